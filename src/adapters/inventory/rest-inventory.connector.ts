import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { isSuccess, Result } from '../../types/result.types';
import { RestConnector } from '../http/rest-connector';
import { IInventoryConnector, TransferRequest, WarehouseInfo } from './inventory-connector.interface';

const InventoryPayloadSchema = z.record(z.unknown());

const WarehouseInfoSchema = z.object({
  name: z.string().optional(),
  location: z.string().optional(),
  capacity: z.coerce.number().nonnegative().optional(),
  coordinates: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180)
  }).optional()
});

const TransferResponseSchema = z.object({
  transfer_id: z.union([z.string().min(1), z.number()]).transform(String)
});

@injectable()
export class RestInventoryConnector extends RestConnector implements IInventoryConnector {
  constructor(@inject('AppConfig') config: AppConfig) {
    super('Inventory API', config.apis.inventory, config);
  }

  protected authenticate(_url: URL, headers: Record<string, string>): void {
    headers['Authorization'] = `Bearer ${this.credentials.apiKey}`;
    if (this.credentials.apiSecret) {
      headers['X-API-Secret'] = this.credentials.apiSecret;
    }
  }

  async getAllInventory(): Promise<Result<Record<string, unknown>>> {
    const result = await this.call('GET', 'inventory', InventoryPayloadSchema);
    if (result.success) {
      this.logger.info('Retrieved inventory data for all warehouses');
    } else {
      this.logger.error(`Failed to retrieve inventory data: ${result.message}`);
    }
    return result;
  }

  async getWarehouseInfo(warehouseId: string): Promise<Result<WarehouseInfo>> {
    const result = await this.call(
      'GET',
      `warehouses/${encodeURIComponent(warehouseId)}`,
      WarehouseInfoSchema
    );
    if (!isSuccess(result)) {
      this.logger.error(`Failed to retrieve information for warehouse ${warehouseId}: ${result.message}`);
      return { success: false, message: result.message };
    }

    const info = result.data;
    return {
      success: true,
      data: {
        name: info.name ?? `Warehouse ${warehouseId}`,
        location: info.location ?? 'Unknown',
        capacity: info.capacity ?? 0,
        coordinates: info.coordinates
      },
      message: `Warehouse ${warehouseId} retrieved successfully`
    };
  }

  async createTransfer(request: TransferRequest): Promise<Result<string>> {
    this.logger.info(
      `Creating inventory transfer from ${request.sourceWarehouseId} to ${request.destinationWarehouseId} for ${request.items.length} items`
    );
    const result = await this.call('POST', 'transfers', TransferResponseSchema, {
      body: {
        source_warehouse: request.sourceWarehouseId,
        destination_warehouse: request.destinationWarehouseId,
        items: request.items,
        requested_by: this.config.agentName
      }
    });
    if (!isSuccess(result)) {
      this.logger.error(`Failed to create inventory transfer: ${result.message}`);
      return { success: false, message: result.message };
    }

    this.logger.info(`Created inventory transfer ${result.data.transfer_id}`);
    return {
      success: true,
      data: result.data.transfer_id,
      message: `Transfer ${result.data.transfer_id} created`
    };
  }
}
