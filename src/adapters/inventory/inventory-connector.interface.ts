import { GeoLocation } from '../../types/domain.types';
import { Result } from '../../types/result.types';
import { ConnectionCheck } from '../http/rest-connector';

export interface WarehouseInfo {
  name: string;
  location: string;
  capacity: number;
  coordinates?: GeoLocation;
}

export interface TransferRequest {
  sourceWarehouseId: string;
  destinationWarehouseId: string;
  items: Array<{ id: string; quantity: number; unit: string }>;
}

/**
 * Connector for the inventory management system.
 */
export interface IInventoryConnector {
  /**
   * Raw inventory for every warehouse, in whichever shape the system returns it.
   */
  getAllInventory(): Promise<Result<Record<string, unknown>>>;
  getWarehouseInfo(warehouseId: string): Promise<Result<WarehouseInfo>>;
  /**
   * @returns Result with the transfer id assigned by the inventory system
   */
  createTransfer(request: TransferRequest): Promise<Result<string>>;
  checkConnection(): Promise<ConnectionCheck>;
}
