import 'reflect-metadata';
import { RestInventoryConnector } from './rest-inventory.connector';
import { buildTestConfig, errorResponse, jsonResponse } from '../../test/fixtures';
import { isSuccess } from '../../types/result.types';

const fetchMock = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>();
global.fetch = fetchMock;

describe('RestInventoryConnector', () => {
  let connector: RestInventoryConnector;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    connector = new RestInventoryConnector(buildTestConfig());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getAllInventory', () => {
    // Test: Credentials travel as bearer key plus secret header
    it('should send the key and secret with the request', async () => {
      // Arrange
      fetchMock.mockResolvedValue(jsonResponse({ warehouses: [] }));

      // Act
      const result = await connector.getAllInventory();

      // Assert
      expect(isSuccess(result) && result.data).toEqual({ warehouses: [] });
      expect(fetchMock).toHaveBeenCalledWith(
        'http://inventory.test/api/inventory',
        expect.objectContaining({
          method: 'GET',
          headers: {
            Accept: 'application/json',
            Authorization: 'Bearer inventory-key',
            'X-API-Secret': 'test-secret'
          }
        })
      );
    });

    // Test: 5xx responses are retried until one succeeds
    it('should retry a server error and return the later success', async () => {
      // Arrange
      fetchMock
        .mockResolvedValueOnce(errorResponse(503, 'Service Unavailable'))
        .mockResolvedValueOnce(jsonResponse({ W1: {} }));

      // Act
      const result = await connector.getAllInventory();

      // Assert
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(result.success).toBe(true);
    });

    // Test: Retries stop at the configured attempt count
    it('should fail after exhausting every attempt', async () => {
      // Arrange
      fetchMock.mockImplementation(async () => errorResponse(500, 'Internal Server Error'));

      // Act
      const result = await connector.getAllInventory();

      // Assert
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(result).toEqual({
        success: false,
        message: 'GET inventory failed after 3 attempts: HTTP 500: Internal Server Error'
      });
    });

    // Test: Client errors are not retried
    it('should not retry a 404', async () => {
      // Arrange
      fetchMock.mockResolvedValue(errorResponse(404, 'Not Found'));

      // Act
      const result = await connector.getAllInventory();

      // Assert
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(result).toEqual({ success: false, message: 'GET inventory failed: HTTP 404: Not Found' });
    });

    // Test: Network failures count as retryable
    it('should retry network errors', async () => {
      // Arrange
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse({}));

      // Act
      const result = await connector.getAllInventory();

      // Assert
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(result.success).toBe(true);
    });
  });

  describe('getWarehouseInfo', () => {
    // Test: Missing fields fall back to defaults, capacity 0 meaning unknown
    it('should fill defaults for absent warehouse fields', async () => {
      // Arrange
      fetchMock.mockResolvedValue(jsonResponse({ capacity: '5000' }));

      // Act
      const result = await connector.getWarehouseInfo('W1');

      // Assert
      expect(isSuccess(result) && result.data).toEqual({
        name: 'Warehouse W1',
        location: 'Unknown',
        capacity: 5000,
        coordinates: undefined
      });
      expect(fetchMock.mock.calls[0][0]).toBe('http://inventory.test/api/warehouses/W1');
    });

    // Test: Payload validation failures are reported, not thrown
    it('should reject a negative capacity', async () => {
      // Arrange
      fetchMock.mockResolvedValue(jsonResponse({ capacity: -1 }));

      // Act
      const result = await connector.getWarehouseInfo('W1');

      // Assert
      expect(result.success).toBe(false);
      expect(result.message).toContain('capacity');
    });
  });

  describe('createTransfer', () => {
    // Test: Transfer body carries the agent name and returns the new id
    it('should post the transfer and return its id', async () => {
      // Arrange
      fetchMock.mockResolvedValue(jsonResponse({ transfer_id: 42 }));

      // Act
      const result = await connector.createTransfer({
        sourceWarehouseId: 'W2',
        destinationWarehouseId: 'W1',
        items: [{ id: 'bolts', quantity: 10, unit: 'box' }]
      });

      // Assert
      expect(isSuccess(result) && result.data).toBe('42');
      const init = fetchMock.mock.calls[0][1];
      expect(init?.method).toBe('POST');
      expect(JSON.parse(String(init?.body))).toEqual({
        source_warehouse: 'W2',
        destination_warehouse: 'W1',
        items: [{ id: 'bolts', quantity: 10, unit: 'box' }],
        requested_by: 'TestAgent'
      });
    });

    // Test: A response without transfer id is a failure
    it('should fail when no transfer id is returned', async () => {
      // Arrange
      fetchMock.mockResolvedValue(jsonResponse({ status: 'queued' }));

      // Act
      const result = await connector.createTransfer({
        sourceWarehouseId: 'W2',
        destinationWarehouseId: 'W1',
        items: []
      });

      // Assert
      expect(result.success).toBe(false);
    });
  });

  describe('checkConnection', () => {
    // Test: 401 is reported as rejected credentials
    it('should report rejected credentials', async () => {
      // Arrange
      fetchMock.mockResolvedValue(errorResponse(401, 'Unauthorized'));

      // Act
      const check = await connector.checkConnection();

      // Assert
      expect(check).toEqual({
        ok: false,
        message: 'Inventory API rejected the configured credentials (HTTP 401)'
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    // Test: A 404 on the base URL still proves the API is reachable
    it('should treat a 404 on the base URL as reachable', async () => {
      // Arrange
      fetchMock.mockResolvedValue(errorResponse(404, 'Not Found'));

      // Act
      const check = await connector.checkConnection();

      // Assert
      expect(check.ok).toBe(true);
      expect(fetchMock.mock.calls[0][0]).toBe('http://inventory.test/api/');
    });

    // Test: Network errors mean unreachable
    it('should report an unreachable API', async () => {
      // Arrange
      fetchMock.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:80'));

      // Act
      const check = await connector.checkConnection();

      // Assert
      expect(check).toEqual({
        ok: false,
        message: 'Inventory API unreachable at http://inventory.test/api: connect ECONNREFUSED 127.0.0.1:80'
      });
    });
  });
});
