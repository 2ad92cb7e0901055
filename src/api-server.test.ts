import 'reflect-metadata';
import { Server } from 'http';
import { createApiServer, startApiServer } from './api-server';
import { MemoryDecisionLog } from './adapters/persistence/memory-decision-log.adapter';
import { ILogisticsAgent } from './services/logistics-agent.interface';
import { INotificationService } from './services/notification.interface';

describe('Status API', () => {
  let agent: jest.Mocked<ILogisticsAgent>;
  let decisionLog: MemoryDecisionLog;
  let notifications: jest.Mocked<INotificationService>;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    agent = {
      start: jest.fn(),
      stop: jest.fn(),
      runCycle: jest.fn(),
      getStatus: jest.fn()
    };
    agent.getStatus.mockReturnValue({
      agentName: 'TestAgent',
      running: true,
      cycles: 4,
      warehouses: 2,
      activeShipments: 1,
      monitoredRoutes: 1,
      disruptedRoutes: ['R1'],
      lastRuns: {},
      optimizationEnabled: false
    });

    decisionLog = new MemoryDecisionLog();
    notifications = {
      sendAlert: jest.fn(),
      sendInventoryAlerts: jest.fn(),
      sendShipmentAlerts: jest.fn(),
      sendWarehouseCapacityAlerts: jest.fn(),
      sendRouteAlert: jest.fn(),
      sendShipmentUpdate: jest.fn(),
      sendInventoryUpdate: jest.fn(),
      sendLogisticsUpdate: jest.fn(),
      recentNotifications: jest.fn()
    };
    notifications.recentNotifications.mockResolvedValue([{ event_type: 'alert', type: 'stock_out' }]);

    server = await startApiServer(createApiServer(agent, decisionLog, notifications), 0);
    const address = server.address();
    baseUrl = `http://127.0.0.1:${typeof address === 'object' && address !== null ? address.port : 0}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    jest.restoreAllMocks();
  });

  // Test: Health reports the agent name and loop state
  it('should answer the health check', async () => {
    // Act
    const response = await fetch(`${baseUrl}/health`);

    // Assert
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', agent: 'TestAgent', running: true });
  });

  // Test: Status is the agent's own summary
  it('should return the agent status', async () => {
    // Act
    const body = await (await fetch(`${baseUrl}/api/status`)).json();

    // Assert
    expect(body).toEqual({
      success: true,
      status: expect.objectContaining({ cycles: 4, disruptedRoutes: ['R1'] })
    });
  });

  // Test: Decisions newest first, limited
  it('should list the latest decisions up to the limit', async () => {
    // Arrange
    for (const id of ['d-1', 'd-2']) {
      await decisionLog.recordDecision({
        id,
        kind: 'reroute',
        subjectId: 'S1',
        reason: 'significant_delay',
        outcome: 'executed',
        details: {},
        createdAt: new Date('2025-03-01T12:00:00Z')
      });
    }

    // Act
    const body = await (await fetch(`${baseUrl}/api/decisions?limit=1`)).json();

    // Assert
    expect(body).toEqual({
      success: true,
      decisions: [
        {
          id: 'd-2',
          kind: 'reroute',
          subjectId: 'S1',
          reason: 'significant_delay',
          outcome: 'executed',
          details: {},
          createdAt: '2025-03-01T12:00:00.000Z'
        }
      ]
    });
  });

  // Test: Invalid limits are rejected
  it('should reject a limit that is not a positive integer', async () => {
    // Act
    const response = await fetch(`${baseUrl}/api/decisions?limit=abc`);

    // Assert
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: 'limit must be an integer between 1 and 1000'
    });
  });

  // Test: Store failures become 500 responses
  it('should return 500 when the decision log fails', async () => {
    // Arrange
    jest.spyOn(decisionLog, 'listDecisions').mockRejectedValue(new Error('db offline'));

    // Act
    const response = await fetch(`${baseUrl}/api/decisions`);

    // Assert
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ success: false, error: 'db offline' });
  });

  // Test: Notifications use the default limit
  it('should list recent notifications with the default limit', async () => {
    // Act
    const body = await (await fetch(`${baseUrl}/api/notifications`)).json();

    // Assert
    expect(notifications.recentNotifications).toHaveBeenCalledWith(50);
    expect(body).toEqual({ success: true, notifications: [{ event_type: 'alert', type: 'stock_out' }] });
  });

  // Test: A cycle can be triggered on demand
  it('should run a cycle on request', async () => {
    // Arrange
    agent.runCycle.mockResolvedValue({
      startedAt: new Date('2025-03-01T12:00:00Z'),
      completed: ['inventory'],
      failed: ['routes']
    });

    // Act
    const response = await fetch(`${baseUrl}/api/cycle`, { method: 'POST' });

    // Assert
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      report: { startedAt: '2025-03-01T12:00:00.000Z', completed: ['inventory'], failed: ['routes'] }
    });
  });
});
