import { DecisionLogEntry } from '../../types/decision.types';
import { NotificationRecord } from '../../types/notification.types';
import { IDecisionLog } from './decision-log.interface';

const MAX_ENTRIES = 1000;

/**
 * Bounded in-process log, used when no database is configured.
 */
export class MemoryDecisionLog implements IDecisionLog {
  private readonly decisions: DecisionLogEntry[] = [];
  private readonly notifications: NotificationRecord[] = [];

  async initialize(): Promise<void> {
    // no schema
  }

  async recordDecision(entry: DecisionLogEntry): Promise<void> {
    this.decisions.unshift(entry);
    this.decisions.splice(MAX_ENTRIES);
  }

  async recordNotification(record: NotificationRecord): Promise<void> {
    this.notifications.unshift(record);
    this.notifications.splice(MAX_ENTRIES);
  }

  async listDecisions(limit: number): Promise<DecisionLogEntry[]> {
    return this.decisions.slice(0, limit);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.decisions.length = 0;
    this.notifications.length = 0;
  }
}
