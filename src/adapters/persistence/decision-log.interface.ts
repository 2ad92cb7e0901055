import { DecisionLogEntry } from '../../types/decision.types';
import { NotificationRecord } from '../../types/notification.types';

/**
 * Append-only log of the agent's decisions and the notifications it sent.
 */
export interface IDecisionLog {
  /** Creates tables if they do not exist. */
  initialize(): Promise<void>;
  recordDecision(entry: DecisionLogEntry): Promise<void>;
  recordNotification(record: NotificationRecord): Promise<void>;
  /** Newest first. */
  listDecisions(limit: number): Promise<DecisionLogEntry[]>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
