import { readFile } from 'fs/promises';
import * as path from 'path';
import { Pool } from 'pg';
import { z } from 'zod';
import { DatabaseConfig } from '../../config/app.config';
import { DecisionLogEntry } from '../../types/decision.types';
import { NotificationRecord } from '../../types/notification.types';
import { createLogger, errorMessage } from '../../utils/logger';
import { IDecisionLog } from './decision-log.interface';

const logger = createLogger('Decision Log');

export const SCHEMA_PATH = path.join(__dirname, '../../../sql/schema.sql');

const DecisionRowSchema = z.object({
  id: z.string(),
  kind: z.enum(['reroute', 'inventory_transfer', 'schedule_adjustment']),
  subject_id: z.string(),
  reason: z.string(),
  outcome: z.enum(['executed', 'failed']),
  details: z.record(z.unknown()),
  created_at: z.coerce.date()
});

export class PostgresDecisionLog implements IDecisionLog {
  private readonly pool: Pool;

  constructor(config: DatabaseConfig) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: 5
    });
    this.pool.on('error', (error: Error) => {
      logger.error(`Idle PostgreSQL client error: ${error.message}`);
    });
  }

  async initialize(): Promise<void> {
    const schema = await readFile(SCHEMA_PATH, 'utf-8');
    await this.pool.query(schema);
    logger.info('Database schema is up to date');
  }

  async recordDecision(entry: DecisionLogEntry): Promise<void> {
    await this.pool.query(
      `INSERT INTO decisions (id, kind, subject_id, reason, outcome, details, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        entry.id,
        entry.kind,
        entry.subjectId,
        entry.reason,
        entry.outcome,
        JSON.stringify(entry.details),
        entry.createdAt
      ]
    );
  }

  async recordNotification(record: NotificationRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO notifications (category, type, severity, message, details, channels, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        record.category,
        record.type,
        record.severity,
        record.message,
        JSON.stringify(record.details),
        record.channels,
        record.timestamp
      ]
    );
  }

  async listDecisions(limit: number): Promise<DecisionLogEntry[]> {
    const result = await this.pool.query(
      `SELECT id, kind, subject_id, reason, outcome, details, created_at
         FROM decisions
        ORDER BY created_at DESC
        LIMIT $1`,
      [limit]
    );

    const entries: DecisionLogEntry[] = [];
    for (const row of result.rows) {
      const parsed = DecisionRowSchema.safeParse(row);
      if (!parsed.success) {
        logger.warn(`Skipping malformed decision row: ${parsed.error.issues.map(i => i.path.join('.')).join(', ')}`);
        continue;
      }
      entries.push({
        id: parsed.data.id,
        kind: parsed.data.kind,
        subjectId: parsed.data.subject_id,
        reason: parsed.data.reason,
        outcome: parsed.data.outcome,
        details: parsed.data.details,
        createdAt: parsed.data.created_at
      });
    }
    return entries;
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.error(`PostgreSQL ping failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
