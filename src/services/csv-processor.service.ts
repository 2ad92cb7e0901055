import * as fs from 'fs';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { injectable } from 'tsyringe';
import { z } from 'zod';
import { DecisionLogEntry } from '../types/decision.types';
import { distanceKey } from '../utils/geo.util';
import { createLogger } from '../utils/logger';
import { ICsvProcessor } from './csv-processor.interface';

const logger = createLogger('CSV');

const DistanceRowSchema = z.object({
  origin: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  distance_km: z.coerce.number().finite().nonnegative()
});

const REPORT_COLUMNS = ['id', 'created_at', 'kind', 'subject_id', 'reason', 'outcome', 'details'];

@injectable()
export class CsvProcessorService implements ICsvProcessor {
  async readDistanceMatrix(csvPath: string): Promise<Map<string, number>> {
    return new Promise((resolve, reject) => {
      const distances = new Map<string, number>();
      let line = 1;

      fs.createReadStream(csvPath)
        .pipe(parse({ columns: true, skip_empty_lines: true, trim: true }))
        .on('data', (row: unknown) => {
          line++;
          const parsed = DistanceRowSchema.safeParse(row);
          if (!parsed.success) {
            logger.warn(`Skipping distance row ${line}: ${parsed.error.issues.map(i => i.path.join('.')).join(', ')}`);
            return;
          }
          const { origin, destination, distance_km } = parsed.data;
          distances.set(distanceKey(origin, destination), distance_km);
        })
        .on('end', () => {
          logger.info(`Loaded ${distances.size} warehouse distances from ${csvPath}`);
          resolve(distances);
        })
        .on('error', (error) => reject(error));
    });
  }

  async writeDecisionReport(outputPath: string, entries: DecisionLogEntry[]): Promise<void> {
    const rows = entries.map(entry => ({
      id: entry.id,
      created_at: entry.createdAt.toISOString(),
      kind: entry.kind,
      subject_id: entry.subjectId,
      reason: entry.reason,
      outcome: entry.outcome,
      details: JSON.stringify(entry.details)
    }));

    return new Promise((resolve, reject) => {
      stringify(rows, { header: true, columns: REPORT_COLUMNS }, (err, output) => {
        if (err) {
          reject(err);
          return;
        }

        fs.writeFile(outputPath, output, (writeErr) => {
          if (writeErr) {
            reject(writeErr);
            return;
          }
          resolve();
        });
      });
    });
  }
}
