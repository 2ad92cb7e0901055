import { DecisionLogEntry } from '../types/decision.types';

export interface ICsvProcessor {
  /** Warehouse distances in km keyed by `distanceKey(origin, destination)`. */
  readDistanceMatrix(csvPath: string): Promise<Map<string, number>>;
  writeDecisionReport(outputPath: string, entries: DecisionLogEntry[]): Promise<void>;
}
