import 'reflect-metadata';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CsvProcessorService } from './csv-processor.service';

describe('CsvProcessorService', () => {
  let dir: string;
  let service: CsvProcessorService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-processor-'));
    service = new CsvProcessorService();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  describe('readDistanceMatrix', () => {
    // Test: Valid rows keyed in both directions, invalid rows skipped
    it('should load distances and skip invalid rows', async () => {
      // Arrange
      const csvPath = path.join(dir, 'distances.csv');
      fs.writeFileSync(csvPath, [
        'origin,destination,distance_km',
        'W1,W2,120.5',
        'W3,W1,80',
        'W2,,10',
        'W4,W5,abc'
      ].join('\n'));

      // Act
      const distances = await service.readDistanceMatrix(csvPath);

      // Assert
      expect([...distances.entries()]).toEqual([
        ['W1|W2', 120.5],
        ['W1|W3', 80]
      ]);
      expect(console.warn).toHaveBeenCalledTimes(2);
    });

    // Test: Missing file rejects
    it('should reject when the file does not exist', async () => {
      await expect(service.readDistanceMatrix(path.join(dir, 'missing.csv'))).rejects.toThrow('ENOENT');
    });
  });

  describe('writeDecisionReport', () => {
    // Test: One row per decision with details as JSON
    it('should write decisions with a header row', async () => {
      // Arrange
      const outputPath = path.join(dir, 'decisions.csv');

      // Act
      await service.writeDecisionReport(outputPath, [
        {
          id: 'd-1',
          kind: 'inventory_transfer',
          subjectId: 'W2->W1:bolts',
          reason: 'low_stock',
          outcome: 'executed',
          details: { transferId: 'T-1' },
          createdAt: new Date('2025-03-01T12:00:00Z')
        }
      ]);

      // Assert
      expect(fs.readFileSync(outputPath, 'utf-8')).toBe(
        'id,created_at,kind,subject_id,reason,outcome,details\n' +
        'd-1,2025-03-01T12:00:00.000Z,inventory_transfer,W2->W1:bolts,low_stock,executed,"{""transferId"":""T-1""}"\n'
      );
    });
  });
});
