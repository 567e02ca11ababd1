/**
 * Import Service — Facade over the Bulk Load
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * `importFile(filePath)` hides the whole offline load:
 *   - reading and validating the JSON document
 *   - normalizing each record through the data source adapter
 *   - buffering into batches and inserting through the repository
 *
 * This is never reachable from HTTP; the catalog is read-only at serve time
 * and the seed script (src/scripts/seed.ts) is the only caller.
 */
import { config } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { IEstablishmentRepository } from '@domain/interfaces/IEstablishmentRepository';
import { ValidationError } from '@shared/errors/AppError';
import type { ImportResult } from '@shared/types';
import { BatchProcessor } from '@workers/import/batchProcessor';
import { importFileSchema } from '@workers/import/JsonDataSourceAdapter';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { inject, injectable } from 'tsyringe';

export interface ImportOptions {
  /** Delete existing rows before loading. */
  truncate?: boolean;
  /** Rows per INSERT batch; defaults to IMPORT_BATCH_SIZE. */
  batchSize?: number;
  /** Called after every flushed batch with the running inserted count. */
  onProgress?: (inserted: number) => void;
}

@injectable()
export class ImportService {
  constructor(
    @inject(TOKENS.EstablishmentRepository) private repo: IEstablishmentRepository,
    @inject(TOKENS.DataSourceAdapter) private adapter: IDataSourceAdapter,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async importFile(filePath: string, options: ImportOptions = {}): Promise<ImportResult> {
    const absolutePath = path.resolve(filePath);
    this.log.info({ filePath: absolutePath }, 'Starting catalog import');

    const content = await readFile(absolutePath, 'utf-8');
    return this.importRecords(parseImportDocument(content), options);
  }

  async importRecords(records: unknown[], options: ImportOptions = {}): Promise<ImportResult> {
    const startTime = Date.now();

    if (options.truncate) {
      await this.repo.truncate();
    }

    const processor = new BatchProcessor((rows) => this.repo.insertMany(rows), {
      batchSize: options.batchSize ?? config.import.batchSize,
    });

    let skipped = 0;
    let lastReported = 0;
    for (const raw of records) {
      const entity = this.adapter.normalize(raw);
      if (!entity) {
        skipped++;
        continue;
      }
      await processor.add(entity);
      if (options.onProgress && processor.inserted !== lastReported) {
        lastReported = processor.inserted;
        options.onProgress(lastReported);
      }
    }
    await processor.flush();
    if (options.onProgress && processor.inserted !== lastReported) {
      options.onProgress(processor.inserted);
    }

    const result: ImportResult = {
      totalRead: records.length,
      totalInserted: processor.inserted,
      totalSkipped: skipped,
      durationMs: Date.now() - startTime,
    };
    this.log.info(result, 'Catalog import finished');
    return result;
  }
}

/** Parse the import document; anything but `{ establecimientos: [...] }` is rejected. */
export function parseImportDocument(content: string): unknown[] {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Import file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = importFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ValidationError('Import file must contain an "establecimientos" array');
  }
  return parsed.data.establecimientos;
}
