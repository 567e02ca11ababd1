/**
 * Batch Processor — Buffered Bulk Insert
 * Layer: Workers (Import)
 *
 * I buffer establishments and flush them in batches so the import does one
 * INSERT per chunk instead of one per record. Each flush goes through the
 * repository's insertMany (chunked, inside a single transaction), so a
 * failed or retried batch leaves no partial state.
 *
 * Callers await every add() and flush(), so at most one flush is ever in
 * progress; the processor keeps no lock of its own.
 *
 * Retries: on connection errors the whole batch is retried with exponential
 * backoff. Any other error (constraint violation, bad data) fails the
 * import immediately.
 */
import type { NewEstablishment } from '@domain/entities/Establishment';

export type FlushTarget = (rows: NewEstablishment[]) => Promise<number>;

export interface BatchOptions {
  batchSize: number;
  retryAttempts: number;
  retryDelayMs: number;
}

const DEFAULT_BATCH_OPTIONS: BatchOptions = {
  batchSize: 1000,
  retryAttempts: 3,
  retryDelayMs: 1000,
};

export function isRetryableConnectionError(err: unknown): boolean {
  const code = err instanceof Error && 'code' in err ? String(err.code) : null;
  const message = err instanceof Error ? err.message : String(err);
  const connectionErrorCode =
    code === 'ECONNRESET' ||
    code === 'EPIPE' ||
    code === 'ETIMEDOUT' ||
    code === 'ECONNREFUSED' ||
    code === '57P01'; // admin shutdown
  const connectionErrorMessage =
    /connection terminated|terminated unexpectedly|connection closed|connection.*reset/i.test(
      message,
    );
  const poolTimeoutMessage = /timeout acquiring a connection|pool is probably full/i.test(message);
  return connectionErrorCode || connectionErrorMessage || poolTimeoutMessage;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class BatchProcessor {
  private buffer: NewEstablishment[] = [];
  private totalInserted = 0;
  private options: BatchOptions;

  constructor(
    private target: FlushTarget,
    options?: Partial<BatchOptions>,
  ) {
    this.options = { ...DEFAULT_BATCH_OPTIONS, ...options };
  }

  get inserted(): number {
    return this.totalInserted;
  }

  async add(entity: NewEstablishment): Promise<void> {
    this.buffer.push(entity);
    if (this.buffer.length >= this.options.batchSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;
    const batch = this.buffer.splice(0);
    await this.runOneFlush(batch);
  }

  private async runOneFlush(batch: NewEstablishment[]): Promise<void> {
    const { retryAttempts, retryDelayMs } = this.options;
    for (let attempt = 1; attempt <= retryAttempts; attempt++) {
      try {
        this.totalInserted += await this.target(batch);
        return;
      } catch (err) {
        if (!isRetryableConnectionError(err) || attempt === retryAttempts) throw err;
        await delay(retryDelayMs * Math.pow(2, attempt - 1));
      }
    }
  }
}
