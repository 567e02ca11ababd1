/**
 * Seed CLI Script — Standalone Catalog Import
 * Layer: Entry Point (CLI, not HTTP)
 *
 * npm run seed -- [--file path] [--migrate] [--truncate]
 *
 * I check the file exists, optionally run migrations, then hand the file to
 * ImportService and print counts and throughput. The HTTP API never writes,
 * so this is the only way rows get into the catalog.
 */
import type { ImportService } from '@application/services/ImportService';
import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { destroyDbConnection, getDbConnection } from '@infrastructure/database/connection';
import fs from 'node:fs';
import path from 'node:path';

// CLI argument parsing

const args = process.argv.slice(2);

function getArg(flag: string, fallback: string): string {
  const idx = args.indexOf(flag);
  const value = idx !== -1 ? args[idx + 1] : undefined;
  return value ?? fallback;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

const filePath = path.resolve(getArg('--file', config.import.dataFile));
const runMigrations = hasFlag('--migrate');
const truncate = hasFlag('--truncate');

// Helpers

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString('es-ES');
}

// Main

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  log('');
  log('╔══════════════════════════════════════════════════╗');
  log('║        Establecimientos — Catalog Import         ║');
  log('╚══════════════════════════════════════════════════╝');
  log('');

  if (!fs.existsSync(filePath)) {
    log(`  ERROR: File not found: ${filePath}`);
    log('  Use --file <path> to specify the JSON file.');
    process.exitCode = 1;
    return;
  }

  const fileSize = fs.statSync(filePath).size;
  log(`  File:       ${filePath}`);
  log(`  Size:       ${(fileSize / 1024 / 1024).toFixed(1)} MB`);
  log(`  Batch size: ${formatNumber(config.import.batchSize)}`);
  log(`  Truncate:   ${truncate ? 'yes' : 'no'}`);
  // Show host/db only, never the password
  const dbLabel = (() => {
    try {
      const u = new URL(config.database.url);
      return `${u.hostname}:${u.port || '5432'}${u.pathname}`;
    } catch {
      return '(from DATABASE_URL)';
    }
  })();
  log(`  Database:   ${dbLabel}`);
  log('');

  try {
    if (runMigrations) {
      log('  Running migrations...');
      await getDbConnection().migrate.latest({
        directory: path.resolve(__dirname, '../infrastructure/database/migrations'),
        loadExtensions: ['.ts'],
      });
      log('  Migrations complete.');
      log('');
    }

    log('  Starting import...');
    log('');

    const startTime = Date.now();
    const service = container.resolve<ImportService>(TOKENS.ImportService);
    const result = await service.importFile(filePath, {
      truncate,
      onProgress: (inserted) => {
        log(`  [${formatDuration(Date.now() - startTime)}] ${formatNumber(inserted)} rows inserted`);
      },
    });

    const avgRps =
      result.durationMs > 0 ? Math.round((result.totalInserted / result.durationMs) * 1000) : 0;

    log('');
    log('  ✓ Import complete');
    log(`    Records read:   ${formatNumber(result.totalRead)}`);
    log(`    Inserted:       ${formatNumber(result.totalInserted)}`);
    log(`    Skipped:        ${formatNumber(result.totalSkipped)}`);
    log(`    Duration:       ${formatDuration(result.durationMs)}`);
    log(`    Avg throughput: ${formatNumber(avgRps)} rows/s`);
    log('');
  } finally {
    await destroyDbConnection();
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Seed failed:', err);
  process.exit(1);
});
