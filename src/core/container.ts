/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where tokens are mapped to implementations. No class
 * ever does `new PostgresEstablishmentRepository(...)` by hand; it asks the
 * container for TOKENS.EstablishmentRepository.
 *
 *   - `reflect-metadata` must load first so tsyringe can read constructor
 *     parameter metadata written by @inject/@injectable.
 *   - `useValue` registers a pre-built singleton (logger).
 *   - The Knex pool is built on first resolve, so code paths that never
 *     touch the database (tests with a mocked repository) never open one.
 *   - `useClass` constructs the class with its own dependencies injected.
 *
 * Integration tests override TOKENS.EstablishmentRepository after importing
 * this module; tsyringe resolves the last registration.
 */
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Knex } from 'knex';

import { TOKENS } from './types';
import { logger } from './logger';

import { CatalogService } from '@application/services/CatalogService';
import { ImportService } from '@application/services/ImportService';
import { getDbConnection } from '@infrastructure/database/connection';
import { PostgresEstablishmentRepository } from '@infrastructure/repositories/PostgresEstablishmentRepository';
import { JsonDataSourceAdapter } from '@workers/import/JsonDataSourceAdapter';

container.register(TOKENS.Logger, { useValue: logger });
container.register<Knex>(TOKENS.Knex, {
  useFactory: instanceCachingFactory<Knex>(() => getDbConnection()),
});
container.register(TOKENS.EstablishmentRepository, { useClass: PostgresEstablishmentRepository });
container.register(TOKENS.DataSourceAdapter, { useClass: JsonDataSourceAdapter });
container.register(TOKENS.CatalogService, { useClass: CatalogService });
container.register(TOKENS.ImportService, { useClass: ImportService });

export { container };
