/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency gets a unique Symbol so the tsyringe container
 * knows "when someone asks for X, give them Y". Symbols never collide with a
 * stray string and stay out of JSON.stringify output.
 *
 * Grouped by architectural layer; register a new token here first.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),

  // Repositories
  EstablishmentRepository: Symbol.for('EstablishmentRepository'),

  // Services
  CatalogService: Symbol.for('CatalogService'),
  ImportService: Symbol.for('ImportService'),

  // Adapters
  DataSourceAdapter: Symbol.for('DataSourceAdapter'),
} as const;
