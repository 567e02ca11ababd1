/**
 * Jest Global Setup
 *
 * Runs before every test file. tsyringe's decorators (@injectable, @inject)
 * need the Reflect metadata API at class-definition time; in production
 * container.ts imports it first, here this file does.
 *
 * The env defaults keep pino quiet and config out of development mode
 * (no pino-pretty transport thread).
 */
import 'reflect-metadata';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
