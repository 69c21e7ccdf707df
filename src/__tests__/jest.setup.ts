/**
 * Jest Global Setup
 *
 * Runs before every test file. The `reflect-metadata` import is required
 * because tsyringe's decorators (@injectable, @inject) rely on the Reflect
 * API to store constructor parameter metadata at class-definition time.
 *
 * LOG_LEVEL is set before any test imports core/config, so the pino logger
 * (and every request/audit line) is silent unless a run asks for output.
 */
import 'reflect-metadata';

process.env.LOG_LEVEL ??= 'silent';
