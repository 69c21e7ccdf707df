/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * This is the single place where we wire together every dependency in the app.
 * Each token (name badge) is mapped to a concrete implementation so that when
 * the dispatcher says "I need the SportsProvider", the container looks up the
 * token and hands back the right object.
 *
 *   - `reflect-metadata` must be imported first — tsyringe reads the
 *     constructor metadata that @injectable/@inject store through it.
 *   - `useValue` registers a pre-built singleton. The provider is built here
 *     exactly once, so its rate limiter is shared by every request.
 *   - The dispatcher is registered as a singleton class: it holds no
 *     per-request state, and the provider it wraps must not be rebuilt.
 *
 * A provider name the factory does not know throws here, at bootstrap, rather
 * than on the first request.
 */
import 'reflect-metadata';

import { createOperationRegistry } from '@application/operations/operationRegistry';
import { OperationDispatcher } from '@application/services/OperationDispatcher';
import { createProvider } from '@infrastructure/providers/createProvider';
import { container, Lifecycle } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.SportsProvider, { useValue: createProvider(config.provider) });
container.register(TOKENS.OperationRegistry, { useValue: createOperationRegistry() });
container.register(
  TOKENS.OperationDispatcher,
  { useClass: OperationDispatcher },
  { lifecycle: Lifecycle.Singleton },
);

export { container };
