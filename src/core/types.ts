/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * In our DI system (tsyringe), every injectable dependency needs a unique
 * identifier so the container knows "when someone asks for X, give them Y."
 *
 * Think of these tokens as **name badges at a conference**. When the
 * dispatcher says "I need the SportsProvider", it holds up the
 * TOKENS.SportsProvider badge, and the container hands over whichever adapter
 * was registered (OpenLigaProvider in production, a stub in tests).
 *
 * Symbols instead of plain strings: guaranteed unique, and they never show up
 * in JSON.stringify output.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the app needs to function
  Logger: Symbol.for('Logger'),

  // Adapters — the one active upstream provider
  SportsProvider: Symbol.for('SportsProvider'),

  // Application — the operation catalog and its executor
  OperationRegistry: Symbol.for('OperationRegistry'),
  OperationDispatcher: Symbol.for('OperationDispatcher'),
} as const;
