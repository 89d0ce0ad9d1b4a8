/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Symbols the tsyringe container maps to implementations. Symbol.for keeps
 * them stable if this module is loaded twice (e.g. by a test and by the code
 * under test through a different path).
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  BufferPool: Symbol.for('BufferPool'),

  // Configuration slices
  EncoderSettings: Symbol.for('EncoderSettings'),

  // Factories
  EncoderFactory: Symbol.for('EncoderFactory'),
} as const;
