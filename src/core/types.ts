/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up by one of these Symbols. They are
 * grouped by layer so it is easy to see what exists at each level; a new
 * client or service gets its token here before it is registered in
 * container.ts.
 */
export const TOKENS = {
  // Infrastructure — process-wide values and tools
  Logger: Symbol.for('Logger'),
  RegistryConfig: Symbol.for('RegistryConfig'),
  CompletionConfig: Symbol.for('CompletionConfig'),
  ReportConfig: Symbol.for('ReportConfig'),

  // Clients — outbound provider contracts
  RegistryClient: Symbol.for('RegistryClient'),
  CompletionClient: Symbol.for('CompletionClient'),

  // Services — application-level orchestrators
  AnalysisService: Symbol.for('AnalysisService'),
} as const;
