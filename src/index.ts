export * from './engine/index.js';
export * from './providers/index.js';
export { loadDeclarations, parseDeclarations, declarationId, type DeclarationDocument, type ResourceDeclaration } from './runner/config.js';
export { runDeclarations, formatResult, DEFAULT_CONCURRENCY, type ResourceResult, type VerifyRunOptions, type VerifyRunResult } from './runner/verify.js';
export { createExecutor } from './runner/executor-factory.js';
export { parseBackendSelector } from './runner/target.js';
export type { CommandExecutor, CommandResult, ExecutorTarget } from './runner/executor-interface.js';
