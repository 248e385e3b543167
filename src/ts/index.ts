/**
 * Main entry point - exports the decision engine, adapters, runtime and CLI
 */

export * from './core/types';
export * from './core/engine';
export * from './core/trend';
export * from './core/errors';
export * from './core/logger';
export * from './core/schema';
export * from './core/collaborators';
export * from './core/state-store';
export * from './core/history';
export * from './adapters/exec';
export * from './adapters/metrics-source';
export * from './adapters/scorer';
export * from './adapters/mwan3';
export * from './adapters/audit';
export * from './runtime/config';
export * from './runtime/lock';
export * from './runtime/cycle';
export * from './runtime/monitor';
export * from './runtime/wiring';
export * from './cli/cli';
