/**
 * Core types for the template registry library
 */

import type { TemplateRegistry } from './templates/registry.js';

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// ============================================================================
// Service Configuration
// ============================================================================

export interface TemplateServiceConfig {
  logLevel?: LogLevel;
  logger?: Logger;
  registry?: TemplateRegistry; // Bring your own registry (shared between services)
  templatePaths?: string[]; // Directories scanned by loadTemplates()
  builtins?: boolean; // Register the built-in contract templates (default: true)
}

// ============================================================================
// Service Events
// ============================================================================

export interface TemplateServiceEvents {
  'template:registered': (name: string) => void;
  'template:created': (name: string) => void;
}
