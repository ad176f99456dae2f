/**
 * Document Template Registry
 *
 * Master document templates that hand out independent deep copies
 */

export { TemplateService, type TemplateDescription } from './service.js';
export { createDefaultLogger, isLogLevel } from './logger.js';

export type {
  Logger,
  LogLevel,
  TemplateServiceConfig,
  TemplateServiceEvents,
} from './types.js';

// Export template system
export * from './templates/index.js';
