/**
 * Template System - prototypes, registry, YAML loading and built-in masters
 */

export type { Cloneable } from './cloneable.js';

export {
  Margins,
  DocumentStyle,
  Section,
  ApprovalWorkflow,
  type MarginsInit,
  type DocumentStyleInit,
  type SectionInit,
  type ApprovalWorkflowInit,
} from './entities.js';

export { DocumentTemplate, type DocumentTemplateInit } from './document-template.js';

export { TemplateRegistry, TemplateNotFoundError, type TemplateSummary } from './registry.js';

export {
  TemplateDefinitionSchema,
  TemplateParseError,
  type TemplateDefinition,
  type StyleDefinition,
  type SectionDefinition,
  type WorkflowDefinition,
} from './schema.js';

export {
  parseTemplateDefinition,
  validateTemplateDefinition,
  toDocumentTemplate,
} from './parser.js';

export { TemplateLoader, type LoadedTemplate, type TemplateSink } from './loader.js';

export {
  SERVICE_CONTRACT,
  CONSULTING_CONTRACT,
  buildServiceContractTemplate,
  customizeConsultingContract,
} from './builtins.js';
