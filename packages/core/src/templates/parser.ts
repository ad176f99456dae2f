import { parse as parseYaml } from 'yaml';
import { TemplateDefinitionSchema, TemplateParseError } from './schema.js';
import type { TemplateDefinition } from './schema.js';
import { DocumentTemplate } from './document-template.js';
import { ApprovalWorkflow, DocumentStyle, Margins, Section } from './entities.js';

/**
 * Parse YAML template content and check it against the definition schema
 *
 * @param yamlContent - Raw YAML template content
 * @throws TemplateParseError if the YAML is malformed or has the wrong shape
 *
 * @example
 * ```typescript
 * const definition = parseTemplateDefinition(await readFile('nda.yaml', 'utf-8'));
 * registry.register(definition.name, toDocumentTemplate(definition));
 * ```
 */
export function parseTemplateDefinition(yamlContent: string): TemplateDefinition {
  try {
    const parsed: unknown = parseYaml(yamlContent);

    if (!parsed) {
      throw new TemplateParseError('Template file is empty or contains only comments');
    }

    return validateTemplateDefinition(parsed);
  } catch (error) {
    if (error instanceof TemplateParseError) {
      throw error;
    }

    // Handle YAML parsing errors
    if (error instanceof Error) {
      throw new TemplateParseError(`Failed to parse YAML template: ${error.message}`);
    }

    throw new TemplateParseError('Unknown error parsing template');
  }
}

/**
 * Validate an already parsed definition object
 *
 * @throws TemplateParseError if the object has the wrong shape
 */
export function validateTemplateDefinition(definition: unknown): TemplateDefinition {
  const result = TemplateDefinitionSchema.safeParse(definition);

  if (!result.success) {
    throw new TemplateParseError('Template definition is invalid', result.error);
  }

  return result.data;
}

/**
 * Build a template graph from a definition
 *
 * The result owns fresh copies of every collection in the definition.
 */
export function toDocumentTemplate(definition: TemplateDefinition): DocumentTemplate {
  const { style, workflow } = definition;

  return new DocumentTemplate({
    title: definition.title,
    category: definition.category,
    style: style
      ? new DocumentStyle({
          fontFamily: style.fontFamily,
          fontSize: style.fontSize,
          headerColor: style.headerColor,
          logoUrl: style.logoUrl,
          pageMargins: style.pageMargins ? new Margins(style.pageMargins) : undefined,
        })
      : undefined,
    sections: definition.sections.map(
      (section) =>
        new Section({
          name: section.name,
          content: section.content,
          isEditable: section.isEditable,
          placeholders: [...section.placeholders],
        })
    ),
    requiredFields: [...definition.requiredFields],
    metadata: new Map(Object.entries(definition.metadata)),
    workflow: workflow
      ? new ApprovalWorkflow({
          approvers: [...workflow.approvers],
          requiredApprovals: workflow.requiredApprovals,
          timeoutDays: workflow.timeoutDays,
        })
      : undefined,
    tags: [...definition.tags],
  });
}
