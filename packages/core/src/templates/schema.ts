import { z } from 'zod';

/**
 * Zod schema for YAML template definitions
 *
 * Checks shape only. Content rules (such as required approvals not exceeding
 * the approver count) belong to whoever consumes the templates.
 */

const MarginsSchema = z.object({
  top: z.number().int(),
  bottom: z.number().int(),
  left: z.number().int(),
  right: z.number().int(),
});

const StyleSchema = z.object({
  fontFamily: z.string(),
  fontSize: z.number().int(),
  headerColor: z.string(),
  logoUrl: z.string(),
  pageMargins: MarginsSchema.optional(),
});

const SectionSchema = z.object({
  name: z.string(),
  content: z.string(),
  isEditable: z.boolean().default(false),
  placeholders: z.array(z.string()).default([]),
});

const WorkflowSchema = z.object({
  approvers: z.array(z.string()).default([]),
  requiredApprovals: z.number().int(),
  timeoutDays: z.number().int(),
});

// Root definition schema
export const TemplateDefinitionSchema = z.object({
  name: z.string().min(1),
  title: z.string(),
  category: z.string(),
  style: StyleSchema.optional(),
  sections: z.array(SectionSchema).default([]),
  requiredFields: z.array(z.string()).default([]),
  metadata: z.record(z.string()).default({}),
  workflow: WorkflowSchema.optional(),
  tags: z.array(z.string()).default([]),
});

// TypeScript types derived from Zod schemas
export type TemplateDefinition = z.infer<typeof TemplateDefinitionSchema>;
export type StyleDefinition = z.infer<typeof StyleSchema>;
export type SectionDefinition = z.infer<typeof SectionSchema>;
export type WorkflowDefinition = z.infer<typeof WorkflowSchema>;

/**
 * Custom error for template parsing failures
 */
export class TemplateParseError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'TemplateParseError';
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}
