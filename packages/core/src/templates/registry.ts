import type { Logger } from '../types.js';
import type { Cloneable } from './cloneable.js';
import type { DocumentTemplate } from './document-template.js';

/**
 * Custom error for template not found
 */
export class TemplateNotFoundError extends Error {
  readonly templateName: string;

  constructor(templateName: string) {
    super(`Template not found: ${templateName}`);
    this.name = 'TemplateNotFoundError';
    this.templateName = templateName;
  }
}

/**
 * Summary of a registered template, for listings
 */
export interface TemplateSummary {
  name: string;
  title: string;
  category: string;
  sectionCount: number;
  tags: string[];
}

/**
 * Template Registry - Central store for master templates
 *
 * Masters are stored as given and never handed out; {@link create} returns a
 * fresh clone on every call.
 */
export class TemplateRegistry<T extends Cloneable<T> = DocumentTemplate> {
  private templates: Map<string, T> = new Map();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Register a master template, replacing any master already under `name`
   *
   * The registry keeps the exact instance; callers must not mutate it afterwards.
   */
  register(name: string, template: T): void {
    if (this.templates.has(name)) {
      this.logger?.debug(`Overwriting template: ${name}`);
    }

    this.templates.set(name, template);
  }

  /**
   * Create an independent copy of a master template
   *
   * @throws TemplateNotFoundError if nothing is registered under `name`
   */
  create(name: string): T {
    const master = this.templates.get(name);

    if (!master) {
      throw new TemplateNotFoundError(name);
    }

    return master.clone();
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * Get all registered names, in registration order
   */
  names(): string[] {
    return Array.from(this.templates.keys());
  }

  /**
   * Unregister a template
   *
   * @returns true if template was unregistered, false if not found
   */
  unregister(name: string): boolean {
    return this.templates.delete(name);
  }

  /**
   * Clear all templates (useful for testing)
   */
  clear(): void {
    this.templates.clear();
  }

  get size(): number {
    return this.templates.size;
  }

  /**
   * Summarize every registered master
   *
   * Only available for document templates; the summary reads their fields.
   */
  listSummaries(this: TemplateRegistry<DocumentTemplate>): TemplateSummary[] {
    return Array.from(this.templates.entries()).map(([name, template]) => ({
      name,
      title: template.title,
      category: template.category,
      sectionCount: template.sections.length,
      tags: [...template.tags],
    }));
  }
}
