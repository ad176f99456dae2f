import type { Cloneable } from './cloneable.js';
import type { ApprovalWorkflow, DocumentStyle, Section } from './entities.js';

export interface DocumentTemplateInit {
  title: string;
  category: string;
  sections?: Section[];
  style?: DocumentStyle;
  requiredFields?: string[];
  metadata?: Map<string, string>;
  workflow?: ApprovalWorkflow;
  tags?: string[];
}

/**
 * Document Template - composite prototype
 *
 * The constructor takes ownership of the objects it is given. Use {@link clone}
 * to obtain a copy that shares no mutable state with this instance.
 */
export class DocumentTemplate implements Cloneable<DocumentTemplate> {
  title: string;
  category: string;
  sections: Section[];
  style?: DocumentStyle;
  requiredFields: string[];
  metadata: Map<string, string>;
  workflow?: ApprovalWorkflow;
  tags: string[];

  constructor(init: DocumentTemplateInit) {
    this.title = init.title;
    this.category = init.category;
    this.sections = init.sections ?? [];
    this.style = init.style;
    this.requiredFields = init.requiredFields ?? [];
    this.metadata = init.metadata ?? new Map();
    this.workflow = init.workflow;
    this.tags = init.tags ?? [];
  }

  /**
   * Deep clone the whole template graph
   *
   * Every field holding a mutable reference needs its own copy step here.
   * Adding a field without one reintroduces sharing between clones, which the
   * independence tests in `__tests__/document-template.test.ts` catch.
   */
  clone(): DocumentTemplate {
    return new DocumentTemplate({
      title: this.title,
      category: this.category,
      sections: this.sections.map((section) => section.clone()),
      style: this.style?.clone(),
      requiredFields: [...this.requiredFields],
      metadata: new Map(this.metadata),
      workflow: this.workflow?.clone(),
      tags: [...this.tags],
    });
  }
}
