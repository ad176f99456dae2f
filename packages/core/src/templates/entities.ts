import type { Cloneable } from './cloneable.js';

export interface MarginsInit {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

/**
 * Page margins
 */
export class Margins implements Cloneable<Margins> {
  top: number;
  bottom: number;
  left: number;
  right: number;

  constructor(init: MarginsInit) {
    this.top = init.top;
    this.bottom = init.bottom;
    this.left = init.left;
    this.right = init.right;
  }

  clone(): Margins {
    return new Margins({
      top: this.top,
      bottom: this.bottom,
      left: this.left,
      right: this.right,
    });
  }
}

export interface DocumentStyleInit {
  fontFamily: string;
  fontSize: number;
  headerColor: string;
  logoUrl: string;
  pageMargins?: Margins;
}

/**
 * Visual style of a document. Page margins are optional.
 */
export class DocumentStyle implements Cloneable<DocumentStyle> {
  fontFamily: string;
  fontSize: number;
  headerColor: string;
  logoUrl: string;
  pageMargins?: Margins;

  constructor(init: DocumentStyleInit) {
    this.fontFamily = init.fontFamily;
    this.fontSize = init.fontSize;
    this.headerColor = init.headerColor;
    this.logoUrl = init.logoUrl;
    this.pageMargins = init.pageMargins;
  }

  clone(): DocumentStyle {
    return new DocumentStyle({
      fontFamily: this.fontFamily,
      fontSize: this.fontSize,
      headerColor: this.headerColor,
      logoUrl: this.logoUrl,
      pageMargins: this.pageMargins?.clone(),
    });
  }
}

export interface SectionInit {
  name: string;
  content: string;
  isEditable?: boolean;
  placeholders?: string[];
}

/**
 * A named block of document content. Placeholders keep substitution order.
 */
export class Section implements Cloneable<Section> {
  name: string;
  content: string;
  isEditable: boolean;
  placeholders: string[];

  constructor(init: SectionInit) {
    this.name = init.name;
    this.content = init.content;
    this.isEditable = init.isEditable ?? false;
    this.placeholders = init.placeholders ?? [];
  }

  clone(): Section {
    return new Section({
      name: this.name,
      content: this.content,
      isEditable: this.isEditable,
      placeholders: [...this.placeholders],
    });
  }
}

export interface ApprovalWorkflowInit {
  approvers?: string[];
  requiredApprovals: number;
  timeoutDays: number;
}

/**
 * Approval rules for a document. Approvers are listed in priority order and may repeat.
 */
export class ApprovalWorkflow implements Cloneable<ApprovalWorkflow> {
  approvers: string[];
  requiredApprovals: number;
  timeoutDays: number;

  constructor(init: ApprovalWorkflowInit) {
    this.approvers = init.approvers ?? [];
    this.requiredApprovals = init.requiredApprovals;
    this.timeoutDays = init.timeoutDays;
  }

  clone(): ApprovalWorkflow {
    return new ApprovalWorkflow({
      approvers: [...this.approvers],
      requiredApprovals: this.requiredApprovals,
      timeoutDays: this.timeoutDays,
    });
  }
}
