/**
 * Editable HCL syntax tree.
 *
 * Every parsed node keeps the exact source text it came from. A node is
 * re-rendered only after it (or something inside it) has been edited, so
 * untouched declarations serialize byte for byte.
 */
import type { AttributeValue } from '../model/attribute-value.js';
import { renderValue } from './literal.js';

export interface AttributeNode {
  kind: 'attribute';
  name: string;
  /** Expression source text, trimmed */
  expression: string;
  /** Trailing comment on the same line, if any */
  comment?: string;
  /** Source text of the whole line; absent for edited or inline attributes */
  raw?: string;
}

/** Comments and blank lines between body items. */
export interface TriviaNode {
  kind: 'trivia';
  text: string;
}

export type BodyItem = AttributeNode | Block | TriviaNode;

export function isBlankTrivia(item: BodyItem | undefined): boolean {
  return item?.kind === 'trivia' && item.text.trim() === '';
}

export class Body {
  readonly items: BodyItem[] = [];
  private modified = false;

  /**
   * @param depth - nesting level of the items in this body (0 at file level)
   */
  constructor(readonly depth: number) {}

  isClean(): boolean {
    return !this.modified && this.blocks().every((block) => block.isClean());
  }

  attributes(): AttributeNode[] {
    return this.items.filter((item): item is AttributeNode => item.kind === 'attribute');
  }

  getAttribute(name: string): AttributeNode | undefined {
    return this.attributes().find((attr) => attr.name === name);
  }

  hasAttribute(name: string): boolean {
    return this.getAttribute(name) !== undefined;
  }

  /**
   * Set an attribute to an expression. Existing attributes are replaced in
   * place; new ones go after the last attribute. Setting the same
   * expression again is a no-op.
   */
  setAttributeRaw(name: string, expression: string): void {
    const index = this.items.findIndex((item) => item.kind === 'attribute' && item.name === name);
    if (index >= 0) {
      const existing = this.items[index];
      if (existing.kind === 'attribute' && existing.expression === expression) return;
      const comment = existing.kind === 'attribute' ? existing.comment : undefined;
      this.items[index] = { kind: 'attribute', name, expression, ...(comment ? { comment } : {}) };
    } else {
      this.items.splice(this.insertionIndex(), 0, { kind: 'attribute', name, expression });
    }
    this.modified = true;
  }

  setAttributeValue(name: string, value: AttributeValue): void {
    this.setAttributeRaw(name, renderValue(value, this.depth));
  }

  removeAttribute(name: string): boolean {
    const index = this.items.findIndex((item) => item.kind === 'attribute' && item.name === name);
    if (index < 0) return false;
    this.items.splice(index, 1);
    this.modified = true;
    return true;
  }

  blocks(type?: string): Block[] {
    return this.items.filter(
      (item): item is Block => item.kind === 'block' && (type === undefined || item.type === type)
    );
  }

  containsBlock(block: Block): boolean {
    return this.items.includes(block);
  }

  /**
   * Remove a block. A blank line left doubled by the removal is dropped.
   */
  removeBlock(block: Block): boolean {
    const index = this.items.indexOf(block);
    if (index < 0) return false;
    this.items.splice(index, 1);
    if (isBlankTrivia(this.items[index]) && (index === 0 || isBlankTrivia(this.items[index - 1]))) {
      this.items.splice(index, 1);
    } else if (index === this.items.length && isBlankTrivia(this.items[index - 1])) {
      this.items.splice(index - 1, 1);
    }
    this.modified = true;
    return true;
  }

  /**
   * Append comment text verbatim. The body is newline-terminated first.
   */
  appendTrivia(text: string): void {
    const last = this.items[this.items.length - 1];
    if (last && !endsWithNewline(last)) {
      this.items.push({ kind: 'trivia', text: '\n' });
    }
    this.items.push({ kind: 'trivia', text });
    this.modified = true;
  }

  private insertionIndex(): number {
    let index = -1;
    this.items.forEach((item, i) => {
      if (item.kind === 'attribute') index = i;
    });
    return index + 1;
  }
}

function endsWithNewline(item: BodyItem): boolean {
  switch (item.kind) {
    case 'trivia':
      return item.text.endsWith('\n');
    case 'attribute':
      return item.raw === undefined || item.raw.endsWith('\n');
    case 'block':
      return item.closingRaw === undefined || item.closingRaw.endsWith('\n');
  }
}

export class Block {
  readonly kind = 'block';
  readonly body: Body;
  /** Full source text of the block, for clean rendering */
  raw?: string;
  /** Source of the header line, through "{" (and the newline unless inline) */
  headerRaw?: string;
  /** Source of the closing "}" line */
  closingRaw?: string;
  /** Whether the block was written on one line */
  inline = false;
  private headerModified = false;

  constructor(
    readonly type: string,
    private blockLabels: string[],
    readonly depth: number
  ) {
    this.body = new Body(depth + 1);
  }

  get labels(): readonly string[] {
    return this.blockLabels;
  }

  setLabels(labels: string[]): void {
    if (labels.length === this.blockLabels.length && labels.every((l, i) => l === this.blockLabels[i])) {
      return;
    }
    this.blockLabels = [...labels];
    this.headerModified = true;
  }

  isHeaderModified(): boolean {
    return this.headerModified;
  }

  isClean(): boolean {
    return this.raw !== undefined && !this.headerModified && this.body.isClean();
  }
}

/**
 * One parsed configuration file.
 */
export class ConfigFile {
  /** Cross-resource passes already applied to this file in this run */
  readonly passes = new Set<string>();

  constructor(
    readonly filename: string,
    readonly body: Body
  ) {}

  resourceBlocks(): Block[] {
    return this.body.blocks('resource');
  }
}

/**
 * Resource kind and name of a `resource "<kind>" "<name>"` block.
 */
export function resourceLabels(block: Block): { kind: string; name: string } | undefined {
  if (block.type !== 'resource' || block.labels.length < 2) return undefined;
  return { kind: block.labels[0], name: block.labels[1] };
}
