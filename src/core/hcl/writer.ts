/**
 * Serialization of the editable HCL tree back to text.
 */
import { quoteString, indentation } from './literal.js';
import type { AttributeNode, Block, Body, BodyItem, ConfigFile } from './tree.js';

export function serializeConfig(file: ConfigFile): string {
  return renderItems(file.body);
}

function renderItems(body: Body): string {
  return body.items.map((item) => renderItem(item, body.depth)).join('');
}

function renderItem(item: BodyItem, depth: number): string {
  switch (item.kind) {
    case 'trivia':
      return item.text;
    case 'attribute':
      return renderAttribute(item, depth);
    case 'block':
      return renderBlock(item);
  }
}

function renderAttribute(attr: AttributeNode, depth: number): string {
  if (attr.raw !== undefined) return attr.raw;
  const comment = attr.comment ? ` ${attr.comment}` : '';
  return `${indentation(depth)}${attr.name} = ${attr.expression}${comment}\n`;
}

function renderHeader(block: Block): string {
  const labels = block.labels.map((label) => ` ${quoteString(label)}`).join('');
  return `${indentation(block.depth)}${block.type}${labels} {\n`;
}

/**
 * Render a block. Clean blocks come out exactly as parsed; edited blocks
 * keep their untouched items and get a normalized header and closing line.
 */
export function renderBlock(block: Block): string {
  if (block.isClean() && block.raw !== undefined) return block.raw;

  let header: string;
  if (block.headerRaw === undefined || block.isHeaderModified()) {
    header = renderHeader(block);
  } else if (block.inline) {
    header = `${block.headerRaw.trimEnd()}\n`;
  } else {
    header = block.headerRaw;
  }

  let closing: string;
  if (block.closingRaw === undefined || block.inline) {
    const suffix = block.closingRaw?.trim().slice(1) ?? '';
    closing = `${indentation(block.depth)}}${suffix}\n`;
  } else {
    closing = block.closingRaw;
  }

  let items = renderItems(block.body);
  if (items !== '' && !items.endsWith('\n')) items += '\n';
  return header + items + closing;
}
