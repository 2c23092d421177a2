import type { BlockNode, InlineNode } from './types';

/**
 * Visible text of inline content, concatenated. Breaks become a single space;
 * raw markup and footnotes contribute nothing.
 */
export function stringifyInlines(nodes: readonly InlineNode[]): string {
  return nodes.map(stringifyInline).join('');
}

function stringifyInline(node: InlineNode): string {
  switch (node.kind) {
    case 'text':
    case 'code':
    case 'math':
      return node.text;
    case 'space':
    case 'softbreak':
    case 'linebreak':
      return ' ';
    case 'emphasis':
    case 'strong':
    case 'link':
    case 'inline-container':
    case 'image':
      return stringifyInlines(node.children);
    case 'raw-inline':
    case 'footnote':
      return '';
    default:
      return '';
  }
}

/** Visible text of a block, block children separated by a space. */
export function stringifyBlock(node: BlockNode): string {
  switch (node.kind) {
    case 'heading':
    case 'paragraph':
    case 'loose-text':
    case 'image':
      return stringifyInlines(node.children);
    case 'code-block':
    case 'math':
      return node.text;
    case 'table':
      return node.rows.map(row => row.join(' ')).join(' ');
    case 'figure':
      return [stringifyInlines(node.caption), ...node.children.map(stringifyBlock)].join(' ');
    case 'block-container':
    case 'blockquote':
    case 'footnote':
      return node.children.map(stringifyBlock).join(' ');
    case 'list':
      return node.items.map(item => item.map(stringifyBlock).join(' ')).join(' ');
    case 'raw-block':
    case 'thematic-break':
      return '';
    default:
      return '';
  }
}
