import { stringifyBlock, stringifyInlines } from './stringify';
import type { BlockNode, NarrationDocument } from './types';

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function renderBlock(node: BlockNode): string {
  switch (node.kind) {
    case 'heading':
    case 'paragraph':
    case 'loose-text':
      return collapseWhitespace(stringifyInlines(node.children));
    case 'list':
      return node.items
        .map(item => item.map(renderBlock).filter(text => text !== '').join(' '))
        .filter(text => text !== '')
        .join('\n');
    case 'blockquote':
    case 'block-container':
      return renderBlocks(node.children);
    case 'code-block':
      return node.text.replace(/\n+$/, '');
    case 'thematic-break':
      return '';
    default:
      return collapseWhitespace(stringifyBlock(node));
  }
}

function renderBlocks(nodes: readonly BlockNode[]): string {
  return nodes
    .map(renderBlock)
    .filter(text => text !== '')
    .join('\n\n');
}

/**
 * Serializes a document tree to plain text: one line per text block, list items
 * one per line, blocks separated by a blank line. Blocks without text are skipped.
 */
export function treeToText(document: NarrationDocument): string {
  return renderBlocks(document);
}
