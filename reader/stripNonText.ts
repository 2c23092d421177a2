import {
  isStubMarker,
  isTocLabel,
  looksLikeTocEntry,
  shouldDropAsciiTableish,
} from './predicates';
import { stringifyInlines } from './stringify';
import type {
  BlockNode,
  FilterContext,
  FilterOptions,
  HeadingNode,
  InlineNode,
  LooseTextNode,
  NarrationDocument,
  ParagraphNode,
} from './types';

export function createFilterContext(options: FilterOptions = {}): FilterContext {
  return {
    insideToc: false,
    headingEndsToc: options.headingEndsToc ?? false,
  };
}

/**
 * Removes everything from a document tree that cannot be narrated: tables, figures,
 * images, footnotes, raw markup and math are deleted, links and containers are
 * flattened, and table-of-contents runs, stub markers and decorative rules are dropped.
 *
 * Call it once per document or chapter; each call starts outside a table of contents.
 * @param document - Block nodes of the parsed document
 * @param options - Filter options
 * @returns A new tree of the same node vocabulary
 */
export function stripNonText(
  document: NarrationDocument,
  options: FilterOptions = {}
): NarrationDocument {
  return transformBlocks(document, createFilterContext(options));
}

export function transformBlocks(nodes: readonly BlockNode[], context: FilterContext): BlockNode[] {
  return nodes.flatMap(node => transformBlock(node, context));
}

/**
 * Transforms one block, children first. Returns the nodes that replace it,
 * which may be none.
 */
export function transformBlock(node: BlockNode, context: FilterContext): BlockNode[] {
  switch (node.kind) {
    case 'table':
    case 'figure':
    case 'image':
    case 'footnote':
    case 'raw-block':
    case 'math':
      return [];

    case 'block-container':
      return transformBlocks(node.children, context);

    case 'heading':
      return applyHeadingRule(
        { ...node, children: transformInlines(node.children) },
        context
      );

    case 'paragraph':
    case 'loose-text':
      return applyTextBlockRule(
        { ...node, children: transformInlines(node.children) },
        markerSourceText(node.children),
        context
      );

    case 'list':
      return [{ ...node, items: node.items.map(item => transformBlocks(item, context)) }];

    case 'blockquote':
      return [{ ...node, children: transformBlocks(node.children, context) }];

    default:
      // code blocks, thematic breaks and kinds this filter does not know
      return [node];
  }
}

export function transformInlines(nodes: readonly InlineNode[]): InlineNode[] {
  return nodes.flatMap(transformInline);
}

export function transformInline(node: InlineNode): InlineNode[] {
  switch (node.kind) {
    case 'image':
    case 'footnote':
    case 'raw-inline':
    case 'math':
      return [];

    case 'link':
    case 'inline-container':
      return transformInlines(node.children);

    case 'text':
      return isStubMarker(node.text) ? [] : [node];

    case 'emphasis':
    case 'strong':
      return [{ ...node, children: transformInlines(node.children) }];

    default:
      return [node];
  }
}

/**
 * Text of inline content before the inline pass, leaving out image alt text and
 * math source, which are never read as stub markers.
 */
function markerSourceText(nodes: readonly InlineNode[]): string {
  return nodes
    .map(node => {
      switch (node.kind) {
        case 'image':
        case 'math':
          return '';
        case 'emphasis':
        case 'strong':
        case 'link':
        case 'inline-container':
          return markerSourceText(node.children);
        default:
          return stringifyInlines([node]);
      }
    })
    .join('');
}

function applyHeadingRule(heading: HeadingNode, context: FilterContext): BlockNode[] {
  if (isTocLabel(stringifyInlines(heading.children))) {
    context.insideToc = true;
    return [];
  }

  if (context.headingEndsToc) {
    context.insideToc = false;
  }
  return [heading];
}

/**
 * @param block - The block with its inline content already transformed
 * @param sourceText - Text of the block before its inline content was transformed
 */
function applyTextBlockRule(
  block: ParagraphNode | LooseTextNode,
  sourceText: string,
  context: FilterContext
): BlockNode[] {
  const text = stringifyInlines(block.children).trim();

  // A block holding nothing but a marker, which the inline pass has already emptied
  if (isStubMarker(sourceText)) {
    return [];
  }

  // Blank lines piled up while skipping a table of contents
  if (text === '') {
    return context.insideToc ? [] : [block];
  }

  // A table-of-contents title written as body text
  if (isTocLabel(text)) {
    context.insideToc = true;
    return [];
  }

  if (isStubMarker(text)) {
    return [];
  }

  if (context.insideToc) {
    if (shouldDropAsciiTableish(text) || looksLikeTocEntry(text)) {
      return [];
    }
    context.insideToc = false;
  }

  return shouldDropAsciiTableish(text) ? [] : [block];
}
