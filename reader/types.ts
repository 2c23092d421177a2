export interface TextRunNode {
  kind: 'text';
  text: string;
}

export interface SpaceNode {
  kind: 'space';
}

export interface SoftBreakNode {
  kind: 'softbreak';
}

export interface LineBreakNode {
  kind: 'linebreak';
}

export interface EmphasisNode {
  kind: 'emphasis';
  children: InlineNode[];
}

export interface StrongNode {
  kind: 'strong';
  children: InlineNode[];
}

export interface CodeNode {
  kind: 'code';
  text: string;
}

export interface LinkNode {
  kind: 'link';
  target: string;
  title?: string;
  children: InlineNode[];
}

/** Span-like wrapper with no meaning of its own (strikethrough, HTML span). */
export interface InlineContainerNode {
  kind: 'inline-container';
  children: InlineNode[];
}

export interface RawInlineNode {
  kind: 'raw-inline';
  format: string;
  text: string;
}

export interface MathNode {
  kind: 'math';
  display: 'inline' | 'block';
  text: string;
}

export interface ImageNode {
  kind: 'image';
  src: string;
  /** Alt text */
  children: InlineNode[];
}

export interface FootnoteNode {
  kind: 'footnote';
  label?: string;
  children: BlockNode[];
}

export type InlineNode =
  | TextRunNode
  | SpaceNode
  | SoftBreakNode
  | LineBreakNode
  | EmphasisNode
  | StrongNode
  | CodeNode
  | LinkNode
  | InlineContainerNode
  | RawInlineNode
  | MathNode
  | ImageNode
  | FootnoteNode;

export interface HeadingNode {
  kind: 'heading';
  level: number;
  children: InlineNode[];
}

export interface ParagraphNode {
  kind: 'paragraph';
  children: InlineNode[];
}

/** Block text that is not wrapped in a paragraph, e.g. the body of a tight list item. */
export interface LooseTextNode {
  kind: 'loose-text';
  children: InlineNode[];
}

export interface TableNode {
  kind: 'table';
  rows: string[][];
}

export interface FigureNode {
  kind: 'figure';
  caption: InlineNode[];
  children: BlockNode[];
}

export interface RawBlockNode {
  kind: 'raw-block';
  format: string;
  text: string;
}

export interface BlockContainerNode {
  kind: 'block-container';
  children: BlockNode[];
}

export interface ListNode {
  kind: 'list';
  ordered: boolean;
  start?: number;
  items: BlockNode[][];
}

export interface BlockQuoteNode {
  kind: 'blockquote';
  children: BlockNode[];
}

export interface CodeBlockNode {
  kind: 'code-block';
  language?: string;
  text: string;
}

export interface ThematicBreakNode {
  kind: 'thematic-break';
}

export type BlockNode =
  | HeadingNode
  | ParagraphNode
  | LooseTextNode
  | TableNode
  | FigureNode
  | ImageNode
  | FootnoteNode
  | RawBlockNode
  | MathNode
  | BlockContainerNode
  | ListNode
  | BlockQuoteNode
  | CodeBlockNode
  | ThematicBreakNode;

export type NarrationDocument = BlockNode[];

export interface FilterOptions {
  /**
   * Let an ordinary heading end a table-of-contents run. Off by default, in which
   * case only a non-matching paragraph can end one.
   */
  headingEndsToc?: boolean;
}

/** Mutable state of one filter invocation. Never shared between documents. */
export interface FilterContext {
  insideToc: boolean;
  headingEndsToc: boolean;
}
