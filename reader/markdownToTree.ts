import MarkdownIt from 'markdown-it';
import texmath from 'markdown-it-texmath';
import katex from 'katex';
import { HTMLElement as HtmlElement, parse as parseHtml } from 'node-html-parser';
import type {
  BlockNode,
  InlineNode,
  ListNode,
  NarrationDocument,
  TableNode,
  TextRunNode,
} from './types';
import { isFootnoteElement } from './footnotes';
import { stringifyInlines } from './stringify';

type Token = ReturnType<MarkdownIt['parse']>[number];

const STUB_MARKER_SPLIT = /(\[(?:IMAGE|FIGURE|TABLE)\])/i;

/**
 * Markdown parser with GFM tables, inline HTML and `$`-delimited math enabled
 */
export function createMarkdownParser(): MarkdownIt {
  return new MarkdownIt({ html: true }).use(texmath, {
    engine: katex,
    delimiters: 'dollars',
  });
}

/**
 * Parses Markdown into a document tree
 * @param markdown - Markdown source
 * @param parser - Parser to use (default: createMarkdownParser())
 * @returns Block nodes of the document
 */
export function markdownToTree(
  markdown: string,
  parser: MarkdownIt = createMarkdownParser()
): NarrationDocument {
  return buildBlocks(parser.parse(markdown, {}));
}

/**
 * Text runs for a text token. A bracketed stub marker gets a run of its own so
 * that it can be dropped without losing the words around it.
 */
export function splitTextRuns(text: string): TextRunNode[] {
  return text
    .split(STUB_MARKER_SPLIT)
    .filter(part => part !== '')
    .map((part): TextRunNode => ({ kind: 'text', text: part }));
}

function buildBlocks(tokens: Token[]): BlockNode[] {
  let pos = 0;

  const readInlineContent = (): InlineNode[] => {
    const inline = tokens[pos];
    // inline token plus the closing tag
    pos += 2;
    return inline && inline.type === 'inline' ? buildInlines(inline.children) : [];
  };

  const readList = (open: Token): ListNode => {
    const closeType = open.type.replace('_open', '_close');
    const items: BlockNode[][] = [];

    while (pos < tokens.length && tokens[pos].type !== closeType) {
      if (tokens[pos].type === 'list_item_open') {
        pos++;
        items.push(readUntil('list_item_close'));
      } else {
        pos++;
      }
    }
    pos++;

    const start = open.attrGet('start');
    return {
      kind: 'list',
      ordered: open.type === 'ordered_list_open',
      ...(start !== null ? { start: Number(start) } : {}),
      items,
    };
  };

  const readTable = (): TableNode => {
    const rows: string[][] = [];
    let row: string[] = [];

    while (pos < tokens.length && tokens[pos].type !== 'table_close') {
      const token = tokens[pos];
      if (token.type === 'tr_open') {
        row = [];
      } else if (token.type === 'inline') {
        row.push(stringifyInlines(buildInlines(token.children)).trim());
      } else if (token.type === 'tr_close') {
        rows.push(row);
      }
      pos++;
    }
    pos++;

    return { kind: 'table', rows };
  };

  function readUntil(closeType: string | null): BlockNode[] {
    const nodes: BlockNode[] = [];

    while (pos < tokens.length) {
      const token = tokens[pos];
      pos++;

      if (closeType !== null && token.type === closeType) {
        return nodes;
      }

      switch (token.type) {
        case 'heading_open':
          nodes.push({
            kind: 'heading',
            level: Number(token.tag.slice(1)),
            children: readInlineContent(),
          });
          break;
        case 'paragraph_open':
          // Paragraphs of tight list items are not real paragraphs
          if (token.hidden) {
            nodes.push({ kind: 'loose-text', children: readInlineContent() });
          } else {
            nodes.push({ kind: 'paragraph', children: readInlineContent() });
          }
          break;
        case 'bullet_list_open':
        case 'ordered_list_open':
          nodes.push(readList(token));
          break;
        case 'blockquote_open':
          nodes.push({ kind: 'blockquote', children: readUntil('blockquote_close') });
          break;
        case 'fence': {
          const language = token.info.trim();
          nodes.push({
            kind: 'code-block',
            ...(language ? { language } : {}),
            text: token.content,
          });
          break;
        }
        case 'code_block':
          nodes.push({ kind: 'code-block', text: token.content });
          break;
        case 'hr':
          nodes.push({ kind: 'thematic-break' });
          break;
        case 'html_block':
          nodes.push(htmlBlockToNode(token.content));
          break;
        case 'table_open':
          nodes.push(readTable());
          break;
        case 'math_block':
        case 'math_block_eqno':
          nodes.push({ kind: 'math', display: 'block', text: token.content });
          break;
        default:
          break;
      }
    }

    return nodes;
  }

  return readUntil(null);
}

export function buildInlines(tokens: Token[] | null): InlineNode[] {
  const list = tokens ?? [];
  let pos = 0;

  function readUntil(closeType: string | null): InlineNode[] {
    const nodes: InlineNode[] = [];

    while (pos < list.length) {
      const token = list[pos];
      pos++;

      if (closeType !== null && token.type === closeType) {
        return nodes;
      }

      switch (token.type) {
        case 'text':
          nodes.push(...splitTextRuns(token.content));
          break;
        case 'softbreak':
          nodes.push({ kind: 'softbreak' });
          break;
        case 'hardbreak':
          nodes.push({ kind: 'linebreak' });
          break;
        case 'code_inline':
          nodes.push({ kind: 'code', text: token.content });
          break;
        case 'em_open':
          nodes.push({ kind: 'emphasis', children: readUntil('em_close') });
          break;
        case 'strong_open':
          nodes.push({ kind: 'strong', children: readUntil('strong_close') });
          break;
        case 's_open':
          nodes.push({ kind: 'inline-container', children: readUntil('s_close') });
          break;
        case 'link_open': {
          const title = token.attrGet('title');
          nodes.push({
            kind: 'link',
            target: token.attrGet('href') ?? '',
            ...(title !== null ? { title } : {}),
            children: readUntil('link_close'),
          });
          break;
        }
        case 'image':
          nodes.push({
            kind: 'image',
            src: token.attrGet('src') ?? '',
            children: buildInlines(token.children),
          });
          break;
        case 'html_inline':
          nodes.push({ kind: 'raw-inline', format: 'html', text: token.content });
          break;
        case 'math_inline':
        case 'math_inline_double':
          nodes.push({ kind: 'math', display: 'inline', text: token.content });
          break;
        default:
          break;
      }
    }

    return nodes;
  }

  return readUntil(null);
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function htmlTableRows(table: HtmlElement): string[][] {
  return table
    .querySelectorAll('tr')
    .map(row => row.querySelectorAll('th, td').map(cell => collapseWhitespace(cell.text)));
}

/**
 * Block-level HTML left in the Markdown. Tables, figures and footnote blocks are
 * recognized by their outermost element; anything else stays raw.
 */
export function htmlBlockToNode(html: string): BlockNode {
  const element = parseHtml(html).childNodes.find(
    (node): node is HtmlElement => node instanceof HtmlElement
  );

  if (element) {
    const tag = element.tagName.toUpperCase();
    if (tag === 'TABLE') {
      return { kind: 'table', rows: htmlTableRows(element) };
    }
    if (tag === 'FIGURE') {
      return { kind: 'figure', caption: [], children: [] };
    }
    if (isFootnoteElement(element)) {
      return { kind: 'footnote', children: [] };
    }
  }
  return { kind: 'raw-block', format: 'html', text: html };
}
