import TurndownService from 'turndown';
import { isFootnoteElement } from './footnotes';
import { markdownToTree } from './markdownToTree';
import type { NarrationDocument } from './types';

const BODY = /<body\b[^>]*>([\s\S]*)<\/body>/i;

/**
 * Converts HTML or XHTML to Markdown. Tables, figures, asides and footnote blocks
 * are kept as HTML so they survive as recognizable blocks in the tree.
 * @param html - The HTML content to convert
 * @returns Markdown string
 */
export function htmlToMarkdown(html: string): string {
  const turndownService = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
  });

  turndownService.remove(['style', 'script', 'title']);
  turndownService.keep(['table', 'figure', 'aside']);
  // Before the paragraph and list rules, so `<p class="footnote">` stays HTML too
  turndownService.addRule('footnote', {
    filter: isFootnoteElement,
    replacement: (_content, node) => `\n\n${node.outerHTML}\n\n`,
  });

  // Only the body of a full document is content
  const body = BODY.exec(html);
  return turndownService.turndown(body ? body[1] : html);
}

/**
 * Converts HTML to a document tree by way of Markdown
 */
export function htmlToTree(html: string): NarrationDocument {
  return markdownToTree(htmlToMarkdown(html));
}
