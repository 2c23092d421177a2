import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { basename, extname, resolve } from 'path';
import { readEpub } from './epub';
import { htmlToTree } from './htmlToMarkdownTree';
import { markdownToTree } from './markdownToTree';
import { stripNonText } from './stripNonText';
import { treeToText } from './treeToText';
import type { FilterOptions, NarrationDocument } from './types';

export const EMPTY_FILE_TEXT = 'No textual content found in this file.';
export const EMPTY_EPUB_TEXT = 'No textual content found in this EPUB.';

export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.txt',
  '.md',
  '.markdown',
  '.html',
  '.htm',
  '.xhtml',
  '.epub',
];

export function narrateTree(document: NarrationDocument, options: FilterOptions = {}): string {
  return treeToText(stripNonText(document, options));
}

export function narrateMarkdown(markdown: string, options: FilterOptions = {}): string {
  return narrateTree(markdownToTree(markdown), options);
}

export function narrateHtml(html: string, options: FilterOptions = {}): string {
  return narrateTree(htmlToTree(html), options);
}

/**
 * Narration text of a whole EPUB. Every chapter is filtered on its own, so a
 * table of contents cannot carry over into the next chapter.
 */
export function narrateEpub(source: string | Buffer, options: FilterOptions = {}): string {
  const book = readEpub(source);
  console.log(`  - Chapters in spine: ${book.chapters.length}`);

  const texts = book.chapters
    .map(chapter => narrateHtml(chapter.html, options))
    .filter(text => text.trim() !== '');

  const combined = texts.join('\n\n');
  return combined.trim() === '' ? EMPTY_EPUB_TEXT : combined;
}

function orPlaceholder(text: string): string {
  return text.trim() === '' ? EMPTY_FILE_TEXT : text;
}

/**
 * Loads a book or document and returns the text worth narrating
 * @param filePath - Path of a .txt, .md, .html or .epub file
 * @param options - Filter options
 * @returns Plain text, blocks separated by blank lines
 */
export async function loadNarrationText(
  filePath: string,
  options: FilterOptions = {}
): Promise<string> {
  const resolvedPath = resolve(filePath);
  if (!existsSync(resolvedPath)) {
    throw new Error(`File not found: ${resolvedPath}`);
  }

  const extension = extname(resolvedPath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(extension)) {
    throw new Error(`Unsupported file type: ${extension || basename(resolvedPath)}`);
  }

  console.log(`Loading ${basename(resolvedPath)}...`);

  let text: string;
  if (extension === '.epub') {
    text = narrateEpub(resolvedPath, options);
  } else {
    const content = await readFile(resolvedPath, 'utf-8');
    if (extension === '.txt') {
      text = orPlaceholder(content);
    } else if (extension === '.md' || extension === '.markdown') {
      text = orPlaceholder(narrateMarkdown(content, options));
    } else {
      text = orPlaceholder(narrateHtml(content, options));
    }
  }

  console.log(`  - Narration text: ${text.length} characters`);
  return text;
}
