const FOOTNOTE_NAME = /footnote|endnote|rearnote/i;
const FOOTNOTE_ATTRIBUTES = ['epub:type', 'role', 'class'];

/** Block elements that may hold a note or a whole list of notes. */
export const FOOTNOTE_TAGS: ReadonlySet<string> = new Set([
  'ASIDE',
  'SECTION',
  'DIV',
  'P',
  'OL',
  'UL',
  'DL',
]);

/** Shape shared by DOM elements and node-html-parser elements. */
export interface MarkupElement {
  tagName: string;
  getAttribute(name: string): string | null | undefined;
}

/**
 * A block element marked as a footnote, endnote or collection of them through
 * `epub:type` (`footnote`, `rearnotes`), `role` (`doc-endnotes`) or `class`.
 */
export function isFootnoteElement(element: MarkupElement): boolean {
  return (
    FOOTNOTE_TAGS.has(element.tagName.toUpperCase()) &&
    FOOTNOTE_ATTRIBUTES.some(name => FOOTNOTE_NAME.test(element.getAttribute(name) ?? ''))
  );
}
