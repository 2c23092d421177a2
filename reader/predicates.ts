/**
 * String classifiers used to decide which blocks of a document are worth narrating.
 * All of them work on already-flattened plain text and have no side effects.
 */

export const TOC_LABELS: ReadonlySet<string> = new Set([
  'CONTENTS',
  'TABLE OF CONTENTS',
  'ILLUSTRATIONS',
  'LIST OF ILLUSTRATIONS',
  'LIST OF FIGURES',
]);

export const STUB_MARKERS: ReadonlySet<string> = new Set([
  '[IMAGE]',
  '[FIGURE]',
  '[TABLE]',
  'IMAGE',
  'FIGURE',
  'TABLE',
]);

// Thresholds for long decorative rules
export const INFLATING_RULE_MIN_LENGTH = 120;
export const INFLATING_RULE_MIN_DENSITY = 0.9;
export const INFLATING_RULE_MAX_LETTERS = 8;

// `s`: a single text run may hold several lines
const ASCII_BORDER_LINE = /^\+[-=+]+\+$/;
const ASCII_TABLE_ROW = /^\|.*\|$/s;
const RULE_CHAR = /[-=+|]/g;
const LETTER = /\p{L}/gu;
const DOTTED_LEADER_ENTRY = /^.+\.[. ]+[0-9ivxlcdmIVXLCDM]+$/s;
const NUMBERED_ENTRY = /^\d+\.\s+.+$/s;

/**
 * Trims, collapses whitespace runs to a single space and uppercases.
 * @example normalizeLabel('  table   of CONTENTS ') // 'TABLE OF CONTENTS'
 */
export function normalizeLabel(s: string): string {
  return s.trim().replace(/\s+/g, ' ').toUpperCase();
}

export function isTocLabel(s: string): boolean {
  return TOC_LABELS.has(normalizeLabel(s));
}

/** Placeholder left by an upstream converter where it could not render an image, figure or table. */
export function isStubMarker(s: string): boolean {
  return STUB_MARKERS.has(normalizeLabel(s));
}

/** `+----+====+` style border of a text-drawn table. */
export function isAsciiBorderLine(s: string): boolean {
  return ASCII_BORDER_LINE.test(s.trim());
}

export function isAsciiTableRow(s: string): boolean {
  return ASCII_TABLE_ROW.test(s.trim());
}

function countMatches(s: string, pattern: RegExp): number {
  return s.match(pattern)?.length ?? 0;
}

/**
 * Long separator or box-drawing line the two stricter patterns miss. Left in, it
 * would be read out character by character.
 */
export function looksLikeInflatingRule(s: string): boolean {
  const t = s.trim();
  if (t.length < INFLATING_RULE_MIN_LENGTH) {
    return false;
  }

  const ruleChars = countMatches(t, RULE_CHAR);
  const letters = countMatches(t, LETTER);
  return ruleChars > t.length * INFLATING_RULE_MIN_DENSITY && letters < INFLATING_RULE_MAX_LETTERS;
}

/**
 * A table-of-contents line: either a dotted leader ending in a page number
 * (`Introduction ........ 3`, `Preface ... xi`) or a numbered entry (`1. The Beginning`).
 */
export function looksLikeTocEntry(s: string): boolean {
  const t = s.trim();
  if (t === '') {
    return false;
  }
  return DOTTED_LEADER_ENTRY.test(t) || NUMBERED_ENTRY.test(t);
}

export function shouldDropAsciiTableish(s: string): boolean {
  return isAsciiBorderLine(s) || isAsciiTableRow(s) || looksLikeInflatingRule(s);
}
