export * from './types';
export * from './predicates';
export { stripNonText, createFilterContext, transformBlocks, transformBlock, transformInlines, transformInline } from './stripNonText';
export { stringifyInlines, stringifyBlock } from './stringify';
export { markdownToTree, createMarkdownParser } from './markdownToTree';
export { htmlToMarkdown, htmlToTree } from './htmlToMarkdownTree';
export { treeToText } from './treeToText';
export { readEpub, type EpubBook, type EpubChapter } from './epub';
export { isFootnoteElement } from './footnotes';
export {
  loadNarrationText,
  narrateTree,
  narrateMarkdown,
  narrateHtml,
  narrateEpub,
  EMPTY_FILE_TEXT,
  EMPTY_EPUB_TEXT,
} from './loadNarrationText';
export { loadConfig, type NarrationConfig } from './config';
export { convertDataset, type ConversionSummary } from './convertDataset';
