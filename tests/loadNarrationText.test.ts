import { after, before, describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  EMPTY_EPUB_TEXT,
  EMPTY_FILE_TEXT,
  loadNarrationText,
  narrateEpub,
  narrateMarkdown,
} from '../reader/loadNarrationText';
import { buildEpubFixture } from './helpers';

const contentsChapter = {
  id: 'contents',
  href: 'contents.xhtml',
  body: '<h1>Contents</h1><p>Chapter 1 ..... 1</p><p>Chapter 2 ..... 9</p>',
};

describe('narrateEpub', () => {
  test('filters every chapter with its own state', () => {
    const bytes = buildEpubFixture('Fixture', [
      contentsChapter,
      {
        id: 'c1',
        href: 'c1.xhtml',
        body: '<h1>Chapter 1</h1><p>1. Morning came.</p><table><tr><td>x</td></tr></table>',
      },
      { id: 'c2', href: 'c2.xhtml', body: '<h1>Chapter 2</h1><p>It was a dark night.</p>' },
    ]);

    assert.equal(
      narrateEpub(bytes),
      'Chapter 1\n\n1. Morning came.\n\nChapter 2\n\nIt was a dark night.'
    );
  });

  test('falls back to a placeholder when nothing is narratable', () => {
    const bytes = buildEpubFixture('Fixture', [contentsChapter]);

    assert.equal(narrateEpub(bytes), EMPTY_EPUB_TEXT);
  });
});

describe('narrateMarkdown', () => {
  test('skips a dotted-leader contents run', () => {
    const markdown = '# Contents\n\nOne ..... 1\n\nTwo ..... 5\n\n# One\n\nOnce upon a time.\n';

    assert.equal(narrateMarkdown(markdown), 'One\n\nOnce upon a time.');
  });
});

describe('loadNarrationText', () => {
  let dir = '';

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'narration-load-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('returns plain text files as they are', async () => {
    const path = join(dir, 'plain.txt');
    writeFileSync(path, 'Just words.\n', 'utf-8');

    assert.equal(await loadNarrationText(path), 'Just words.\n');
  });

  test('uses a placeholder for a blank text file', async () => {
    const path = join(dir, 'blank.txt');
    writeFileSync(path, '  \n', 'utf-8');

    assert.equal(await loadNarrationText(path), EMPTY_FILE_TEXT);
  });

  test('filters Markdown and HTML files', async () => {
    const markdownPath = join(dir, 'story.md');
    writeFileSync(markdownPath, '# Story\n\n![map](map.png)\n\nIt rained.\n', 'utf-8');
    const htmlPath = join(dir, 'story.XHTML');
    writeFileSync(htmlPath, '<html><body><p>[TABLE]</p><p>It rained.</p></body></html>', 'utf-8');

    assert.equal(await loadNarrationText(markdownPath), 'Story\n\nIt rained.');
    assert.equal(await loadNarrationText(htmlPath), 'It rained.');
  });

  test('reads EPUB files from disk', async () => {
    const path = join(dir, 'book.epub');
    writeFileSync(path, buildEpubFixture('Book', [{ id: 'c1', href: 'c1.xhtml', body: '<p>Hello.</p>' }]));

    assert.equal(await loadNarrationText(path), 'Hello.');
  });

  test('passes filter options through', async () => {
    const path = join(dir, 'toc.md');
    writeFileSync(path, '# Contents\n\nOne ..... 1\n\n# One\n\n1\\. Begin.\n', 'utf-8');

    assert.equal(await loadNarrationText(path), 'One');
    assert.equal(await loadNarrationText(path, { headingEndsToc: true }), 'One\n\n1. Begin.');
  });

  test('rejects missing and unsupported files', async () => {
    await assert.rejects(loadNarrationText(join(dir, 'missing.epub')), {
      message: `File not found: ${join(dir, 'missing.epub')}`,
    });

    const pdfPath = join(dir, 'paper.pdf');
    writeFileSync(pdfPath, '%PDF-1.4', 'utf-8');
    await assert.rejects(loadNarrationText(pdfPath), { message: 'Unsupported file type: .pdf' });
  });
});
