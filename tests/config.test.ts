import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_DATASET_DIR, loadConfig } from '../reader/config';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    assert.deepEqual(loadConfig({}), {
      datasetDir: DEFAULT_DATASET_DIR,
      outputSuffix: '.narration.txt',
      overwrite: false,
      filter: { headingEndsToc: false },
    });
  });

  test('reads explicit values', () => {
    const config = loadConfig({
      NARRATION_DATASET_DIR: '/data/books',
      NARRATION_OUTPUT_SUFFIX: '.tts.txt',
      NARRATION_HEADING_ENDS_TOC: '1',
      NARRATION_OVERWRITE: 'true',
    });

    assert.deepEqual(config, {
      datasetDir: '/data/books',
      outputSuffix: '.tts.txt',
      overwrite: true,
      filter: { headingEndsToc: true },
    });
  });

  test('names every invalid variable', () => {
    assert.throws(
      () => loadConfig({ NARRATION_HEADING_ENDS_TOC: 'yes', NARRATION_OVERWRITE: 'maybe' }),
      { message: 'Invalid configuration: NARRATION_HEADING_ENDS_TOC, NARRATION_OVERWRITE' }
    );
    assert.throws(() => loadConfig({ NARRATION_OUTPUT_SUFFIX: '' }), {
      message: 'Invalid configuration: NARRATION_OUTPUT_SUFFIX',
    });
  });
});
