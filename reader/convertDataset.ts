import { existsSync, readdirSync, writeFileSync } from 'fs';
import { extname, join, parse } from 'path';
import { loadConfig, type NarrationConfig } from './config';
import { loadNarrationText, SUPPORTED_EXTENSIONS } from './loadNarrationText';

export interface ConversionSummary {
  converted: number;
  skipped: number;
  failed: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Convert every supported book in the dataset directory to narration text.
 * Skips books that already have an output file unless `overwrite` is set.
 */
export async function convertDataset(config: NarrationConfig = loadConfig()): Promise<ConversionSummary> {
  const { datasetDir, outputSuffix, overwrite, filter } = config;

  console.log(`Scanning dataset directory: ${datasetDir}\n`);

  if (!existsSync(datasetDir)) {
    throw new Error(`Dataset directory not found: ${datasetDir}`);
  }

  const books = readdirSync(datasetDir)
    .filter(file => !file.endsWith(outputSuffix))
    .filter(file => SUPPORTED_EXTENSIONS.includes(extname(file).toLowerCase()))
    .sort();

  console.log(`Found ${books.length} book(s)\n`);

  const summary: ConversionSummary = { converted: 0, skipped: 0, failed: 0 };

  for (const book of books) {
    const bookPath = join(datasetDir, book);
    const outputPath = join(datasetDir, `${parse(book).name}${outputSuffix}`);

    console.log(`\n--- Processing: ${book} ---`);

    if (existsSync(outputPath) && !overwrite) {
      console.log(`✓ Skipping (output already exists): ${book}`);
      summary.skipped++;
      continue;
    }

    try {
      const text = await loadNarrationText(bookPath, filter);
      writeFileSync(outputPath, text, 'utf-8');
      console.log(`✓ Successfully converted: ${book}`);
      summary.converted++;
    } catch (error) {
      console.error(`✗ Failed to convert ${book}:`, errorMessage(error));
      summary.failed++;
    }
  }

  console.log('\n=== Conversion Summary ===');
  console.log(`Total books found: ${books.length}`);
  console.log(`Successfully converted: ${summary.converted}`);
  console.log(`Skipped (already exists): ${summary.skipped}`);
  console.log(`Failed: ${summary.failed}`);

  return summary;
}

if (require.main === module) {
  convertDataset()
    .then(() => {
      console.log('\nDataset conversion complete!');
      process.exit(0);
    })
    .catch((error) => {
      console.error('\nFatal error during conversion:', error);
      process.exit(1);
    });
}
