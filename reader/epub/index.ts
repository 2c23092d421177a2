import AdmZip from 'adm-zip';
import { posix } from 'path';
import { parseContainer, parsePackageDocument } from './packageDocument';

export interface EpubChapter {
  id: string;
  /** Path of the chapter inside the archive */
  href: string;
  html: string;
}

export interface EpubBook {
  title?: string;
  chapters: EpubChapter[];
}

const CONTAINER_PATH = 'META-INF/container.xml';
const CHAPTER_MEDIA_TYPES = new Set(['application/xhtml+xml', 'text/html']);

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function resolveHref(baseDir: string, href: string): string {
  const [withoutFragment] = href.split('#');
  const decoded = decodeURIComponent(withoutFragment);
  return baseDir === '.' ? posix.normalize(decoded) : posix.join(baseDir, decoded);
}

/**
 * Opens an EPUB archive and returns its chapters in reading order
 * @param source - Path of the .epub file, or its bytes
 * @returns Book title and the XHTML of every linear spine item
 */
export function readEpub(source: string | Buffer): EpubBook {
  let zip: AdmZip;
  try {
    zip = new AdmZip(source);
  } catch (err) {
    throw new Error(`Error reading EPUB: ${errorMessage(err)}`);
  }

  const readEntry = (name: string): string | null => {
    const entry = zip.getEntry(name);
    return entry ? entry.getData().toString('utf-8') : null;
  };

  const container = readEntry(CONTAINER_PATH);
  if (container === null) {
    throw new Error(`Invalid EPUB: ${CONTAINER_PATH} is missing`);
  }

  const opfPath = parseContainer(container);
  if (opfPath === null) {
    throw new Error('Invalid EPUB: container.xml names no rootfile');
  }

  const opf = readEntry(opfPath);
  if (opf === null) {
    throw new Error(`Invalid EPUB: package document ${opfPath} is missing`);
  }

  const packageDocument = parsePackageDocument(opf);
  const baseDir = posix.dirname(opfPath);
  const chapters: EpubChapter[] = [];

  for (const itemref of packageDocument.spine) {
    const item = packageDocument.manifest.get(itemref.idref);
    if (!itemref.linear || !item || !CHAPTER_MEDIA_TYPES.has(item.mediaType)) {
      continue;
    }

    const href = resolveHref(baseDir, item.href);
    const html = readEntry(href);
    if (html === null) {
      console.warn(`  Spine item ${item.id} points to a missing file: ${href}`);
      continue;
    }
    chapters.push({ id: item.id, href, html });
  }

  return {
    ...(packageDocument.title ? { title: packageDocument.title } : {}),
    chapters,
  };
}
