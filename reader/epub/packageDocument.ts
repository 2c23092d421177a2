import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';

export interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
}

export interface SpineItem {
  idref: string;
  linear: boolean;
}

export interface PackageDocument {
  title?: string;
  manifest: Map<string, ManifestItem>;
  spine: SpineItem[];
}

const LIST_TAGS = new Set(['rootfile', 'item', 'itemref', 'title']);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  htmlEntities: true,
  isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && LIST_TAGS.has(tagName),
});

// An element without children or attributes parses to '' rather than an object
const element = <T extends z.ZodRawShape>(shape: T) =>
  z.preprocess(value => (typeof value === 'object' && value !== null ? value : {}), z.object(shape));

const textContent = z
  .union([z.string(), z.object({ '#text': z.string().optional() })])
  .transform(value => (typeof value === 'string' ? value : value['#text'] ?? '').trim());

const containerSchema = z.object({
  container: z.object({
    rootfiles: element({
      rootfile: z.array(element({ '@_full-path': z.string().optional() })).default([]),
    }),
  }),
});

const packageSchema = z.object({
  package: z.object({
    metadata: element({ title: z.array(textContent).default([]) }),
    manifest: element({
      item: z
        .array(
          element({
            '@_id': z.string().optional(),
            '@_href': z.string().optional(),
            '@_media-type': z.string().optional(),
          })
        )
        .default([]),
    }),
    spine: element({
      itemref: z
        .array(element({ '@_idref': z.string().optional(), '@_linear': z.string().optional() }))
        .default([]),
    }),
  }),
});

/**
 * Path of the package document named by `META-INF/container.xml`
 * @returns The first rootfile's `full-path`, or null when there is none
 */
export function parseContainer(xml: string): string | null {
  const result = containerSchema.safeParse(xmlParser.parse(xml));
  if (!result.success) {
    return null;
  }
  const [rootfile] = result.data.container.rootfiles.rootfile;
  return rootfile?.['@_full-path'] || null;
}

/**
 * Reads the title, manifest and spine of an OPF package document
 * @param xml - Contents of the .opf file
 */
export function parsePackageDocument(xml: string): PackageDocument {
  const result = packageSchema.safeParse(xmlParser.parse(xml));
  if (!result.success) {
    throw new Error('Invalid EPUB: package document has no <package> element');
  }
  const { metadata, manifest: manifestElement, spine: spineElement } = result.data.package;

  const manifest = new Map<string, ManifestItem>();
  for (const item of manifestElement.item) {
    const id = item['@_id'];
    const href = item['@_href'];
    if (!id || !href) {
      continue;
    }
    manifest.set(id, { id, href, mediaType: item['@_media-type'] ?? '' });
  }

  const spine: SpineItem[] = [];
  for (const itemref of spineElement.itemref) {
    const idref = itemref['@_idref'];
    if (idref) {
      spine.push({ idref, linear: itemref['@_linear'] !== 'no' });
    }
  }

  const [title] = metadata.title;
  return {
    ...(title ? { title } : {}),
    manifest,
    spine,
  };
}
