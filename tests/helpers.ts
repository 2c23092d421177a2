import AdmZip from 'adm-zip';
import type {
  BlockNode,
  HeadingNode,
  InlineNode,
  LooseTextNode,
  ParagraphNode,
  TextRunNode,
} from '../reader/types';

export function text(value: string): TextRunNode {
  return { kind: 'text', text: value };
}

export function para(...children: Array<InlineNode | string>): ParagraphNode {
  return { kind: 'paragraph', children: children.map(toInline) };
}

export function loose(...children: Array<InlineNode | string>): LooseTextNode {
  return { kind: 'loose-text', children: children.map(toInline) };
}

export function heading(value: string, level = 1): HeadingNode {
  return { kind: 'heading', level, children: [text(value)] };
}

export function toInline(child: InlineNode | string): InlineNode {
  return typeof child === 'string' ? text(child) : child;
}

export function kinds(nodes: readonly BlockNode[]): string[] {
  return nodes.map(node => node.kind);
}

export interface EpubFixtureChapter {
  id: string;
  /** Path relative to the package document */
  href: string;
  body: string;
  linear?: boolean;
}

function xhtml(title: string, body: string): string {
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">',
    `<head><title>${title}</title></head>`,
    `<body>${body}</body>`,
    '</html>',
  ].join('\n');
}

/**
 * Builds a small EPUB in memory. Spine order follows `chapters`; `extraSpine`
 * adds itemrefs by id, e.g. to non-chapter items or to ids missing from the manifest.
 */
export function buildEpubFixture(
  title: string,
  chapters: EpubFixtureChapter[],
  extraSpine: string[] = []
): Buffer {
  const zip = new AdmZip();
  zip.addFile('mimetype', Buffer.from('application/epub+zip'));
  zip.addFile(
    'META-INF/container.xml',
    Buffer.from(
      '<?xml version="1.0"?>\n' +
        '<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">' +
        '<rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>' +
        '</container>'
    )
  );

  const manifest = chapters
    .map(chapter => `<item id="${chapter.id}" href="${chapter.href}" media-type="application/xhtml+xml"/>`)
    .concat('<item id="css" href="style.css" media-type="text/css"/>');
  const spine = chapters
    .map(chapter => `<itemref idref="${chapter.id}"${chapter.linear === false ? ' linear="no"' : ''}/>`)
    .concat(extraSpine.map(idref => `<itemref idref="${idref}"/>`));

  zip.addFile(
    'OEBPS/content.opf',
    Buffer.from(
      '<?xml version="1.0" encoding="utf-8"?>\n' +
        '<package xmlns="http://www.idpf.org/2007/opf" version="3.0">' +
        `<metadata xmlns:dc="http://purl.org/dc/elements/1.1/"><dc:title>${title}</dc:title></metadata>` +
        `<manifest>${manifest.join('')}</manifest>` +
        `<spine>${spine.join('')}</spine>` +
        '</package>'
    )
  );
  zip.addFile('OEBPS/style.css', Buffer.from('p { margin: 0; }'));

  for (const chapter of chapters) {
    const [path] = chapter.href.split('#');
    zip.addFile(`OEBPS/${decodeURIComponent(path)}`, Buffer.from(xhtml(chapter.id, chapter.body)));
  }

  return zip.toBuffer();
}
