import JSZip from 'jszip';
import { Logger } from '../../src/utils/common';

export const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

export const EPUB2_OPF = `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="2.0" unique-identifier="book-id">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:opf="http://www.idpf.org/2007/opf">
    <dc:identifier id="book-id" opf:scheme="UUID">urn:uuid:test-0002</dc:identifier>
    <dc:title>Sample Two</dc:title>
    <dc:language>en</dc:language>
    <dc:creator opf:role="aut" opf:file-as="Writer, Test">Test Writer</dc:creator>
    <meta name="cover" content="cover-image"/>
  </metadata>
  <manifest>
    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>
    <item id="chapter1" href="text/chapter1.xhtml" media-type="application/xhtml+xml"/>
    <item id="chapter2" href="text/chapter2.xhtml" media-type="application/xhtml+xml"/>
    <item id="cover-image" href="images/cover.png" media-type="image/png"/>
  </manifest>
  <spine toc="ncx">
    <itemref idref="chapter1"/>
    <itemref idref="chapter2" linear="no"/>
  </spine>
  <guide>
    <reference type="toc" title="Contents" href="text/chapter1.xhtml"/>
    <reference type="other.copyright" title="Copyright" href="text/chapter2.xhtml"/>
  </guide>
</package>
`;

export const EPUB2_NCX = `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="urn:uuid:test-0002"/>
  </head>
  <docTitle><text>Sample Two</text></docTitle>
  <navMap>
    <navPoint id="np-1" playOrder="1">
      <navLabel><text>Chapter One</text></navLabel>
      <content src="text/chapter1.xhtml"/>
      <navPoint id="np-1-1" playOrder="2">
        <navLabel><text>First Section</text></navLabel>
        <content src="text/chapter1.xhtml#section-1"/>
      </navPoint>
    </navPoint>
    <navPoint id="np-2" playOrder="3">
      <navLabel><text>Chapter Two</text></navLabel>
      <content src="text/chapter2.xhtml"/>
    </navPoint>
  </navMap>
</ncx>
`;

export const EPUB3_OPF = `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="pub-id" xml:lang="en" prefix="ibooks: http://example.com/ibooks/vocabulary#">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="pub-id">urn:uuid:test-0003</dc:identifier>
    <dc:title id="main-title">Sample Three</dc:title>
    <dc:language>en</dc:language>
    <dc:creator id="creator-1">Test Writer</dc:creator>
    <meta property="dcterms:modified">2024-01-01T00:00:00Z</meta>
    <meta refines="#creator-1" property="file-as" id="creator-1-file-as">Writer, Test</meta>
    <meta refines="#creator-1-file-as" property="alternate-script">Writer Alternate</meta>
    <meta refines="#creator-1" property="role" scheme="marc:relators">aut</meta>
    <meta property="ibooks:version">1.0</meta>
    <meta name="cover" content="cover-image"/>
  </metadata>
  <manifest>
    <item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>
    <item id="chapter1" href="text/chapter1.xhtml" media-type="application/xhtml+xml"/>
    <item id="chapter2" href="text/chapter2.xhtml" media-type="application/xhtml+xml"/>
    <item id="cover-image" href="images/cover.png" media-type="image/png" properties="cover-image"/>
  </manifest>
  <spine page-progression-direction="ltr">
    <itemref idref="chapter1"/>
    <itemref idref="chapter2"/>
  </spine>
</package>
`;

export const EPUB3_NAV = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
  <head><title>Contents</title></head>
  <body>
    <nav epub:type="toc" id="toc">
      <h1>Contents</h1>
      <ol>
        <li>
          <a href="text/chapter1.xhtml">Chapter One</a>
          <ol>
            <li><a href="text/chapter1.xhtml#section-1">First Section</a></li>
          </ol>
        </li>
        <li><a href="text/chapter2.xhtml">Chapter Two</a></li>
      </ol>
    </nav>
    <nav epub:type="landmarks" hidden="">
      <ol>
        <li><a epub:type="bodymatter" href="text/chapter1.xhtml">Start</a></li>
      </ol>
    </nav>
  </body>
</html>
`;

export function chapter(title: string): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<html xmlns="http://www.w3.org/1999/xhtml">
  <head><title>${title}</title></head>
  <body><h1 id="section-1">${title}</h1></body>
</html>
`;
}

/** Archive entries by path. A `null` value is written as a directory. */
export type EpubFiles = Record<string, string | Buffer | null>;

export function epub2Files(): EpubFiles {
    return {
        mimetype: 'application/epub+zip',
        'META-INF/container.xml': CONTAINER_XML,
        'OEBPS/content.opf': EPUB2_OPF,
        'OEBPS/toc.ncx': EPUB2_NCX,
        'OEBPS/text/chapter1.xhtml': chapter('Chapter One'),
        'OEBPS/text/chapter2.xhtml': chapter('Chapter Two'),
        'OEBPS/images/cover.png': Buffer.from([0x89, 0x50, 0x4e, 0x47]),
        'OEBPS/styles/book.css': 'body { margin: 0; }\n'
    };
}

export function epub3Files(): EpubFiles {
    return {
        mimetype: 'application/epub+zip',
        'META-INF/container.xml': CONTAINER_XML,
        'OEBPS/content.opf': EPUB3_OPF,
        'OEBPS/nav.xhtml': EPUB3_NAV,
        'OEBPS/text/chapter1.xhtml': chapter('Chapter One'),
        'OEBPS/text/chapter2.xhtml': chapter('Chapter Two'),
        'OEBPS/images/cover.png': Buffer.from([0x89, 0x50, 0x4e, 0x47])
    };
}

export async function buildEpub(files: EpubFiles): Promise<Buffer> {
    const zip = new JSZip();
    const mimetype = files.mimetype;
    if (typeof mimetype === 'string' || Buffer.isBuffer(mimetype)) {
        zip.file('mimetype', mimetype, { compression: 'STORE' });
    }
    for (const [name, content] of Object.entries(files)) {
        if (name === 'mimetype') {
            continue;
        }
        if (content === null) {
            zip.folder(name);
        } else {
            zip.file(name, content);
        }
    }
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/** Messages a logger recorded at warn level, without their level and timestamp. */
export function warnings(logger: Logger): string[] {
    return logger
        .getLogs()
        .filter(line => line.startsWith('[WARN]'))
        .map(line => line.substring(line.indexOf(' - ') + 3));
}
