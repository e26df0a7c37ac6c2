import { describe, it, expect } from 'vitest';
import { PackageDocument } from '../src/opf/package-document';
import { PackageMetadata, isOpf3Meta } from '../src/opf/metadata';
import { identifierOf, languageEntryOf, titleOf } from '../src/opf/dublin-core';
import {
    IllegalSchemeError,
    MARC_RELATORS_SCHEME,
    MetaCodec,
    Opf3Meta,
    Opf3MetaRegistry,
    createDefaultRegistry
} from '../src/opf/opf3-meta';
import { CreativeRole } from '../src/opf/creative-role';
import { EPUB_2_0, EPUB_3_0, EpubVersion } from '../src/core/epub-version';
import { defaultConfig } from '../src/core/config';
import { XmlElement, Namespaces, parseXml } from '../src/xml/xml-element';
import { ok, err, WriterConfig } from '../src/types';
import { Logger, createSilentLogger } from '../src/utils/common';
import { EPUB2_OPF, EPUB3_OPF, warnings } from './helpers/fixtures';

function read(text: string, logger: Logger = createSilentLogger(), options: { strict?: boolean; registry?: Opf3MetaRegistry } = {}): PackageDocument {
    const parsed = PackageDocument.fromXml(text, { logger, config: { strict: options.strict ?? false }, registry: options.registry });
    if (!parsed.ok) {
        throw new Error(`could not read package: ${parsed.error.kind}`);
    }
    return parsed.value;
}

function labels(metadata: XmlElement): string[] {
    return metadata.children.map(child => child.getAttribute('property') ?? child.qualifiedName);
}

function write(metadata: PackageMetadata, version: EpubVersion, config: WriterConfig = defaultConfig.writer, logger: Logger = createSilentLogger()): XmlElement {
    return metadata.toElement({ version, config, logger });
}

function opf3(metadata: string): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="pub-id">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="pub-id">urn:uuid:test-0004</dc:identifier>
    <dc:title>Ordering</dc:title>
    <dc:language>en</dc:language>
    ${metadata}
  </metadata>
  <manifest><item id="c" href="c.xhtml" media-type="application/xhtml+xml"/></manifest>
  <spine><itemref idref="c"/></spine>
</package>`;
}

describe('PackageMetadata reading', () => {
    it('reads EPUB 2 creators with their legacy attributes', () => {
        const metadata = read(EPUB2_OPF).metadata;
        expect(metadata.identifiers).toEqual([{ name: 'identifier', identifier: 'book-id', content: 'urn:uuid:test-0002', scheme: 'UUID' }]);
        expect(metadata.primaryTitle.content).toBe('Sample Two');
        const [creator] = metadata.dublinCoreEntries;
        expect(creator).toMatchObject({ name: 'creator', content: 'Test Writer', fileAs: 'Writer, Test' });
        expect(creator.name === 'creator' && creator.role?.code).toBe('aut');
        expect(metadata.opf2MetaEntries).toEqual([{ kind: 'name', name: 'cover', content: 'cover-image', scheme: null, attributes: [] }]);
    });

    it('reads OPF3 metas and their refinements', () => {
        const metadata = read(EPUB3_OPF).metadata;
        expect(metadata.opf3MetaEntries.map(meta => meta.toString())).toEqual([
            'meta(dcterms:modified=2024-01-01T00:00:00Z)',
            'meta(file-as=Writer, Test)',
            'meta(alternate-script=Writer Alternate)',
            'meta(role=aut)',
            'meta(ibooks:version=1.0)'
        ]);
        expect(metadata.refinementsOf('creator-1').map(meta => meta.content)).toEqual(['Writer, Test', 'aut']);
        expect(metadata.refinementsOf('creator-1-file-as').map(meta => meta.content)).toEqual(['Writer Alternate']);
    });

    it('decodes metas with a registered scheme', () => {
        const [role] = read(EPUB3_OPF).metadata.opf3MetaEntries.filter(meta => meta.scheme === MARC_RELATORS_SCHEME);
        expect(role.value).toBeInstanceOf(CreativeRole);
        expect(role.value).toEqual(CreativeRole.AUTHOR);
    });

    it('tells OPF3 metas from OPF2 ones by their text', () => {
        const parsed = parseXml('<m><meta property="a">x</meta><meta property="a"> </meta><meta name="n" content="c"/></m>');
        expect(parsed.ok && parsed.value.children.map(isOpf3Meta)).toEqual([true, false, false]);
    });

    it('skips entries with undeclared prefixes', () => {
        const logger = createSilentLogger();
        const metadata = read(opf3('<meta property="foo:bar">x</meta>'), logger).metadata;
        expect(metadata.opf3MetaEntries).toEqual([]);
        expect(warnings(logger)).toEqual([
            "Skipping entry: Property 'foo:bar' at /package/metadata/meta uses an undeclared prefix"
        ]);
    });

    it('fails on undeclared prefixes when strict', () => {
        const parsed = PackageDocument.fromXml(opf3('<meta property="foo:bar">x</meta>'), {
            logger: createSilentLogger(),
            config: { strict: true }
        });
        expect(parsed).toEqual({ ok: false, error: { kind: 'UnknownPrefix', property: 'foo:bar', path: '/package/metadata/meta' } });
    });

    it('checks values against custom codecs', () => {
        const number: MetaCodec<number> = {
            decode: text => (/^\d+$/.test(text) ? ok(Number(text)) : err('not a number')),
            encode: value => String(value)
        };
        const registry = createDefaultRegistry().register('xsd:integer', number);
        const source = opf3('<meta property="display-seq" scheme="xsd:integer">2</meta><meta property="display-seq" scheme="xsd:integer">two</meta>');

        const lenient = read(source, createSilentLogger(), { registry });
        expect(lenient.metadata.opf3MetaEntries.map(meta => meta.value)).toEqual([2]);

        const strict = PackageDocument.fromXml(source, { logger: createSilentLogger(), config: { strict: true }, registry });
        expect(strict).toEqual({
            ok: false,
            error: { kind: 'InvalidMetaValue', value: 'two', scheme: 'xsd:integer', reason: 'not a number', path: '/package/metadata/meta' }
        });
    });

    it('requires a title', () => {
        const source = EPUB2_OPF.replace('<dc:title>Sample Two</dc:title>', '');
        expect(PackageDocument.fromXml(source, { logger: createSilentLogger() })).toEqual({
            ok: false,
            error: { kind: 'MissingTitle', path: '/package/metadata' }
        });
    });
});

describe('PackageMetadata writing', () => {
    it('writes refinements right after what they refine', () => {
        const source = opf3(`
    <meta refines="#creator-1" property="role" scheme="marc:relators">aut</meta>
    <meta refines="#creator-1-file-as" property="alternate-script">Writer Alternate</meta>
    <meta property="dcterms:modified">2024-01-01T00:00:00Z</meta>
    <dc:creator id="creator-1">Test Writer</dc:creator>
    <meta refines="#creator-1" property="file-as" id="creator-1-file-as">Writer, Test</meta>`);
        const document = read(source);
        expect(labels(write(document.metadata, document.version))).toEqual([
            'dc:identifier',
            'dc:title',
            'dc:language',
            'dc:creator',
            'role',
            'file-as',
            'alternate-script',
            'dcterms:modified'
        ]);
    });

    it('writes refinements of missing elements last', () => {
        const logger = createSilentLogger();
        const document = read(opf3('<meta refines="#nowhere" property="display-seq">1</meta><meta property="dcterms:modified">2024-01-01T00:00:00Z</meta>'));
        expect(labels(write(document.metadata, document.version, defaultConfig.writer, logger))).toEqual([
            'dc:identifier',
            'dc:title',
            'dc:language',
            'dcterms:modified',
            'display-seq'
        ]);
        expect(warnings(logger)).toEqual(['Refined element of meta(display-seq=1) was not written, writing it unattached']);
    });

    it('writes refinements of a link right after it', () => {
        const logger = createSilentLogger();
        const document = read(opf3(`
    <meta property="dcterms:modified">2024-01-01T00:00:00Z</meta>
    <meta refines="#record" property="display-seq">1</meta>
    <link rel="record" href="meta/record.xml" media-type="application/marc" id="record"/>
    <link rel="alternate" href="book.pdf" media-type="application/pdf"/>`));
        expect(labels(write(document.metadata, document.version, defaultConfig.writer, logger))).toEqual([
            'dc:identifier',
            'dc:title',
            'dc:language',
            'dcterms:modified',
            'link',
            'display-seq',
            'link'
        ]);
        expect(warnings(logger)).toEqual([]);
    });

    it('writes OPF3 metas and OPF2 metas for every version', () => {
        const document = read(EPUB3_OPF);
        const written = labels(write(document.metadata, EPUB_2_0));
        expect(written).toContain('dcterms:modified');
        expect(written[written.length - 1]).toBe('meta');
    });

    it('leaves out OPF2 metas of EPUB 3 packages when legacy features are omitted', () => {
        const config = { ...defaultConfig.writer, omitLegacyFeatures: true };
        const document = read(EPUB3_OPF);
        expect(labels(write(document.metadata, EPUB_3_0, config))).not.toContain('meta');
        expect(labels(write(read(EPUB2_OPF).metadata, EPUB_2_0, config))).toContain('meta');
    });

    it('writes legacy creator attributes only for EPUB 2', () => {
        const metadata = read(EPUB2_OPF).metadata;
        const creator = (version: EpubVersion): XmlElement | null =>
            write(metadata, version).getChild('creator', Namespaces.DUBLIN_CORE);
        expect(creator(EPUB_2_0)?.getAttribute('role', Namespaces.OPF)).toBe('aut');
        expect(creator(EPUB_2_0)?.getAttribute('file-as', Namespaces.OPF)).toBe('Writer, Test');
        expect(creator(EPUB_3_0)?.getAttribute('role', Namespaces.OPF)).toBeNull();
    });
});

describe('PackageMetadata editing', () => {
    it('keeps at least one identifier, title and language', () => {
        const title = titleOf('Only');
        const metadata = new PackageMetadata([identifierOf('urn:uuid:test')], [title], [languageEntryOf('en')]);
        expect(metadata.removeTitle(title)).toBe(false);
        const second = titleOf('Second');
        metadata.addTitle(second);
        expect(metadata.removeTitle(title)).toBe(true);
        expect(metadata.primaryTitle).toBe(second);
    });
});

describe('Opf3Meta', () => {
    it('refuses string values for schemes with a typed codec', () => {
        expect(() => Opf3Meta.createString({ prefix: null, reference: 'role' }, 'aut', { scheme: MARC_RELATORS_SCHEME })).toThrow(
            IllegalSchemeError
        );
        const meta = Opf3Meta.createString({ prefix: null, reference: 'role' }, 'aut', { scheme: 'custom' });
        expect(meta.content).toBe('aut');
    });

    it('encodes creative roles by their code', () => {
        const meta = Opf3Meta.createCreativeRole({ prefix: null, reference: 'role' }, CreativeRole.of('xyz'), { refines: '#creator-1' });
        expect(meta.content).toBe('oth.xyz');
        expect(meta.scheme).toBe(MARC_RELATORS_SCHEME);
        expect(meta.refinesTarget).toBe('creator-1');
    });
});
