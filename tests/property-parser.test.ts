import { describe, it, expect } from 'vitest';
import {
    DefaultVocabulary,
    encodePrefixes,
    encodeProperties,
    expandProperty,
    isNcName,
    parsePrefixes,
    parseProperties,
    parseProperty
} from '../src/xml/property-parser';

describe('parseProperty', () => {
    it('splits the prefix from the reference', () => {
        expect(parseProperty('dcterms:modified')).toEqual({ ok: true, value: { prefix: 'dcterms', reference: 'modified' } });
        expect(parseProperty('nav')).toEqual({ ok: true, value: { prefix: null, reference: 'nav' } });
    });

    it('rejects malformed properties', () => {
        expect(parseProperty('')).toEqual({ ok: false, error: 'property is empty' });
        expect(parseProperty('1x:y')).toEqual({ ok: false, error: "'1x' is not a valid prefix name" });
        expect(parseProperty('dcterms:')).toEqual({ ok: false, error: 'reference is empty' });
    });

    it('knows what an NCName is', () => {
        expect(isNcName('rendition')).toBe(true);
        expect(isNcName('_a.b-c')).toBe(true);
        expect(isNcName('-a')).toBe(false);
    });
});

describe('parseProperties', () => {
    it('keeps the first of repeated properties', () => {
        const parsed = parseProperties(' nav  cover-image nav ');
        expect(parsed).toEqual({
            ok: true,
            value: [
                { prefix: null, reference: 'nav' },
                { prefix: null, reference: 'cover-image' }
            ]
        });
        expect(parsed.ok && encodeProperties(parsed.value)).toBe('nav cover-image');
    });

    it('reports the first bad token', () => {
        expect(parseProperties('nav :x')).toEqual({ ok: false, error: "'' is not a valid prefix name" });
    });
});

describe('parsePrefixes', () => {
    it('reads name and URI pairs', () => {
        const parsed = parsePrefixes('ibooks: http://example.com/ibooks/ rendition: http://example.com/rendition/');
        expect(parsed).toEqual({
            ok: true,
            value: new Map([
                ['ibooks', 'http://example.com/ibooks/'],
                ['rendition', 'http://example.com/rendition/']
            ])
        });
        expect(parsed.ok && encodePrefixes(parsed.value)).toBe(
            'ibooks: http://example.com/ibooks/ rendition: http://example.com/rendition/'
        );
    });

    it('rejects broken declarations', () => {
        expect(parsePrefixes('ibooks http://example.com/')).toEqual({ ok: false, error: "expected 'name:' but found 'ibooks'" });
        expect(parsePrefixes('a: http://x/ a: http://y/')).toEqual({ ok: false, error: "prefix 'a' is declared twice" });
        expect(parsePrefixes('a:')).toEqual({ ok: false, error: "prefix 'a' has no URI" });
    });

    it('accepts an empty attribute', () => {
        expect(parsePrefixes('   ')).toEqual({ ok: true, value: new Map() });
    });
});

describe('expandProperty', () => {
    const declared = new Map([['ibooks', 'http://example.com/ibooks/']]);

    it('uses the default vocabulary for unprefixed properties', () => {
        expect(expandProperty({ prefix: null, reference: 'nav' }, declared, DefaultVocabulary.ITEM)).toBe(
            'http://idpf.org/epub/vocab/package/item/#nav'
        );
    });

    it('prefers declared prefixes over reserved ones', () => {
        expect(expandProperty({ prefix: 'ibooks', reference: 'version' }, declared, DefaultVocabulary.META)).toBe(
            'http://example.com/ibooks/version'
        );
        expect(expandProperty({ prefix: 'dcterms', reference: 'modified' }, declared, DefaultVocabulary.META)).toBe(
            'http://purl.org/dc/terms/modified'
        );
        const overridden = new Map([['dcterms', 'http://example.com/terms/']]);
        expect(expandProperty({ prefix: 'dcterms', reference: 'modified' }, overridden, DefaultVocabulary.META)).toBe(
            'http://example.com/terms/modified'
        );
    });

    it('returns null for unknown prefixes', () => {
        expect(expandProperty({ prefix: 'unknown', reference: 'x' }, declared, DefaultVocabulary.META)).toBeNull();
    });
});
