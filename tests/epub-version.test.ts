import { describe, it, expect } from 'vitest';
import {
    EPUB_2_0,
    EPUB_3_0,
    EPUB_3_2,
    EpubVersion,
    Format,
    compareVersions,
    formatOf,
    parseAndResolve,
    resolveFormat
} from '../src/core/epub-version';

function version(value: string): EpubVersion {
    const parsed = EpubVersion.parse(value);
    if (!parsed.ok) {
        throw new Error(`could not parse ${value}`);
    }
    return parsed.value;
}

describe('EpubVersion', () => {
    it('parses major, minor and patch', () => {
        const parsed = version('3.0.1');
        expect([parsed.major, parsed.minor, parsed.patch]).toEqual([3, 0, 1]);
        expect(parsed.toString()).toBe('3.0.1');
    });

    it('rejects values that are not versions', () => {
        expect(EpubVersion.parse('three')).toEqual({ ok: false, error: { kind: 'InvalidVersion', value: 'three' } });
        expect(EpubVersion.parse('3.')).toEqual({ ok: false, error: { kind: 'InvalidVersion', value: '3.' } });
    });

    it('orders versions', () => {
        expect(EPUB_2_0.isOlder(EPUB_3_0)).toBe(true);
        expect(EPUB_3_2.isNewer(EPUB_3_0)).toBe(true);
        expect(version('3.0').equals(EPUB_3_0)).toBe(true);
        const sorted = [EPUB_3_2, EPUB_2_0, EPUB_3_0].sort(compareVersions);
        expect(sorted.map(entry => entry.toString())).toEqual(['2.0', '3.0', '3.2']);
    });

    it('buckets versions into formats', () => {
        expect(formatOf(version('1.9'))).toBe(Format.Unknown);
        expect(formatOf(version('2.0.1'))).toBe(Format.Epub2_0);
        expect(formatOf(version('3.0'))).toBe(Format.Epub3_0);
        expect(formatOf(version('3.1'))).toBe(Format.Epub3_1);
        expect(formatOf(version('3.3'))).toBe(Format.Epub3_2);
        expect(formatOf(version('4.0'))).toBe(Format.NotSupported);
    });

    it('refuses the withdrawn 3.1 format', () => {
        expect(resolveFormat(version('3.1'))).toEqual({ ok: false, error: { kind: 'WithdrawnVersion', version: '3.1' } });
    });

    it('refuses versions a package can not be read as', () => {
        expect(parseAndResolve('1.0')).toEqual({
            ok: false,
            error: { kind: 'UnsupportedVersion', version: '1.0', format: Format.Unknown }
        });
        expect(parseAndResolve('4.0')).toEqual({
            ok: false,
            error: { kind: 'UnsupportedVersion', version: '4.0', format: Format.NotSupported }
        });
    });
});
