import { Result, ok, err } from '../types';

export enum Format {
    Unknown = 'unknown',
    Epub2_0 = 'epub-2.0',
    Epub3_0 = 'epub-3.0',
    Epub3_1 = 'epub-3.1',
    Epub3_2 = 'epub-3.2',
    NotSupported = 'not-supported'
}

export type VersionError =
    | { kind: 'InvalidVersion'; value: string }
    | { kind: 'WithdrawnVersion'; version: string }
    | { kind: 'UnsupportedVersion'; version: string; format: Format };

export class UnsupportedFormatError extends Error {
    constructor(readonly version: string, readonly format: Format) {
        super(`EPUB version ${version} (${format}) can not be used for a package document`);
        this.name = 'UnsupportedFormatError';
    }
}

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?$/;

export class EpubVersion {
    constructor(
        readonly major: number,
        readonly minor: number = 0,
        readonly patch: number = 0,
        private readonly text: string | null = null
    ) {}

    static parse(value: string): Result<EpubVersion, VersionError> {
        const match = VERSION_PATTERN.exec(value.trim());
        if (!match) {
            return err({ kind: 'InvalidVersion', value });
        }
        const [, major, minor, patch] = match;
        return ok(new EpubVersion(
            parseInt(major, 10),
            minor === undefined ? 0 : parseInt(minor, 10),
            patch === undefined ? 0 : parseInt(patch, 10),
            value.trim()
        ));
    }

    compareTo(other: EpubVersion): number {
        if (this.major !== other.major) return this.major - other.major;
        if (this.minor !== other.minor) return this.minor - other.minor;
        return this.patch - other.patch;
    }

    isOlder(other: EpubVersion): boolean {
        return this.compareTo(other) < 0;
    }

    isNewer(other: EpubVersion): boolean {
        return this.compareTo(other) > 0;
    }

    isAtLeast(other: EpubVersion): boolean {
        return this.compareTo(other) >= 0;
    }

    equals(other: EpubVersion): boolean {
        return this.compareTo(other) === 0;
    }

    get format(): Format {
        return formatOf(this);
    }

    /**
     * The version as it was written in the package document, or `major.minor` for versions created in code.
     */
    toString(): string {
        return this.text ?? `${this.major}.${this.minor}`;
    }
}

export const EPUB_2_0 = new EpubVersion(2, 0);
export const EPUB_3_0 = new EpubVersion(3, 0);
export const EPUB_3_1 = new EpubVersion(3, 1);
export const EPUB_3_2 = new EpubVersion(3, 2);
export const EPUB_4_0 = new EpubVersion(4, 0);

/** Comparator for sorting versions oldest first. */
export function compareVersions(a: EpubVersion, b: EpubVersion): number {
    return a.compareTo(b);
}

/**
 * Buckets a version into the EPUB generation it belongs to. Ranges are `[low, high)`, the last one is open ended.
 */
export function formatOf(version: EpubVersion): Format {
    if (version.isOlder(EPUB_2_0)) return Format.Unknown;
    if (version.isOlder(EPUB_3_0)) return Format.Epub2_0;
    if (version.isOlder(EPUB_3_1)) return Format.Epub3_0;
    if (version.isOlder(EPUB_3_2)) return Format.Epub3_1;
    if (version.isOlder(EPUB_4_0)) return Format.Epub3_2;
    return Format.NotSupported;
}

/**
 * Resolves the format of a version, refusing EPUB 3.1 which was withdrawn.
 */
export function resolveFormat(version: EpubVersion): Result<Format, VersionError> {
    const format = formatOf(version);
    if (format === Format.Epub3_1) {
        return err({ kind: 'WithdrawnVersion', version: version.toString() });
    }
    return ok(format);
}

/**
 * Like {@link resolveFormat}, but also refuses the formats a package document can not be read as.
 */
export function resolveReadableFormat(version: EpubVersion): Result<Format, VersionError> {
    const resolved = resolveFormat(version);
    if (!resolved.ok) {
        return resolved;
    }
    if (resolved.value === Format.Unknown || resolved.value === Format.NotSupported) {
        return err({ kind: 'UnsupportedVersion', version: version.toString(), format: resolved.value });
    }
    return resolved;
}

export function parseAndResolve(value: string): Result<{ version: EpubVersion; format: Format }, VersionError> {
    const parsed = EpubVersion.parse(value);
    if (!parsed.ok) {
        return parsed;
    }
    const format = resolveReadableFormat(parsed.value);
    if (!format.ok) {
        return format;
    }
    return ok({ version: parsed.value, format: format.value });
}

export function describeVersionError(error: VersionError): string {
    switch (error.kind) {
        case 'InvalidVersion':
            return `'${error.value}' is not a valid EPUB version`;
        case 'WithdrawnVersion':
            return `EPUB ${error.version} was withdrawn and is not supported`;
        case 'UnsupportedVersion':
            return `EPUB ${error.version} is not supported (${error.format})`;
    }
}
