export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

/**
 * Collects a list of results into a single result, stopping at the first failure.
 */
export function collectResults<T, E>(results: Iterable<Result<T, E>>): Result<T[], E> {
    const values: T[] = [];
    for (const result of results) {
        if (!result.ok) {
            return result;
        }
        values.push(result.value);
    }
    return ok(values);
}

export type ReadingDirection = 'ltr' | 'rtl' | 'auto';

export function isReadingDirection(value: string): value is ReadingDirection {
    return value === 'ltr' || value === 'rtl' || value === 'auto';
}

export interface ReaderConfig {
    /**
     * Fail the whole load when an optional package element (guide, bindings, tours, collection)
     * cannot be read, instead of dropping it.
     */
    strict: boolean;
}

export interface WriterConfig {
    /** Skip OPF2 `meta` entries and the guide when writing an EPUB 3 package. */
    omitLegacyFeatures: boolean;
    prettyPrint: boolean;
    compressionLevel: number;
}

export interface EpubConfig {
    reader: ReaderConfig;
    writer: WriterConfig;
}

export interface CliOptions {
    verbose?: boolean;
    config?: string;
}
