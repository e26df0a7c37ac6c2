import { Result, ok, err, ReaderConfig, WriterConfig } from '../types';
import { Logger } from '../utils/common';
import { EpubVersion, EPUB_3_0 } from '../core/epub-version';
import { RESERVED_PREFIXES } from '../xml/property-parser';
import type { Opf3MetaRegistry } from './opf3-meta';

export interface ReadContext {
    version: EpubVersion;
    /** Prefixes declared on the package element. Reserved prefixes are not included. */
    prefixes: ReadonlyMap<string, string>;
    registry: Opf3MetaRegistry;
    config: ReaderConfig;
    logger: Logger;
}

export interface WriteContext {
    version: EpubVersion;
    config: WriterConfig;
    logger: Logger;
}

export function isEpub3(context: { version: EpubVersion }): boolean {
    return context.version.isAtLeast(EPUB_3_0);
}

export function isKnownPrefix(context: ReadContext, prefix: string | null): boolean {
    return prefix === null || context.prefixes.has(prefix) || Object.prototype.hasOwnProperty.call(RESERVED_PREFIXES, prefix);
}

/**
 * Drops the entries that failed to read, logging each one. In strict mode the first failure is returned instead.
 */
export function keepReadable<T, E>(
    results: Iterable<Result<T, E>>,
    context: ReadContext,
    describe: (error: E) => string
): Result<T[], E> {
    const values: T[] = [];
    for (const result of results) {
        if (result.ok) {
            values.push(result.value);
            continue;
        }
        if (context.config.strict) {
            return err(result.error);
        }
        context.logger.warn(`Skipping entry: ${describe(result.error)}`);
    }
    return ok(values);
}
