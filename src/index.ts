export { EpubParser } from './core/epub-parser';
export { EpubWriter } from './core/epub-writer';
export { LoadedEpub, compareMandatoryFields } from './core/loaded-epub';
export type { ManifestDocument, LoadedEpubParts } from './core/loaded-epub';
export { ManifestResourceIndex } from './core/manifest-resource-index';
export { EPUB_MIME_TYPE, describeError } from './core/errors';
export type { ReaderError, TableOfContentsError } from './core/errors';
export { loadConfig, mergeConfig, defaultConfig } from './core/config';
export * from './core/epub-version';
export { Logger, createSilentLogger, formatFileSize } from './utils/common';
export * from './types';

export { EpubFileSystem } from './fs/epub-file-system';
export type { ResourceIndex } from './fs/epub-file-system';
export { VirtualPath } from './fs/virtual-path';
export * from './fs/file-error';
export * from './fs/resource';
export { Capability, MIMETYPE_PATH, META_INF_CONTROL_FILES } from './fs/resource-classifier';
export type { Protection } from './fs/resource-classifier';
export type { WalkAction } from './fs/resource-visitor';

export * from './xml/xml-element';
export * from './xml/read-errors';
export * from './xml/property-parser';

export * from './metainf/meta-inf-container';
export * from './opf/package-document';
export * from './opf/metadata';
export * from './opf/dublin-core';
export * from './opf/opf3-meta';
export * from './opf/creative-role';
export * from './opf/manifest';
export * from './opf/spine';
export * from './opf/guide';
export * from './opf/guide-reference-corrector';
export * from './opf/bindings';
export * from './opf/tours';
export * from './opf/collection';
export { splitHref, resolveHref, hrefBetween } from './opf/href-resolver';
export * from './toc/ncx';
export * from './toc/navigation-document';
export * from './toc/table-of-contents';

// For programmatic usage
import { Result, EpubConfig } from './types';
import { EpubParser } from './core/epub-parser';
import { LoadedEpub } from './core/loaded-epub';
import { ReaderError } from './core/errors';
import { defaultConfig } from './core/config';
import { Logger, createSilentLogger } from './utils/common';

export interface OpenOptions {
    logger?: Logger;
    config?: EpubConfig;
}

/**
 * Opens an EPUB held in memory.
 */
export async function openEpub(bytes: Buffer | Uint8Array, options: OpenOptions = {}): Promise<Result<LoadedEpub, ReaderError>> {
    const parser = new EpubParser(options.logger ?? createSilentLogger(), options.config ?? defaultConfig);
    return parser.open(bytes);
}

/**
 * Opens the EPUB at `epubPath`.
 */
export async function readEpubFile(epubPath: string, options: OpenOptions = {}): Promise<Result<LoadedEpub, ReaderError>> {
    const parser = new EpubParser(options.logger ?? createSilentLogger(), options.config ?? defaultConfig);
    return parser.readFile(epubPath);
}
