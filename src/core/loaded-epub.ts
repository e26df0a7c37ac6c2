import { EpubConfig, Result } from '../types';
import { Logger } from '../utils/common';
import type { EpubFileSystem } from '../fs/epub-file-system';
import type { FileError } from '../fs/file-error';
import type { VirtualPath } from '../fs/virtual-path';
import type { MetaInfContainer } from '../metainf/meta-inf-container';
import type { ManifestItem } from '../opf/manifest';
import type { PackageDocument } from '../opf/package-document';
import { resolveHref } from '../opf/href-resolver';
import type { NavigationControlFile } from '../toc/ncx';
import type { NavigationDocument } from '../toc/navigation-document';
import type { TableOfContents } from '../toc/table-of-contents';
import type { EpubVersion, Format } from './epub-version';
import { EpubWriter } from './epub-writer';

/**
 * A table of contents document together with the manifest item it was read from. The item is followed on save,
 * so moving the file through the file system moves the serialized document with it.
 */
export interface ManifestDocument<T> {
    document: T;
    item: ManifestItem;
}

export interface LoadedEpubParts {
    fileSystem: EpubFileSystem;
    container: MetaInfContainer;
    packageDocument: PackageDocument;
    tableOfContents: TableOfContents;
    ncx: ManifestDocument<NavigationControlFile> | null;
    navigationDocument: ManifestDocument<NavigationDocument> | null;
}

export class LoadedEpub {
    readonly fileSystem: EpubFileSystem;
    readonly container: MetaInfContainer;
    readonly packageDocument: PackageDocument;
    readonly tableOfContents: TableOfContents;
    readonly ncx: ManifestDocument<NavigationControlFile> | null;
    readonly navigationDocument: ManifestDocument<NavigationDocument> | null;

    constructor(parts: LoadedEpubParts, private readonly config: EpubConfig, private readonly logger: Logger) {
        this.fileSystem = parts.fileSystem;
        this.container = parts.container;
        this.packageDocument = parts.packageDocument;
        this.tableOfContents = parts.tableOfContents;
        this.ncx = parts.ncx;
        this.navigationDocument = parts.navigationDocument;
    }

    get version(): EpubVersion {
        return this.packageDocument.version;
    }

    get format(): Format {
        return this.packageDocument.format;
    }

    get packageDocumentPath(): VirtualPath {
        const path = this.fileSystem.packageDocumentPath;
        if (path === null) {
            throw new Error('The EPUB file system has no package document');
        }
        return path;
    }

    /** Where a manifest item currently lives in the archive, or `null` when its href leaves the archive. */
    pathOf(item: ManifestItem): VirtualPath | null {
        return resolveHref(this.packageDocumentPath, item.href);
    }

    async toBuffer(): Promise<Result<Buffer, FileError>> {
        return new EpubWriter(this.config.writer, this.logger).toBuffer(this);
    }

    async save(outputPath: string): Promise<Result<void, FileError>> {
        return new EpubWriter(this.config.writer, this.logger).save(this, outputPath);
    }

    close(): void {
        this.fileSystem.close();
    }
}

/**
 * Lists the mandatory fields that differ between two loads of the same book.
 */
export function compareMandatoryFields(before: LoadedEpub, after: LoadedEpub): string[] {
    const differences: string[] = [];
    const check = (label: string, a: string, b: string): void => {
        if (a !== b) {
            differences.push(`${label}: '${a}' became '${b}'`);
        }
    };
    const left = before.packageDocument;
    const right = after.packageDocument;
    check('version', left.version.toString(), right.version.toString());
    check('unique-identifier', left.uniqueIdentifier, right.uniqueIdentifier);
    check('identifiers', left.metadata.identifiers.map(entry => entry.content).join('|'), right.metadata.identifiers.map(entry => entry.content).join('|'));
    check('titles', left.metadata.titles.map(entry => entry.content).join('|'), right.metadata.titles.map(entry => entry.content).join('|'));
    check('languages', left.metadata.languages.map(entry => entry.content).join('|'), right.metadata.languages.map(entry => entry.content).join('|'));
    check('manifest', left.manifest.toString(), right.manifest.toString());
    check('spine', left.spine.references.map(reference => reference.idref).join('|'), right.spine.references.map(reference => reference.idref).join('|'));
    check('table of contents size', String(before.tableOfContents.size), String(after.tableOfContents.size));
    return differences;
}
