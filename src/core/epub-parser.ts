import * as fs from 'fs-extra';
import { Result, ok, err, EpubConfig } from '../types';
import { Logger } from '../utils/common';
import { EpubFileSystem } from '../fs/epub-file-system';
import type { VirtualPath } from '../fs/virtual-path';
import type { FileResource } from '../fs/resource';
import { describeFileError } from '../fs/file-error';
import { MIMETYPE_PATH } from '../fs/resource-classifier';
import { CONTAINER_FILE, MetaInfContainer } from '../metainf/meta-inf-container';
import type { ManifestItem } from '../opf/manifest';
import { PackageDocument } from '../opf/package-document';
import { NavigationControlFile } from '../toc/ncx';
import { NavigationDocument } from '../toc/navigation-document';
import { ManifestLocator, TableOfContents } from '../toc/table-of-contents';
import { EPUB_MIME_TYPE, ReaderError, TableOfContentsError } from './errors';
import { Format } from './epub-version';
import { LoadedEpub, ManifestDocument } from './loaded-epub';
import { ManifestResourceIndex } from './manifest-resource-index';
import { defaultConfig } from './config';

function fileOf(fileSystem: EpubFileSystem, path: VirtualPath | string): FileResource | null {
    const resource = fileSystem.resource(path);
    return resource.ok && resource.value.type === 'file' ? resource.value : null;
}

interface TableOfContentsParts {
    tableOfContents: TableOfContents;
    ncx: ManifestDocument<NavigationControlFile> | null;
    navigationDocument: ManifestDocument<NavigationDocument> | null;
}

export class EpubParser {
    constructor(private readonly logger: Logger, private readonly config: EpubConfig = defaultConfig) {}

    async readFile(epubPath: string): Promise<Result<LoadedEpub, ReaderError>> {
        this.logger.info(`Reading EPUB: ${epubPath}`);
        let bytes: Buffer;
        try {
            bytes = await fs.readFile(epubPath);
        } catch (error) {
            return err({ kind: 'FailedToCreateFileSystem', cause: error instanceof Error ? error.message : String(error) });
        }
        return this.open(bytes);
    }

    async open(bytes: Buffer | Uint8Array): Promise<Result<LoadedEpub, ReaderError>> {
        let fileSystem: EpubFileSystem;
        try {
            fileSystem = await EpubFileSystem.fromZip(bytes, this.logger);
        } catch (error) {
            return err({ kind: 'FailedToCreateFileSystem', cause: error instanceof Error ? error.message : String(error) });
        }
        const result = this.read(fileSystem);
        if (!result.ok) {
            fileSystem.close();
            return result;
        }
        this.logger.success(`Opened EPUB ${result.value.version} (${result.value.format})`);
        return result;
    }

    private read(fileSystem: EpubFileSystem): Result<LoadedEpub, ReaderError> {
        const checked = this.checkFiles(fileSystem);
        if (!checked.ok) return checked;

        const containerText = fileOf(fileSystem, `/${CONTAINER_FILE}`);
        if (containerText === null) {
            return err({ kind: 'MissingMetaInfContainer' });
        }
        const containerXml = containerText.readText();
        if (!containerXml.ok) {
            return err({ kind: 'MissingMetaInfContainer' });
        }
        const container = MetaInfContainer.fromXml(containerXml.value);
        if (!container.ok) {
            return err({ kind: 'MetaInfError', error: container.error });
        }

        const rootFile = container.value.packageDocument;
        if (rootFile === null) {
            return err({ kind: 'MissingOebpsRootFileElement' });
        }
        const packagePath = this.locate(fileSystem, rootFile.fullPath);
        const packageResource = packagePath === null ? null : fileOf(fileSystem, packagePath);
        if (packagePath === null || packageResource === null) {
            return err({ kind: 'MissingOpfFile', path: rootFile.fullPath });
        }
        const packageXml = packageResource.readText();
        if (!packageXml.ok) {
            return err({ kind: 'MissingOpfFile', path: rootFile.fullPath });
        }
        const packageDocument = PackageDocument.fromXml(packageXml.value, { logger: this.logger, config: this.config.reader });
        if (!packageDocument.ok) {
            return err({ kind: 'OpfError', path: packagePath.toString(), error: packageDocument.error });
        }
        fileSystem.setPackageDocumentPath(packagePath);
        fileSystem.attachResourceIndex(new ManifestResourceIndex(fileSystem, packageDocument.value, this.logger));

        const toc = this.readTableOfContents(fileSystem, packagePath, packageDocument.value);
        if (!toc.ok) {
            return err({ kind: 'TableOfContentsError', error: toc.error });
        }
        return ok(new LoadedEpub(
            { fileSystem, container: container.value, packageDocument: packageDocument.value, ...toc.value },
            this.config,
            this.logger
        ));
    }

    /**
     * Checks that the container is at least minimally sound before any document is parsed.
     */
    private checkFiles(fileSystem: EpubFileSystem): Result<void, ReaderError> {
        const metaInf = fileSystem.resource('/META-INF');
        if (!metaInf.ok || metaInf.value.type !== 'directory') {
            return err({ kind: 'MissingMetaInf' });
        }
        if (fileOf(fileSystem, `/${CONTAINER_FILE}`) === null) {
            return err({ kind: 'MissingMetaInfContainer' });
        }
        const mimetype = fileOf(fileSystem, MIMETYPE_PATH);
        if (mimetype === null) {
            return err({ kind: 'MissingMimeType' });
        }
        const content = mimetype.readText('ascii');
        if (!content.ok) {
            return err({ kind: 'CorruptMimeType', cause: describeFileError(content.error) });
        }
        if (content.value !== EPUB_MIME_TYPE) {
            return err({ kind: 'MimeTypeContentMismatch', content: content.value });
        }
        return ok(undefined);
    }

    private locate(fileSystem: EpubFileSystem, fullPath: string): VirtualPath | null {
        try {
            return fileSystem.getPath('/', fullPath).normalize();
        } catch (error) {
            this.logger.warn(`Rootfile path '${fullPath}' is not inside the archive: ${error instanceof Error ? error.message : String(error)}`);
            return null;
        }
    }

    private readTableOfContents(
        fileSystem: EpubFileSystem,
        packagePath: VirtualPath,
        packageDocument: PackageDocument
    ): Result<TableOfContentsParts, TableOfContentsError> {
        const locator = new ManifestLocator(packagePath, packageDocument.manifest);
        const { manifest, spine } = packageDocument;

        let ncx: ManifestDocument<NavigationControlFile> | null = null;
        let ncxPath: VirtualPath | null = null;
        const ncxItem = spine.tableOfContentsId === null ? null : manifest.getItem(spine.tableOfContentsId);
        if (ncxItem !== null) {
            const read = this.readDocument(fileSystem, locator, ncxItem);
            if (!read.ok) return read;
            const parsed = NavigationControlFile.fromXml(read.value.text);
            if (!parsed.ok) {
                return err({ kind: 'NcxError', path: read.value.path.toString(), error: parsed.error });
            }
            ncx = { document: parsed.value, item: ncxItem };
            ncxPath = read.value.path;
        }

        let navigationDocument: ManifestDocument<NavigationDocument> | null = null;
        let navPath: VirtualPath | null = null;
        const navItem = packageDocument.format === Format.Epub2_0 ? undefined : manifest.itemsWithProperty('nav')[0];
        if (navItem !== undefined) {
            const read = this.readDocument(fileSystem, locator, navItem);
            if (!read.ok) return read;
            const parsed = NavigationDocument.fromXml(read.value.text);
            if (!parsed.ok) {
                return err({ kind: 'NavigationDocumentError', path: read.value.path.toString(), error: parsed.error });
            }
            navigationDocument = { document: parsed.value, item: navItem };
            navPath = read.value.path;
        }

        let tableOfContents: Result<TableOfContents, TableOfContentsError>;
        if (navigationDocument !== null && navPath !== null) {
            tableOfContents = TableOfContents.fromNavigationDocument(navigationDocument.document, navPath, locator);
        } else if (ncx !== null && ncxPath !== null) {
            tableOfContents = TableOfContents.fromNcx(ncx.document, ncxPath, locator);
        } else {
            this.logger.warn('The package has neither an NCX nor a navigation document');
            tableOfContents = ok(TableOfContents.empty());
        }
        if (!tableOfContents.ok) return tableOfContents;
        this.logger.debug(`Table of contents has ${tableOfContents.value.size} entries`);
        return ok({ tableOfContents: tableOfContents.value, ncx, navigationDocument });
    }

    private readDocument(
        fileSystem: EpubFileSystem,
        locator: ManifestLocator,
        item: ManifestItem
    ): Result<{ path: VirtualPath; text: string }, TableOfContentsError> {
        const path = locator.pathOf(item);
        if (path === null) {
            return err({ kind: 'MissingTableOfContentsFile', path: item.href });
        }
        const resource = fileOf(fileSystem, path);
        const text = resource === null ? null : resource.readText();
        if (text === null || !text.ok) {
            return err({ kind: 'MissingTableOfContentsFile', path: path.toString() });
        }
        return ok({ path, text: text.value });
    }
}
