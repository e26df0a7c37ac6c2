import * as fs from 'fs-extra';
import { Result, ok, WriterConfig } from '../types';
import type { FileError } from '../fs/file-error';
import { Logger, formatFileSize } from '../utils/common';
import { CONTAINER_FILE } from '../metainf/meta-inf-container';
import type { LoadedEpub, ManifestDocument } from './loaded-epub';

/**
 * Serializes the document models of a book back into its file system and zips the result.
 */
export class EpubWriter {
    constructor(private readonly config: WriterConfig, private readonly logger: Logger) {}

    /**
     * Writes container.xml, the package document and the table of contents documents into the file system.
     */
    write(epub: LoadedEpub): Result<void, FileError> {
        const { fileSystem } = epub;
        const container = fileSystem.writeSystemFile(
            fileSystem.getPath('/', CONTAINER_FILE),
            Buffer.from(epub.container.toXml(this.config.prettyPrint), 'utf8')
        );
        if (!container.ok) {
            return container;
        }

        const packageXml = epub.packageDocument.toXml(this.config, this.logger);
        const written = fileSystem.writeSystemFile(epub.packageDocumentPath, Buffer.from(packageXml, 'utf8'));
        if (!written.ok) {
            return written;
        }
        this.logger.debug(`Wrote package document ${epub.packageDocumentPath}`);

        const ncx = this.writeDocument(epub, epub.ncx, document => document.toXml(this.config.prettyPrint));
        if (!ncx.ok) {
            return ncx;
        }
        return this.writeDocument(epub, epub.navigationDocument, nav => nav.toXml(this.config.prettyPrint));
    }

    async toBuffer(epub: LoadedEpub): Promise<Result<Buffer, FileError>> {
        const written = this.write(epub);
        if (!written.ok) {
            return written;
        }
        const zipped = await epub.fileSystem.toZip(this.config.compressionLevel);
        if (zipped.ok) {
            this.logger.info(`Generated EPUB archive (${formatFileSize(zipped.value.length)})`);
        }
        return zipped;
    }

    /**
     * Writes the archive to `outputPath`. Failures of the host file system are thrown.
     */
    async save(epub: LoadedEpub, outputPath: string): Promise<Result<void, FileError>> {
        const buffer = await this.toBuffer(epub);
        if (!buffer.ok) {
            return buffer;
        }
        await fs.outputFile(outputPath, buffer.value);
        this.logger.success(`Saved EPUB to ${outputPath}`);
        return ok(undefined);
    }

    private writeDocument<T>(
        epub: LoadedEpub,
        entry: ManifestDocument<T> | null,
        serialize: (document: T) => string
    ): Result<void, FileError> {
        if (entry === null) {
            return ok(undefined);
        }
        if (!epub.packageDocument.manifest.hasItem(entry.item.id)) {
            this.logger.warn(`Manifest item '${entry.item.id}' was removed, its document is not written`);
            return ok(undefined);
        }
        const path = epub.pathOf(entry.item);
        if (path === null) {
            this.logger.warn(`Manifest item '${entry.item.id}' points outside the archive, its document is not written`);
            return ok(undefined);
        }
        const written = epub.fileSystem.writeSystemFile(path, Buffer.from(serialize(entry.document), 'utf8'));
        if (written.ok) {
            this.logger.debug(`Wrote ${path}`);
        }
        return written;
    }
}
