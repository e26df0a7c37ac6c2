import type { EpubFileSystem, ResourceIndex } from '../fs/epub-file-system';
import { ManifestItem, describePackageChange } from '../opf/manifest';
import type { PackageDocument } from '../opf/package-document';
import { hrefBetween, resolveHref } from '../opf/href-resolver';
import { Logger } from '../utils/common';

/**
 * Backs the local resource class of the file system with the package manifest. Paths are recomputed from the
 * manifest on every lookup, so items added or removed through the model are seen immediately.
 */
export class ManifestResourceIndex implements ResourceIndex {
    constructor(
        private readonly fileSystem: EpubFileSystem,
        private readonly packageDocument: PackageDocument,
        private readonly logger: Logger
    ) {}

    isRegistered(path: string): boolean {
        return this.itemAt(path) !== null;
    }

    checkRemoval(path: string): string | null {
        const item = this.itemAt(path);
        if (item === null) {
            return null;
        }
        const refused = this.packageDocument.checkManifestRemoval(item.id);
        return refused === null ? null : describePackageChange(refused);
    }

    onMoved(from: string, to: string): void {
        const item = this.itemAt(from);
        const packagePath = this.fileSystem.packageDocumentPath;
        if (item === null || packagePath === null) {
            return;
        }
        const href = hrefBetween(packagePath, this.fileSystem.getPath(to));
        this.logger.debug(`Manifest item '${item.id}' moved from '${item.href}' to '${href}'`);
        item.href = href;
    }

    onRemoved(path: string): void {
        const item = this.itemAt(path);
        if (item === null) {
            return;
        }
        const references = this.packageDocument.spine.referencesTo(item.id).length;
        const removed = this.packageDocument.removeManifestItem(item.id);
        if (!removed.ok) {
            this.logger.warn(`Manifest item '${item.id}' was kept: ${describePackageChange(removed.error)}`);
            return;
        }
        this.logger.info(`Removed manifest item '${item.id}' and ${references} spine reference(s)`);
    }

    private itemAt(path: string): ManifestItem | null {
        const packagePath = this.fileSystem.packageDocumentPath;
        if (packagePath === null) {
            return null;
        }
        for (const item of this.packageDocument.manifest.entries) {
            const resolved = resolveHref(packagePath, item.href);
            if (resolved !== null && resolved.toString() === path) {
                return item;
            }
        }
        return null;
    }
}
