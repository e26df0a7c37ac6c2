import * as fs from 'fs-extra';
import * as path from 'path';
import JSZip from 'jszip';
import { Minimatch } from 'minimatch';
import type { Readable } from 'stream';
import { Result, ok, err } from '../types';
import { Logger } from '../utils/common';
import { VirtualPath, isEntryName } from './virtual-path';
import { FileError, ForeignPathError, PathOutsideRootError, SymbolicLinkError } from './file-error';
import {
    ClassificationContext,
    MIMETYPE_PATH,
    capabilitiesFor,
    classifyDirectory,
    classifyFile,
    nilCapabilitiesFor
} from './resource-classifier';
import { DirectoryResource, FileResource, NilResource, Resource } from './resource';

export interface ArchiveEntry {
    kind: 'file' | 'directory';
    data: Buffer;
    lastModified: Date;
    symlink: boolean;
}

/**
 * Lets the package manifest take part in file operations, so that moving or deleting a registered resource
 * keeps the manifest and spine pointing at the right place.
 */
export interface ResourceIndex {
    isRegistered(path: string): boolean;
    /** Returns why the resource may not be removed, or `null` when it may. */
    checkRemoval(path: string): string | null;
    onMoved(from: string, to: string): void;
    onRemoved(path: string): void;
}

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

function isSymbolicLink(permissions: number | string | null): boolean {
    if (typeof permissions !== 'number') {
        return false;
    }
    return (permissions & S_IFMT) === S_IFLNK;
}

function parentKey(key: string): string | null {
    if (key === '/') {
        return null;
    }
    const index = key.lastIndexOf('/');
    return index <= 0 ? '/' : key.substring(0, index);
}

export class EpubFileSystem {
    readonly root: VirtualPath;
    private readonly entries = new Map<string, ArchiveEntry>();
    private closed = false;
    private packageDocumentKey: string | null = null;
    private index: ResourceIndex | null = null;

    constructor(private readonly logger: Logger) {
        this.root = new VirtualPath(this, [], true);
        this.entries.set('/', { kind: 'directory', data: Buffer.alloc(0), lastModified: new Date(), symlink: false });
    }

    /**
     * Loads every entry of a zip archive into memory.
     *
     * @throws PathOutsideRootError when an entry name climbs above the archive root
     */
    static async fromZip(bytes: Buffer | Uint8Array, logger: Logger): Promise<EpubFileSystem> {
        const zip = await JSZip.loadAsync(bytes);
        const fileSystem = new EpubFileSystem(logger);

        for (const file of Object.values(zip.files)) {
            const key = fileSystem.getPath('/', file.name).normalize().toString();
            if (file.dir) {
                fileSystem.putDirectory(key, file.date);
                continue;
            }
            const data = await file.async('nodebuffer');
            fileSystem.putFile(key, data, file.date, isSymbolicLink(file.unixPermissions));
        }

        logger.info(`Loaded ${fileSystem.entries.size - 1} archive entries`);
        return fileSystem;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get packageDocumentPath(): VirtualPath | null {
        return this.packageDocumentKey === null ? null : this.getPath(this.packageDocumentKey);
    }

    setPackageDocumentPath(target: VirtualPath): void {
        this.requireOwn(target);
        this.packageDocumentKey = target.toAbsolute().toString();
    }

    attachResourceIndex(index: ResourceIndex): void {
        this.index = index;
    }

    get resourceIndex(): ResourceIndex | null {
        return this.index;
    }

    getPath(first: string, ...more: string[]): VirtualPath {
        const joined = [first, ...more].join('/');
        return new VirtualPath(this, joined.split('/'), joined.startsWith('/'));
    }

    /**
     * Resolves what currently exists at `target` and classifies it. Fails with `FileSystemClosed` after
     * {@link close} and with `PathOutsideRoot` when the path climbs above the root.
     *
     * @throws SymbolicLinkError when the entry is a symbolic link
     */
    resource(target: VirtualPath | string): Result<Resource, FileError> {
        const resolved = typeof target === 'string' ? this.getPath(target) : target;
        this.requireOwn(resolved);
        if (this.closed) {
            return err({ kind: 'FileSystemClosed' });
        }
        let absolute: VirtualPath;
        try {
            absolute = resolved.toAbsolute();
        } catch (error) {
            if (error instanceof PathOutsideRootError) {
                return err({ kind: 'PathOutsideRoot', path: error.path });
            }
            throw error;
        }
        const key = absolute.toString();
        const entry = this.entries.get(key);
        const context = this.classificationContext();
        if (entry === undefined) {
            return ok(new NilResource(this, absolute, nilCapabilitiesFor(key, context)));
        }
        if (entry.symlink) {
            throw new SymbolicLinkError(key);
        }
        if (entry.kind === 'directory') {
            return ok(new DirectoryResource(this, absolute, capabilitiesFor(classifyDirectory(key, context))));
        }
        return ok(new FileResource(this, absolute, capabilitiesFor(classifyFile(key, context))));
    }

    /**
     * Lists every entry below the root whose path, relative to the root, matches `glob`.
     */
    listEntries(glob: string = '**'): Result<VirtualPath[], FileError> {
        if (this.closed) {
            return err({ kind: 'FileSystemClosed' });
        }
        if (glob.trim().length === 0) {
            return err({ kind: 'InvalidGlobPattern', pattern: glob, reason: 'pattern is empty' });
        }
        let matcher: Minimatch;
        try {
            matcher = new Minimatch(glob, { dot: true });
        } catch (error) {
            return err({ kind: 'InvalidGlobPattern', pattern: glob, reason: error instanceof Error ? error.message : String(error) });
        }
        const matches = [...this.entries.keys()]
            .filter(key => key !== '/' && matcher.match(key.substring(1)))
            .sort()
            .map(key => this.getPath(key));
        return ok(matches);
    }

    async importFile(hostPath: string, targetDirectory: VirtualPath): Promise<Result<FileResource, FileError>> {
        let data: Buffer;
        try {
            data = await fs.readFile(hostPath);
        } catch (error) {
            return err({ kind: 'Unknown', path: hostPath, cause: error instanceof Error ? error.message : String(error) });
        }
        return this.importBytes(path.basename(hostPath), data, targetDirectory);
    }

    async importStream(stream: Readable, name: string, targetDirectory: VirtualPath): Promise<Result<FileResource, FileError>> {
        const chunks: Buffer[] = [];
        try {
            for await (const chunk of stream) {
                chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
            }
        } catch (error) {
            return err({ kind: 'Unknown', path: name, cause: error instanceof Error ? error.message : String(error) });
        }
        return this.importBytes(name, Buffer.concat(chunks), targetDirectory);
    }

    /**
     * Copies external bytes into `targetDirectory/name`, creating the directory when needed. `name` is a single
     * entry name, never a path.
     */
    importBytes(name: string, bytes: Buffer | Uint8Array | string, targetDirectory: VirtualPath): Result<FileResource, FileError> {
        if (this.closed) {
            return err({ kind: 'FileSystemClosed' });
        }
        if (!isEntryName(name)) {
            return err({ kind: 'InvalidName', path: targetDirectory.toString(), name });
        }
        const directory = this.resource(targetDirectory);
        if (!directory.ok) {
            return directory;
        }
        if (directory.value.type === 'file') {
            return err({ kind: 'NotDirectory', path: directory.value.path.toString() });
        }
        const target = this.resource(directory.value.path.resolve(name));
        if (!target.ok) {
            return target;
        }
        if (target.value.type !== 'nil') {
            return err({ kind: 'ResourceAlreadyExists', path: target.value.path.toString() });
        }
        const created = target.value.createFile(bytes);
        if (created.ok) {
            this.logger.info(`Imported ${created.value.path}`);
        }
        return created;
    }

    /**
     * Replaces the bytes of a file regardless of its protection. Used when the package writer serializes
     * the container, package and navigation documents.
     */
    writeSystemFile(target: VirtualPath, data: Buffer): Result<void, FileError> {
        this.requireOwn(target);
        if (this.closed) {
            return err({ kind: 'FileSystemClosed' });
        }
        const key = target.toAbsolute().toString();
        this.putFile(key, data, new Date(), false);
        return ok(undefined);
    }

    /**
     * Closes the file system. Every path and resource derived from it stops working.
     */
    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.entries.clear();
        this.logger.info('Closed EPUB file system');
    }

    async toZip(compressionLevel: number = 9): Promise<Result<Buffer, FileError>> {
        if (this.closed) {
            return err({ kind: 'FileSystemClosed' });
        }
        const zip = new JSZip();
        const mimetype = this.entries.get(MIMETYPE_PATH);
        if (mimetype !== undefined && mimetype.kind === 'file') {
            zip.file('mimetype', mimetype.data, { compression: 'STORE', date: mimetype.lastModified });
        }
        for (const key of [...this.entries.keys()].sort()) {
            const entry = this.entries.get(key);
            if (entry === undefined || key === '/' || key === MIMETYPE_PATH) {
                continue;
            }
            if (entry.kind === 'directory') {
                zip.folder(key.substring(1));
            } else {
                zip.file(key.substring(1), entry.data, { date: entry.lastModified });
            }
        }
        const bytes = await zip.generateAsync({
            type: 'nodebuffer',
            compression: 'DEFLATE',
            compressionOptions: { level: compressionLevel }
        });
        return ok(bytes);
    }

    // Low level entry access for the resource handles. Keys are normalized absolute paths.

    entryAt(key: string): ArchiveEntry | undefined {
        return this.entries.get(key);
    }

    childKeys(key: string): string[] {
        const prefix = key === '/' ? '/' : `${key}/`;
        return [...this.entries.keys()]
            .filter(candidate => candidate !== key && candidate.startsWith(prefix) && !candidate.substring(prefix.length).includes('/'))
            .sort();
    }

    createFileEntry(key: string, data: Buffer): Result<void, FileError> {
        const parents = this.createParents(key);
        if (!parents.ok) {
            return parents;
        }
        this.entries.set(key, { kind: 'file', data, lastModified: new Date(), symlink: false });
        return ok(undefined);
    }

    createDirectoryEntry(key: string): Result<void, FileError> {
        const parents = this.createParents(key);
        if (!parents.ok) {
            return parents;
        }
        this.entries.set(key, { kind: 'directory', data: Buffer.alloc(0), lastModified: new Date(), symlink: false });
        return ok(undefined);
    }

    updateFileEntry(key: string, data: Buffer): Result<void, FileError> {
        if (this.closed) {
            return err({ kind: 'FileSystemClosed' });
        }
        const entry = this.entries.get(key);
        if (entry === undefined || entry.kind !== 'file') {
            return err({ kind: 'NoSuchResource', path: key });
        }
        entry.data = data;
        entry.lastModified = new Date();
        return ok(undefined);
    }

    removeEntry(key: string): void {
        this.entries.delete(key);
    }

    moveFileEntry(from: string, to: string): Result<void, FileError> {
        const entry = this.entries.get(from);
        if (entry === undefined) {
            return err({ kind: 'NoSuchResource', path: from });
        }
        const parents = this.createParents(to);
        if (!parents.ok) {
            return parents;
        }
        this.entries.delete(from);
        this.entries.set(to, entry);
        return ok(undefined);
    }

    private createParents(key: string): Result<void, FileError> {
        const missing: string[] = [];
        let current = parentKey(key);
        while (current !== null) {
            const entry = this.entries.get(current);
            if (entry !== undefined) {
                if (entry.kind !== 'directory') {
                    return err({ kind: 'NotDirectory', path: current });
                }
                break;
            }
            missing.push(current);
            current = parentKey(current);
        }
        for (const directory of missing.reverse()) {
            this.entries.set(directory, { kind: 'directory', data: Buffer.alloc(0), lastModified: new Date(), symlink: false });
        }
        return ok(undefined);
    }

    private putFile(key: string, data: Buffer, lastModified: Date, symlink: boolean): void {
        const parents = this.createParents(key);
        if (!parents.ok) {
            throw new Error(`Archive entry '${key}' is nested below the file '${parents.error.kind === 'NotDirectory' ? parents.error.path : key}'`);
        }
        const existing = this.entries.get(key);
        if (existing !== undefined && existing.kind === 'directory') {
            throw new Error(`Archive entry '${key}' is both a file and a directory`);
        }
        this.entries.set(key, { kind: 'file', data, lastModified, symlink });
    }

    private putDirectory(key: string, lastModified: Date): void {
        const existing = this.entries.get(key);
        if (existing !== undefined) {
            if (existing.kind !== 'directory') {
                throw new Error(`Archive entry '${key}' is both a file and a directory`);
            }
            existing.lastModified = lastModified;
            return;
        }
        const parents = this.createParents(key);
        if (!parents.ok) {
            throw new Error(`Archive entry '${key}' is nested below a file`);
        }
        this.entries.set(key, { kind: 'directory', data: Buffer.alloc(0), lastModified, symlink: false });
    }

    private classificationContext(): ClassificationContext {
        const index = this.index;
        return {
            packageDocumentPath: this.packageDocumentKey,
            isLocalResource: key => index !== null && index.isRegistered(key)
        };
    }

    private requireOwn(target: VirtualPath): void {
        if (target.fileSystem !== this) {
            throw new ForeignPathError(target.toString());
        }
    }
}
