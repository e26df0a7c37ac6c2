import { Minimatch } from 'minimatch';
import { Result, ok, err, collectResults } from '../types';
import type { EpubFileSystem, ArchiveEntry } from './epub-file-system';
import type { VirtualPath } from './virtual-path';
import { isEntryName } from './virtual-path';
import { FileError } from './file-error';
import { Capability } from './resource-classifier';
import { ByteChannel } from './byte-channel';
import { ResourceVisitor, WalkAction, walkDirectory } from './resource-visitor';

export type Resource = NilResource | FileResource | DirectoryResource;

function notPermitted(capability: Capability, path: string): FileError {
    switch (capability) {
        case Capability.Modify:
            return { kind: 'NotModifiable', path };
        case Capability.Delete:
            return { kind: 'NotDeletable', path };
        case Capability.Unprotected:
            return { kind: 'NotUnprotected', path };
        case Capability.Read:
            return { kind: 'Unknown', path, cause: 'resource is not readable' };
    }
}

function toBuffer(data: Buffer | Uint8Array | string): Buffer {
    return typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
}

abstract class BaseResource {
    abstract readonly type: 'nil' | 'file' | 'directory';

    constructor(
        readonly fileSystem: EpubFileSystem,
        readonly path: VirtualPath,
        readonly capabilities: ReadonlySet<Capability>
    ) {}

    can(capability: Capability): boolean {
        return this.capabilities.has(capability);
    }

    /**
     * Returns this handle when it carries `capability`. Protected resources never gain capabilities they were
     * not classified with.
     */
    acquire(capability: Capability): Result<this, FileError> {
        if (!this.can(capability)) {
            return err(notPermitted(capability, this.key));
        }
        return ok(this);
    }

    isSameAs(other: Resource): boolean {
        return other.fileSystem === this.fileSystem && other.path.equals(this.path);
    }

    toString(): string {
        return `${this.type}(${this.key})`;
    }

    protected get key(): string {
        return this.path.toString();
    }

    protected require(capability: Capability): FileError | null {
        return this.can(capability) ? null : notPermitted(capability, this.key);
    }

    /**
     * Checks that the file system is open and that the entry still is what this handle was created for.
     */
    protected currentEntry(kind: 'file' | 'directory'): Result<ArchiveEntry, FileError> {
        if (this.fileSystem.isClosed) {
            return err({ kind: 'FileSystemClosed' });
        }
        const entry = this.fileSystem.entryAt(this.key);
        if (entry === undefined || entry.kind !== kind) {
            return err({ kind: 'NoSuchResource', path: this.key });
        }
        return ok(entry);
    }

    protected resolveFile(target: VirtualPath): Result<FileResource, FileError> {
        const resource = this.fileSystem.resource(target);
        if (!resource.ok) {
            return resource;
        }
        if (resource.value.type !== 'file') {
            return err({ kind: 'NotFile', path: target.toString() });
        }
        return ok(resource.value);
    }

    protected resolveDirectory(target: VirtualPath): Result<DirectoryResource, FileError> {
        const resource = this.fileSystem.resource(target);
        if (!resource.ok) {
            return resource;
        }
        if (resource.value.type !== 'directory') {
            return err({ kind: 'NotDirectory', path: target.toString() });
        }
        return ok(resource.value);
    }
}

/**
 * Nothing exists at the path. Creating a file or directory creates any missing parent directories.
 */
export class NilResource extends BaseResource {
    readonly type = 'nil';

    constructor(fileSystem: EpubFileSystem, path: VirtualPath, capabilities?: ReadonlySet<Capability>) {
        super(fileSystem, path, capabilities ?? new Set([Capability.Read, Capability.Modify]));
    }

    exists(): false {
        return false;
    }

    createFile(data: Buffer | Uint8Array | string = Buffer.alloc(0)): Result<FileResource, FileError> {
        const free = this.requireFree();
        if (!free.ok) {
            return free;
        }
        const created = this.fileSystem.createFileEntry(this.key, toBuffer(data));
        if (!created.ok) {
            return created;
        }
        return this.resolveFile(this.path);
    }

    createDirectory(): Result<DirectoryResource, FileError> {
        const free = this.requireFree();
        if (!free.ok) {
            return free;
        }
        const created = this.fileSystem.createDirectoryEntry(this.key);
        if (!created.ok) {
            return created;
        }
        return this.resolveDirectory(this.path);
    }

    private requireFree(): Result<void, FileError> {
        const denied = this.require(Capability.Modify);
        if (denied) {
            return err(denied);
        }
        if (this.fileSystem.isClosed) {
            return err({ kind: 'FileSystemClosed' });
        }
        if (this.fileSystem.entryAt(this.key) !== undefined) {
            return err({ kind: 'ResourceAlreadyExists', path: this.key });
        }
        return ok(undefined);
    }
}

export class FileResource extends BaseResource {
    readonly type = 'file';

    exists(): true {
        return true;
    }

    /** The directory holding this file. */
    directory(): Result<DirectoryResource, FileError> {
        const parent = this.path.parent;
        if (parent === null) {
            return err({ kind: 'NoSuchResource', path: this.key });
        }
        return this.resolveDirectory(parent);
    }

    readBytes(): Result<Buffer, FileError> {
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        return ok(Buffer.from(entry.value.data));
    }

    readText(encoding: BufferEncoding = 'utf8'): Result<string, FileError> {
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        return ok(entry.value.data.toString(encoding));
    }

    readLines(encoding: BufferEncoding = 'utf8'): Result<string[], FileError> {
        const text = this.readText(encoding);
        if (!text.ok) {
            return text;
        }
        if (text.value.length === 0) {
            return ok([]);
        }
        const lines = text.value.split(/\r?\n/);
        if (lines[lines.length - 1] === '') {
            lines.pop();
        }
        return ok(lines);
    }

    fileSize(): Result<number, FileError> {
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        return ok(entry.value.data.length);
    }

    lastModified(): Result<Date, FileError> {
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        return ok(entry.value.lastModified);
    }

    isEmpty(): Result<boolean, FileError> {
        const size = this.fileSize();
        return size.ok ? ok(size.value === 0) : size;
    }

    setLastModified(date: Date): Result<void, FileError> {
        const denied = this.require(Capability.Modify);
        if (denied) {
            return err(denied);
        }
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        entry.value.lastModified = date;
        return ok(undefined);
    }

    writeBytes(data: Buffer | Uint8Array): Result<void, FileError> {
        return this.replace(toBuffer(data));
    }

    writeText(text: string, encoding: BufferEncoding = 'utf8'): Result<void, FileError> {
        return this.replace(Buffer.from(text, encoding));
    }

    writeLines(lines: Iterable<string>): Result<void, FileError> {
        return this.replace(Buffer.from([...lines].map(line => `${line}\n`).join(''), 'utf8'));
    }

    appendBytes(data: Buffer | Uint8Array): Result<void, FileError> {
        const current = this.readBytes();
        if (!current.ok) {
            return current;
        }
        return this.replace(Buffer.concat([current.value, toBuffer(data)]));
    }

    appendText(text: string): Result<void, FileError> {
        return this.appendBytes(Buffer.from(text, 'utf8'));
    }

    /**
     * Opens a seekable channel over the raw bytes. Only unprotected files allow this.
     */
    openChannel(): Result<ByteChannel, FileError> {
        const denied = this.require(Capability.Unprotected);
        if (denied) {
            return err(denied);
        }
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        const key = this.key;
        return ok(new ByteChannel(entry.value.data, data => this.fileSystem.updateFileEntry(key, data)));
    }

    /**
     * Copies the bytes to `target`. A missing target is created, an existing file is only replaced when
     * `overwrite` is set and the target may be modified.
     */
    copyTo(target: Resource, overwrite: boolean = false): Result<FileResource, FileError> {
        const bytes = this.readBytes();
        if (!bytes.ok) {
            return bytes;
        }
        switch (target.type) {
            case 'directory':
                return err({ kind: 'NotFile', path: target.path.toString() });
            case 'nil':
                return target.createFile(bytes.value);
            case 'file': {
                if (target.isSameAs(this)) {
                    return ok(this);
                }
                if (!overwrite) {
                    return err({ kind: 'ResourceAlreadyExists', path: target.path.toString() });
                }
                const written = target.writeBytes(bytes.value);
                return written.ok ? ok(target) : written;
            }
        }
    }

    /**
     * Moves the file to `target`. Moving a manifest registered resource updates the manifest entry.
     */
    moveTo(target: Resource, overwrite: boolean = false): Result<FileResource, FileError> {
        const denied = this.require(Capability.Modify);
        if (denied) {
            return err(denied);
        }
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        if (target.isSameAs(this)) {
            return ok(this);
        }
        switch (target.type) {
            case 'directory':
                return err({ kind: 'NotFile', path: target.path.toString() });
            case 'file': {
                if (!overwrite) {
                    return err({ kind: 'ResourceAlreadyExists', path: target.path.toString() });
                }
                if (!target.can(Capability.Modify)) {
                    return err({ kind: 'NotModifiable', path: target.path.toString() });
                }
                const removed = target.delete();
                if (!removed.ok) {
                    return removed;
                }
                break;
            }
            case 'nil':
                if (!target.can(Capability.Modify)) {
                    return err({ kind: 'NotModifiable', path: target.path.toString() });
                }
                break;
        }
        const from = this.key;
        const to = target.path.toString();
        const moved = this.fileSystem.moveFileEntry(from, to);
        if (!moved.ok) {
            return moved;
        }
        const index = this.fileSystem.resourceIndex;
        if (index !== null && index.isRegistered(from)) {
            index.onMoved(from, to);
        }
        return this.resolveFile(target.path);
    }

    renameTo(name: string, overwrite: boolean = false): Result<FileResource, FileError> {
        if (!isEntryName(name)) {
            return err({ kind: 'InvalidName', path: this.key, name });
        }
        const target = this.fileSystem.resource(this.path.resolveSibling(name));
        return target.ok ? this.moveTo(target.value, overwrite) : target;
    }

    /**
     * Deletes the file. Deleting a manifest registered resource also removes it from the manifest and spine,
     * unless that would leave either of them empty.
     */
    delete(): Result<NilResource, FileError> {
        const denied = this.require(Capability.Delete);
        if (denied) {
            return err(denied);
        }
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        const index = this.fileSystem.resourceIndex;
        const registered = index !== null && index.isRegistered(this.key);
        if (index !== null && registered) {
            const reason = index.checkRemoval(this.key);
            if (reason !== null) {
                return err({ kind: 'NotDeletable', path: this.key, reason });
            }
        }
        this.fileSystem.removeEntry(this.key);
        if (index !== null && registered) {
            index.onRemoved(this.key);
        }
        return ok(new NilResource(this.fileSystem, this.path));
    }

    private replace(data: Buffer): Result<void, FileError> {
        const denied = this.require(Capability.Modify);
        if (denied) {
            return err(denied);
        }
        const entry = this.currentEntry('file');
        if (!entry.ok) {
            return entry;
        }
        return this.fileSystem.updateFileEntry(this.key, data);
    }
}

export class DirectoryResource extends BaseResource {
    readonly type = 'directory';

    exists(): true {
        return true;
    }

    childPaths(): Result<VirtualPath[], FileError> {
        const entry = this.currentEntry('directory');
        if (!entry.ok) {
            return entry;
        }
        return ok(this.fileSystem.childKeys(this.key).map(key => this.fileSystem.getPath(key)));
    }

    entries(): Result<Resource[], FileError> {
        const children = this.childPaths();
        if (!children.ok) {
            return children;
        }
        return collectResults(children.value.map(child => this.fileSystem.resource(child)));
    }

    /**
     * Lists the direct children whose name matches `glob`.
     */
    listEntries(glob: string = '*'): Result<Resource[], FileError> {
        let matcher: Minimatch;
        try {
            matcher = new Minimatch(glob, { dot: true });
        } catch (error) {
            return err({ kind: 'InvalidGlobPattern', pattern: glob, reason: error instanceof Error ? error.message : String(error) });
        }
        const entries = this.entries();
        if (!entries.ok) {
            return entries;
        }
        return ok(entries.value.filter(entry => matcher.match(entry.path.name)));
    }

    resolve(name: string): Result<Resource, FileError> {
        return this.fileSystem.resource(this.path.resolve(name));
    }

    isEmpty(): Result<boolean, FileError> {
        const children = this.childPaths();
        return children.ok ? ok(children.value.length === 0) : children;
    }

    lastModified(): Result<Date, FileError> {
        const entry = this.currentEntry('directory');
        if (!entry.ok) {
            return entry;
        }
        return ok(entry.value.lastModified);
    }

    walk(visitor: ResourceVisitor): Result<void, FileError> {
        const walked = walkDirectory(this, visitor);
        return walked.ok ? ok(undefined) : walked;
    }

    calculateDirectorySize(): Result<number, FileError> {
        let total = 0;
        const walked = this.walk({
            visitFile: file => {
                const size = file.fileSize();
                if (!size.ok) {
                    return size;
                }
                total += size.value;
                return ok<WalkAction>('continue');
            }
        });
        return walked.ok ? ok(total) : walked;
    }

    /**
     * Same as {@link calculateDirectorySize}, summed as a `bigint` so that the total can't lose precision.
     */
    calculateLargeDirectorySize(): Result<bigint, FileError> {
        let total = 0n;
        const walked = this.walk({
            visitFile: file => {
                const size = file.fileSize();
                if (!size.ok) {
                    return size;
                }
                total += BigInt(size.value);
                return ok<WalkAction>('continue');
            }
        });
        return walked.ok ? ok(total) : walked;
    }

    /**
     * Copies every entry below this directory into `target`, keeping the relative layout. A file where a
     * directory should go (or the other way around) fails the copy at that node.
     */
    copyEntriesTo(target: Resource, overwrite: boolean = false): Result<DirectoryResource, FileError> {
        const destination = this.prepareDestination(target);
        if (!destination.ok) {
            return destination;
        }
        const root = destination.value;
        const walked = this.walk({
            preVisitDirectory: directory => this.mirrorDirectory(directory, root),
            visitFile: file => {
                const target = this.fileSystem.resource(this.mirrorPath(file.path, root));
                if (!target.ok) {
                    return target;
                }
                const copied = file.copyTo(target.value, overwrite);
                return copied.ok ? ok<WalkAction>('continue') : copied;
            }
        });
        return walked.ok ? this.resolveDirectory(root) : walked;
    }

    /**
     * Moves every entry below this directory into `target` and removes the emptied source directories.
     * A failure leaves the entries moved so far at their new location.
     */
    moveRecursivelyTo(target: Resource): Result<DirectoryResource, FileError> {
        const denied = this.require(Capability.Modify);
        if (denied) {
            return err(denied);
        }
        const destination = this.prepareDestination(target);
        if (!destination.ok) {
            return destination;
        }
        const root = destination.value;
        const walked = this.walk({
            preVisitDirectory: directory => this.mirrorDirectory(directory, root),
            visitFile: file => {
                const target = this.fileSystem.resource(this.mirrorPath(file.path, root));
                if (!target.ok) {
                    return target;
                }
                const moved = file.moveTo(target.value);
                return moved.ok ? ok<WalkAction>('continue') : moved;
            },
            postVisitDirectory: directory => {
                this.fileSystem.removeEntry(directory.path.toString());
                return ok<WalkAction>('continue');
            }
        });
        return walked.ok ? this.resolveDirectory(root) : walked;
    }

    /**
     * Deletes the tree bottom up, files before the directories holding them. Stops at the first entry that
     * can't be deleted and reports it.
     */
    deleteRecursively(): Result<NilResource, FileError> {
        const denied = this.require(Capability.Delete);
        if (denied) {
            return err(denied);
        }
        const walked = this.walk({
            visitFile: file => {
                const deleted = file.delete();
                return deleted.ok ? ok<WalkAction>('continue') : deleted;
            },
            postVisitDirectory: directory => {
                const deleted = directory.delete();
                return deleted.ok ? ok<WalkAction>('continue') : deleted;
            }
        });
        return walked.ok ? ok(new NilResource(this.fileSystem, this.path)) : walked;
    }

    /**
     * Deletes this directory, which must be empty.
     */
    delete(): Result<NilResource, FileError> {
        const denied = this.require(Capability.Delete);
        if (denied) {
            return err(denied);
        }
        const empty = this.isEmpty();
        if (!empty.ok) {
            return empty;
        }
        if (!empty.value) {
            return err({ kind: 'DirectoryNotEmpty', path: this.key });
        }
        this.fileSystem.removeEntry(this.key);
        return ok(new NilResource(this.fileSystem, this.path));
    }

    /**
     * Moves this directory, which must be empty, to a free location. Use {@link moveRecursivelyTo} for
     * directories with entries.
     */
    moveTo(target: Resource): Result<DirectoryResource, FileError> {
        const denied = this.require(Capability.Modify);
        if (denied) {
            return err(denied);
        }
        const empty = this.isEmpty();
        if (!empty.ok) {
            return empty;
        }
        if (!empty.value) {
            return err({ kind: 'DirectoryNotEmpty', path: this.key });
        }
        switch (target.type) {
            case 'file':
                return err({ kind: 'NotDirectory', path: target.path.toString() });
            case 'directory':
                return err({ kind: 'ResourceAlreadyExists', path: target.path.toString() });
            case 'nil': {
                const created = target.createDirectory();
                if (!created.ok) {
                    return created;
                }
                this.fileSystem.removeEntry(this.key);
                return created;
            }
        }
    }

    renameTo(name: string): Result<DirectoryResource, FileError> {
        if (!isEntryName(name)) {
            return err({ kind: 'InvalidName', path: this.key, name });
        }
        const target = this.fileSystem.resource(this.path.resolveSibling(name));
        if (!target.ok) {
            return target;
        }
        if (target.value.type !== 'nil') {
            return err({ kind: 'ResourceAlreadyExists', path: target.value.path.toString() });
        }
        return this.moveRecursivelyTo(target.value);
    }

    private prepareDestination(target: Resource): Result<VirtualPath, FileError> {
        const entry = this.currentEntry('directory');
        if (!entry.ok) {
            return entry;
        }
        if (target.path.startsWith(this.path)) {
            return err({ kind: 'Unknown', path: target.path.toString(), cause: `target is inside '${this.key}'` });
        }
        switch (target.type) {
            case 'file':
                return err({ kind: 'NotDirectory', path: target.path.toString() });
            case 'directory':
                return ok(target.path);
            case 'nil': {
                const created = target.createDirectory();
                return created.ok ? ok(target.path) : created;
            }
        }
    }

    private mirrorPath(source: VirtualPath, root: VirtualPath): VirtualPath {
        return root.resolve(this.path.relativize(source));
    }

    private mirrorDirectory(directory: DirectoryResource, root: VirtualPath): Result<WalkAction, FileError> {
        const resolved = this.fileSystem.resource(this.mirrorPath(directory.path, root));
        if (!resolved.ok) {
            return resolved;
        }
        const mirrored = resolved.value;
        switch (mirrored.type) {
            case 'directory':
                return ok<WalkAction>('continue');
            case 'file':
                return err({ kind: 'NotDirectory', path: mirrored.path.toString() });
            case 'nil': {
                const created = mirrored.createDirectory();
                return created.ok ? ok<WalkAction>('continue') : created;
            }
        }
    }
}
