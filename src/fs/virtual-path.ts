import type { EpubFileSystem } from './epub-file-system';
import type { Resource } from './resource';
import type { Result } from '../types';
import { FileError, ForeignPathError, PathOutsideRootError } from './file-error';

/**
 * Whether `name` names a single entry: not empty, no separator, not `.` or `..`.
 */
export function isEntryName(name: string): boolean {
    return name.length > 0 && !name.includes('/') && name !== '.' && name !== '..';
}

/**
 * An immutable path inside one {@link EpubFileSystem}. Paths are never bound to what exists in the archive;
 * call {@link VirtualPath.resource} to find out.
 */
export class VirtualPath {
    readonly segments: readonly string[];

    constructor(
        readonly fileSystem: EpubFileSystem,
        segments: readonly string[],
        readonly isAbsolute: boolean
    ) {
        this.segments = segments.filter(segment => segment.length > 0);
    }

    get nameCount(): number {
        return this.segments.length;
    }

    get isRoot(): boolean {
        return this.isAbsolute && this.segments.length === 0;
    }

    /** The last segment, or an empty string for the root. */
    get name(): string {
        return this.segments.length === 0 ? '' : this.segments[this.segments.length - 1];
    }

    /** The last segment as a path of its own, or `null` for the root. */
    get fileName(): VirtualPath | null {
        return this.segments.length === 0 ? null : new VirtualPath(this.fileSystem, [this.name], false);
    }

    get extension(): string {
        const name = this.name;
        const dot = name.lastIndexOf('.');
        return dot <= 0 ? '' : name.substring(dot + 1);
    }

    get parent(): VirtualPath | null {
        if (this.segments.length === 0 || (!this.isAbsolute && this.segments.length === 1)) {
            return null;
        }
        return new VirtualPath(this.fileSystem, this.segments.slice(0, -1), this.isAbsolute);
    }

    resolve(other: VirtualPath | string): VirtualPath {
        const path = this.coerce(other);
        if (path.isAbsolute) {
            return path;
        }
        return new VirtualPath(this.fileSystem, [...this.segments, ...path.segments], this.isAbsolute);
    }

    resolveSibling(other: VirtualPath | string): VirtualPath {
        const parent = this.parent;
        if (parent === null) {
            return this.coerce(other);
        }
        return parent.resolve(other);
    }

    /**
     * Builds the relative path that leads from this path to `other`. Both paths must be either absolute or relative.
     */
    relativize(other: VirtualPath | string): VirtualPath {
        const target = this.coerce(other);
        if (target.isAbsolute !== this.isAbsolute) {
            throw new Error(`Can not relativize '${target}' against '${this}', only one of them is absolute`);
        }
        const from = this.normalize().segments;
        const to = target.normalize().segments;
        let common = 0;
        while (common < from.length && common < to.length && from[common] === to[common]) {
            common++;
        }
        const ups = from.slice(common).map(() => '..');
        return new VirtualPath(this.fileSystem, [...ups, ...to.slice(common)], false);
    }

    /**
     * Removes `.` segments and folds `..` into the preceding segment. An absolute path that climbs above the root
     * is rejected instead of being clamped.
     */
    normalize(): VirtualPath {
        const result: string[] = [];
        for (const segment of this.segments) {
            if (segment === '.') {
                continue;
            }
            if (segment === '..') {
                if (result.length > 0 && result[result.length - 1] !== '..') {
                    result.pop();
                } else if (this.isAbsolute) {
                    throw new PathOutsideRootError(this.toString());
                } else {
                    result.push(segment);
                }
                continue;
            }
            result.push(segment);
        }
        return new VirtualPath(this.fileSystem, result, this.isAbsolute);
    }

    toAbsolute(): VirtualPath {
        return this.fileSystem.root.resolve(this).normalize();
    }

    startsWith(other: VirtualPath | string): boolean {
        const prefix = this.coerce(other);
        if (prefix.isAbsolute !== this.isAbsolute || prefix.segments.length > this.segments.length) {
            return false;
        }
        return prefix.segments.every((segment, i) => this.segments[i] === segment);
    }

    equals(other: VirtualPath): boolean {
        return other.fileSystem === this.fileSystem && other.toString() === this.toString();
    }

    compareTo(other: VirtualPath): number {
        this.requireSameFileSystem(other);
        const a = this.toString();
        const b = other.toString();
        return a < b ? -1 : a > b ? 1 : 0;
    }

    /**
     * Resolves what currently exists at this path. Nothing is cached, every call reclassifies the path.
     */
    resource(): Result<Resource, FileError> {
        return this.fileSystem.resource(this);
    }

    toString(): string {
        const joined = this.segments.join('/');
        return this.isAbsolute ? `/${joined}` : joined;
    }

    private coerce(other: VirtualPath | string): VirtualPath {
        if (typeof other === 'string') {
            return this.fileSystem.getPath(other);
        }
        this.requireSameFileSystem(other);
        return other;
    }

    private requireSameFileSystem(other: VirtualPath): void {
        if (other.fileSystem !== this.fileSystem) {
            throw new ForeignPathError(other.toString());
        }
    }
}
