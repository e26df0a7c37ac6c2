import { VirtualPath } from '../fs/virtual-path';
import { PathOutsideRootError } from '../fs/file-error';

export interface SplitHref {
    path: string;
    fragment: string | null;
}

export function splitHref(href: string): SplitHref {
    const hash = href.indexOf('#');
    const withoutFragment = hash < 0 ? href : href.substring(0, hash);
    const query = withoutFragment.indexOf('?');
    return {
        path: query < 0 ? withoutFragment : withoutFragment.substring(0, query),
        fragment: hash < 0 ? null : href.substring(hash + 1)
    };
}

function decode(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}

/**
 * Resolves an href found in `document` to the archive path it points at. Returns `null` for remote references
 * and for references that climb above the archive root.
 */
export function resolveHref(document: VirtualPath, href: string): VirtualPath | null {
    const { path } = splitHref(href);
    if (/^[A-Za-z][A-Za-z0-9+.-]*:/.test(path)) {
        return null;
    }
    const absolute = document.toAbsolute();
    if (path.length === 0) {
        return absolute;
    }
    const directory = absolute.parent ?? absolute.fileSystem.root;
    try {
        return directory.resolve(decode(path)).normalize();
    } catch (error) {
        if (error instanceof PathOutsideRootError) {
            return null;
        }
        throw error;
    }
}

/**
 * The href that leads from `document` to `target`, with each segment percent-encoded.
 */
export function hrefBetween(document: VirtualPath, target: VirtualPath): string {
    const directory = document.toAbsolute().parent ?? document.fileSystem.root;
    return directory.relativize(target.toAbsolute()).segments.map(encodeURIComponent).join('/');
}
