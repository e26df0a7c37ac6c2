import { Result, ok, err } from '../types';
import type { VirtualPath } from '../fs/virtual-path';
import type { ManifestItem, PackageManifest } from '../opf/manifest';
import { resolveHref, splitHref } from '../opf/href-resolver';
import type { NavPoint, NavigationControlFile } from './ncx';
import type { NavListItem, NavigationDocument } from './navigation-document';

export interface TocEntry {
    title: string;
    href: string;
    fragment: string | null;
    /** The manifest item the entry points at. */
    resource: ManifestItem;
    path: VirtualPath;
    children: TocEntry[];
}

export type TocError = { kind: 'UnresolvedReference'; href: string; path: string };

export function describeTocError(error: TocError): string {
    return `'${error.href}' in ${error.path} does not point at a manifest item`;
}

/**
 * Maps manifest items to the archive paths they resolve to, relative to the package document.
 */
export class ManifestLocator {
    private readonly byPath = new Map<string, ManifestItem>();

    constructor(readonly packageDocumentPath: VirtualPath, manifest: PackageManifest) {
        for (const item of manifest.entries) {
            const path = resolveHref(packageDocumentPath, item.href);
            if (path !== null) {
                this.byPath.set(path.toString(), item);
            }
        }
    }

    itemAt(path: VirtualPath): ManifestItem | null {
        return this.byPath.get(path.toString()) ?? null;
    }

    pathOf(item: ManifestItem): VirtualPath | null {
        return resolveHref(this.packageDocumentPath, item.href);
    }
}

function resolveEntry(
    locator: ManifestLocator,
    document: VirtualPath,
    title: string,
    href: string
): Result<Omit<TocEntry, 'children'>, TocError> {
    const path = resolveHref(document, href);
    const item = path === null ? null : locator.itemAt(path);
    if (path === null || item === null) {
        return err({ kind: 'UnresolvedReference', href, path: document.toString() });
    }
    return ok({ title, href, fragment: splitHref(href).fragment, resource: item, path });
}

function fromNavPoints(points: NavPoint[], locator: ManifestLocator, document: VirtualPath): Result<TocEntry[], TocError> {
    const entries: TocEntry[] = [];
    for (const point of points) {
        const entry = resolveEntry(locator, document, point.labels[0].text, point.source);
        if (!entry.ok) return entry;
        const nested = fromNavPoints(point.children, locator, document);
        if (!nested.ok) return nested;
        entries.push({ ...entry.value, children: nested.value });
    }
    return ok(entries);
}

/**
 * Spans group their children. Their children are lifted into the parent list, since an entry needs a target.
 */
function fromNavItems(items: NavListItem[], locator: ManifestLocator, document: VirtualPath): Result<TocEntry[], TocError> {
    const entries: TocEntry[] = [];
    for (const item of items) {
        const nested = fromNavItems(item.children, locator, document);
        if (!nested.ok) return nested;
        if (item.content.kind === 'span') {
            entries.push(...nested.value);
            continue;
        }
        const entry = resolveEntry(locator, document, item.content.text, item.content.href);
        if (!entry.ok) return entry;
        entries.push({ ...entry.value, children: nested.value });
    }
    return ok(entries);
}

/**
 * A read-only view of the table of contents, whichever format it was read from.
 */
export class TableOfContents {
    private constructor(readonly entries: readonly TocEntry[], readonly source: 'ncx' | 'navigation-document') {}

    static fromNcx(ncx: NavigationControlFile, ncxPath: VirtualPath, locator: ManifestLocator): Result<TableOfContents, TocError> {
        const entries = fromNavPoints(ncx.navMap, locator, ncxPath);
        return entries.ok ? ok(new TableOfContents(entries.value, 'ncx')) : entries;
    }

    static fromNavigationDocument(
        document: NavigationDocument,
        documentPath: VirtualPath,
        locator: ManifestLocator
    ): Result<TableOfContents, TocError> {
        const entries = fromNavItems(document.toc.items, locator, documentPath);
        return entries.ok ? ok(new TableOfContents(entries.value, 'navigation-document')) : entries;
    }

    static empty(): TableOfContents {
        return new TableOfContents([], 'ncx');
    }

    get size(): number {
        const count = (entries: readonly TocEntry[]): number =>
            entries.reduce((total, entry) => total + 1 + count(entry.children), 0);
        return count(this.entries);
    }

    /** Entries depth first, paired with their depth starting at 0. */
    *walk(): Generator<[TocEntry, number]> {
        function* visit(entries: readonly TocEntry[], depth: number): Generator<[TocEntry, number]> {
            for (const entry of entries) {
                yield [entry, depth];
                yield* visit(entry.children, depth + 1);
            }
        }
        yield* visit(this.entries, 0);
    }
}
