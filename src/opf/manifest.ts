import { Result, ok, err } from '../types';
import { XmlElement, Namespaces } from '../xml/xml-element';
import { XmlReadError } from '../xml/read-errors';
import {
    attr,
    children,
    iriAttr,
    optionalAttr,
    parseMediaType,
    propertiesAttr,
    setOptionalAttribute,
    setPropertiesAttribute
} from '../xml/model-xml-serializer';
import { Property, encodeProperty } from '../xml/property-parser';
import { WriteContext, isEpub3 } from './context';

export interface ManifestItem {
    id: string;
    href: string;
    mediaType: string;
    fallback: string | null;
    mediaOverlay: string | null;
    properties: Property[];
}

export type ManifestReadError = XmlReadError | { kind: 'DuplicateManifestItem'; id: string; path: string };

/**
 * Why a change to the manifest or spine was refused. Every change keeps both non-empty and every spine
 * reference pointing at a manifest item.
 */
export type PackageChangeError =
    | { kind: 'UnknownManifestItem'; id: string }
    | { kind: 'LastManifestItem'; id: string }
    | { kind: 'LastSpineReference'; id: string }
    | { kind: 'ReferencedBySpine'; id: string };

export function describePackageChange(error: PackageChangeError): string {
    switch (error.kind) {
        case 'UnknownManifestItem':
            return `'${error.id}' is not a manifest item`;
        case 'LastManifestItem':
            return `'${error.id}' is the only manifest item`;
        case 'LastSpineReference':
            return `removing '${error.id}' would leave the spine empty`;
        case 'ReferencedBySpine':
            return `'${error.id}' is still referenced by the spine`;
    }
}

export function hasProperty(item: ManifestItem, reference: string, prefix: string | null = null): boolean {
    return item.properties.some(property => property.reference === reference && property.prefix === prefix);
}

function readItem(element: XmlElement): Result<ManifestItem, XmlReadError> {
    const id = attr(element, 'id');
    if (!id.ok) return id;
    const href = iriAttr(element, 'href');
    if (!href.ok) return href;
    const rawMediaType = attr(element, 'media-type');
    if (!rawMediaType.ok) return rawMediaType;
    const mediaType = parseMediaType(element, rawMediaType.value);
    if (!mediaType.ok) return mediaType;
    const properties = propertiesAttr(element);
    if (!properties.ok) return properties;

    return ok({
        id: id.value,
        href: href.value,
        mediaType: mediaType.value,
        fallback: optionalAttr(element, 'fallback'),
        mediaOverlay: optionalAttr(element, 'media-overlay'),
        properties: properties.value
    });
}

/**
 * The `manifest` of a package document, items keyed by id in document order.
 */
export class PackageManifest {
    identifier: string | null;
    private readonly items = new Map<string, ManifestItem>();
    private isReferenced: (id: string) => boolean = () => false;

    constructor(items: Iterable<ManifestItem> = [], identifier: string | null = null) {
        this.identifier = identifier;
        for (const item of items) {
            this.items.set(item.id, item);
        }
    }

    get size(): number {
        return this.items.size;
    }

    get entries(): ManifestItem[] {
        return [...this.items.values()];
    }

    getItem(id: string): ManifestItem | null {
        return this.items.get(id) ?? null;
    }

    hasItem(id: string): boolean {
        return this.items.has(id);
    }

    findByHref(href: string): ManifestItem | null {
        return this.entries.find(item => item.href === href) ?? null;
    }

    itemsWithProperty(reference: string): ManifestItem[] {
        return this.entries.filter(item => hasProperty(item, reference));
    }

    /** Adds or replaces the item with the same id. */
    addItem(item: ManifestItem): void {
        this.items.set(item.id, item);
    }

    /**
     * Removes an item that nothing in the spine refers to. The last item is never removed.
     */
    removeItem(id: string): Result<ManifestItem, PackageChangeError> {
        const item = this.items.get(id);
        if (item === undefined) {
            return err({ kind: 'UnknownManifestItem', id });
        }
        if (this.items.size === 1) {
            return err({ kind: 'LastManifestItem', id });
        }
        if (this.isReferenced(id)) {
            return err({ kind: 'ReferencedBySpine', id });
        }
        this.items.delete(id);
        return ok(item);
    }

    /** Registers the check {@link removeItem} runs against the spine built on this manifest. */
    guardRemoval(isReferenced: (id: string) => boolean): void {
        this.isReferenced = isReferenced;
    }

    static fromElement(element: XmlElement): Result<PackageManifest, ManifestReadError> {
        const itemElements = children(element, 'item', Namespaces.OPF);
        if (!itemElements.ok) {
            return itemElements;
        }
        const items: ManifestItem[] = [];
        for (const itemElement of itemElements.value) {
            const item = readItem(itemElement);
            if (!item.ok) {
                return item;
            }
            if (items.some(existing => existing.id === item.value.id)) {
                return err({ kind: 'DuplicateManifestItem', id: item.value.id, path: itemElement.path });
            }
            items.push(item.value);
        }
        return ok(new PackageManifest(items, element.getAttribute('id')));
    }

    toElement(context: WriteContext): XmlElement {
        const element = new XmlElement('manifest', Namespaces.OPF);
        setOptionalAttribute(element, 'id', this.identifier);
        for (const item of this.items.values()) {
            const itemElement = new XmlElement('item', Namespaces.OPF);
            itemElement.setAttribute('id', item.id);
            itemElement.setAttribute('href', item.href);
            itemElement.setAttribute('media-type', item.mediaType);
            setOptionalAttribute(itemElement, 'fallback', item.fallback);
            if (isEpub3(context)) {
                setOptionalAttribute(itemElement, 'media-overlay', item.mediaOverlay);
                setPropertiesAttribute(itemElement, item.properties);
            }
            element.addContent(itemElement);
        }
        return element;
    }

    toString(): string {
        return this.entries
            .map(item => `${item.id} -> ${item.href} (${item.mediaType}${item.properties.length > 0 ? `; ${item.properties.map(encodeProperty).join(' ')}` : ''})`)
            .join('\n');
    }
}
