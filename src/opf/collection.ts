import { Result, ok, err, ReadingDirection } from '../types';
import { XmlElement, Namespaces } from '../xml/xml-element';
import { attr, languageOf, parseDirection, setOptionalAttribute } from '../xml/model-xml-serializer';
import { MetaEntryError, MetadataLink, readMetadataLink, writeMetadataLink } from './metadata';
import { ReadContext, WriteContext } from './context';

/**
 * An EPUB 3 `collection`, grouping resources for a purpose named by its `role`.
 */
export interface PackageCollection {
    role: string;
    identifier: string | null;
    direction: ReadingDirection | null;
    language: string | null;
    /** The collection's own `metadata`, kept as read. */
    metadata: XmlElement | null;
    collections: PackageCollection[];
    links: MetadataLink[];
}

export function readCollection(element: XmlElement, context: ReadContext): Result<PackageCollection, MetaEntryError> {
    const role = attr(element, 'role');
    if (!role.ok) return role;
    const direction = parseDirection(element);
    if (!direction.ok) return direction;

    const collections: PackageCollection[] = [];
    for (const child of element.getChildren('collection', Namespaces.OPF)) {
        const collection = readCollection(child, context);
        if (!collection.ok) return collection;
        collections.push(collection.value);
    }
    const links: MetadataLink[] = [];
    for (const child of element.getChildren('link', Namespaces.OPF)) {
        const link = readMetadataLink(child, context);
        if (!link.ok) return link;
        links.push(link.value);
    }
    if (collections.length === 0 && links.length === 0) {
        return err({ kind: 'MissingElement', name: 'link', path: element.path });
    }
    return ok({
        role: role.value,
        identifier: element.getAttribute('id'),
        direction: direction.value,
        language: languageOf(element),
        metadata: element.getChild('metadata', Namespaces.OPF)?.clone() ?? null,
        collections,
        links
    });
}

export function writeCollection(collection: PackageCollection, context: WriteContext): XmlElement {
    const element = new XmlElement('collection', Namespaces.OPF);
    element.setAttribute('role', collection.role);
    setOptionalAttribute(element, 'id', collection.identifier);
    setOptionalAttribute(element, 'dir', collection.direction);
    setOptionalAttribute(element, 'lang', collection.language, Namespaces.XML);
    if (collection.metadata !== null) {
        element.addContent(collection.metadata.clone());
    }
    for (const child of collection.collections) {
        element.addContent(writeCollection(child, context));
    }
    for (const link of collection.links) {
        element.addContent(writeMetadataLink(link, context));
    }
    return element;
}
