import { Result, ok, err } from '../types';
import { XmlAttribute, XmlElement, Namespaces } from '../xml/xml-element';
import { XmlReadError, describeXmlReadError } from '../xml/read-errors';
import {
    attr,
    iriAttr,
    languageOf,
    optionalAttr,
    optionalIriAttr,
    ownText,
    parseDirection,
    parseMediaType,
    propertiesAttr,
    setOptionalAttribute,
    setPropertiesAttribute
} from '../xml/model-xml-serializer';
import { Property, encodeProperty, parseProperty } from '../xml/property-parser';
import { EPUB_3_0 } from '../core/epub-version';
import {
    DublinCore,
    DublinCoreError,
    DublinCoreIdentifier,
    DublinCoreLanguage,
    DublinCoreTitle,
    describeDublinCoreError,
    isTitle,
    readDublinCore,
    writeDublinCore
} from './dublin-core';
import { Opf3Meta, STRING_CODEC } from './opf3-meta';
import { ReadContext, WriteContext, isEpub3, isKnownPrefix, keepReadable } from './context';

const OPF2_META_ATTRIBUTES = ['name', 'content', 'http-equiv', 'charset', 'scheme'];

interface Opf2MetaBase {
    scheme: string | null;
    /** Attributes besides the ones the variant is made of, kept as they were read. */
    attributes: XmlAttribute[];
}

export type Opf2Meta =
    | (Opf2MetaBase & { kind: 'name'; name: string; content: string })
    | (Opf2MetaBase & { kind: 'http-equiv'; httpEquiv: string; content: string })
    | (Opf2MetaBase & { kind: 'charset'; charset: string });

export interface MetadataLink {
    href: string;
    relation: Property[];
    mediaType: string | null;
    identifier: string | null;
    properties: Property[];
    refines: string | null;
}

export type MetaEntryError =
    | XmlReadError
    | { kind: 'InvalidOpf2Meta'; path: string }
    | { kind: 'UnknownPrefix'; property: string; path: string }
    | { kind: 'InvalidMetaValue'; value: string; scheme: string; reason: string; path: string };

export type MetadataReadError =
    | DublinCoreError
    | MetaEntryError
    | { kind: 'MissingIdentifier'; path: string }
    | { kind: 'MissingTitle'; path: string }
    | { kind: 'MissingLanguage'; path: string };

export function describeMetadataError(error: MetadataReadError): string {
    switch (error.kind) {
        case 'DublinCoreError':
        case 'UnknownDublinCore':
            return describeDublinCoreError(error);
        case 'InvalidOpf2Meta':
            return `'meta' at ${error.path} is neither a name, http-equiv nor charset meta`;
        case 'UnknownPrefix':
            return `Property '${error.property}' at ${error.path} uses an undeclared prefix`;
        case 'InvalidMetaValue':
            return `Value '${error.value}' at ${error.path} does not fit scheme '${error.scheme}': ${error.reason}`;
        case 'MissingIdentifier':
            return `No dc:identifier in ${error.path}`;
        case 'MissingTitle':
            return `No dc:title in ${error.path}`;
        case 'MissingLanguage':
            return `No dc:language in ${error.path}`;
        default:
            return describeXmlReadError(error);
    }
}

/**
 * A `meta` is read as OPF3 when it has a `property` attribute and non-blank text.
 */
export function isOpf3Meta(element: XmlElement): boolean {
    return element.hasAttribute('property') && element.textNormalized.length > 0;
}

export function readOpf2Meta(element: XmlElement): Result<Opf2Meta, MetaEntryError> {
    const name = element.getAttribute('name');
    const content = element.getAttribute('content');
    const httpEquiv = element.getAttribute('http-equiv');
    const charset = element.getAttribute('charset');
    const scheme = element.getAttribute('scheme');
    const attributes = element.attributes
        .filter(attribute => attribute.namespace !== null || !OPF2_META_ATTRIBUTES.includes(attribute.name))
        .map(attribute => ({ ...attribute }));

    if (name !== null && content !== null && httpEquiv === null && charset === null) {
        return ok({ kind: 'name', name, content, scheme, attributes });
    }
    if (httpEquiv !== null && content !== null && name === null && charset === null) {
        return ok({ kind: 'http-equiv', httpEquiv, content, scheme, attributes });
    }
    if (charset !== null && name === null && httpEquiv === null && content === null) {
        return ok({ kind: 'charset', charset, scheme, attributes });
    }
    return err({ kind: 'InvalidOpf2Meta', path: element.path });
}

export function writeOpf2Meta(meta: Opf2Meta): XmlElement {
    const element = new XmlElement('meta', Namespaces.OPF);
    switch (meta.kind) {
        case 'name':
            element.setAttribute('name', meta.name);
            element.setAttribute('content', meta.content);
            break;
        case 'http-equiv':
            element.setAttribute('http-equiv', meta.httpEquiv);
            element.setAttribute('content', meta.content);
            break;
        case 'charset':
            element.setAttribute('charset', meta.charset);
            break;
    }
    setOptionalAttribute(element, 'scheme', meta.scheme);
    for (const attribute of meta.attributes) {
        element.setAttribute(attribute.name, attribute.value, attribute.namespace, attribute.prefix);
    }
    return element;
}

export function readOpf3Meta(element: XmlElement, context: ReadContext): Result<Opf3Meta, MetaEntryError> {
    const content = ownText(element);
    if (!content.ok) {
        return content;
    }
    const rawProperty = attr(element, 'property');
    if (!rawProperty.ok) {
        return rawProperty;
    }
    const property = parseProperty(rawProperty.value);
    if (!property.ok) {
        return err({ kind: 'InvalidProperty', value: rawProperty.value, reason: property.error, path: element.path });
    }
    if (!isKnownPrefix(context, property.value.prefix)) {
        return err({ kind: 'UnknownPrefix', property: rawProperty.value, path: element.path });
    }
    const direction = parseDirection(element);
    if (!direction.ok) {
        return direction;
    }

    const options = {
        identifier: element.getAttribute('id'),
        direction: direction.value,
        refines: element.getAttribute('refines'),
        scheme: element.getAttribute('scheme'),
        language: languageOf(element)
    };
    const codec = context.registry.codecFor(options.scheme);
    if (codec === null || options.scheme === null) {
        return ok(new Opf3Meta(property.value, content.value, STRING_CODEC, options));
    }
    const decoded = codec.decode(content.value);
    if (!decoded.ok) {
        return err({ kind: 'InvalidMetaValue', value: content.value, scheme: options.scheme, reason: decoded.error, path: element.path });
    }
    return ok(new Opf3Meta(property.value, decoded.value, codec, options));
}

export function writeOpf3Meta(meta: Opf3Meta): XmlElement {
    const element = new XmlElement('meta', Namespaces.OPF);
    element.setAttribute('property', encodeProperty(meta.property));
    setOptionalAttribute(element, 'id', meta.identifier);
    setOptionalAttribute(element, 'dir', meta.direction);
    setOptionalAttribute(element, 'refines', meta.refines);
    setOptionalAttribute(element, 'scheme', meta.scheme);
    setOptionalAttribute(element, 'lang', meta.language, Namespaces.XML);
    element.text = meta.content;
    return element;
}

export function readMetadataLink(element: XmlElement, context: ReadContext): Result<MetadataLink, MetaEntryError> {
    const href = iriAttr(element, 'href');
    if (!href.ok) {
        return href;
    }
    const relation = propertiesAttr(element, 'rel');
    if (!relation.ok) {
        return relation;
    }
    const properties = propertiesAttr(element);
    if (!properties.ok) {
        return properties;
    }
    const unknown = [...relation.value, ...properties.value].find(property => !isKnownPrefix(context, property.prefix));
    if (unknown !== undefined) {
        return err({ kind: 'UnknownPrefix', property: encodeProperty(unknown), path: element.path });
    }
    const refines = optionalIriAttr(element, 'refines');
    if (!refines.ok) {
        return refines;
    }
    const rawMediaType = optionalAttr(element, 'media-type');
    let mediaType: string | null = null;
    if (rawMediaType !== null) {
        const parsed = parseMediaType(element, rawMediaType);
        if (!parsed.ok) {
            return parsed;
        }
        mediaType = parsed.value;
    }
    return ok({
        href: href.value,
        relation: relation.value,
        mediaType,
        identifier: element.getAttribute('id'),
        properties: properties.value,
        refines: refines.value
    });
}

export function writeMetadataLink(link: MetadataLink, context: WriteContext): XmlElement {
    const element = new XmlElement('link', Namespaces.OPF);
    element.setAttribute('href', link.href);
    if (isEpub3(context)) {
        setPropertiesAttribute(element, link.relation, 'rel');
    }
    setOptionalAttribute(element, 'media-type', link.mediaType);
    setOptionalAttribute(element, 'id', link.identifier);
    if (isEpub3(context)) {
        setPropertiesAttribute(element, link.properties);
        setOptionalAttribute(element, 'refines', link.refines);
    }
    return element;
}

/**
 * The `metadata` element of a package document.
 *
 * Identifiers, titles and languages are kept apart from the other Dublin Core entries, as a package needs at
 * least one of each.
 */
export class PackageMetadata {
    readonly dublinCoreEntries: DublinCore[];
    readonly opf2MetaEntries: Opf2Meta[];
    readonly opf3MetaEntries: Opf3Meta[];
    readonly links: MetadataLink[];
    private readonly _identifiers: DublinCoreIdentifier[];
    private readonly _titles: DublinCoreTitle[];
    private readonly _languages: DublinCoreLanguage[];

    constructor(
        identifiers: [DublinCoreIdentifier, ...DublinCoreIdentifier[]],
        titles: [DublinCoreTitle, ...DublinCoreTitle[]],
        languages: [DublinCoreLanguage, ...DublinCoreLanguage[]],
        rest: {
            dublinCoreEntries?: DublinCore[];
            opf2MetaEntries?: Opf2Meta[];
            opf3MetaEntries?: Opf3Meta[];
            links?: MetadataLink[];
        } = {}
    ) {
        this._identifiers = [...identifiers];
        this._titles = [...titles];
        this._languages = [...languages];
        this.dublinCoreEntries = rest.dublinCoreEntries ?? [];
        this.opf2MetaEntries = rest.opf2MetaEntries ?? [];
        this.opf3MetaEntries = rest.opf3MetaEntries ?? [];
        this.links = rest.links ?? [];
    }

    get identifiers(): readonly DublinCoreIdentifier[] {
        return this._identifiers;
    }

    get titles(): readonly DublinCoreTitle[] {
        return this._titles;
    }

    get languages(): readonly DublinCoreLanguage[] {
        return this._languages;
    }

    get primaryTitle(): DublinCoreTitle {
        return this._titles[0];
    }

    addIdentifier(identifier: DublinCoreIdentifier): void {
        this._identifiers.push(identifier);
    }

    addTitle(title: DublinCoreTitle): void {
        this._titles.push(title);
    }

    addLanguage(language: DublinCoreLanguage): void {
        this._languages.push(language);
    }

    /** Removes an identifier unless it is the last one. Returns whether it was removed. */
    removeIdentifier(identifier: DublinCoreIdentifier): boolean {
        return removeKeepingOne(this._identifiers, identifier);
    }

    removeTitle(title: DublinCoreTitle): boolean {
        return removeKeepingOne(this._titles, title);
    }

    removeLanguage(language: DublinCoreLanguage): boolean {
        return removeKeepingOne(this._languages, language);
    }

    findIdentifier(id: string): DublinCoreIdentifier | null {
        return this._identifiers.find(entry => entry.identifier === id) ?? null;
    }

    /** OPF3 metas refining the element with the given `id`. */
    refinementsOf(id: string): Opf3Meta[] {
        return this.opf3MetaEntries.filter(meta => meta.refinesTarget === id);
    }

    static fromElement(element: XmlElement, context: ReadContext): Result<PackageMetadata, MetadataReadError> {
        // Old packages may group entries in dc-metadata and x-metadata wrappers.
        const dublinCoreSource = element.getChild('dc-metadata') ?? element;
        const metaSource = element.getChild('x-metadata') ?? element;

        const dublinCore = keepReadable(
            dublinCoreSource.children.filter(child => child.namespace === Namespaces.DUBLIN_CORE).map(readDublinCore),
            context,
            describeDublinCoreError
        );
        if (!dublinCore.ok) {
            return dublinCore;
        }

        const identifiers: DublinCoreIdentifier[] = [];
        const titles: DublinCoreTitle[] = [];
        const languages: DublinCoreLanguage[] = [];
        const others: DublinCore[] = [];
        for (const entry of dublinCore.value) {
            if (entry.name === 'identifier') identifiers.push(entry);
            else if (entry.name === 'language') languages.push(entry);
            else if (isTitle(entry)) titles.push(entry);
            else others.push(entry);
        }
        const [firstIdentifier, ...moreIdentifiers] = identifiers;
        if (firstIdentifier === undefined) {
            return err({ kind: 'MissingIdentifier', path: element.path });
        }
        const [firstTitle, ...moreTitles] = titles;
        if (firstTitle === undefined) {
            return err({ kind: 'MissingTitle', path: element.path });
        }
        const [firstLanguage, ...moreLanguages] = languages;
        if (firstLanguage === undefined) {
            return err({ kind: 'MissingLanguage', path: element.path });
        }

        const metaElements = metaSource.getChildren('meta', Namespaces.OPF);
        const opf2 = keepReadable(
            metaElements.filter(meta => !isOpf3Meta(meta)).map(readOpf2Meta),
            context,
            describeMetadataError
        );
        if (!opf2.ok) {
            return opf2;
        }
        const opf3 = keepReadable(
            metaElements.filter(isOpf3Meta).map(meta => readOpf3Meta(meta, context)),
            context,
            describeMetadataError
        );
        if (!opf3.ok) {
            return opf3;
        }
        const links = keepReadable(
            element.getChildren('link', Namespaces.OPF).map(link => readMetadataLink(link, context)),
            context,
            describeMetadataError
        );
        if (!links.ok) {
            return links;
        }

        return ok(new PackageMetadata(
            [firstIdentifier, ...moreIdentifiers],
            [firstTitle, ...moreTitles],
            [firstLanguage, ...moreLanguages],
            { dublinCoreEntries: others, opf2MetaEntries: opf2.value, opf3MetaEntries: opf3.value, links: links.value }
        ));
    }

    /**
     * Writes the metadata element. Each OPF3 meta that refines another element is written right after it,
     * refinements of refinements included. Refinements whose target is not written end up after all other
     * entries.
     */
    toElement(context: WriteContext): XmlElement {
        const element = new XmlElement('metadata', Namespaces.OPF);
        element.addNamespaceDeclaration('dc', Namespaces.DUBLIN_CORE);
        element.addNamespaceDeclaration('opf', Namespaces.OPF);

        const refinements = new Map<string, Opf3Meta[]>();
        for (const meta of this.opf3MetaEntries) {
            const target = meta.refinesTarget;
            if (target !== null) {
                refinements.set(target, [...(refinements.get(target) ?? []), meta]);
            }
        }
        const written = new Set<Opf3Meta>();

        const addRefinements = (id: string | null): void => {
            if (id === null) {
                return;
            }
            for (const meta of refinements.get(id) ?? []) {
                if (written.has(meta)) {
                    continue;
                }
                written.add(meta);
                element.addContent(writeOpf3Meta(meta));
                addRefinements(meta.identifier);
            }
        };

        const entries: DublinCore[] = [...this._identifiers, ...this._titles, ...this._languages, ...this.dublinCoreEntries];
        for (const entry of entries) {
            element.addContent(writeDublinCore(entry, context));
            addRefinements(entry.identifier);
        }

        for (const meta of this.opf3MetaEntries) {
            if (meta.refines !== null || written.has(meta)) {
                continue;
            }
            written.add(meta);
            element.addContent(writeOpf3Meta(meta));
            addRefinements(meta.identifier);
        }

        const omitLegacy = context.config.omitLegacyFeatures && context.version.isAtLeast(EPUB_3_0);
        if (!omitLegacy) {
            for (const meta of this.opf2MetaEntries) {
                element.addContent(writeOpf2Meta(meta));
            }
        }

        for (const link of this.links) {
            element.addContent(writeMetadataLink(link, context));
            addRefinements(link.identifier);
        }

        for (const meta of this.opf3MetaEntries) {
            if (!written.has(meta)) {
                context.logger.warn(`Refined element of ${meta} was not written, writing it unattached`);
                element.addContent(writeOpf3Meta(meta));
            }
        }
        return element;
    }
}

function removeKeepingOne<T>(entries: T[], entry: T): boolean {
    const index = entries.indexOf(entry);
    if (index < 0 || entries.length === 1) {
        return false;
    }
    entries.splice(index, 1);
    return true;
}
