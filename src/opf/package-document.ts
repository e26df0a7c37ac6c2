import { Result, ok, err, ReadingDirection, ReaderConfig, WriterConfig } from '../types';
import { Logger } from '../utils/common';
import { XmlElement, XmlParseError, Namespaces, parseXml, serializeXml } from '../xml/xml-element';
import { XmlReadError, describeXmlReadError } from '../xml/read-errors';
import { attr, child, languageOf, parseDirection, setOptionalAttribute } from '../xml/model-xml-serializer';
import { encodePrefixes, parsePrefixes } from '../xml/property-parser';
import {
    EpubVersion,
    Format,
    UnsupportedFormatError,
    VersionError,
    describeVersionError,
    parseAndResolve,
    resolveReadableFormat
} from '../core/epub-version';
import { PackageMetadata, MetadataReadError, describeMetadataError } from './metadata';
import { ManifestItem, PackageChangeError, PackageManifest, ManifestReadError } from './manifest';
import { PackageSpine, SpineReadError } from './spine';
import { PackageGuide } from './guide';
import { PackageBindings, BindingsReadError } from './bindings';
import { PackageTours } from './tours';
import { PackageCollection, readCollection, writeCollection } from './collection';
import { Opf3MetaRegistry, DEFAULT_REGISTRY } from './opf3-meta';
import { ReadContext, WriteContext, isEpub3 } from './context';

export type PackageReadError =
    | XmlParseError
    | VersionError
    | MetadataReadError
    | ManifestReadError
    | SpineReadError
    | BindingsReadError
    | { kind: 'NotPackageDocument'; name: string; path: string };

export function describePackageError(error: PackageReadError): string {
    switch (error.kind) {
        case 'MalformedXml':
            return `Malformed XML: ${error.reason}`;
        case 'InvalidVersion':
        case 'WithdrawnVersion':
        case 'UnsupportedVersion':
            return describeVersionError(error);
        case 'NotPackageDocument':
            return `Expected a 'package' element but found '${error.name}' at ${error.path}`;
        case 'DuplicateManifestItem':
            return `Manifest item id '${error.id}' is used twice (${error.path})`;
        case 'UnknownSpineItem':
            return `Spine refers to unknown manifest item '${error.idref}' at ${error.path}`;
        case 'UnknownHandler':
            return `Binding handler '${error.handler}' at ${error.path} is not a manifest item`;
        default:
            return describeMetadataError(error);
    }
}

export interface PackageReadOptions {
    logger: Logger;
    config?: ReaderConfig;
    registry?: Opf3MetaRegistry;
}

export interface PackageDocumentParts {
    version: EpubVersion;
    uniqueIdentifier: string;
    metadata: PackageMetadata;
    manifest: PackageManifest;
    spine: PackageSpine;
    identifier?: string | null;
    direction?: ReadingDirection | null;
    language?: string | null;
    prefixes?: Map<string, string>;
    guide?: PackageGuide | null;
    bindings?: PackageBindings | null;
    tours?: PackageTours | null;
    collections?: PackageCollection[];
}

/**
 * Reads an optional part. A part that fails is dropped with a warning, unless the reader is strict.
 */
function readOptional<T, E>(
    element: XmlElement | null,
    read: (element: XmlElement) => Result<T, E>,
    context: ReadContext,
    describe: (error: E) => string
): Result<T | null, E> {
    if (element === null) {
        return ok(null);
    }
    const result = read(element);
    if (result.ok || context.config.strict) {
        return result;
    }
    context.logger.warn(`Dropping '${element.name}': ${describe(result.error)}`);
    return ok(null);
}

/**
 * The OPF package document.
 */
export class PackageDocument {
    uniqueIdentifier: string;
    identifier: string | null;
    direction: ReadingDirection | null;
    language: string | null;
    readonly prefixes: Map<string, string>;
    readonly metadata: PackageMetadata;
    readonly manifest: PackageManifest;
    readonly spine: PackageSpine;
    guide: PackageGuide | null;
    bindings: PackageBindings | null;
    tours: PackageTours | null;
    readonly collections: PackageCollection[];
    private _version: EpubVersion;
    private _format: Format;

    constructor(parts: PackageDocumentParts) {
        const format = resolveReadableFormat(parts.version);
        if (!format.ok) {
            throw new UnsupportedFormatError(parts.version.toString(), parts.version.format);
        }
        this._version = parts.version;
        this._format = format.value;
        this.uniqueIdentifier = parts.uniqueIdentifier;
        this.metadata = parts.metadata;
        this.manifest = parts.manifest;
        this.spine = parts.spine;
        this.identifier = parts.identifier ?? null;
        this.direction = parts.direction ?? null;
        this.language = parts.language ?? null;
        this.prefixes = parts.prefixes ?? new Map();
        this.guide = parts.guide ?? null;
        this.bindings = parts.bindings ?? null;
        this.tours = parts.tours ?? null;
        this.collections = parts.collections ?? [];
    }

    get version(): EpubVersion {
        return this._version;
    }

    get format(): Format {
        return this._format;
    }

    /**
     * @throws UnsupportedFormatError when `version` is withdrawn, unknown or not supported
     */
    setVersion(version: EpubVersion): void {
        const format = resolveReadableFormat(version);
        if (!format.ok) {
            throw new UnsupportedFormatError(version.toString(), version.format);
        }
        this._version = version;
        this._format = format.value;
    }

    /**
     * Returns why {@link removeManifestItem} would refuse to remove `id`, or `null` when it may.
     */
    checkManifestRemoval(id: string): PackageChangeError | null {
        if (!this.manifest.hasItem(id)) {
            return { kind: 'UnknownManifestItem', id };
        }
        if (this.manifest.size === 1) {
            return { kind: 'LastManifestItem', id };
        }
        const references = this.spine.referencesTo(id).length;
        if (references > 0 && references === this.spine.references.length) {
            return { kind: 'LastSpineReference', id };
        }
        return null;
    }

    /**
     * Removes a manifest item together with the spine references to it, and clears the spine `toc` when it
     * named the item.
     */
    removeManifestItem(id: string): Result<ManifestItem, PackageChangeError> {
        const refused = this.checkManifestRemoval(id);
        if (refused !== null) {
            return err(refused);
        }
        if (this.spine.referencesTo(id).length > 0) {
            const removed = this.spine.removeReferencesTo(id);
            if (!removed.ok) {
                return removed;
            }
        }
        if (this.spine.tableOfContentsId === id) {
            this.spine.tableOfContentsId = null;
        }
        return this.manifest.removeItem(id);
    }

    static fromXml(text: string, options: PackageReadOptions): Result<PackageDocument, PackageReadError> {
        const root = parseXml(text);
        return root.ok ? PackageDocument.fromElement(root.value, options) : root;
    }

    static fromElement(element: XmlElement, options: PackageReadOptions): Result<PackageDocument, PackageReadError> {
        if (element.name !== 'package' || element.namespace !== Namespaces.OPF) {
            return err({ kind: 'NotPackageDocument', name: element.qualifiedName, path: element.path });
        }
        const rawVersion = attr(element, 'version');
        if (!rawVersion.ok) return rawVersion;
        const version = parseAndResolve(rawVersion.value);
        if (!version.ok) return version;
        const uniqueIdentifier = attr(element, 'unique-identifier');
        if (!uniqueIdentifier.ok) return uniqueIdentifier;
        const direction = parseDirection(element);
        if (!direction.ok) return direction;

        let prefixes = new Map<string, string>();
        const rawPrefixes = element.getAttribute('prefix');
        if (rawPrefixes !== null) {
            const parsed = parsePrefixes(rawPrefixes);
            if (!parsed.ok) {
                return err({ kind: 'InvalidPrefix', value: rawPrefixes, reason: parsed.error, path: element.path });
            }
            prefixes = parsed.value;
        }

        const context: ReadContext = {
            version: version.value.version,
            prefixes,
            registry: options.registry ?? DEFAULT_REGISTRY,
            config: options.config ?? { strict: false },
            logger: options.logger
        };

        const metadataElement = child(element, 'metadata', Namespaces.OPF);
        if (!metadataElement.ok) return metadataElement;
        const metadata = PackageMetadata.fromElement(metadataElement.value, context);
        if (!metadata.ok) return metadata;

        const manifestElement = child(element, 'manifest', Namespaces.OPF);
        if (!manifestElement.ok) return manifestElement;
        const manifest = PackageManifest.fromElement(manifestElement.value);
        if (!manifest.ok) return manifest;

        const spineElement = child(element, 'spine', Namespaces.OPF);
        if (!spineElement.ok) return spineElement;
        const spine = PackageSpine.fromElement(spineElement.value, manifest.value);
        if (!spine.ok) return spine;

        const guide = readOptional(
            element.getChild('guide', Namespaces.OPF),
            guideElement => PackageGuide.fromElement(guideElement, options.logger),
            context,
            describeXmlReadError
        );
        if (!guide.ok) return guide;
        const bindings = readOptional(
            element.getChild('bindings', Namespaces.OPF),
            bindingsElement => PackageBindings.fromElement(bindingsElement, manifest.value),
            context,
            describePackageError
        );
        if (!bindings.ok) return bindings;
        const tours = readOptional(element.getChild('tours', Namespaces.OPF), PackageTours.fromElement, context, describeXmlReadError);
        if (!tours.ok) return tours;

        const collections: PackageCollection[] = [];
        for (const collectionElement of element.getChildren('collection', Namespaces.OPF)) {
            const collection = readOptional(collectionElement, read => readCollection(read, context), context, describeMetadataError);
            if (!collection.ok) return collection;
            if (collection.value !== null) collections.push(collection.value);
        }

        if (metadata.value.findIdentifier(uniqueIdentifier.value) === null) {
            options.logger.warn(`unique-identifier '${uniqueIdentifier.value}' does not match any dc:identifier`);
        }

        return ok(new PackageDocument({
            version: version.value.version,
            uniqueIdentifier: uniqueIdentifier.value,
            metadata: metadata.value,
            manifest: manifest.value,
            spine: spine.value,
            identifier: element.getAttribute('id'),
            direction: direction.value,
            language: languageOf(element),
            prefixes,
            guide: guide.value,
            bindings: bindings.value,
            tours: tours.value,
            collections
        }));
    }

    toElement(config: WriterConfig, logger: Logger): XmlElement {
        const context: WriteContext = { version: this._version, config, logger };
        const epub3 = isEpub3(context);

        const element = new XmlElement('package', Namespaces.OPF);
        element.addNamespaceDeclaration('', Namespaces.OPF);
        element.setAttribute('version', this._version.toString());
        element.setAttribute('unique-identifier', this.uniqueIdentifier);
        setOptionalAttribute(element, 'id', this.identifier);
        if (epub3) {
            setOptionalAttribute(element, 'dir', this.direction);
            setOptionalAttribute(element, 'lang', this.language, Namespaces.XML);
            if (this.prefixes.size > 0) {
                element.setAttribute('prefix', encodePrefixes(this.prefixes));
            }
        }

        element.addContent(this.metadata.toElement(context));
        element.addContent(this.manifest.toElement(context));
        element.addContent(this.spine.toElement(context));

        const guide = this.guide !== null && !this.guide.isEmpty ? this.guide : null;
        if (epub3) {
            if (guide !== null && !config.omitLegacyFeatures) {
                element.addContent(guide.toElement());
            }
            if (this.bindings !== null && this.bindings.bindings.length > 0) {
                element.addContent(this.bindings.toElement());
            }
            for (const collection of this.collections) {
                element.addContent(writeCollection(collection, context));
            }
        } else {
            if (this.tours !== null && this.tours.tours.length > 0) {
                element.addContent(this.tours.toElement());
            }
            if (guide !== null) {
                element.addContent(guide.toElement());
            }
        }
        return element;
    }

    toXml(config: WriterConfig, logger: Logger): string {
        return serializeXml(this.toElement(config, logger), { prettyPrint: config.prettyPrint });
    }
}
