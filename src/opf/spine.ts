import { Result, ok, err, ReadingDirection } from '../types';
import { XmlElement, Namespaces } from '../xml/xml-element';
import { XmlReadError } from '../xml/read-errors';
import {
    attr,
    children,
    parseDirection,
    propertiesAttr,
    setOptionalAttribute,
    setPropertiesAttribute,
    yesNoAttr
} from '../xml/model-xml-serializer';
import { Property } from '../xml/property-parser';
import { WriteContext, isEpub3 } from './context';
import type { PackageChangeError, PackageManifest } from './manifest';

export interface SpineReference {
    idref: string;
    identifier: string | null;
    linear: boolean;
    properties: Property[];
}

export type SpineReadError = XmlReadError | { kind: 'UnknownSpineItem'; idref: string; path: string };

function readReference(element: XmlElement, manifest: PackageManifest): Result<SpineReference, SpineReadError> {
    const idref = attr(element, 'idref');
    if (!idref.ok) return idref;
    if (!manifest.hasItem(idref.value)) {
        return err({ kind: 'UnknownSpineItem', idref: idref.value, path: element.path });
    }
    const linear = yesNoAttr(element, 'linear', true);
    if (!linear.ok) return linear;
    const properties = propertiesAttr(element);
    if (!properties.ok) return properties;
    return ok({
        idref: idref.value,
        identifier: element.getAttribute('id'),
        linear: linear.value,
        properties: properties.value
    });
}

/**
 * The reading order of a package: references to manifest items. The spine is never empty and only refers to
 * items of the manifest it was built on.
 */
export class PackageSpine {
    private readonly _references: SpineReference[];

    constructor(
        private readonly manifest: PackageManifest,
        references: SpineReference[],
        public identifier: string | null = null,
        public pageProgressionDirection: ReadingDirection | null = null,
        /** Id of the NCX manifest item, from the legacy `toc` attribute. */
        public tableOfContentsId: string | null = null
    ) {
        this._references = [...references];
        manifest.guardRemoval(id => this.referencesTo(id).length > 0 || this.tableOfContentsId === id);
    }

    get references(): readonly SpineReference[] {
        return this._references;
    }

    get linearReferences(): SpineReference[] {
        return this._references.filter(reference => reference.linear);
    }

    referencesTo(idref: string): SpineReference[] {
        return this._references.filter(reference => reference.idref === idref);
    }

    /** Inserts a reference at `index`, at the end by default. */
    addReference(reference: SpineReference, index: number = this._references.length): Result<void, PackageChangeError> {
        if (!this.manifest.hasItem(reference.idref)) {
            return err({ kind: 'UnknownManifestItem', id: reference.idref });
        }
        this._references.splice(index, 0, reference);
        return ok(undefined);
    }

    /**
     * Removes every reference to `idref` and returns how many were removed. Refused when nothing else would be
     * left in the spine.
     */
    removeReferencesTo(idref: string): Result<number, PackageChangeError> {
        const remaining = this._references.filter(reference => reference.idref !== idref);
        if (remaining.length === 0) {
            return err({ kind: 'LastSpineReference', id: idref });
        }
        const removed = this._references.length - remaining.length;
        this._references.splice(0, this._references.length, ...remaining);
        return ok(removed);
    }

    static fromElement(element: XmlElement, manifest: PackageManifest): Result<PackageSpine, SpineReadError> {
        const referenceElements = children(element, 'itemref', Namespaces.OPF);
        if (!referenceElements.ok) {
            return referenceElements;
        }
        const references: SpineReference[] = [];
        for (const referenceElement of referenceElements.value) {
            const reference = readReference(referenceElement, manifest);
            if (!reference.ok) {
                return reference;
            }
            references.push(reference.value);
        }
        const direction = parseDirection(element, 'page-progression-direction');
        if (!direction.ok) {
            return direction;
        }
        const toc = element.getAttribute('toc');
        if (toc !== null && !manifest.hasItem(toc)) {
            return err({ kind: 'UnknownSpineItem', idref: toc, path: element.path });
        }
        return ok(new PackageSpine(manifest, references, element.getAttribute('id'), direction.value, toc));
    }

    toElement(context: WriteContext): XmlElement {
        const element = new XmlElement('spine', Namespaces.OPF);
        setOptionalAttribute(element, 'id', this.identifier);
        if (isEpub3(context)) {
            setOptionalAttribute(element, 'page-progression-direction', this.pageProgressionDirection);
        }
        setOptionalAttribute(element, 'toc', this.tableOfContentsId);
        for (const reference of this._references) {
            const referenceElement = new XmlElement('itemref', Namespaces.OPF);
            referenceElement.setAttribute('idref', reference.idref);
            setOptionalAttribute(referenceElement, 'id', reference.identifier);
            if (!reference.linear) {
                referenceElement.setAttribute('linear', 'no');
            }
            if (isEpub3(context)) {
                setPropertiesAttribute(referenceElement, reference.properties);
            }
            element.addContent(referenceElement);
        }
        return element;
    }
}
