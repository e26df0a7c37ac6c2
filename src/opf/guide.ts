import { Result, ok } from '../types';
import { Logger } from '../utils/common';
import { XmlElement, Namespaces } from '../xml/xml-element';
import { XmlReadError } from '../xml/read-errors';
import { attr, children, iriAttr, setOptionalAttribute } from '../xml/model-xml-serializer';
import {
    CorrectorDuplicationStrategy,
    GuideReferenceCorrector,
    ReferenceType,
    referenceTypeOf
} from './guide-reference-corrector';

const CUSTOM_PREFIX = 'other.';

export interface GuideReference {
    type: ReferenceType;
    href: string;
    title: string | null;
}

export interface CustomGuideReference {
    /** The type without its `other.` prefix. */
    customType: string;
    href: string;
    title: string | null;
}

type ReadReference = { custom: false; reference: GuideReference } | { custom: true; reference: CustomGuideReference };

function readReference(element: XmlElement): Result<ReadReference, XmlReadError> {
    const type = attr(element, 'type');
    if (!type.ok) return type;
    const href = iriAttr(element, 'href');
    if (!href.ok) return href;
    const title = element.getAttribute('title');

    const canonical = referenceTypeOf(type.value);
    if (canonical !== null) {
        return ok({ custom: false, reference: { type: canonical, href: href.value, title } });
    }
    const customType = type.value.toLowerCase().startsWith(CUSTOM_PREFIX)
        ? type.value.substring(CUSTOM_PREFIX.length)
        : type.value;
    return ok({ custom: true, reference: { customType, href: href.value, title } });
}

/**
 * The EPUB 2 `guide`, pointing at structural parts of the publication.
 */
export class PackageGuide {
    readonly references = new Map<ReferenceType, GuideReference>();
    readonly customReferences = new Map<string, CustomGuideReference>();

    constructor(private readonly logger: Logger) {}

    addReference(reference: GuideReference): void {
        this.references.set(reference.type, reference);
    }

    addCustomReference(reference: CustomGuideReference): void {
        this.customReferences.set(reference.customType, reference);
    }

    getReference(type: ReferenceType): GuideReference | null {
        return this.references.get(type) ?? null;
    }

    getCustomReference(customType: string): CustomGuideReference | null {
        return this.customReferences.get(customType) ?? null;
    }

    removeReference(type: ReferenceType): boolean {
        return this.references.delete(type);
    }

    removeCustomReference(customType: string): boolean {
        return this.customReferences.delete(customType);
    }

    get isEmpty(): boolean {
        return this.references.size === 0 && this.customReferences.size === 0;
    }

    /**
     * Turns custom references the corrector knows into canonical ones. `strategy` decides what happens when
     * the guide already has a reference of the canonical type.
     */
    correctCustomTypes(
        corrector: GuideReferenceCorrector,
        strategy: CorrectorDuplicationStrategy = CorrectorDuplicationStrategy.DoNothing
    ): void {
        for (const custom of [...this.customReferences.values()]) {
            const type = corrector.getCorrection(custom.customType);
            if (type === null) {
                continue;
            }
            const corrected: GuideReference = { type, href: custom.href, title: custom.title };
            if (!this.references.has(type)) {
                this.logger.debug(`Corrected guide type '${custom.customType}' to '${type}'`);
                this.customReferences.delete(custom.customType);
                this.references.set(type, corrected);
                continue;
            }
            switch (strategy) {
                case CorrectorDuplicationStrategy.ReplaceExisting:
                    this.logger.debug(`Replaced guide reference '${type}' with corrected '${custom.customType}'`);
                    this.customReferences.delete(custom.customType);
                    this.references.set(type, corrected);
                    break;
                case CorrectorDuplicationStrategy.RemoveCustom:
                    this.logger.debug(`Removed guide reference '${custom.customType}', '${type}' already exists`);
                    this.customReferences.delete(custom.customType);
                    break;
                case CorrectorDuplicationStrategy.DoNothing:
                    break;
            }
        }
    }

    static fromElement(element: XmlElement, logger: Logger): Result<PackageGuide, XmlReadError> {
        const referenceElements = children(element, 'reference', Namespaces.OPF);
        if (!referenceElements.ok) {
            return referenceElements;
        }
        const guide = new PackageGuide(logger);
        for (const referenceElement of referenceElements.value) {
            const read = readReference(referenceElement);
            if (!read.ok) {
                return read;
            }
            if (read.value.custom) {
                guide.addCustomReference(read.value.reference);
            } else {
                guide.addReference(read.value.reference);
            }
        }
        return ok(guide);
    }

    toElement(): XmlElement {
        const element = new XmlElement('guide', Namespaces.OPF);
        const write = (type: string, href: string, title: string | null): void => {
            const reference = new XmlElement('reference', Namespaces.OPF);
            reference.setAttribute('type', type);
            reference.setAttribute('href', href);
            setOptionalAttribute(reference, 'title', title);
            element.addContent(reference);
        };
        for (const reference of this.references.values()) {
            write(reference.type, reference.href, reference.title);
        }
        for (const reference of this.customReferences.values()) {
            write(`${CUSTOM_PREFIX}${reference.customType}`, reference.href, reference.title);
        }
        return element;
    }
}
