import { Result, ok, err, ReadingDirection, isReadingDirection } from '../types';
import { XmlElement, Namespaces } from './xml-element';
import { XmlReadError } from './read-errors';
import { Property, encodeProperties, parseProperties } from './property-parser';

// Helpers shared by the document models for reading from and writing to XmlElement trees.

const IRI_BASE = 'http://epub.invalid/';
const MEDIA_TYPE = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+\/[!#$%&'*+.^_`|~0-9A-Za-z-]+(\s*;.*)?$/;

export function child(element: XmlElement, name: string, namespace: string | null = element.namespace): Result<XmlElement, XmlReadError> {
    const found = element.getChild(name, namespace);
    return found === null ? err({ kind: 'MissingElement', name, path: element.path }) : ok(found);
}

export function optionalChild(element: XmlElement, name: string, namespace: string | null = element.namespace): XmlElement | null {
    return element.getChild(name, namespace);
}

/**
 * Returns every `name` child of `element`, failing when there is not at least one.
 */
export function children(element: XmlElement, name: string, namespace: string | null = element.namespace): Result<XmlElement[], XmlReadError> {
    const found = element.getChildren(name, namespace);
    return found.length === 0 ? err({ kind: 'MissingElement', name, path: element.path }) : ok(found);
}

/**
 * Reads a required wrapper such as `<rootfiles>` and the non-empty list of `childName` elements inside it.
 */
export function childrenWrapper(
    element: XmlElement,
    wrapperName: string,
    childName: string,
    namespace: string | null = element.namespace
): Result<XmlElement[], XmlReadError> {
    const wrapper = child(element, wrapperName, namespace);
    if (!wrapper.ok) {
        return wrapper;
    }
    return children(wrapper.value, childName, namespace);
}

/**
 * Like {@link childrenWrapper}, but a missing wrapper yields `null`. A wrapper that is present still needs
 * at least one child.
 */
export function optionalChildrenWrapper(
    element: XmlElement,
    wrapperName: string,
    childName: string,
    namespace: string | null = element.namespace
): Result<XmlElement[] | null, XmlReadError> {
    const wrapper = optionalChild(element, wrapperName, namespace);
    if (wrapper === null) {
        return ok(null);
    }
    return children(wrapper, childName, namespace);
}

export function attr(element: XmlElement, name: string, namespace: string | null = null): Result<string, XmlReadError> {
    const value = element.getAttribute(name, namespace);
    return value === null ? err({ kind: 'MissingAttribute', name, path: element.path }) : ok(value);
}

export function optionalAttr(element: XmlElement, name: string, namespace: string | null = null): string | null {
    return element.getAttribute(name, namespace);
}

/**
 * Normalized own text of `element`. Blank text is a `MissingText` error.
 */
export function ownText(element: XmlElement): Result<string, XmlReadError> {
    const text = element.textNormalized;
    return text.length === 0 ? err({ kind: 'MissingText', path: element.path }) : ok(text);
}

export function parseDirection(element: XmlElement, name: string = 'dir'): Result<ReadingDirection | null, XmlReadError> {
    const value = element.getAttribute(name);
    if (value === null) {
        return ok(null);
    }
    return isReadingDirection(value) ? ok(value) : err({ kind: 'UnknownReadingDirection', value, path: element.path });
}

export function languageOf(element: XmlElement): string | null {
    return element.getAttribute('lang', Namespaces.XML);
}

/**
 * Checks that `value` is a usable IRI reference. Relative references are resolved against a dummy base, so
 * only references that cannot be resolved at all are rejected.
 */
export function parseIri(element: XmlElement, value: string): Result<string, XmlReadError> {
    try {
        new URL(value, IRI_BASE);
    } catch (error) {
        return err({ kind: 'InvalidIri', value, cause: error instanceof Error ? error.message : String(error), path: element.path });
    }
    return ok(value);
}

export function iriAttr(element: XmlElement, name: string): Result<string, XmlReadError> {
    const value = attr(element, name);
    return value.ok ? parseIri(element, value.value) : value;
}

export function optionalIriAttr(element: XmlElement, name: string): Result<string | null, XmlReadError> {
    const value = element.getAttribute(name);
    return value === null ? ok(null) : parseIri(element, value);
}

export function isMediaType(value: string): boolean {
    return MEDIA_TYPE.test(value);
}

export function parseMediaType(element: XmlElement, value: string): Result<string, XmlReadError> {
    return isMediaType(value) ? ok(value) : err({ kind: 'InvalidMediaType', value, path: element.path });
}

export function propertiesAttr(element: XmlElement, name: string = 'properties'): Result<Property[], XmlReadError> {
    const value = element.getAttribute(name);
    if (value === null) {
        return ok([]);
    }
    const parsed = parseProperties(value);
    return parsed.ok ? parsed : err({ kind: 'InvalidProperty', value, reason: parsed.error, path: element.path });
}

/**
 * Reads a `yes`/`no` attribute. Any other token is an error; a missing attribute yields `fallback`.
 */
export function yesNoAttr(element: XmlElement, name: string, fallback: boolean): Result<boolean, XmlReadError> {
    const value = element.getAttribute(name);
    switch (value) {
        case null:
            return ok(fallback);
        case 'yes':
            return ok(true);
        case 'no':
            return ok(false);
        default:
            return err({ kind: 'InvalidAttributeValue', name, value, reason: "expected 'yes' or 'no'", path: element.path });
    }
}

/**
 * Sets the attribute when `value` is present. Absent values leave no attribute behind.
 */
export function setOptionalAttribute(
    element: XmlElement,
    name: string,
    value: string | null | undefined,
    namespace: string | null = null
): XmlElement {
    if (value !== null && value !== undefined) {
        element.setAttribute(name, value, namespace);
    }
    return element;
}

export function setPropertiesAttribute(element: XmlElement, properties: readonly Property[], name: string = 'properties'): XmlElement {
    if (properties.length > 0) {
        element.setAttribute(name, encodeProperties(properties));
    }
    return element;
}

export function addChildren(element: XmlElement, items: Iterable<XmlElement>): XmlElement {
    for (const item of items) {
        element.addContent(item);
    }
    return element;
}

/**
 * Adds `items` inside a new `wrapperName` element. Nothing is added when there are no items.
 */
export function addChildrenWithWrapper(
    element: XmlElement,
    wrapperName: string,
    items: readonly XmlElement[],
    namespace: string | null = element.namespace,
    prefix: string | null = element.prefix
): XmlElement {
    if (items.length > 0) {
        element.addContent(addChildren(new XmlElement(wrapperName, namespace, prefix), items));
    }
    return element;
}

export function textElement(name: string, text: string, namespace: string | null, prefix: string | null = null): XmlElement {
    const element = new XmlElement(name, namespace, prefix);
    element.text = text;
    return element;
}
