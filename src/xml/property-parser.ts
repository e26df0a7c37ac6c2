import { Result, ok, err } from '../types';

/**
 * A property value such as `dcterms:modified`, or `nav` in the default vocabulary of its context.
 */
export interface Property {
    prefix: string | null;
    reference: string;
}

export const RESERVED_PREFIXES: Readonly<Record<string, string>> = {
    a11y: 'http://www.idpf.org/epub/vocab/package/a11y/#',
    dcterms: 'http://purl.org/dc/terms/',
    marc: 'http://id.loc.gov/vocabulary/',
    media: 'http://www.idpf.org/epub/vocab/overlays/#',
    onix: 'http://www.editeur.org/ONIX/book/codelists/current.html#',
    rendition: 'http://www.idpf.org/vocab/rendition/#',
    schema: 'http://schema.org/',
    xsd: 'http://www.w3.org/2001/XMLSchema#'
};

/** Default vocabularies for unprefixed properties, by the attribute they appear in. */
export const DefaultVocabulary = {
    META: 'http://idpf.org/epub/vocab/package/meta/#',
    LINK: 'http://idpf.org/epub/vocab/package/link/#',
    ITEM: 'http://idpf.org/epub/vocab/package/item/#',
    ITEMREF: 'http://idpf.org/epub/vocab/package/itemref/#'
} as const;

const NC_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export function isNcName(value: string): boolean {
    return NC_NAME.test(value);
}

export function parseProperty(value: string): Result<Property, string> {
    if (value.length === 0) {
        return err('property is empty');
    }
    if (/\s/.test(value)) {
        return err('property contains whitespace');
    }
    const colon = value.indexOf(':');
    if (colon < 0) {
        return ok({ prefix: null, reference: value });
    }
    const prefix = value.substring(0, colon);
    const reference = value.substring(colon + 1);
    if (!isNcName(prefix)) {
        return err(`'${prefix}' is not a valid prefix name`);
    }
    if (reference.length === 0) {
        return err('reference is empty');
    }
    return ok({ prefix, reference });
}

export function encodeProperty(property: Property): string {
    return property.prefix === null ? property.reference : `${property.prefix}:${property.reference}`;
}

export function propertiesEqual(a: Property, b: Property): boolean {
    return a.prefix === b.prefix && a.reference === b.reference;
}

/**
 * Parses a whitespace separated property list. Repeated properties are kept once, at their first position.
 */
export function parseProperties(value: string): Result<Property[], string> {
    const properties: Property[] = [];
    for (const token of value.split(/\s+/).filter(part => part.length > 0)) {
        const parsed = parseProperty(token);
        if (!parsed.ok) {
            return parsed;
        }
        if (!properties.some(existing => propertiesEqual(existing, parsed.value))) {
            properties.push(parsed.value);
        }
    }
    return ok(properties);
}

export function encodeProperties(properties: readonly Property[]): string {
    return properties.map(encodeProperty).join(' ');
}

/**
 * Parses a package `prefix` attribute, a list of `name: uri` pairs.
 */
export function parsePrefixes(value: string): Result<Map<string, string>, string> {
    const prefixes = new Map<string, string>();
    const tokens = value.trim().split(/\s+/).filter(part => part.length > 0);
    for (let index = 0; index < tokens.length; index += 2) {
        const name = tokens[index];
        if (!name.endsWith(':')) {
            return err(`expected 'name:' but found '${name}'`);
        }
        const prefix = name.substring(0, name.length - 1);
        if (!isNcName(prefix)) {
            return err(`'${prefix}' is not a valid prefix name`);
        }
        if (index + 1 >= tokens.length) {
            return err(`prefix '${prefix}' has no URI`);
        }
        if (prefixes.has(prefix)) {
            return err(`prefix '${prefix}' is declared twice`);
        }
        prefixes.set(prefix, tokens[index + 1]);
    }
    return ok(prefixes);
}

export function encodePrefixes(prefixes: ReadonlyMap<string, string>): string {
    return [...prefixes].map(([name, uri]) => `${name}: ${uri}`).join(' ');
}

/**
 * Expands a property into the IRI it stands for. Returns `null` for a prefix that is neither declared nor
 * reserved.
 */
export function expandProperty(
    property: Property,
    declared: ReadonlyMap<string, string>,
    defaultVocabulary: string
): string | null {
    if (property.prefix === null) {
        return defaultVocabulary + property.reference;
    }
    const base = declared.get(property.prefix) ?? RESERVED_PREFIXES[property.prefix];
    return base === undefined ? null : base + property.reference;
}
