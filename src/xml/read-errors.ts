/**
 * Problems found while turning an XML element into a document model. Every variant carries the absolute
 * location of the element it was found on.
 */
export type XmlReadError =
    | { kind: 'MissingAttribute'; name: string; path: string }
    | { kind: 'MissingElement'; name: string; path: string }
    | { kind: 'MissingText'; path: string }
    | { kind: 'UnknownReadingDirection'; value: string; path: string }
    | { kind: 'InvalidIri'; value: string; cause: string; path: string }
    | { kind: 'InvalidMediaType'; value: string; path: string }
    | { kind: 'InvalidProperty'; value: string; reason: string; path: string }
    | { kind: 'InvalidPrefix'; value: string; reason: string; path: string }
    | { kind: 'InvalidAttributeValue'; name: string; value: string; reason: string; path: string };

export function describeXmlReadError(error: XmlReadError): string {
    switch (error.kind) {
        case 'MissingAttribute':
            return `Missing attribute '${error.name}' at ${error.path}`;
        case 'MissingElement':
            return `Missing element '${error.name}' at ${error.path}`;
        case 'MissingText':
            return `Element at ${error.path} has no text`;
        case 'UnknownReadingDirection':
            return `Unknown reading direction '${error.value}' at ${error.path}`;
        case 'InvalidIri':
            return `Invalid IRI '${error.value}' at ${error.path}: ${error.cause}`;
        case 'InvalidMediaType':
            return `Invalid media type '${error.value}' at ${error.path}`;
        case 'InvalidProperty':
            return `Invalid property '${error.value}' at ${error.path}: ${error.reason}`;
        case 'InvalidPrefix':
            return `Invalid prefix declaration '${error.value}' at ${error.path}: ${error.reason}`;
        case 'InvalidAttributeValue':
            return `Invalid value '${error.value}' for attribute '${error.name}' at ${error.path}: ${error.reason}`;
    }
}
