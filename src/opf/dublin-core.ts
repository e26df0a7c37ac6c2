import { Result, ok, err, ReadingDirection } from '../types';
import { XmlElement, Namespaces } from '../xml/xml-element';
import { XmlReadError, describeXmlReadError } from '../xml/read-errors';
import { languageOf, ownText, parseDirection, setOptionalAttribute, textElement } from '../xml/model-xml-serializer';
import { CreativeRole } from './creative-role';
import { WriteContext, isEpub3 } from './context';

export const LOCALIZED_DUBLIN_CORE = [
    'contributor',
    'coverage',
    'creator',
    'description',
    'publisher',
    'relation',
    'rights',
    'source',
    'subject',
    'title',
    'type'
] as const;

export type LocalizedDublinCoreName = (typeof LOCALIZED_DUBLIN_CORE)[number];

interface DublinCoreBase {
    /** The `id` attribute. */
    identifier: string | null;
    content: string;
}

export interface LocalizedDublinCore extends DublinCoreBase {
    direction: ReadingDirection | null;
    language: string | null;
}

export interface DublinCoreIdentifier extends DublinCoreBase {
    name: 'identifier';
    /** EPUB 2 only. */
    scheme: string | null;
}

export interface DublinCoreLanguage extends DublinCoreBase {
    name: 'language';
}

export interface DublinCoreFormat extends DublinCoreBase {
    name: 'format';
}

export interface DublinCoreDate extends DublinCoreBase {
    name: 'date';
    /** EPUB 2 only. */
    event: string | null;
}

export interface DublinCoreAgent extends LocalizedDublinCore {
    name: 'contributor' | 'creator';
    /** EPUB 2 only. */
    role: CreativeRole | null;
    /** EPUB 2 only. */
    fileAs: string | null;
}

export interface DublinCoreText extends LocalizedDublinCore {
    name: Exclude<LocalizedDublinCoreName, 'contributor' | 'creator'>;
}

export type DublinCoreTitle = DublinCoreText & { name: 'title' };

export type DublinCore =
    | DublinCoreIdentifier
    | DublinCoreLanguage
    | DublinCoreFormat
    | DublinCoreDate
    | DublinCoreAgent
    | DublinCoreText;

export type DublinCoreName = DublinCore['name'];

export type DublinCoreError =
    | { kind: 'DublinCoreError'; inner: XmlReadError }
    | { kind: 'UnknownDublinCore'; name: string; path: string };

export function describeDublinCoreError(error: DublinCoreError): string {
    return error.kind === 'UnknownDublinCore'
        ? `Unknown Dublin Core element '${error.name}' at ${error.path}`
        : describeXmlReadError(error.inner);
}

export function isTitle(entry: DublinCore): entry is DublinCoreTitle {
    return entry.name === 'title';
}

export function identifierOf(content: string, identifier: string | null = null, scheme: string | null = null): DublinCoreIdentifier {
    return { name: 'identifier', identifier, content, scheme };
}

export function titleOf(content: string, identifier: string | null = null): DublinCoreTitle {
    return { name: 'title', identifier, content, direction: null, language: null };
}

export function languageEntryOf(content: string, identifier: string | null = null): DublinCoreLanguage {
    return { name: 'language', identifier, content };
}

function wrap<T>(result: Result<T, XmlReadError>): Result<T, DublinCoreError> {
    return result.ok ? result : err({ kind: 'DublinCoreError', inner: result.error });
}

function readLocalized(element: XmlElement, content: string): Result<LocalizedDublinCore, DublinCoreError> {
    const direction = wrap(parseDirection(element));
    if (!direction.ok) {
        return direction;
    }
    return ok({
        identifier: element.getAttribute('id'),
        content,
        direction: direction.value,
        language: languageOf(element)
    });
}

/**
 * Reads a `dc:*` element, picking the variant from its local name.
 */
export function readDublinCore(element: XmlElement): Result<DublinCore, DublinCoreError> {
    const content = wrap(ownText(element));
    if (!content.ok) {
        return content;
    }
    const identifier = element.getAttribute('id');
    const name = element.name;

    switch (name) {
        case 'identifier':
            return ok({ name, identifier, content: content.value, scheme: element.getAttribute('scheme', Namespaces.OPF) });
        case 'language':
        case 'format':
            return ok({ name, identifier, content: content.value });
        case 'date':
            return ok({ name, identifier, content: content.value, event: element.getAttribute('event', Namespaces.OPF) });
        case 'contributor':
        case 'creator': {
            const localized = readLocalized(element, content.value);
            if (!localized.ok) {
                return localized;
            }
            const role = element.getAttribute('role', Namespaces.OPF);
            return ok({
                ...localized.value,
                name,
                role: role === null ? null : CreativeRole.of(role),
                fileAs: element.getAttribute('file-as', Namespaces.OPF)
            });
        }
        case 'coverage':
        case 'description':
        case 'publisher':
        case 'relation':
        case 'rights':
        case 'source':
        case 'subject':
        case 'title':
        case 'type': {
            const localized = readLocalized(element, content.value);
            return localized.ok ? ok({ ...localized.value, name }) : localized;
        }
        default:
            return err({ kind: 'UnknownDublinCore', name, path: element.path });
    }
}

/**
 * Writes a Dublin Core entry. The `opf:` attributes are only written for EPUB 2 packages.
 */
export function writeDublinCore(entry: DublinCore, context: WriteContext): XmlElement {
    const element = textElement(entry.name, entry.content, Namespaces.DUBLIN_CORE, 'dc');
    setOptionalAttribute(element, 'id', entry.identifier);
    const legacy = !isEpub3(context);

    switch (entry.name) {
        case 'identifier':
            if (legacy) setOptionalAttribute(element, 'scheme', entry.scheme, Namespaces.OPF);
            break;
        case 'date':
            if (legacy) setOptionalAttribute(element, 'event', entry.event, Namespaces.OPF);
            break;
        case 'language':
        case 'format':
            break;
        case 'contributor':
        case 'creator':
            writeLocalized(element, entry, context);
            if (legacy) {
                setOptionalAttribute(element, 'role', entry.role?.code, Namespaces.OPF);
                setOptionalAttribute(element, 'file-as', entry.fileAs, Namespaces.OPF);
            }
            break;
        default:
            writeLocalized(element, entry, context);
    }
    return element;
}

function writeLocalized(element: XmlElement, entry: LocalizedDublinCore, context: WriteContext): void {
    if (isEpub3(context)) {
        setOptionalAttribute(element, 'dir', entry.direction);
    }
    setOptionalAttribute(element, 'lang', entry.language, Namespaces.XML);
}
