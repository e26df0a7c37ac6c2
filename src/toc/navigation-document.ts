import { Result, ok, err, collectResults } from '../types';
import { XmlElement, XmlParseError, Namespaces, parseXml, serializeXml } from '../xml/xml-element';
import { XmlReadError, describeXmlReadError } from '../xml/read-errors';
import { child, setOptionalAttribute, textElement } from '../xml/model-xml-serializer';
import { Property, encodeProperties, parseProperties, propertiesEqual } from '../xml/property-parser';

export const NAV_DOCUMENT_TITLE = 'Table of Contents';

const HEADINGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

export type NavContent =
    | { kind: 'link'; text: string; href: string; types: Property[] }
    | { kind: 'span'; text: string };

export interface NavListItem {
    content: NavContent;
    children: NavListItem[];
}

export interface NavHeading {
    level: number;
    text: string;
}

export interface Nav {
    identifier: string | null;
    types: Property[];
    hidden: boolean;
    heading: NavHeading | null;
    items: NavListItem[];
}

export type NavDocumentError =
    | XmlParseError
    | XmlReadError
    | { kind: 'MissingTocNav'; path: string };

export function describeNavDocumentError(error: NavDocumentError): string {
    switch (error.kind) {
        case 'MalformedXml':
            return `Malformed navigation document: ${error.reason}`;
        case 'MissingTocNav':
            return `No 'toc' nav in ${error.path}`;
        default:
            return describeXmlReadError(error);
    }
}

const TOC: Property = { prefix: null, reference: 'toc' };
const PAGE_LIST: Property = { prefix: null, reference: 'page-list' };
const LANDMARKS: Property = { prefix: null, reference: 'landmarks' };

function hasType(nav: Nav, type: Property): boolean {
    return nav.types.some(candidate => propertiesEqual(candidate, type));
}

function epubTypes(element: XmlElement): Result<Property[], XmlReadError> {
    const value = element.getAttribute('type', Namespaces.OPS);
    if (value === null) {
        return ok([]);
    }
    const parsed = parseProperties(value);
    return parsed.ok ? parsed : err({ kind: 'InvalidProperty', value, reason: parsed.error, path: element.path });
}

function readItem(element: XmlElement): Result<NavListItem, XmlReadError> {
    const anchor = element.getChild('a');
    const span = element.getChild('span');
    let content: NavContent;
    if (anchor !== null) {
        const href = anchor.getAttribute('href');
        if (href === null) {
            return err({ kind: 'MissingAttribute', name: 'href', path: anchor.path });
        }
        const types = epubTypes(anchor);
        if (!types.ok) return types;
        content = { kind: 'link', text: anchor.deepText.replace(/\s+/g, ' ').trim(), href, types: types.value };
    } else if (span !== null) {
        content = { kind: 'span', text: span.deepText.replace(/\s+/g, ' ').trim() };
    } else {
        return err({ kind: 'MissingElement', name: 'a', path: element.path });
    }
    const list = element.getChild('ol');
    const nested = list === null ? ok<NavListItem[]>([]) : readList(list);
    if (!nested.ok) return nested;
    return ok({ content, children: nested.value });
}

function readList(element: XmlElement): Result<NavListItem[], XmlReadError> {
    return collectResults(element.getChildren('li').map(readItem));
}

function readNav(element: XmlElement): Result<Nav, XmlReadError> {
    const types = epubTypes(element);
    if (!types.ok) return types;
    const headingElement = element.children.find(candidate => HEADINGS.includes(candidate.name)) ?? null;
    const list = child(element, 'ol');
    if (!list.ok) return list;
    const items = readList(list.value);
    if (!items.ok) return items;
    return ok({
        identifier: element.getAttribute('id'),
        types: types.value,
        hidden: element.hasAttribute('hidden'),
        heading: headingElement === null
            ? null
            : { level: HEADINGS.indexOf(headingElement.name) + 1, text: headingElement.deepText.replace(/\s+/g, ' ').trim() },
        items: items.value
    });
}

function findNavs(element: XmlElement): XmlElement[] {
    return element.children.flatMap(candidate =>
        candidate.name === 'nav' && candidate.namespace === Namespaces.XHTML ? [candidate] : findNavs(candidate)
    );
}

function writeItem(item: NavListItem): XmlElement {
    const li = new XmlElement('li', Namespaces.XHTML);
    if (item.content.kind === 'link') {
        const anchor = textElement('a', item.content.text, Namespaces.XHTML);
        anchor.setAttribute('href', item.content.href);
        if (item.content.types.length > 0) {
            anchor.setAttribute('type', encodeProperties(item.content.types), Namespaces.OPS);
        }
        li.addContent(anchor);
    } else {
        li.addContent(textElement('span', item.content.text, Namespaces.XHTML));
    }
    if (item.children.length > 0) {
        li.addContent(writeList(item.children));
    }
    return li;
}

function writeList(items: NavListItem[]): XmlElement {
    const list = new XmlElement('ol', Namespaces.XHTML);
    for (const item of items) {
        list.addContent(writeItem(item));
    }
    return list;
}

function writeNav(nav: Nav): XmlElement {
    const element = new XmlElement('nav', Namespaces.XHTML);
    setOptionalAttribute(element, 'id', nav.identifier);
    if (nav.types.length > 0) {
        element.setAttribute('type', encodeProperties(nav.types), Namespaces.OPS);
    }
    if (nav.hidden) {
        element.setAttribute('hidden', 'hidden');
    }
    if (nav.heading !== null) {
        element.addContent(textElement(`h${nav.heading.level}`, nav.heading.text, Namespaces.XHTML));
    }
    element.addContent(writeList(nav.items));
    return element;
}

/**
 * The EPUB 3 navigation document.
 */
export class NavigationDocument {
    constructor(
        public toc: Nav,
        public pageList: Nav | null = null,
        public landmarks: Nav | null = null,
        readonly customNavs: Nav[] = [],
        public language: string | null = null
    ) {}

    static fromXml(text: string): Result<NavigationDocument, NavDocumentError> {
        const root = parseXml(text);
        return root.ok ? NavigationDocument.fromElement(root.value) : root;
    }

    static fromElement(root: XmlElement): Result<NavigationDocument, NavDocumentError> {
        const body = child(root, 'body');
        if (!body.ok) return body;
        const navs = collectResults(findNavs(body.value).map(readNav));
        if (!navs.ok) return navs;

        const toc = navs.value.find(nav => hasType(nav, TOC));
        if (toc === undefined) {
            return err({ kind: 'MissingTocNav', path: body.value.path });
        }
        const pageList = navs.value.find(nav => hasType(nav, PAGE_LIST)) ?? null;
        const landmarks = navs.value.find(nav => hasType(nav, LANDMARKS)) ?? null;
        const customNavs = navs.value.filter(nav => nav !== toc && nav !== pageList && nav !== landmarks);
        return ok(new NavigationDocument(toc, pageList, landmarks, customNavs, root.getAttribute('lang', Namespaces.XML)));
    }

    get navs(): Nav[] {
        return [this.toc, this.pageList, this.landmarks, ...this.customNavs].filter((nav): nav is Nav => nav !== null);
    }

    toElement(): XmlElement {
        const html = new XmlElement('html', Namespaces.XHTML);
        html.addNamespaceDeclaration('', Namespaces.XHTML);
        html.addNamespaceDeclaration('epub', Namespaces.OPS);
        setOptionalAttribute(html, 'lang', this.language, Namespaces.XML);

        const head = new XmlElement('head', Namespaces.XHTML);
        head.addContent(textElement('title', NAV_DOCUMENT_TITLE, Namespaces.XHTML));
        const charset = new XmlElement('meta', Namespaces.XHTML).setAttribute('charset', 'utf-8');
        head.addContent(charset);
        html.addContent(head);

        const body = new XmlElement('body', Namespaces.XHTML);
        for (const nav of this.navs) {
            body.addContent(writeNav(nav));
        }
        html.addContent(body);
        return html;
    }

    toXml(prettyPrint: boolean = true): string {
        return serializeXml(this.toElement(), { prettyPrint, doctype: '<!DOCTYPE html>' });
    }
}
