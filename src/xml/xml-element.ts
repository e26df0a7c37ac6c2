import * as cheerio from 'cheerio';
import { Comment, Document, Element, Text, isCDATA, isComment, isTag, isText } from 'domhandler';
import type { AnyNode, ChildNode } from 'domhandler';
import { Result, ok, err } from '../types';

export const Namespaces = {
    OPF: 'http://www.idpf.org/2007/opf',
    DUBLIN_CORE: 'http://purl.org/dc/elements/1.1/',
    XML: 'http://www.w3.org/XML/1998/namespace',
    CONTAINER: 'urn:oasis:names:tc:opendocument:xmlns:container',
    NCX: 'http://www.daisy.org/z3986/2005/ncx/',
    XHTML: 'http://www.w3.org/1999/xhtml',
    OPS: 'http://www.idpf.org/2007/ops'
} as const;

export interface XmlAttribute {
    name: string;
    namespace: string | null;
    prefix: string | null;
    value: string;
}

export interface XmlText {
    type: 'text';
    text: string;
}

export interface XmlComment {
    type: 'comment';
    text: string;
}

export type XmlNode = XmlElement | XmlText | XmlComment;

export type XmlParseError = { kind: 'MalformedXml'; reason: string };

/**
 * A namespace aware XML element. Names are local names; prefixes are kept so that documents can be
 * written back with the prefixes they were read with.
 */
export class XmlElement {
    readonly type = 'element';
    readonly attributes: XmlAttribute[] = [];
    readonly content: XmlNode[] = [];
    /** Namespace declarations made on this element, keyed by prefix. The default namespace uses `''`. */
    readonly namespaceDeclarations = new Map<string, string>();
    parent: XmlElement | null = null;

    constructor(
        readonly name: string,
        readonly namespace: string | null = null,
        readonly prefix: string | null = null
    ) {}

    get qualifiedName(): string {
        return this.prefix ? `${this.prefix}:${this.name}` : this.name;
    }

    /**
     * Absolute location of this element made of local names, like `/package/manifest`.
     */
    get path(): string {
        const names: string[] = [];
        let current: XmlElement | null = this;
        while (current !== null) {
            names.push(current.name);
            current = current.parent;
        }
        return `/${names.reverse().join('/')}`;
    }

    get children(): XmlElement[] {
        return this.content.filter((node): node is XmlElement => node instanceof XmlElement);
    }

    getChild(name: string, namespace: string | null = this.namespace): XmlElement | null {
        return this.children.find(child => child.name === name && child.namespace === namespace) ?? null;
    }

    getChildren(name: string, namespace: string | null = this.namespace): XmlElement[] {
        return this.children.filter(child => child.name === name && child.namespace === namespace);
    }

    getAttribute(name: string, namespace: string | null = null): string | null {
        const attribute = this.attributes.find(candidate => candidate.name === name && candidate.namespace === namespace);
        return attribute ? attribute.value : null;
    }

    hasAttribute(name: string, namespace: string | null = null): boolean {
        return this.getAttribute(name, namespace) !== null;
    }

    setAttribute(name: string, value: string, namespace: string | null = null, prefix: string | null = null): this {
        const existing = this.attributes.find(candidate => candidate.name === name && candidate.namespace === namespace);
        if (existing) {
            existing.value = value;
        } else {
            this.attributes.push({ name, namespace, prefix: prefix ?? defaultPrefixFor(namespace), value });
        }
        return this;
    }

    removeAttribute(name: string, namespace: string | null = null): void {
        const index = this.attributes.findIndex(candidate => candidate.name === name && candidate.namespace === namespace);
        if (index >= 0) {
            this.attributes.splice(index, 1);
        }
    }

    addNamespaceDeclaration(prefix: string, uri: string): this {
        this.namespaceDeclarations.set(prefix, uri);
        return this;
    }

    lookupNamespace(prefix: string): string | null {
        if (prefix === 'xml') {
            return Namespaces.XML;
        }
        let current: XmlElement | null = this;
        while (current !== null) {
            const uri = current.namespaceDeclarations.get(prefix);
            if (uri !== undefined) {
                return uri;
            }
            current = current.parent;
        }
        return null;
    }

    addContent(node: XmlNode): this {
        if (node instanceof XmlElement) {
            node.parent = this;
        }
        this.content.push(node);
        return this;
    }

    /** Text of the direct text children, without descending into child elements. */
    get text(): string {
        return this.content
            .filter((node): node is XmlText => node.type === 'text')
            .map(node => node.text)
            .join('');
    }

    set text(value: string) {
        for (const node of this.content) {
            if (node instanceof XmlElement) {
                node.parent = null;
            }
        }
        this.content.length = 0;
        this.content.push({ type: 'text', text: value });
    }

    /** Own text with runs of whitespace collapsed and the ends trimmed. */
    get textNormalized(): string {
        return this.text.replace(/\s+/g, ' ').trim();
    }

    /** Text of every descendant text node, in document order. */
    get deepText(): string {
        return this.content
            .map(node => {
                if (node instanceof XmlElement) return node.deepText;
                return node.type === 'text' ? node.text : '';
            })
            .join('');
    }

    /**
     * Deep copy, detached from any parent.
     */
    clone(): XmlElement {
        const copy = new XmlElement(this.name, this.namespace, this.prefix);
        for (const attribute of this.attributes) {
            copy.attributes.push({ ...attribute });
        }
        this.namespaceDeclarations.forEach((uri, prefix) => copy.namespaceDeclarations.set(prefix, uri));
        for (const node of this.content) {
            copy.addContent(node instanceof XmlElement ? node.clone() : { ...node });
        }
        return copy;
    }
}

export function elementOf(
    name: string,
    namespace: string | null = null,
    prefix: string | null = null,
    build?: (element: XmlElement) => void
): XmlElement {
    const element = new XmlElement(name, namespace, prefix);
    build?.(element);
    return element;
}

export function textOf(text: string): XmlText {
    return { type: 'text', text };
}

function defaultPrefixFor(namespace: string | null): string | null {
    switch (namespace) {
        case null:
            return null;
        case Namespaces.XML:
            return 'xml';
        case Namespaces.OPF:
            return 'opf';
        case Namespaces.OPS:
            return 'epub';
        case Namespaces.DUBLIN_CORE:
            return 'dc';
        default:
            return null;
    }
}

function splitName(qualified: string): [string | null, string] {
    const index = qualified.indexOf(':');
    return index < 0 ? [null, qualified] : [qualified.substring(0, index), qualified.substring(index + 1)];
}

function liftElement(node: Element, parent: XmlElement | null): XmlElement {
    const declarations = new Map<string, string>();
    const plainAttributes: [string, string][] = [];
    for (const [name, value] of Object.entries(node.attribs)) {
        if (name === 'xmlns') {
            declarations.set('', value);
        } else if (name.startsWith('xmlns:')) {
            declarations.set(name.substring(6), value);
        } else {
            plainAttributes.push([name, value]);
        }
    }

    const [prefix, localName] = splitName(node.name);
    // Resolve against this element's own declarations first, then the ancestors.
    const scope = new XmlElement(localName);
    declarations.forEach((uri, key) => scope.namespaceDeclarations.set(key, uri));
    scope.parent = parent;
    const namespace = scope.lookupNamespace(prefix ?? '');

    const element = new XmlElement(localName, namespace, prefix);
    declarations.forEach((uri, key) => element.namespaceDeclarations.set(key, uri));
    element.parent = parent;

    for (const [name, value] of plainAttributes) {
        const [attributePrefix, attributeName] = splitName(name);
        const attributeNamespace = attributePrefix === null ? null : scope.lookupNamespace(attributePrefix);
        element.attributes.push({ name: attributeName, namespace: attributeNamespace, prefix: attributePrefix, value });
    }

    for (const child of node.children) {
        const lifted = liftNode(child, element);
        if (lifted !== null) {
            element.addContent(lifted);
        }
    }
    return element;
}

function liftNode(node: ChildNode, parent: XmlElement): XmlNode | null {
    if (isTag(node)) {
        return liftElement(node, parent);
    }
    if (isText(node)) {
        return { type: 'text', text: node.data };
    }
    if (isCDATA(node)) {
        return {
            type: 'text',
            text: node.children.map(child => (isText(child) ? child.data : '')).join('')
        };
    }
    if (isComment(node)) {
        return { type: 'comment', text: node.data };
    }
    return null;
}

/**
 * Parses an XML document into its root element.
 */
export function parseXml(source: string): Result<XmlElement, XmlParseError> {
    let document: Document;
    try {
        document = cheerio.load(source, { xmlMode: true }).root()[0];
    } catch (error) {
        return err({ kind: 'MalformedXml', reason: error instanceof Error ? error.message : String(error) });
    }
    const root = document.children.find(isTag);
    if (root === undefined) {
        return err({ kind: 'MalformedXml', reason: 'document has no root element' });
    }
    return ok(liftElement(root, null));
}

export interface SerializeOptions {
    prettyPrint?: boolean;
    indent?: string;
    /** Written between the XML declaration and the root element, for example `<!DOCTYPE html>`. */
    doctype?: string;
    declaration?: boolean;
}

function isElementOnly(element: XmlElement): boolean {
    return element.children.length > 0 && element.content.every(node =>
        node instanceof XmlElement || node.type === 'comment' || node.text.trim().length === 0
    );
}

function lowerElement(element: XmlElement, pretty: boolean, indent: string, depth: number): Element {
    const attribs: Record<string, string> = {};
    element.namespaceDeclarations.forEach((uri, prefix) => {
        attribs[prefix === '' ? 'xmlns' : `xmlns:${prefix}`] = uri;
    });
    for (const attribute of element.attributes) {
        const name = attribute.prefix ? `${attribute.prefix}:${attribute.name}` : attribute.name;
        attribs[name] = attribute.value;
    }

    const children: ChildNode[] = [];
    const reindent = pretty && isElementOnly(element);
    for (const node of element.content) {
        if (reindent && !(node instanceof XmlElement) && node.type === 'text') {
            continue;
        }
        if (reindent) {
            children.push(new Text(`\n${indent.repeat(depth + 1)}`));
        }
        if (node instanceof XmlElement) {
            children.push(lowerElement(node, pretty, indent, depth + 1));
        } else if (node.type === 'text') {
            children.push(new Text(node.text));
        } else {
            children.push(new Comment(node.text));
        }
    }
    if (reindent) {
        children.push(new Text(`\n${indent.repeat(depth)}`));
    }
    return new Element(element.qualifiedName, attribs, children);
}

/**
 * Renders an element tree as an XML document. With `prettyPrint`, whitespace is only touched inside
 * elements that hold nothing but other elements, so mixed content keeps its exact text.
 */
export function serializeXml(root: XmlElement, options: SerializeOptions = {}): string {
    const pretty = options.prettyPrint ?? true;
    const indent = options.indent ?? '  ';
    const nodes: AnyNode[] = [lowerElement(root, pretty, indent, 0)];
    const body = cheerio.load(nodes, { xmlMode: true }).xml();
    const parts: string[] = [];
    if (options.declaration ?? true) {
        parts.push('<?xml version="1.0" encoding="UTF-8"?>');
    }
    if (options.doctype) {
        parts.push(options.doctype);
    }
    parts.push(body);
    return `${parts.join('\n')}\n`;
}
