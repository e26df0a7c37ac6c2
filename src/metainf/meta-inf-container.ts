import { Result, ok, err, collectResults } from '../types';
import { XmlElement, XmlParseError, Namespaces, parseXml, serializeXml } from '../xml/xml-element';
import { XmlReadError, describeXmlReadError } from '../xml/read-errors';
import {
    addChildrenWithWrapper,
    attr,
    childrenWrapper,
    iriAttr,
    optionalAttr,
    optionalChildrenWrapper,
    parseMediaType,
    setOptionalAttribute
} from '../xml/model-xml-serializer';

export const OEBPS_PACKAGE_MEDIA_TYPE = 'application/oebps-package+xml';
export const CONTAINER_FILE = 'META-INF/container.xml';

export interface RootFile {
    fullPath: string;
    mediaType: string;
}

export interface ContainerLink {
    href: string;
    relation: string | null;
    mediaType: string | null;
}

export type MetaInfError = XmlParseError | XmlReadError | { kind: 'NotContainer'; name: string; path: string };

export function describeMetaInfError(error: MetaInfError): string {
    switch (error.kind) {
        case 'MalformedXml':
            return `Malformed container.xml: ${error.reason}`;
        case 'NotContainer':
            return `Expected a 'container' element but found '${error.name}'`;
        default:
            return describeXmlReadError(error);
    }
}

function readRootFile(element: XmlElement): Result<RootFile, XmlReadError> {
    const fullPath = attr(element, 'full-path');
    if (!fullPath.ok) return fullPath;
    const rawMediaType = attr(element, 'media-type');
    if (!rawMediaType.ok) return rawMediaType;
    const mediaType = parseMediaType(element, rawMediaType.value);
    if (!mediaType.ok) return mediaType;
    return ok({ fullPath: fullPath.value, mediaType: mediaType.value });
}

function readLink(element: XmlElement): Result<ContainerLink, XmlReadError> {
    const href = iriAttr(element, 'href');
    if (!href.ok) return href;
    return ok({ href: href.value, relation: optionalAttr(element, 'rel'), mediaType: optionalAttr(element, 'media-type') });
}

/**
 * `META-INF/container.xml`, which names the package documents of the publication.
 */
export class MetaInfContainer {
    constructor(
        readonly rootFiles: [RootFile, ...RootFile[]],
        readonly links: ContainerLink[] = [],
        public version: string = '1.0'
    ) {}

    /** The first rootfile with the OEBPS package media type. */
    get packageDocument(): RootFile | null {
        return this.rootFiles.find(rootFile => rootFile.mediaType === OEBPS_PACKAGE_MEDIA_TYPE) ?? null;
    }

    static fromXml(text: string): Result<MetaInfContainer, MetaInfError> {
        const root = parseXml(text);
        return root.ok ? MetaInfContainer.fromElement(root.value) : root;
    }

    static fromElement(element: XmlElement): Result<MetaInfContainer, MetaInfError> {
        if (element.name !== 'container' || element.namespace !== Namespaces.CONTAINER) {
            return err({ kind: 'NotContainer', name: element.qualifiedName, path: element.path });
        }
        const rootFileElements = childrenWrapper(element, 'rootfiles', 'rootfile');
        if (!rootFileElements.ok) return rootFileElements;
        const rootFiles = collectResults(rootFileElements.value.map(readRootFile));
        if (!rootFiles.ok) return rootFiles;

        const linkElements = optionalChildrenWrapper(element, 'links', 'link');
        if (!linkElements.ok) return linkElements;
        const links = collectResults((linkElements.value ?? []).map(readLink));
        if (!links.ok) return links;

        const [first, ...rest] = rootFiles.value;
        return ok(new MetaInfContainer([first, ...rest], links.value, element.getAttribute('version') ?? '1.0'));
    }

    toElement(): XmlElement {
        const element = new XmlElement('container', Namespaces.CONTAINER);
        element.addNamespaceDeclaration('', Namespaces.CONTAINER);
        element.setAttribute('version', this.version);
        addChildrenWithWrapper(element, 'rootfiles', this.rootFiles.map(rootFile => {
            const rootFileElement = new XmlElement('rootfile', Namespaces.CONTAINER);
            rootFileElement.setAttribute('full-path', rootFile.fullPath);
            rootFileElement.setAttribute('media-type', rootFile.mediaType);
            return rootFileElement;
        }));
        return addChildrenWithWrapper(element, 'links', this.links.map(link => {
            const linkElement = new XmlElement('link', Namespaces.CONTAINER);
            linkElement.setAttribute('href', link.href);
            setOptionalAttribute(linkElement, 'rel', link.relation);
            setOptionalAttribute(linkElement, 'media-type', link.mediaType);
            return linkElement;
        }));
    }

    toXml(prettyPrint: boolean = true): string {
        return serializeXml(this.toElement(), { prettyPrint });
    }
}
