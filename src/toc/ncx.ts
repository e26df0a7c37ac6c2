import { Result, ok, err, collectResults, ReadingDirection } from '../types';
import { XmlElement, XmlParseError, Namespaces, parseXml, serializeXml } from '../xml/xml-element';
import { XmlReadError, describeXmlReadError } from '../xml/read-errors';
import {
    attr,
    child,
    children,
    languageOf,
    optionalChild,
    parseDirection,
    setOptionalAttribute,
    textElement
} from '../xml/model-xml-serializer';

const NCX_DOCTYPE = '<!DOCTYPE ncx PUBLIC "-//NISO//DTD ncx 2005-1//EN" "http://www.daisy.org/z3986/2005/ncx-2005-1.dtd">';

export interface NcxMeta {
    name: string;
    content: string;
    scheme: string | null;
}

export interface NcxLabel {
    text: string;
    /** `src` of the label image, if any. */
    image: string | null;
    language: string | null;
    direction: ReadingDirection | null;
}

export interface NavPoint {
    identifier: string;
    className: string | null;
    playOrder: number | null;
    labels: [NcxLabel, ...NcxLabel[]];
    source: string;
    children: NavPoint[];
}

export type PageTargetType = 'front' | 'normal' | 'special';

export interface NavTarget {
    identifier: string;
    value: string | null;
    className: string | null;
    playOrder: number | null;
    labels: [NcxLabel, ...NcxLabel[]];
    source: string;
}

export interface PageTarget extends NavTarget {
    type: PageTargetType;
}

export interface NavTargetList<T extends NavTarget> {
    identifier: string | null;
    className: string | null;
    labels: NcxLabel[];
    targets: T[];
}

export type NcxError = XmlParseError | XmlReadError;

export function describeNcxError(error: NcxError): string {
    return error.kind === 'MalformedXml' ? `Malformed NCX: ${error.reason}` : describeXmlReadError(error);
}

function readPlayOrder(element: XmlElement): Result<number | null, XmlReadError> {
    const value = element.getAttribute('playOrder');
    if (value === null) {
        return ok(null);
    }
    if (!/^\d+$/.test(value.trim())) {
        return err({ kind: 'InvalidAttributeValue', name: 'playOrder', value, reason: 'expected a number', path: element.path });
    }
    return ok(Number(value.trim()));
}

function readLabel(element: XmlElement): Result<NcxLabel, XmlReadError> {
    const direction = parseDirection(element);
    if (!direction.ok) return direction;
    const text = optionalChild(element, 'text');
    const image = optionalChild(element, 'img');
    if (text === null && image === null) {
        return err({ kind: 'MissingElement', name: 'text', path: element.path });
    }
    let source: string | null = null;
    if (image !== null) {
        const src = attr(image, 'src');
        if (!src.ok) return src;
        source = src.value;
    }
    return ok({ text: text?.textNormalized ?? '', image: source, language: languageOf(element), direction: direction.value });
}

function readLabels(element: XmlElement, name: string = 'navLabel'): Result<[NcxLabel, ...NcxLabel[]], XmlReadError> {
    const labelElements = children(element, name);
    if (!labelElements.ok) return labelElements;
    const labels = collectResults(labelElements.value.map(readLabel));
    if (!labels.ok) return labels;
    const [first, ...rest] = labels.value;
    return ok<[NcxLabel, ...NcxLabel[]]>([first, ...rest]);
}

function readSource(element: XmlElement): Result<string, XmlReadError> {
    const content = child(element, 'content');
    return content.ok ? attr(content.value, 'src') : content;
}

function readNavPoint(element: XmlElement): Result<NavPoint, XmlReadError> {
    const identifier = attr(element, 'id');
    if (!identifier.ok) return identifier;
    const playOrder = readPlayOrder(element);
    if (!playOrder.ok) return playOrder;
    const labels = readLabels(element);
    if (!labels.ok) return labels;
    const source = readSource(element);
    if (!source.ok) return source;
    const nested = collectResults(element.getChildren('navPoint').map(readNavPoint));
    if (!nested.ok) return nested;
    return ok({
        identifier: identifier.value,
        className: element.getAttribute('class'),
        playOrder: playOrder.value,
        labels: labels.value,
        source: source.value,
        children: nested.value
    });
}

function readNavTarget(element: XmlElement): Result<NavTarget, XmlReadError> {
    const identifier = attr(element, 'id');
    if (!identifier.ok) return identifier;
    const playOrder = readPlayOrder(element);
    if (!playOrder.ok) return playOrder;
    const labels = readLabels(element);
    if (!labels.ok) return labels;
    const source = readSource(element);
    if (!source.ok) return source;
    return ok({
        identifier: identifier.value,
        value: element.getAttribute('value'),
        className: element.getAttribute('class'),
        playOrder: playOrder.value,
        labels: labels.value,
        source: source.value
    });
}

function readPageTarget(element: XmlElement): Result<PageTarget, XmlReadError> {
    const type = element.getAttribute('type') ?? 'normal';
    if (type !== 'front' && type !== 'normal' && type !== 'special') {
        return err({ kind: 'InvalidAttributeValue', name: 'type', value: type, reason: "expected 'front', 'normal' or 'special'", path: element.path });
    }
    const target = readNavTarget(element);
    return target.ok ? ok({ ...target.value, type }) : target;
}

function readTargetList<T extends NavTarget>(
    element: XmlElement,
    targetName: string,
    read: (element: XmlElement) => Result<T, XmlReadError>
): Result<NavTargetList<T>, XmlReadError> {
    const labels = collectResults(element.getChildren('navLabel').map(readLabel));
    if (!labels.ok) return labels;
    const targetElements = children(element, targetName);
    if (!targetElements.ok) return targetElements;
    const targets = collectResults(targetElements.value.map(read));
    if (!targets.ok) return targets;
    return ok({
        identifier: element.getAttribute('id'),
        className: element.getAttribute('class'),
        labels: labels.value,
        targets: targets.value
    });
}

function ncxElement(name: string): XmlElement {
    return new XmlElement(name, Namespaces.NCX);
}

function writeLabel(label: NcxLabel, name: string = 'navLabel'): XmlElement {
    const labelElement = ncxElement(name);
    setOptionalAttribute(labelElement, 'lang', label.language, Namespaces.XML);
    setOptionalAttribute(labelElement, 'dir', label.direction);
    labelElement.addContent(textElement('text', label.text, Namespaces.NCX));
    if (label.image !== null) {
        labelElement.addContent(ncxElement('img').setAttribute('src', label.image));
    }
    return labelElement;
}

function writeTargetBody(target: NavTarget | NavPoint, into: XmlElement): void {
    into.setAttribute('id', target.identifier);
    setOptionalAttribute(into, 'class', target.className);
    if (target.playOrder !== null) {
        into.setAttribute('playOrder', String(target.playOrder));
    }
    for (const label of target.labels) {
        into.addContent(writeLabel(label));
    }
    into.addContent(ncxElement('content').setAttribute('src', target.source));
}

function writeNavPoint(point: NavPoint): XmlElement {
    const pointElement = ncxElement('navPoint');
    writeTargetBody(point, pointElement);
    for (const nested of point.children) {
        pointElement.addContent(writeNavPoint(nested));
    }
    return pointElement;
}

function writeTargetList<T extends NavTarget>(
    list: NavTargetList<T>,
    name: string,
    targetName: string,
    decorate: (target: T, into: XmlElement) => void
): XmlElement {
    const listElement = ncxElement(name);
    setOptionalAttribute(listElement, 'id', list.identifier);
    setOptionalAttribute(listElement, 'class', list.className);
    for (const label of list.labels) {
        listElement.addContent(writeLabel(label));
    }
    for (const target of list.targets) {
        const targetElement = ncxElement(targetName);
        writeTargetBody(target, targetElement);
        decorate(target, targetElement);
        listElement.addContent(targetElement);
    }
    return listElement;
}

/**
 * The Navigation Control file for XML, the EPUB 2 table of contents.
 */
export class NavigationControlFile {
    constructor(
        public docTitle: NcxLabel,
        readonly navMap: NavPoint[],
        readonly options: {
            version?: string;
            language?: string | null;
            direction?: ReadingDirection | null;
            head?: NcxMeta[];
            docAuthors?: NcxLabel[];
            navMapIdentifier?: string | null;
            pageList?: NavTargetList<PageTarget> | null;
            navLists?: NavTargetList<NavTarget>[];
        } = {}
    ) {}

    get version(): string {
        return this.options.version ?? '2005-1';
    }

    get head(): NcxMeta[] {
        return this.options.head ?? [];
    }

    get pageList(): NavTargetList<PageTarget> | null {
        return this.options.pageList ?? null;
    }

    get navLists(): NavTargetList<NavTarget>[] {
        return this.options.navLists ?? [];
    }

    static fromXml(text: string): Result<NavigationControlFile, NcxError> {
        const root = parseXml(text);
        return root.ok ? NavigationControlFile.fromElement(root.value) : root;
    }

    static fromElement(root: XmlElement): Result<NavigationControlFile, NcxError> {
        const direction = parseDirection(root);
        if (!direction.ok) return direction;

        const head: NcxMeta[] = [];
        const headElement = optionalChild(root, 'head');
        for (const meta of headElement?.getChildren('meta') ?? []) {
            const name = attr(meta, 'name');
            if (!name.ok) return name;
            const content = attr(meta, 'content');
            if (!content.ok) return content;
            head.push({ name: name.value, content: content.value, scheme: meta.getAttribute('scheme') });
        }

        const titleElement = child(root, 'docTitle');
        if (!titleElement.ok) return titleElement;
        const docTitle = readLabel(titleElement.value);
        if (!docTitle.ok) return docTitle;
        const docAuthors = collectResults(root.getChildren('docAuthor').map(readLabel));
        if (!docAuthors.ok) return docAuthors;

        const navMapElement = child(root, 'navMap');
        if (!navMapElement.ok) return navMapElement;
        const pointElements = children(navMapElement.value, 'navPoint');
        if (!pointElements.ok) return pointElements;
        const navMap = collectResults(pointElements.value.map(readNavPoint));
        if (!navMap.ok) return navMap;

        const pageListElement = optionalChild(root, 'pageList');
        let pageList: NavTargetList<PageTarget> | null = null;
        if (pageListElement !== null) {
            const read = readTargetList(pageListElement, 'pageTarget', readPageTarget);
            if (!read.ok) return read;
            pageList = read.value;
        }
        const navLists = collectResults(root.getChildren('navList').map(list => readTargetList(list, 'navTarget', readNavTarget)));
        if (!navLists.ok) return navLists;

        return ok(new NavigationControlFile(docTitle.value, navMap.value, {
            version: root.getAttribute('version') ?? '2005-1',
            language: languageOf(root),
            direction: direction.value,
            head,
            docAuthors: docAuthors.value,
            navMapIdentifier: navMapElement.value.getAttribute('id'),
            pageList,
            navLists: navLists.value
        }));
    }

    toElement(): XmlElement {
        const root = ncxElement('ncx');
        root.addNamespaceDeclaration('', Namespaces.NCX);
        root.setAttribute('version', this.version);
        setOptionalAttribute(root, 'lang', this.options.language, Namespaces.XML);
        setOptionalAttribute(root, 'dir', this.options.direction);

        const head = ncxElement('head');
        for (const meta of this.head) {
            const metaElement = ncxElement('meta');
            metaElement.setAttribute('name', meta.name);
            metaElement.setAttribute('content', meta.content);
            setOptionalAttribute(metaElement, 'scheme', meta.scheme);
            head.addContent(metaElement);
        }
        root.addContent(head);
        root.addContent(writeLabel(this.docTitle, 'docTitle'));
        for (const author of this.options.docAuthors ?? []) {
            root.addContent(writeLabel(author, 'docAuthor'));
        }

        const navMap = ncxElement('navMap');
        setOptionalAttribute(navMap, 'id', this.options.navMapIdentifier);
        for (const point of this.navMap) {
            navMap.addContent(writeNavPoint(point));
        }
        root.addContent(navMap);

        const pageList = this.pageList;
        if (pageList !== null) {
            root.addContent(writeTargetList(pageList, 'pageList', 'pageTarget', (target, into) => {
                setOptionalAttribute(into, 'value', target.value);
                into.setAttribute('type', target.type);
            }));
        }
        for (const list of this.navLists) {
            root.addContent(writeTargetList(list, 'navList', 'navTarget', (target, into) => {
                setOptionalAttribute(into, 'value', target.value);
            }));
        }
        return root;
    }

    toXml(prettyPrint: boolean = true): string {
        return serializeXml(this.toElement(), { prettyPrint, doctype: NCX_DOCTYPE });
    }
}
