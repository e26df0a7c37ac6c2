import { Result, ok, collectResults } from '../types';
import { XmlElement, Namespaces } from '../xml/xml-element';
import { XmlReadError } from '../xml/read-errors';
import { attr, children, iriAttr, setOptionalAttribute } from '../xml/model-xml-serializer';

export interface TourSite {
    href: string;
    title: string;
}

export interface Tour {
    identifier: string | null;
    title: string;
    sites: [TourSite, ...TourSite[]];
}

function readSite(element: XmlElement): Result<TourSite, XmlReadError> {
    const title = attr(element, 'title');
    if (!title.ok) return title;
    const href = iriAttr(element, 'href');
    if (!href.ok) return href;
    return ok({ title: title.value, href: href.value });
}

function readTour(element: XmlElement): Result<Tour, XmlReadError> {
    const title = attr(element, 'title');
    if (!title.ok) return title;
    const siteElements = children(element, 'site', Namespaces.OPF);
    if (!siteElements.ok) return siteElements;
    const sites = collectResults(siteElements.value.map(readSite));
    if (!sites.ok) return sites;
    const [first, ...rest] = sites.value;
    return ok<Tour>({ identifier: element.getAttribute('id'), title: title.value, sites: [first, ...rest] });
}

/**
 * EPUB 2 `tours`, deprecated. Each tour is a named path through the publication.
 */
export class PackageTours {
    constructor(readonly tours: Tour[] = []) {}

    static fromElement(element: XmlElement): Result<PackageTours, XmlReadError> {
        const tourElements = children(element, 'tour', Namespaces.OPF);
        if (!tourElements.ok) return tourElements;
        const tours = collectResults(tourElements.value.map(readTour));
        return tours.ok ? ok(new PackageTours(tours.value)) : tours;
    }

    toElement(): XmlElement {
        const element = new XmlElement('tours', Namespaces.OPF);
        for (const tour of this.tours) {
            const tourElement = new XmlElement('tour', Namespaces.OPF);
            setOptionalAttribute(tourElement, 'id', tour.identifier);
            tourElement.setAttribute('title', tour.title);
            for (const site of tour.sites) {
                const siteElement = new XmlElement('site', Namespaces.OPF);
                siteElement.setAttribute('title', site.title);
                siteElement.setAttribute('href', site.href);
                tourElement.addContent(siteElement);
            }
            element.addContent(tourElement);
        }
        return element;
    }
}
