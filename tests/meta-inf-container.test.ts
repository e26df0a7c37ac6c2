import { describe, it, expect } from 'vitest';
import { MetaInfContainer, OEBPS_PACKAGE_MEDIA_TYPE } from '../src/metainf/meta-inf-container';
import { CONTAINER_XML } from './helpers/fixtures';

function container(body: string): string {
    return `<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">${body}</container>`;
}

describe('MetaInfContainer', () => {
    it('reads the rootfiles', () => {
        const parsed = MetaInfContainer.fromXml(CONTAINER_XML);
        expect(parsed.ok && parsed.value.rootFiles).toEqual([{ fullPath: 'OEBPS/content.opf', mediaType: OEBPS_PACKAGE_MEDIA_TYPE }]);
        expect(parsed.ok && parsed.value.links).toEqual([]);
        expect(parsed.ok && parsed.value.version).toBe('1.0');
    });

    it('picks the first OEBPS package as the package document', () => {
        const parsed = MetaInfContainer.fromXml(container(`<rootfiles>
            <rootfile full-path="book.pdf" media-type="application/pdf"/>
            <rootfile full-path="a/one.opf" media-type="application/oebps-package+xml"/>
            <rootfile full-path="b/two.opf" media-type="application/oebps-package+xml"/>
        </rootfiles>`));
        expect(parsed.ok && parsed.value.packageDocument?.fullPath).toBe('a/one.opf');
    });

    it('reads links', () => {
        const parsed = MetaInfContainer.fromXml(container(`
            <rootfiles><rootfile full-path="content.opf" media-type="application/oebps-package+xml"/></rootfiles>
            <links><link href="META-INF/record.xml" rel="record" media-type="application/xml"/><link href="other.xml"/></links>`));
        expect(parsed.ok && parsed.value.links).toEqual([
            { href: 'META-INF/record.xml', relation: 'record', mediaType: 'application/xml' },
            { href: 'other.xml', relation: null, mediaType: null }
        ]);
    });

    it('reports what is missing or malformed', () => {
        expect(MetaInfContainer.fromXml(container(''))).toEqual({
            ok: false,
            error: { kind: 'MissingElement', name: 'rootfiles', path: '/container' }
        });
        expect(MetaInfContainer.fromXml(container('<rootfiles/>'))).toEqual({
            ok: false,
            error: { kind: 'MissingElement', name: 'rootfile', path: '/container/rootfiles' }
        });
        expect(MetaInfContainer.fromXml(container('<rootfiles><rootfile media-type="application/xml"/></rootfiles>'))).toEqual({
            ok: false,
            error: { kind: 'MissingAttribute', name: 'full-path', path: '/container/rootfiles/rootfile' }
        });
        expect(MetaInfContainer.fromXml(container('<rootfiles><rootfile full-path="a.opf" media-type="opf"/></rootfiles>'))).toEqual({
            ok: false,
            error: { kind: 'InvalidMediaType', value: 'opf', path: '/container/rootfiles/rootfile' }
        });
    });

    it('refuses other root elements', () => {
        expect(MetaInfContainer.fromXml('<container/>')).toEqual({
            ok: false,
            error: { kind: 'NotContainer', name: 'container', path: '/container' }
        });
    });

    it('writes the container', () => {
        const parsed = MetaInfContainer.fromXml(CONTAINER_XML);
        expect(parsed.ok && parsed.value.toXml()).toBe(
            '<?xml version="1.0" encoding="UTF-8"?>\n' +
                '<container xmlns="urn:oasis:names:tc:opendocument:xmlns:container" version="1.0">\n' +
                '  <rootfiles>\n' +
                '    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>\n' +
                '  </rootfiles>\n' +
                '</container>\n'
        );
    });

    it('writes links in their own wrapper', () => {
        const parsed = MetaInfContainer.fromXml(container(`
            <rootfiles><rootfile full-path="content.opf" media-type="application/oebps-package+xml"/></rootfiles>
            <links><link href="META-INF/record.xml" rel="record"/></links>`));
        expect(parsed.ok && parsed.value.toXml()).toBe(
            '<?xml version="1.0" encoding="UTF-8"?>\n' +
                '<container xmlns="urn:oasis:names:tc:opendocument:xmlns:container" version="1.0">\n' +
                '  <rootfiles>\n' +
                '    <rootfile full-path="content.opf" media-type="application/oebps-package+xml"/>\n' +
                '  </rootfiles>\n' +
                '  <links>\n' +
                '    <link href="META-INF/record.xml" rel="record"/>\n' +
                '  </links>\n' +
                '</container>\n'
        );
    });
});
