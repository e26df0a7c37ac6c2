import { Result, ok, err } from '../types';
import { XmlElement, Namespaces } from '../xml/xml-element';
import { XmlReadError } from '../xml/read-errors';
import { attr, children, parseMediaType } from '../xml/model-xml-serializer';
import type { PackageManifest } from './manifest';

export interface MediaTypeBinding {
    mediaType: string;
    /** Id of the manifest item that handles the media type. */
    handler: string;
}

export type BindingsReadError = XmlReadError | { kind: 'UnknownHandler'; handler: string; path: string };

/**
 * EPUB 3.0 `bindings`, deprecated since 3.1. Maps foreign media types to scripted handlers.
 */
export class PackageBindings {
    constructor(readonly bindings: MediaTypeBinding[] = []) {}

    handlerFor(mediaType: string): string | null {
        return this.bindings.find(binding => binding.mediaType === mediaType)?.handler ?? null;
    }

    static fromElement(element: XmlElement, manifest: PackageManifest): Result<PackageBindings, BindingsReadError> {
        const entries = children(element, 'mediaType', Namespaces.OPF);
        if (!entries.ok) {
            return entries;
        }
        const bindings: MediaTypeBinding[] = [];
        for (const entry of entries.value) {
            const rawMediaType = attr(entry, 'media-type');
            if (!rawMediaType.ok) return rawMediaType;
            const mediaType = parseMediaType(entry, rawMediaType.value);
            if (!mediaType.ok) return mediaType;
            const handler = attr(entry, 'handler');
            if (!handler.ok) return handler;
            if (!manifest.hasItem(handler.value)) {
                return err({ kind: 'UnknownHandler', handler: handler.value, path: entry.path });
            }
            bindings.push({ mediaType: mediaType.value, handler: handler.value });
        }
        return ok(new PackageBindings(bindings));
    }

    toElement(): XmlElement {
        const element = new XmlElement('bindings', Namespaces.OPF);
        for (const binding of this.bindings) {
            const entry = new XmlElement('mediaType', Namespaces.OPF);
            entry.setAttribute('media-type', binding.mediaType);
            entry.setAttribute('handler', binding.handler);
            element.addContent(entry);
        }
        return element;
    }
}
