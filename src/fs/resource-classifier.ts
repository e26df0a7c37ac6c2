export enum Capability {
    Read = 'read',
    Delete = 'delete',
    Modify = 'modify',
    Unprotected = 'unprotected'
}

export type Protection = 'protected' | 'local-resource' | 'unprotected';

export const MIMETYPE_PATH = '/mimetype';
export const META_INF_PATH = '/META-INF';

export const META_INF_CONTROL_FILES: readonly string[] = [
    'container.xml',
    'encryption.xml',
    'manifest.xml',
    'metadata.xml',
    'rights.xml',
    'signatures.xml'
];

const BASE: ReadonlySet<Capability> = new Set([Capability.Read]);
const LOCAL_RESOURCE: ReadonlySet<Capability> = new Set([Capability.Read, Capability.Modify, Capability.Delete]);
const NIL: ReadonlySet<Capability> = new Set([Capability.Read, Capability.Modify]);
const UNPROTECTED: ReadonlySet<Capability> = new Set([
    Capability.Read,
    Capability.Modify,
    Capability.Delete,
    Capability.Unprotected
]);

export interface ClassificationContext {
    /** Normalized absolute path of the package document, once it is known. */
    packageDocumentPath: string | null;
    isLocalResource(path: string): boolean;
}

function parentOf(path: string): string {
    const index = path.lastIndexOf('/');
    return index <= 0 ? '/' : path.substring(0, index);
}

function sameLocation(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
}

/**
 * Classifies a normalized absolute path. Rules are checked in order: the mimetype file, the package document,
 * the META-INF control files, manifest registered resources and finally everything else.
 */
export function classifyFile(path: string, context: ClassificationContext): Protection {
    if (sameLocation(path, MIMETYPE_PATH)) {
        return 'protected';
    }
    if (context.packageDocumentPath !== null && sameLocation(path, context.packageDocumentPath)) {
        return 'protected';
    }
    if (sameLocation(parentOf(path), META_INF_PATH)) {
        const name = path.substring(path.lastIndexOf('/') + 1).toLowerCase();
        if (META_INF_CONTROL_FILES.includes(name)) {
            return 'protected';
        }
    }
    if (context.isLocalResource(path)) {
        return 'local-resource';
    }
    return 'unprotected';
}

/**
 * The root, META-INF and the directory holding the package document can't be moved or removed.
 */
export function classifyDirectory(path: string, context: ClassificationContext): Protection {
    if (path === '/' || sameLocation(path, META_INF_PATH)) {
        return 'protected';
    }
    if (context.packageDocumentPath !== null && sameLocation(path, parentOf(context.packageDocumentPath))) {
        return 'protected';
    }
    return 'unprotected';
}

export function capabilitiesFor(protection: Protection): ReadonlySet<Capability> {
    switch (protection) {
        case 'protected':
            return BASE;
        case 'local-resource':
            return LOCAL_RESOURCE;
        case 'unprotected':
            return UNPROTECTED;
    }
}

/**
 * Nothing exists at `path` yet. A free path may be created unless a protected file belongs there.
 */
export function nilCapabilitiesFor(path: string, context: ClassificationContext): ReadonlySet<Capability> {
    return classifyFile(path, context) === 'protected' ? BASE : NIL;
}
