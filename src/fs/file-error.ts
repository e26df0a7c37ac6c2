export type FileError =
    | { kind: 'NoSuchResource'; path: string }
    | { kind: 'DirectoryNotEmpty'; path: string }
    | { kind: 'ResourceAlreadyExists'; path: string }
    | { kind: 'NotFile'; path: string }
    | { kind: 'NotDirectory'; path: string }
    | { kind: 'NotModifiable'; path: string }
    | { kind: 'NotDeletable'; path: string; reason?: string }
    | { kind: 'NotUnprotected'; path: string }
    | { kind: 'InvalidGlobPattern'; pattern: string; reason: string }
    | { kind: 'InvalidName'; path: string; name: string }
    | { kind: 'PathOutsideRoot'; path: string }
    | { kind: 'FileSystemClosed' }
    | { kind: 'Unknown'; path: string; cause: string };

export function describeFileError(error: FileError): string {
    switch (error.kind) {
        case 'NoSuchResource':
            return `No file or directory exists at '${error.path}'`;
        case 'DirectoryNotEmpty':
            return `Directory '${error.path}' is not empty`;
        case 'ResourceAlreadyExists':
            return `A file or directory already exists at '${error.path}'`;
        case 'NotFile':
            return `'${error.path}' is not a file`;
        case 'NotDirectory':
            return `'${error.path}' is not a directory`;
        case 'NotModifiable':
            return `'${error.path}' is protected and can not be modified`;
        case 'NotDeletable':
            return error.reason
                ? `'${error.path}' can not be deleted: ${error.reason}`
                : `'${error.path}' is protected and can not be deleted`;
        case 'NotUnprotected':
            return `'${error.path}' does not allow raw byte access`;
        case 'InvalidGlobPattern':
            return `Invalid glob pattern '${error.pattern}': ${error.reason}`;
        case 'InvalidName':
            return `'${error.name}' is not a valid entry name in '${error.path}'`;
        case 'PathOutsideRoot':
            return `Path '${error.path}' escapes the root of the EPUB file system`;
        case 'FileSystemClosed':
            return 'The EPUB file system has been closed';
        case 'Unknown':
            return `I/O failure at '${error.path}': ${error.cause}`;
    }
}

/**
 * Thrown when a path is used with a file system it was not created by.
 */
export class ForeignPathError extends Error {
    constructor(path: string) {
        super(`Path '${path}' belongs to a different EPUB file system`);
        this.name = 'ForeignPathError';
    }
}

/**
 * Thrown when the archive contains a symbolic link. Zip containers for EPUB may not hold links, so the archive
 * is treated as corrupt.
 */
export class SymbolicLinkError extends Error {
    constructor(readonly path: string) {
        super(`Archive entry '${path}' is a symbolic link; the EPUB container is corrupt`);
        this.name = 'SymbolicLinkError';
    }
}

export class PathOutsideRootError extends Error {
    constructor(readonly path: string) {
        super(`Path '${path}' escapes the root of the EPUB file system`);
        this.name = 'PathOutsideRootError';
    }
}
