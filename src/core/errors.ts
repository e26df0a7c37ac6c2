import { MetaInfError, describeMetaInfError } from '../metainf/meta-inf-container';
import { PackageReadError, describePackageError } from '../opf/package-document';
import { NcxError, describeNcxError } from '../toc/ncx';
import { NavDocumentError, describeNavDocumentError } from '../toc/navigation-document';
import { TocError, describeTocError } from '../toc/table-of-contents';

export const EPUB_MIME_TYPE = 'application/epub+zip';

export type TableOfContentsError =
    | { kind: 'NcxError'; path: string; error: NcxError }
    | { kind: 'NavigationDocumentError'; path: string; error: NavDocumentError }
    | { kind: 'MissingTableOfContentsFile'; path: string }
    | TocError;

/**
 * Everything that can stop an EPUB from being opened.
 */
export type ReaderError =
    | { kind: 'FailedToCreateFileSystem'; cause: string }
    | { kind: 'MissingMetaInf' }
    | { kind: 'MissingMetaInfContainer' }
    | { kind: 'MissingMimeType' }
    | { kind: 'CorruptMimeType'; cause: string }
    | { kind: 'MimeTypeContentMismatch'; content: string }
    | { kind: 'MissingOebpsRootFileElement' }
    | { kind: 'MissingOpfFile'; path: string }
    | { kind: 'MetaInfError'; error: MetaInfError }
    | { kind: 'OpfError'; path: string; error: PackageReadError }
    | { kind: 'TableOfContentsError'; error: TableOfContentsError };

function describeTableOfContentsError(error: TableOfContentsError): string {
    switch (error.kind) {
        case 'NcxError':
            return `${error.path}: ${describeNcxError(error.error)}`;
        case 'NavigationDocumentError':
            return `${error.path}: ${describeNavDocumentError(error.error)}`;
        case 'MissingTableOfContentsFile':
            return `Table of contents file ${error.path} is missing from the archive`;
        case 'UnresolvedReference':
            return describeTocError(error);
    }
}

export function describeError(error: ReaderError): string {
    switch (error.kind) {
        case 'FailedToCreateFileSystem':
            return `Not a readable zip archive: ${error.cause}`;
        case 'MissingMetaInf':
            return 'The META-INF directory is missing';
        case 'MissingMetaInfContainer':
            return 'META-INF/container.xml is missing';
        case 'MissingMimeType':
            return 'The mimetype file is missing';
        case 'CorruptMimeType':
            return `The mimetype file can not be read: ${error.cause}`;
        case 'MimeTypeContentMismatch':
            return `The mimetype file contains '${error.content}' instead of '${EPUB_MIME_TYPE}'`;
        case 'MissingOebpsRootFileElement':
            return 'container.xml has no rootfile of type application/oebps-package+xml';
        case 'MissingOpfFile':
            return `The package document ${error.path} is missing`;
        case 'MetaInfError':
            return `container.xml: ${describeMetaInfError(error.error)}`;
        case 'OpfError':
            return `${error.path}: ${describePackageError(error.error)}`;
        case 'TableOfContentsError':
            return describeTableOfContentsError(error.error);
    }
}
