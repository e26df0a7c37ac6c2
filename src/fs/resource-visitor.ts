import { Result, ok, err } from '../types';
import type { FileError } from './file-error';
import type { DirectoryResource, FileResource, NilResource } from './resource';
import type { VirtualPath } from './virtual-path';

export type WalkAction = 'continue' | 'terminate' | 'skip-subtree' | 'skip-siblings';

/**
 * Callbacks for {@link walkDirectory}. Every callback is optional and defaults to `continue`. Returning an error
 * stops the walk and the error becomes the result of the walk.
 */
export interface ResourceVisitor {
    preVisitDirectory?(directory: DirectoryResource): Result<WalkAction, FileError>;
    visitFile?(file: FileResource): Result<WalkAction, FileError>;
    visitFileFailed?(path: VirtualPath, error: FileError): Result<WalkAction, FileError>;
    postVisitDirectory?(directory: DirectoryResource): Result<WalkAction, FileError>;
    /** Called for entries that were listed but no longer exist when the walk reaches them. */
    visitNil?(nil: NilResource): Result<WalkAction, FileError>;
}

const CONTINUE: Result<WalkAction, FileError> = ok<WalkAction>('continue');

function visitChild(path: VirtualPath, visitor: ResourceVisitor): Result<WalkAction, FileError> {
    const resolved = path.resource();
    if (!resolved.ok) {
        return visitor.visitFileFailed?.(path, resolved.error) ?? resolved;
    }
    const resource = resolved.value;
    switch (resource.type) {
        case 'nil':
            return visitor.visitNil?.(resource) ?? CONTINUE;
        case 'file':
            return visitor.visitFile?.(resource) ?? CONTINUE;
        case 'directory':
            return walkDirectory(resource, visitor);
    }
}

/**
 * Walks a directory tree depth first. Children are listed when their directory is entered, so entries
 * removed by an earlier callback show up as {@link ResourceVisitor.visitNil}.
 */
export function walkDirectory(directory: DirectoryResource, visitor: ResourceVisitor): Result<WalkAction, FileError> {
    const pre = visitor.preVisitDirectory?.(directory) ?? CONTINUE;
    if (!pre.ok || pre.value === 'terminate' || pre.value === 'skip-siblings') {
        return pre;
    }
    if (pre.value === 'skip-subtree') {
        return CONTINUE;
    }

    const children = directory.childPaths();
    if (!children.ok) {
        const failed = visitor.visitFileFailed?.(directory.path, children.error) ?? err(children.error);
        if (!failed.ok || failed.value === 'terminate') {
            return failed;
        }
    } else {
        for (const child of children.value) {
            const result = visitChild(child, visitor);
            if (!result.ok || result.value === 'terminate') {
                return result;
            }
            if (result.value === 'skip-siblings') {
                break;
            }
        }
    }

    const post = visitor.postVisitDirectory?.(directory) ?? CONTINUE;
    if (!post.ok || post.value === 'terminate' || post.value === 'skip-siblings') {
        return post;
    }
    return CONTINUE;
}
