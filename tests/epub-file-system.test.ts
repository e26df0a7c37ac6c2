import { describe, it, expect, beforeEach } from 'vitest';
import { Readable } from 'stream';
import JSZip from 'jszip';
import { EpubFileSystem } from '../src/fs/epub-file-system';
import { Capability } from '../src/fs/resource-classifier';
import { DirectoryResource, FileResource, Resource } from '../src/fs/resource';
import { SymbolicLinkError, describeFileError } from '../src/fs/file-error';
import { WalkAction } from '../src/fs/resource-visitor';
import { ok } from '../src/types';
import { createSilentLogger } from '../src/utils/common';

function at(fileSystem: EpubFileSystem, path: string): Resource {
    const resource = fileSystem.resource(path);
    if (!resource.ok) {
        throw new Error(describeFileError(resource.error));
    }
    return resource.value;
}

function file(resource: Resource): FileResource {
    if (resource.type !== 'file') {
        throw new Error(`${resource} is not a file`);
    }
    return resource;
}

function directory(resource: Resource): DirectoryResource {
    if (resource.type !== 'directory') {
        throw new Error(`${resource} is not a directory`);
    }
    return resource;
}

function create(fileSystem: EpubFileSystem, path: string, content: string): FileResource {
    const resource = at(fileSystem, path);
    if (resource.type !== 'nil') {
        throw new Error(`${path} exists`);
    }
    const created = resource.createFile(content);
    if (!created.ok) {
        throw new Error(`could not create ${path}`);
    }
    return created.value;
}

describe('EpubFileSystem', () => {
    let fileSystem: EpubFileSystem;

    beforeEach(() => {
        fileSystem = new EpubFileSystem(createSilentLogger());
        create(fileSystem, '/mimetype', 'application/epub+zip');
        create(fileSystem, '/META-INF/container.xml', '<container/>');
        create(fileSystem, '/OEBPS/content.opf', '<package/>');
        create(fileSystem, '/OEBPS/text/chapter1.xhtml', 'one');
        create(fileSystem, '/OEBPS/text/chapter2.xhtml', 'two!');
        create(fileSystem, '/extra/notes.txt', 'line 1\nline 2\n');
        fileSystem.setPackageDocumentPath(fileSystem.getPath('/OEBPS/content.opf'));
    });

    describe('classification', () => {
        const protectedPaths = [
            '/mimetype',
            './mimetype',
            '/MIMETYPE',
            '/META-INF/container.xml',
            './META-INF/CONTAINER.XML',
            '/META-INF/encryption.xml',
            '/META-INF/manifest.xml',
            '/META-INF/metadata.xml',
            '/META-INF/rights.xml',
            '/META-INF/Signatures.xml',
            '/OEBPS/content.opf',
            'OEBPS/Content.OPF'
        ];

        it.each(protectedPaths)('refuses to widen the capabilities of %s', path => {
            const resource = at(fileSystem, path);
            expect(resource.acquire(Capability.Read).ok).toBe(true);
            expect(resource.acquire(Capability.Modify)).toMatchObject({ ok: false, error: { kind: 'NotModifiable' } });
            expect(resource.acquire(Capability.Delete).ok).toBe(false);
            expect(resource.acquire(Capability.Unprotected).ok).toBe(false);
        });

        it('keeps protected files from being written or deleted', () => {
            const mimetype = file(at(fileSystem, '/mimetype'));
            expect(mimetype.writeText('text/plain')).toEqual({ ok: false, error: { kind: 'NotModifiable', path: '/mimetype' } });
            expect(mimetype.delete()).toEqual({ ok: false, error: { kind: 'NotDeletable', path: '/mimetype' } });
            expect(mimetype.readText()).toEqual({ ok: true, value: 'application/epub+zip' });
        });

        it('does not create files where a protected file belongs', () => {
            const upper = at(fileSystem, '/MIMETYPE');
            expect(upper.type).toBe('nil');
            if (upper.type === 'nil') {
                expect(upper.createFile('x')).toEqual({ ok: false, error: { kind: 'NotModifiable', path: '/MIMETYPE' } });
            }
        });

        it('treats other files as unprotected', () => {
            const notes = file(at(fileSystem, '/extra/notes.txt'));
            expect([...notes.capabilities].sort()).toEqual(['delete', 'modify', 'read', 'unprotected']);
        });

        it('asks the resource index about local resources', () => {
            fileSystem.attachResourceIndex({
                isRegistered: path => path === '/OEBPS/text/chapter1.xhtml',
                checkRemoval: () => null,
                onMoved: () => undefined,
                onRemoved: () => undefined
            });
            const chapter = file(at(fileSystem, '/OEBPS/text/chapter1.xhtml'));
            expect([...chapter.capabilities].sort()).toEqual(['delete', 'modify', 'read']);
            expect(chapter.openChannel()).toEqual({ ok: false, error: { kind: 'NotUnprotected', path: '/OEBPS/text/chapter1.xhtml' } });
        });

        it('protects the root, META-INF and the package directory', () => {
            expect(directory(at(fileSystem, '/')).acquire(Capability.Delete).ok).toBe(false);
            expect(directory(at(fileSystem, '/META-INF')).acquire(Capability.Modify).ok).toBe(false);
            expect(directory(at(fileSystem, '/OEBPS')).acquire(Capability.Delete).ok).toBe(false);
            expect(directory(at(fileSystem, '/OEBPS/text')).acquire(Capability.Delete).ok).toBe(true);
        });
    });

    describe('files', () => {
        it('reads lines without the trailing empty line', () => {
            expect(file(at(fileSystem, '/extra/notes.txt')).readLines()).toEqual({ ok: true, value: ['line 1', 'line 2'] });
        });

        it('moves and renames files', () => {
            const notes = file(at(fileSystem, '/extra/notes.txt'));
            const moved = notes.moveTo(at(fileSystem, '/extra/archive/notes.txt'));
            expect(moved.ok).toBe(true);
            expect(at(fileSystem, '/extra/notes.txt').type).toBe('nil');
            const renamed = file(at(fileSystem, '/extra/archive/notes.txt')).renameTo('readme.txt');
            expect(renamed.ok && renamed.value.path.toString()).toBe('/extra/archive/readme.txt');
        });

        it('only overwrites when asked to', () => {
            const one = file(at(fileSystem, '/OEBPS/text/chapter1.xhtml'));
            const target = at(fileSystem, '/OEBPS/text/chapter2.xhtml');
            expect(one.copyTo(target)).toEqual({ ok: false, error: { kind: 'ResourceAlreadyExists', path: '/OEBPS/text/chapter2.xhtml' } });
            expect(one.copyTo(target, true).ok).toBe(true);
            expect(file(at(fileSystem, '/OEBPS/text/chapter2.xhtml')).readText()).toEqual({ ok: true, value: 'one' });
        });

        it('reports a stale handle', () => {
            const notes = file(at(fileSystem, '/extra/notes.txt'));
            expect(notes.delete().ok).toBe(true);
            expect(notes.readBytes()).toEqual({ ok: false, error: { kind: 'NoSuchResource', path: '/extra/notes.txt' } });
        });

        it('gives unprotected files a seekable channel', () => {
            const notes = file(at(fileSystem, '/extra/notes.txt'));
            const channel = notes.openChannel();
            if (!channel.ok) {
                throw new Error('no channel');
            }
            channel.value.position = 5;
            expect(channel.value.write('9')).toBe(1);
            expect(channel.value.close()).toEqual({ ok: true, value: undefined });
            expect(notes.readText()).toEqual({ ok: true, value: 'line 9\nline 2\n' });
        });

        it('reports channel writes that can no longer be stored', () => {
            const notes = file(at(fileSystem, '/extra/notes.txt'));
            const channel = notes.openChannel();
            if (!channel.ok) {
                throw new Error('no channel');
            }
            const renamed = notes.renameTo('moved.txt');
            expect(renamed.ok).toBe(true);
            channel.value.write('CHANGED');
            expect(channel.value.close()).toEqual({ ok: false, error: { kind: 'NoSuchResource', path: '/extra/notes.txt' } });
            expect(file(at(fileSystem, '/extra/moved.txt')).readText()).toEqual({ ok: true, value: 'line 1\nline 2\n' });
        });

        it('only accepts single entry names', () => {
            const notes = file(at(fileSystem, '/extra/notes.txt'));
            expect(notes.renameTo('..')).toEqual({ ok: false, error: { kind: 'InvalidName', path: '/extra/notes.txt', name: '..' } });
            expect(notes.renameTo('a/b.txt')).toEqual({ ok: false, error: { kind: 'InvalidName', path: '/extra/notes.txt', name: 'a/b.txt' } });
            expect(fileSystem.importBytes('../../evil.txt', 'x', fileSystem.root)).toEqual({
                ok: false,
                error: { kind: 'InvalidName', path: '/', name: '../../evil.txt' }
            });
            expect(fileSystem.resource('/../evil.txt')).toEqual({ ok: false, error: { kind: 'PathOutsideRoot', path: '/../evil.txt' } });
        });
    });

    describe('directories', () => {
        it('sums file sizes', () => {
            const oebps = directory(at(fileSystem, '/OEBPS'));
            // '<package/>' + 'one' + 'two!'
            expect(oebps.calculateDirectorySize()).toEqual({ ok: true, value: 17 });
            expect(oebps.calculateLargeDirectorySize()).toEqual({ ok: true, value: 17n });
        });

        it('walks depth first and honours skip-subtree', () => {
            const visited: string[] = [];
            const walked = directory(at(fileSystem, '/')).walk({
                preVisitDirectory: entry => {
                    visited.push(entry.path.toString());
                    return ok<WalkAction>(entry.path.toString() === '/OEBPS/text' ? 'skip-subtree' : 'continue');
                },
                visitFile: entry => {
                    visited.push(entry.path.toString());
                    return ok<WalkAction>('continue');
                }
            });
            expect(walked.ok).toBe(true);
            expect(visited).toEqual([
                '/',
                '/META-INF',
                '/META-INF/container.xml',
                '/OEBPS',
                '/OEBPS/content.opf',
                '/OEBPS/text',
                '/extra',
                '/extra/notes.txt',
                '/mimetype'
            ]);
        });

        it('refuses to delete a non-empty directory', () => {
            expect(directory(at(fileSystem, '/extra')).delete()).toEqual({ ok: false, error: { kind: 'DirectoryNotEmpty', path: '/extra' } });
            expect(directory(at(fileSystem, '/extra')).deleteRecursively().ok).toBe(true);
            expect(at(fileSystem, '/extra').type).toBe('nil');
        });

        it('copies a tree and keeps its layout', () => {
            const copied = directory(at(fileSystem, '/OEBPS/text')).copyEntriesTo(at(fileSystem, '/backup'));
            expect(copied.ok).toBe(true);
            expect(file(at(fileSystem, '/backup/chapter2.xhtml')).readText()).toEqual({ ok: true, value: 'two!' });
        });

        it('stops a copy where a file sits in place of a directory', () => {
            create(fileSystem, '/source/nested/a.txt', 'a');
            create(fileSystem, '/target/nested', 'not a directory');
            const copied = directory(at(fileSystem, '/source')).copyEntriesTo(at(fileSystem, '/target'));
            expect(copied).toEqual({ ok: false, error: { kind: 'NotDirectory', path: '/target/nested' } });
        });

        it('moves a tree and removes the source', () => {
            const moved = directory(at(fileSystem, '/extra')).moveRecursivelyTo(at(fileSystem, '/moved'));
            expect(moved.ok).toBe(true);
            expect(at(fileSystem, '/extra').type).toBe('nil');
            expect(file(at(fileSystem, '/moved/notes.txt')).readLines()).toEqual({ ok: true, value: ['line 1', 'line 2'] });
        });

        it('refuses to copy a directory into itself', () => {
            const copied = directory(at(fileSystem, '/extra')).copyEntriesTo(at(fileSystem, '/extra/inner'));
            expect(copied).toMatchObject({ ok: false, error: { kind: 'Unknown', path: '/extra/inner' } });
        });
    });

    describe('listing and importing', () => {
        it('filters entries with a glob', () => {
            const listed = fileSystem.listEntries('OEBPS/**/*.xhtml');
            expect(listed.ok && listed.value.map(path => path.toString())).toEqual([
                '/OEBPS/text/chapter1.xhtml',
                '/OEBPS/text/chapter2.xhtml'
            ]);
        });

        it('rejects an empty glob', () => {
            expect(fileSystem.listEntries(' ')).toEqual({
                ok: false,
                error: { kind: 'InvalidGlobPattern', pattern: ' ', reason: 'pattern is empty' }
            });
        });

        it('imports bytes and streams', async () => {
            const imported = fileSystem.importBytes('style.css', 'body {}', fileSystem.getPath('/OEBPS/styles'));
            expect(imported.ok && imported.value.path.toString()).toBe('/OEBPS/styles/style.css');
            expect(fileSystem.importBytes('style.css', 'p {}', fileSystem.getPath('/OEBPS/styles'))).toEqual({
                ok: false,
                error: { kind: 'ResourceAlreadyExists', path: '/OEBPS/styles/style.css' }
            });

            const streamed = await fileSystem.importStream(Readable.from([Buffer.from('ab'), Buffer.from('c')]), 'data.bin', fileSystem.root);
            expect(streamed.ok && streamed.value.readText()).toEqual({ ok: true, value: 'abc' });
        });
    });

    describe('archives', () => {
        it('writes the mimetype first and uncompressed', async () => {
            const zipped = await fileSystem.toZip();
            if (!zipped.ok) {
                throw new Error(describeFileError(zipped.error));
            }
            const bytes = zipped.value;
            const zip = await JSZip.loadAsync(bytes);
            const names = Object.keys(zip.files);
            expect(names[0]).toBe('mimetype');
            expect(await zip.file('OEBPS/text/chapter2.xhtml')?.async('string')).toBe('two!');
            // A stored entry keeps its bytes right after the 30 byte local header and the 8 byte name.
            expect(bytes.subarray(38, 58).toString('ascii')).toBe('application/epub+zip');
        });

        it('stops at symbolic links', async () => {
            const zip = new JSZip();
            zip.file('mimetype', 'application/epub+zip');
            zip.file('link', 'target', { unixPermissions: 0o120777 });
            const loaded = await EpubFileSystem.fromZip(
                await zip.generateAsync({ type: 'nodebuffer', platform: 'UNIX' }),
                createSilentLogger()
            );
            expect(() => loaded.resource('/link')).toThrow(SymbolicLinkError);
        });

        it('stops working once closed', () => {
            const notes = file(at(fileSystem, '/extra/notes.txt'));
            fileSystem.close();
            expect(fileSystem.isClosed).toBe(true);
            expect(notes.readText()).toEqual({ ok: false, error: { kind: 'FileSystemClosed' } });
            expect(fileSystem.listEntries()).toEqual({ ok: false, error: { kind: 'FileSystemClosed' } });
        });

        it('returns a closed error from every lookup after close', async () => {
            const closed = { ok: false, error: { kind: 'FileSystemClosed' } };
            const notes = file(at(fileSystem, '/extra/notes.txt'));
            const extra = directory(at(fileSystem, '/extra'));
            const channel = notes.openChannel();
            fileSystem.close();

            expect(notes.renameTo('other.txt')).toEqual(closed);
            expect(notes.directory()).toEqual(closed);
            expect(extra.resolve('a')).toEqual(closed);
            expect(extra.renameTo('other')).toEqual(closed);
            expect(fileSystem.getPath('/extra/notes.txt').resource()).toEqual(closed);
            expect(fileSystem.resource('/extra')).toEqual(closed);
            expect(fileSystem.importBytes('new.txt', 'x', fileSystem.root)).toEqual(closed);
            expect(await fileSystem.toZip()).toEqual(closed);
            if (channel.ok) {
                channel.value.write('late');
                expect(channel.value.close()).toEqual(closed);
            }
        });
    });
});
