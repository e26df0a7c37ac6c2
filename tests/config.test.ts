import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { defaultConfig, loadConfig, mergeConfig } from '../src/core/config';
import { createSilentLogger } from '../src/utils/common';
import { warnings } from './helpers/fixtures';

describe('mergeConfig', () => {
    it('falls back to the defaults for anything missing', () => {
        expect(mergeConfig(undefined)).toEqual(defaultConfig);
        expect(mergeConfig({ reader: { strict: true } })).toEqual({ ...defaultConfig, reader: { strict: true } });
    });

    it('keeps defaults for values of the wrong type', () => {
        expect(mergeConfig({ reader: { strict: 'yes' }, writer: { prettyPrint: 0, omitLegacyFeatures: true } })).toEqual({
            reader: { strict: false },
            writer: { omitLegacyFeatures: true, prettyPrint: true, compressionLevel: 9 }
        });
    });

    it.each([
        [1, 1],
        [6, 6],
        [0, 9],
        [10, 9],
        [4.5, 9]
    ])('takes compression level %s as %s', (level, expected) => {
        expect(mergeConfig({ writer: { compressionLevel: level } }).writer.compressionLevel).toBe(expected);
    });
});

describe('loadConfig', () => {
    let directory: string | null = null;

    afterEach(async () => {
        if (directory !== null) {
            await fs.remove(directory);
            directory = null;
        }
    });

    it('uses the defaults without a path', () => {
        expect(loadConfig()).toBe(defaultConfig);
    });

    it('reads a JSON file', async () => {
        directory = await fs.mkdtemp(path.join(os.tmpdir(), 'epub-om-config-'));
        const file = path.join(directory, 'config.json');
        await fs.writeJson(file, { writer: { omitLegacyFeatures: true, compressionLevel: 3 } });
        expect(loadConfig(file).writer).toEqual({ omitLegacyFeatures: true, prettyPrint: true, compressionLevel: 3 });
    });

    it('warns and uses the defaults when the file can not be read', async () => {
        directory = await fs.mkdtemp(path.join(os.tmpdir(), 'epub-om-config-'));
        const file = path.join(directory, 'broken.json');
        await fs.writeFile(file, '{ not json');
        const logger = createSilentLogger();
        expect(loadConfig(file, logger)).toBe(defaultConfig);
        const [warning] = warnings(logger);
        expect(warning.startsWith(`Could not load config from ${file}, using defaults: `)).toBe(true);
    });
});
