import * as fs from 'fs-extra';
import { EpubConfig, ReaderConfig, WriterConfig } from '../types';
import { Logger } from '../utils/common';

export const defaultConfig: EpubConfig = {
    reader: {
        strict: false
    },
    writer: {
        omitLegacyFeatures: false,
        prettyPrint: true,
        compressionLevel: 9
    }
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function booleanOr(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback;
}

function readerConfig(value: unknown): ReaderConfig {
    const section = isRecord(value) ? value : {};
    return { strict: booleanOr(section.strict, defaultConfig.reader.strict) };
}

function writerConfig(value: unknown): WriterConfig {
    const section = isRecord(value) ? value : {};
    const level = section.compressionLevel;
    return {
        omitLegacyFeatures: booleanOr(section.omitLegacyFeatures, defaultConfig.writer.omitLegacyFeatures),
        prettyPrint: booleanOr(section.prettyPrint, defaultConfig.writer.prettyPrint),
        // zlib levels
        compressionLevel: typeof level === 'number' && Number.isInteger(level) && level >= 1 && level <= 9
            ? level
            : defaultConfig.writer.compressionLevel
    };
}

/**
 * Merges a parsed JSON value over the defaults. Keys with the wrong type keep their default.
 */
export function mergeConfig(value: unknown): EpubConfig {
    const root = isRecord(value) ? value : {};
    return { reader: readerConfig(root.reader), writer: writerConfig(root.writer) };
}

export function loadConfig(configPath?: string, logger?: Logger): EpubConfig {
    if (configPath) {
        try {
            const userConfig: unknown = fs.readJsonSync(configPath);
            return mergeConfig(userConfig);
        } catch (error) {
            const message = `Could not load config from ${configPath}, using defaults`;
            if (logger) {
                logger.warn(`${message}: ${error instanceof Error ? error.message : String(error)}`);
            } else {
                console.warn(message);
            }
            return defaultConfig;
        }
    }
    return defaultConfig;
}
