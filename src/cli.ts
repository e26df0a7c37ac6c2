#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import * as fs from 'fs-extra';
import chalk from 'chalk';
import ora from 'ora';
import * as dotenv from 'dotenv';

import { EpubParser } from './core/epub-parser';
import { LoadedEpub, compareMandatoryFields } from './core/loaded-epub';
import { describeError } from './core/errors';
import { loadConfig } from './core/config';
import { Logger, isValidEpubPath, formatFileSize } from './utils/common';
import { CliOptions, EpubConfig } from './types';
import { describeFileError } from './fs/file-error';

// Load environment variables from .env file
dotenv.config();

const program = new Command();

function globalOptions(): CliOptions {
    const options = program.opts<CliOptions>();
    return {
        verbose: options.verbose || ['1', 'true'].includes(process.env.EPUB_OM_VERBOSE ?? ''),
        config: options.config ?? process.env.EPUB_OM_CONFIG
    };
}

function setup(): { logger: Logger; config: EpubConfig } {
    const options = globalOptions();
    const logger = new Logger(options.verbose || false);
    return { logger, config: loadConfig(options.config, logger) };
}

function fail(message: string, logger?: Logger, error?: unknown): never {
    console.error(chalk.red('Error:'), message);
    if (logger?.isVerbose() && error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
    }
    process.exit(1);
}

async function open(input: string, logger: Logger, config: EpubConfig): Promise<LoadedEpub> {
    const inputPath = path.resolve(input);
    if (!isValidEpubPath(inputPath)) {
        fail(`Input file does not exist or is not an EPUB: ${inputPath}`, logger);
    }
    const spinner = ora(`Opening ${path.basename(inputPath)}...`).start();
    const result = await new EpubParser(logger, config).readFile(inputPath);
    if (!result.ok) {
        spinner.fail('Could not open EPUB');
        fail(describeError(result.error), logger);
    }
    spinner.succeed(`Opened ${path.basename(inputPath)}`);
    return result.value;
}

program
    .name('epub-om')
    .description('Inspect and round-trip EPUB publications through a typed object model')
    .version('0.1.0')
    .option('-v, --verbose', 'Verbose output')
    .option('-c, --config <path>', 'Path to configuration file');

program
    .command('info <epub>')
    .description('Show the package document summary')
    .action(async (input: string) => {
        const { logger, config } = setup();
        const epub = await open(input, logger, config);
        const { packageDocument: opf } = epub;

        console.log(`\n${chalk.bold('Package:')} ${epub.packageDocumentPath}`);
        console.log(`${chalk.cyan('Version:')} ${epub.version} (${epub.format})`);
        console.log(`${chalk.cyan('Identifiers:')} ${opf.metadata.identifiers.map(identifier => identifier.content).join(', ')}`);
        console.log(`${chalk.cyan('Titles:')} ${opf.metadata.titles.map(title => title.content).join(', ')}`);
        console.log(`${chalk.cyan('Languages:')} ${opf.metadata.languages.map(language => language.content).join(', ')}`);
        console.log(`${chalk.cyan('Manifest items:')} ${opf.manifest.size}`);
        console.log(`${chalk.cyan('Spine references:')} ${opf.spine.references.length}`);
        const present = (value: boolean): string => (value ? chalk.green('yes') : chalk.gray('no'));
        console.log(`${chalk.cyan('Guide:')} ${present(opf.guide !== null && !opf.guide.isEmpty)}`);
        console.log(`${chalk.cyan('NCX:')} ${present(epub.ncx !== null)}`);
        console.log(`${chalk.cyan('Navigation document:')} ${present(epub.navigationDocument !== null)}`);
        epub.close();
    });

program
    .command('ls <epub> [glob]')
    .description('List the entries of the EPUB container')
    .action(async (input: string, glob: string | undefined) => {
        const { logger, config } = setup();
        const epub = await open(input, logger, config);
        const entries = epub.fileSystem.listEntries(glob ?? '**');
        if (!entries.ok) {
            fail(describeFileError(entries.error), logger);
        }
        for (const entry of entries.value) {
            const resolved = entry.resource();
            if (!resolved.ok) {
                fail(describeFileError(resolved.error), logger);
            }
            const resource = resolved.value;
            if (resource.type === 'file') {
                const size = resource.fileSize();
                const label = size.ok ? formatFileSize(size.value) : '?';
                console.log(`${label.padStart(10)}  ${entry}`);
            } else {
                console.log(`${chalk.blue('<dir>'.padStart(10))}  ${entry}/`);
            }
        }
        console.log(chalk.gray(`\n${entries.value.length} entries`));
        epub.close();
    });

program
    .command('toc <epub>')
    .description('Print the table of contents')
    .action(async (input: string) => {
        const { logger, config } = setup();
        const epub = await open(input, logger, config);
        const { tableOfContents } = epub;
        console.log(`\n${chalk.bold('Table of Contents')} ${chalk.gray(`(${tableOfContents.source})`)}`);
        for (const [entry, depth] of tableOfContents.walk()) {
            console.log(`${'  '.repeat(depth)}${entry.title} ${chalk.gray(entry.href)}`);
        }
        epub.close();
    });

program
    .command('roundtrip <epub> <output>')
    .description('Open, save and reopen an EPUB, then compare the mandatory fields')
    .action(async (input: string, output: string) => {
        const { logger, config } = setup();
        const epub = await open(input, logger, config);
        const outputPath = path.resolve(output);
        const spinner = ora('Writing EPUB...').start();
        try {
            const saved = await epub.save(outputPath);
            if (!saved.ok) {
                spinner.fail('Could not save EPUB');
                fail(describeFileError(saved.error), logger);
            }
            spinner.succeed(`Saved ${path.basename(outputPath)} (${formatFileSize((await fs.stat(outputPath)).size)})`);
        } catch (error) {
            spinner.fail('Could not save EPUB');
            fail(error instanceof Error ? error.message : String(error), logger, error);
        }

        const reopened = await open(outputPath, logger, config);
        const differences = compareMandatoryFields(epub, reopened);
        epub.close();
        reopened.close();
        if (differences.length > 0) {
            for (const difference of differences) {
                console.log(`${chalk.red('✗')} ${difference}`);
            }
            process.exit(1);
        }
        console.log(`${chalk.green('✓')} Round trip preserved version, identifiers, titles, languages, manifest and spine`);
    });

program
    .command('config')
    .description('Print the effective configuration')
    .action(() => {
        const { config } = setup();
        console.log(JSON.stringify(config, null, 2));
    });

if (require.main === module) {
    program.parseAsync(process.argv).catch((error: unknown) => {
        fail(error instanceof Error ? error.message : String(error), undefined, error);
    });
}
