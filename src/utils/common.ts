import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';

export class Logger {
    private verbose: boolean;
    private silent: boolean;
    private logs: string[] = [];

    constructor(verbose: boolean = false, silent: boolean = false) {
        this.verbose = verbose;
        this.silent = silent;
    }

    isVerbose(): boolean {
        return this.verbose;
    }

    debug(message: string): void {
        const logMessage = `[DEBUG] ${new Date().toISOString()} - ${message}`;
        this.logs.push(logMessage);
        if (this.verbose && !this.silent) {
            console.log(chalk.gray(logMessage));
        }
    }

    info(message: string): void {
        const logMessage = `[INFO] ${new Date().toISOString()} - ${message}`;
        this.logs.push(logMessage);
        if (this.verbose && !this.silent) {
            console.log(chalk.blue(logMessage));
        }
    }

    warn(message: string): void {
        const logMessage = `[WARN] ${new Date().toISOString()} - ${message}`;
        this.logs.push(logMessage);
        if (!this.silent) {
            console.log(chalk.yellow(logMessage));
        }
    }

    error(message: string): void {
        const logMessage = `[ERROR] ${new Date().toISOString()} - ${message}`;
        this.logs.push(logMessage);
        if (!this.silent) {
            console.log(chalk.red(logMessage));
        }
    }

    success(message: string): void {
        const logMessage = `[SUCCESS] ${new Date().toISOString()} - ${message}`;
        this.logs.push(logMessage);
        if (!this.silent) {
            console.log(chalk.green(logMessage));
        }
    }

    getLogs(): string[] {
        return [...this.logs];
    }
}

/**
 * A logger that records everything and prints nothing, for library callers that don't want console output.
 */
export function createSilentLogger(): Logger {
    return new Logger(false, true);
}

export function isValidEpubPath(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === '.epub' && fs.existsSync(filePath);
}

export function formatFileSize(bytes: number): string {
    const sizes = ['Bytes', 'KB', 'MB', 'GB'];
    if (bytes === 0) return '0 Bytes';
    const i = Math.floor(Math.log(bytes) / Math.log(1024));
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}
