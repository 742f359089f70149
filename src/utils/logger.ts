/**
 * ================================================================================
 * LOGGER UTILITY - Structured Logging and Monitoring
 * ================================================================================
 *
 * Console output plus JSON file logging for the inventory CLI. The Logger
 * implements DiagnosticSink, so the CLI hands it straight to the collector
 * and normalizer.
 *
 * KEY FEATURES:
 * • Multi-level Logging - info, warn, error, debug, success
 * • Execution Tracking - UUID-based execution correlation
 * • File Persistence - JSON-structured logs written to instance-inventory.log
 * • Performance Timing - Built-in timer functionality
 * • Progress Indicators - Spinner support for long operations
 * • Verbose Mode - Debug output on the console when enabled
 *
 * @version 1.0.0
 * @since 2025
 * @license BSD-3-Clause
 */

import winston from 'winston';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { randomUUID } from 'crypto';
import path from 'path';
import { DEFAULT_LOG_FILE } from '../config/defaults';
import type { DiagnosticData, DiagnosticSink } from '../types';

export interface LoggerOptions {
    // Relative paths resolve against the working directory
    logFile?: string;
    verbose?: boolean;
}

function errorData(error: Error): DiagnosticData {
    return { name: error.name, message: error.message, stack: error.stack };
}

/**
 * ================================================================================
 * LOGGER CLASS
 * ================================================================================
 *
 * //! IMPORTANT: The CLI uses the exported 'logger' singleton
 * //? Library callers can pass any DiagnosticSink instead
 */
export class Logger implements DiagnosticSink {
    private winston: winston.Logger;
    private verbose: boolean = false;
    private executionId: string = '';
    private logFilePath: string;

    constructor(options: LoggerOptions = {}) {
        this.logFilePath = path.resolve(process.cwd(), options.logFile ?? DEFAULT_LOG_FILE);
        this.winston = this.createWinston(this.logFilePath);
        if (options.verbose) {
            this.setVerbose(true);
        }
    }

    private createWinston(filename: string): winston.Logger {
        return winston.createLogger({
            level: this.verbose ? 'debug' : 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            transports: [new winston.transports.File({ filename })],
        });
    }

    /**
     * Enable or disable verbose logging mode
     *
     * Verbose mode prints debug messages and their data on the console and
     * lowers the file log level to debug.
     */
    setVerbose(verbose: boolean): void {
        this.verbose = verbose;
        this.winston.level = verbose ? 'debug' : 'info';
        this.debug('Verbose logging enabled');
    }

    /**
     * Point file logging at another file. Used when configuration is loaded
     * after the singleton was created.
     */
    setLogFile(logFile: string): void {
        const resolved = path.resolve(process.cwd(), logFile);
        if (resolved === this.logFilePath) return;
        this.winston.close();
        this.logFilePath = resolved;
        this.winston = this.createWinston(resolved);
    }

    /**
     * Start a new execution session with unique tracking ID
     *
     * @param command - Full command being executed
     * @returns Generated execution ID
     *
     * //? First 8 characters of the UUID prefix console lines
     */
    startExecution(command: string): string {
        this.executionId = randomUUID();

        console.log(chalk.cyan('🚀'), chalk.bold(`Execution ID: ${this.executionId}`));
        console.log(chalk.gray('📄'), `Log file: ${this.logFilePath}`);
        console.log('');

        this.winston.info(`Starting execution: ${command}`, {
            executionId: this.executionId,
            command,
        });
        return this.executionId;
    }

    private formatMessage(message: string): string {
        return this.executionId ? `[${this.executionId.slice(0, 8)}] ${message}` : message;
    }

    /**
     * ================================================================================
     * LOGGING METHODS - Different Log Levels
     * ================================================================================
     */

    info(message: string, data?: DiagnosticData): void {
        console.log(chalk.blue('ℹ'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data });
    }

    success(message: string, data?: DiagnosticData): void {
        console.log(chalk.green('✓'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data, outcome: 'success' });
    }

    warn(message: string, data?: DiagnosticData): void {
        console.log(chalk.yellow('⚠'), this.formatMessage(message));
        this.winston.warn(message, { executionId: this.executionId, data });
    }

    /**
     * Log error message with red X icon
     *
     * Accepts either an Error (stack is printed and stored) or structured data.
     */
    error(message: string, errorOrData?: Error | DiagnosticData, data?: DiagnosticData): void {
        console.log(chalk.red('✗'), this.formatMessage(message));

        if (errorOrData instanceof Error) {
            console.log(chalk.red(errorOrData.stack ?? errorOrData.message));
            this.winston.error(message, {
                executionId: this.executionId,
                error: errorData(errorOrData),
                data,
            });
        } else {
            this.winston.error(message, { executionId: this.executionId, data: errorOrData });
        }
    }

    /**
     * Log debug message
     *
     * //? Console output only in verbose mode; the file gets it whenever the
     * //? file level is debug
     */
    debug(message: string, data?: DiagnosticData): void {
        if (this.verbose) {
            console.log(chalk.gray('🔍'), chalk.gray(this.formatMessage(message)));
            if (data) {
                console.log(chalk.gray('   Data:'), chalk.gray(JSON.stringify(data, null, 2)));
            }
        }

        this.winston.debug(message, { executionId: this.executionId, data });
    }

    /**
     * ================================================================================
     * UTILITY METHODS - Timing and Progress
     * ================================================================================
     */

    timer(label: string): { end: () => number } {
        const startTime = Date.now();
        this.debug(`Timer started: ${label}`);

        return {
            end: () => {
                const duration = Date.now() - startTime;
                this.debug(`Timer ended: ${label} (${duration}ms)`, { duration, label });
                return duration;
            },
        };
    }

    /**
     * Create a spinner for long-running operations
     *
     * //? Remember to call .succeed(), .fail(), or .stop() when done
     */
    spinner(message: string): Ora {
        return ora(this.formatMessage(message)).start();
    }

    getExecutionId(): string {
        return this.executionId;
    }

    getLogFilePath(): string {
        return this.logFilePath;
    }

    close(): void {
        this.winston.close();
    }
}

/**
 * ================================================================================
 * SINGLETON LOGGER INSTANCE
 * ================================================================================
 */
export const logger = new Logger({ logFile: process.env.INVENTORY_LOG_FILE });
