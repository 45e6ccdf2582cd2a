// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.ts';

import chalk from 'chalk';
import { describeErrorChain, toError } from '../errors/errors.ts';

const loggerMap: Record<string, Logger> = {};

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const LEVELS: Record<LogLevel, { tag: string; paint: (text: string) => string; channel: keyof ILogFacility }> = {
    info: { tag: 'INFO', paint: chalk.blue, channel: 'log' },
    success: { tag: 'SUCCESS', paint: chalk.green, channel: 'log' },
    warn: { tag: 'WARNING', paint: chalk.yellow, channel: 'warn' },
    error: { tag: 'ERROR', paint: chalk.red, channel: 'error' },
    debug: { tag: 'DEBUG', paint: chalk.magenta, channel: 'log' },
};

/**
 * Writes `[LEVEL] name :: message` lines, coloured per level, to a log facility. Debug lines
 * are dropped unless verbose.
 */
class Logger implements ILogger {
    constructor(
        readonly name: string,
        readonly logger: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.write('info', message);
    }

    success(message: string) {
        this.write('success', message);
    }

    warn(message: string) {
        this.write('warn', message);
    }

    error(message: string) {
        this.write('error', message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.write('debug', message);
        }
    }

    private write(level: LogLevel, message: string): void {
        const { tag, paint, channel } = LEVELS[level];
        this.logger[channel](paint(`[${tag}] ${this.name} :: ${message}`));
    }
}

/**
 * Retrieves logger by name. If the logger does not already exist, or exists with another
 * facility or verbosity, it creates a new one.
 *
 * @param name - The name identifier for the logger.
 * @param logFacility - The log facility where logs will be sent.
 * @param verbose - Optional flag to enable verbose logging.
 * @return The logger instance associated with the provided name.
 */
export function getLogger(
    name: string,
    logFacility: ILogFacility = console,
    verbose: boolean = false,
): ILogger {
    const existing = loggerMap[name];
    if (existing && existing.logger === logFacility && existing.verbose === verbose) {
        return existing;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap[name] = logger;
    return logger;
}

/**
 * Formats an error for a log line: the message alone, or the whole cause chain when verbose.
 */
export function formatError(error: unknown, verbose: boolean): string {
    return verbose ? describeErrorChain(error) : toError(error).message;
}
