import winston from 'winston';
import * as path from 'node:path';
import * as fs from 'node:fs';
import envPaths from 'env-paths';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { ILoggingService, LogMeta } from './service-interfaces.js';
import { isTestEnvironment, type EnvSource } from './settings-env.js';
import type { LoggingSettings } from './settings-schema.js';

export const LOG_LEVELS = {
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

const isLogLevel = (level: string): level is LogLevel =>
	Object.prototype.hasOwnProperty.call(LOG_LEVELS, level);

export interface LoggingServiceConfig {
	logDir?: string;
	logLevel?: LogLevel;
	disableLogging?: boolean;
	console?: boolean;
	debugLogging?: boolean;
	// Extra transports, mainly for tests.
	transports?: winston.transport[];
}

export const defaultLogDir = (): string => path.join(envPaths('sshconf').log, 'logs');

/**
 * Logger configuration for a resolved `logging` settings section. Logging to
 * disk is always off under a test runner.
 */
export const loggingConfigFromSettings = (
	logging: LoggingSettings,
	env: EnvSource = process.env,
): LoggingServiceConfig => ({
	...logging,
	disableLogging: logging.disableLogging || isTestEnvironment(env),
});

const describe = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Winston-based logging service.
 *
 * Writes JSON lines to a daily-rotated file under the XDG log directory and,
 * when enabled, a colorized copy to stderr. Failures to set up or write a
 * transport never reach the caller; with `debugLogging` they are echoed to
 * stderr.
 */
export class LoggingService implements ILoggingService {
	private logger: winston.Logger;
	private correlationId: string | undefined;
	private debugLogging: boolean;

	constructor(config: LoggingServiceConfig = {}) {
		const {
			logDir,
			logLevel = 'info',
			disableLogging = false,
			console: enableConsole = false,
			debugLogging = false,
			transports: extraTransports = [],
		} = config;

		this.debugLogging = debugLogging;

		const finalLogDir = logDir || defaultLogDir();
		const transports: winston.transport[] = [...extraTransports];

		if (!disableLogging) {
			try {
				if (!fs.existsSync(finalLogDir)) {
					fs.mkdirSync(finalLogDir, {recursive: true});
				}

				const fileTransport = new DailyRotateFile({
					dirname: finalLogDir,
					filename: 'sshconf-%DATE%.log',
					datePattern: 'YYYY-MM-DD',
					maxSize: '10m',
					maxFiles: '14d',
					format: winston.format.json(),
					level: logLevel,
				});

				fileTransport.on('error', (error: unknown) => {
					this.reportInternal('File transport error', error);
				});

				transports.push(fileTransport);
			} catch (error) {
				this.reportInternal('Failed to configure file transport', error);
			}
		}

		if (enableConsole) {
			transports.push(
				new winston.transports.Console({
					stderrLevels: Object.keys(LOG_LEVELS),
					format: winston.format.combine(
						winston.format.colorize(),
						winston.format.simple(),
					),
					level: logLevel,
				}),
			);
		}

		this.logger = winston.createLogger({
			levels: LOG_LEVELS,
			level: logLevel,
			format: winston.format.combine(
				winston.format.timestamp({format: 'YYYY-MM-DD HH:mm:ss'}),
				winston.format.json(),
			),
			defaultMeta: {},
			transports:
				transports.length > 0
					? transports
					: [new winston.transports.Console({silent: true})],
		});
	}

	getLogLevel(): string {
		return this.logger.level;
	}

	/**
	 * Change the level of the logger and every transport. Unknown levels are
	 * ignored.
	 */
	setLogLevel(level: string): void {
		if (!isLogLevel(level)) {
			this.reportInternal('Invalid log level', level);
			return;
		}

		this.logger.level = level;
		for (const transport of this.logger.transports) {
			transport.level = level;
		}
	}

	error(message: string, meta?: LogMeta): void {
		this.log('error', message, meta);
	}

	warn(message: string, meta?: LogMeta): void {
		this.log('warn', message, meta);
	}

	info(message: string, meta?: LogMeta): void {
		this.log('info', message, meta);
	}

	debug(message: string, meta?: LogMeta): void {
		this.log('debug', message, meta);
	}

	/**
	 * Set correlation ID for tracking related operations
	 */
	setCorrelationId(id: string | undefined): void {
		this.correlationId = id;
	}

	getCorrelationId(): string | undefined {
		return this.correlationId;
	}

	clearCorrelationId(): void {
		this.correlationId = undefined;
	}

	private log(level: LogLevel, message: string, meta?: LogMeta): void {
		try {
			this.logger.log(level, message, {
				...meta,
				...(this.correlationId && {correlationId: this.correlationId}),
			});
		} catch (error) {
			this.reportInternal('Error logging message', error);
		}
	}

	private reportInternal(message: string, detail: unknown): void {
		if (this.debugLogging) {
			console.error(`[LoggingService] ${message}: ${describe(detail)}`);
		}
	}
}
