import pino from 'pino';
import type { Logger } from 'pino';
import { getConfig } from './config.ts';
import type { TallyConfig } from './config.ts';

export type { Logger };

/**
 * Create a package logger. Level and pretty-printing come from the
 * validated configuration (`LOG_LEVEL`, `LOG_PRETTY`).
 */
export function createLogger(config: Pick<TallyConfig, 'logLevel' | 'logPretty'>): Logger {
	return pino({
		level: config.logLevel,
		base: {
			service: 'tally-connector',
		},
		formatters: {
			level: (label) => {
				return { level: label };
			},
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		...(config.logPretty && {
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		}),
	});
}

let shared: Logger | null = null;

/**
 * Main logger instance, created on first use from the process
 * configuration.
 *
 * @throws {ConfigError} when the environment does not validate.
 */
export function getLogger(): Logger {
	shared ??= createLogger(getConfig());
	return shared;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>, parent: Logger = getLogger()): Logger {
	return parent.child(context);
}
