/**
 * tally-connector — configuration
 *
 * Read from the environment, after loading `.env` from the working
 * directory if there is one:
 *
 * | variable           | default        |                                      |
 * | ------------------ | -------------- | ------------------------------------ |
 * | `TALLY_HOST`       | `localhost`    | host running Tally's HTTP server     |
 * | `TALLY_PORT`       | `9002`         | its port                             |
 * | `TALLY_TIMEOUT_MS` | `30000`        | per-request timeout                  |
 * | `TALLY_CACHE_DIR`  | `.tally-cache` | raw response cache; `off` disables   |
 * | `LOG_LEVEL`        | `info`         | pino level                           |
 * | `LOG_PRETTY`       | `false`        | pretty-print logs with pino-pretty   |
 *
 * Empty variables count as unset.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.ts';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
	TALLY_HOST: z.string().default('localhost'),
	TALLY_PORT: z.coerce.number().int().min(1).max(65535).default(9002),
	TALLY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
	TALLY_CACHE_DIR: z.string().default('.tally-cache'),
	LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
	LOG_PRETTY: z.enum(['true', 'false']).default('false'),
});

export interface TallyConfig {
	readonly host: string;
	readonly port: number;
	readonly timeoutMs: number;
	/** `null` when caching is off. */
	readonly cacheDir: string | null;
	readonly logLevel: LogLevel;
	readonly logPretty: boolean;
}

/** Builds the configuration from `env` alone; `.env` is not consulted. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TallyConfig {
	const present: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== '') present[key] = value.trim();
	}

	const result = EnvSchema.safeParse(present);
	if (!result.success) {
		throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
	}

	const vars = result.data;
	return {
		host: vars.TALLY_HOST,
		port: vars.TALLY_PORT,
		timeoutMs: vars.TALLY_TIMEOUT_MS,
		cacheDir: vars.TALLY_CACHE_DIR.toLowerCase() === 'off' ? null : vars.TALLY_CACHE_DIR,
		logLevel: vars.LOG_LEVEL,
		logPretty: vars.LOG_PRETTY === 'true',
	};
}

let cached: TallyConfig | null = null;

/** The process configuration, read once. */
export function getConfig(): TallyConfig {
	if (cached === null) {
		dotenv.config();
		cached = loadConfig(process.env);
	}
	return cached;
}

/** `http://host:port` of the Tally server. */
export function tallyUrl(config: Pick<TallyConfig, 'host' | 'port'>): string {
	return `http://${config.host}:${config.port}`;
}
