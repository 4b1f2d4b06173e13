/**
 * The package logger is built from the validated configuration, so a bad
 * `LOG_LEVEL` must not break importing the package.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

// Set before the package loads: static imports would run first.
process.env['LOG_LEVEL'] = 'verbose';
process.env['LOG_PRETTY'] = 'false';

describe('getLogger', () => {
	it('reports an invalid LOG_LEVEL as a configuration error', async () => {
		const mod = await import('../src/index.ts');
		assert.throws(
			() => mod.getLogger(),
			(err: unknown) => err instanceof mod.ConfigError && err.issues.some((issue) => issue.startsWith('LOG_LEVEL: ')),
		);
	});

	it('uses the configured level once the environment is fixed', async () => {
		const mod = await import('../src/index.ts');
		process.env['LOG_LEVEL'] = 'warn';
		assert.equal(mod.getLogger().level, 'warn');
		assert.equal(mod.createChildLogger({ component: 'test' }).level, 'warn');
	});
});

describe('createLogger', () => {
	it('takes its level from the configuration', async () => {
		const { createLogger } = await import('../src/index.ts');
		assert.equal(createLogger({ logLevel: 'debug', logPretty: false }).level, 'debug');
		assert.equal(createLogger({ logLevel: 'silent', logPretty: false }).level, 'silent');
	});
});
