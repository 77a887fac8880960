import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv } from '../src/config';

describe('loadConfigFromEnv', () => {
	it('requires MONGODB_URI', () => {
		expect(() => loadConfigFromEnv({})).toThrow('MONGODB_URI is required');
	});

	it('applies defaults', () => {
		expect(loadConfigFromEnv({ MONGODB_URI: 'mongodb://localhost:27017' })).toEqual({
			mongoUri: 'mongodb://localhost:27017',
			port: 8000,
			host: '0.0.0.0',
		});
	});

	it('reads PORT and HOST', () => {
		const config = loadConfigFromEnv({ MONGODB_URI: 'mongodb://db', PORT: '3000', HOST: '127.0.0.1' });

		expect(config.port).toBe(3000);
		expect(config.host).toBe('127.0.0.1');
	});

	it.each(['abc', '0', '-1', '80.5'])('rejects PORT=%s', (port) => {
		expect(() => loadConfigFromEnv({ MONGODB_URI: 'mongodb://db', PORT: port })).toThrow(
			'PORT must be a positive integer when set',
		);
	});
});
