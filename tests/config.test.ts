import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
    it('defaults to port 3000 and info logging', () => {
        expect(loadConfig({ STORE_DRIVER: 'memory' })).toEqual({
            port: 3000,
            logLevel: 'info',
            store: { driver: 'memory' }
        });
    });

    it('reads supabase credentials', () => {
        const config = loadConfig({
            PORT: '8080',
            SUPABASE_URL: 'https://example.supabase.co',
            SUPABASE_KEY: 'test-key',
            LOG_LEVEL: 'debug'
        });

        expect(config).toEqual({
            port: 8080,
            logLevel: 'debug',
            store: { driver: 'supabase', url: 'https://example.supabase.co', key: 'test-key' }
        });
    });

    it('requires credentials for the supabase store', () => {
        expect(() => loadConfig({ SUPABASE_URL: 'https://example.supabase.co', SUPABASE_KEY: '' }))
            .toThrow('Invalid configuration: SUPABASE_URL and SUPABASE_KEY are required for the supabase store');
    });

    it('lists every invalid variable', () => {
        try {
            loadConfig({ PORT: 'eighty', STORE_DRIVER: 'redis' });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigError);
            const message = err instanceof Error ? err.message : '';
            expect(message).toContain('PORT:');
            expect(message).toContain('STORE_DRIVER:');
        }
    });
});
