import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../../src/utils/logger';

describe('createLogger', () => {
    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('prefixes lines with a timestamp, level and scope', () => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-04-01T09:00:00.000Z'));
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        createLogger('scheduler', 'info').info('36 slots filled');

        expect(log).toHaveBeenCalledWith('[2026-04-01T09:00:00.000Z] INFO scheduler: 36 slots filled');
    });

    it('drops lines below the threshold', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        const logger = createLogger('scheduler', 'warn');
        logger.info('hidden');
        logger.debug('hidden');
        logger.warn('shown');

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('appends the error message', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        createLogger('http', 'error').error('Unhandled error', new Error('boom'));

        expect(error.mock.calls[0][0]).toMatch(/ ERROR http: Unhandled error \(boom\)$/);
    });

    it('writes nothing when silent', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        createLogger('http', 'silent').error('ignored');

        expect(error).not.toHaveBeenCalled();
    });
});
