import { afterEach, describe, it, expect, vi } from 'vitest';
import { envLogLevel } from './config';
import { createLogger, isLogLevel, setLogLevel } from './logger';

describe('createLogger', () => {
    afterEach(() => {
        setLogLevel('warn');
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
    });

    it('should prefix messages with the tag and its children', () => {
        setLogLevel('info');
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        createLogger('Generator').child('Contract').info('Laid out 2 row(s)');
        expect(log).toHaveBeenCalledWith('[Generator:Contract] Laid out 2 row(s)');
    });

    it('should drop messages below the level', () => {
        setLogLevel('error');
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const logger = createLogger('Mapping');
        logger.warn('hidden');
        logger.error('shown');
        expect(warn).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledWith('[Mapping] shown');
    });

    it('should accept only known level names', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('toString')).toBe(false);
    });

    it('should read the level from the environment', () => {
        vi.stubEnv('DOCGEN_LOG_LEVEL', ' DEBUG ');
        expect(envLogLevel()).toBe('debug');
        vi.stubEnv('DOCGEN_LOG_LEVEL', 'loud');
        expect(envLogLevel()).toBe('warn');
    });
});
