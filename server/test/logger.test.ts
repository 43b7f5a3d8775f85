/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import logger, { parseLogLevel } from '../utils/logger';

afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel('info');
});

describe('parseLogLevel', () => {
    it('accepts level names case-insensitively and the warning alias', () => {
        expect(parseLogLevel('DEBUG')).toBe('debug');
        expect(parseLogLevel('warning')).toBe('warn');
    });

    it('falls back for unknown or missing values', () => {
        expect(parseLogLevel('loud')).toBe('info');
        expect(parseLogLevel(undefined, 'error')).toBe('error');
    });
});

describe('logger', () => {
    it('redacts auth headers in metadata', () => {
        const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

        logger.info('[Test] Request sent', { headers: { Authorization: 'Bearer test-secret', Accept: 'text/plain' } });

        expect(write).toHaveBeenCalledTimes(1);
        expect(String(write.mock.calls[0][0])).toMatch(
            /INFO {4}\[Test\] Request sent \{"headers":\{"Authorization":"\*\*\*","Accept":"text\/plain"\}\}\n$/
        );
    });

    it('drops messages below the configured level', () => {
        const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
        logger.setLevel('warn');

        logger.info('[Test] Hidden');
        logger.debug('[Test] Hidden');

        expect(write).not.toHaveBeenCalled();
        expect(logger.isEnabled('error')).toBe(true);
    });

    it('writes warnings to stderr', () => {
        const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

        logger.warn('[Test] Careful');

        expect(String(stderr.mock.calls[0][0])).toMatch(/WARN {4}\[Test\] Careful\n$/);
    });
});
