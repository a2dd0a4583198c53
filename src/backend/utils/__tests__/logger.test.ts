/**
 * Channel logger tests
 */

import { createLogger, truncateForLog } from '../logger';

function capture(level: 'info' | 'debug' = 'info') {
    const lines: Array<Record<string, unknown>> = [];
    const logger = createLogger({
        level,
        toFiles: false,
        destination: {
            write(line: string) {
                lines.push(JSON.parse(line));
            },
        },
    });
    return { logger, lines };
}

describe('createLogger', () => {
    it('should tag every line with its channel', () => {
        const { logger, lines } = capture();
        logger.main.info('starting');
        logger.web.warn('slow');

        expect(lines.map((line) => [line.channel, line.msg])).toEqual([
            ['main', 'starting'],
            ['web', 'slow'],
        ]);
    });

    it('should write flat traffic lines to the message channel', () => {
        const { logger, lines } = capture();
        logger.logMessage('RECV', 'group', 'hello', 'conn=a user=1');
        logger.logMessage('SEND', 'private', 'hi');

        expect(lines.map((line) => line.msg)).toEqual(['RECV group hello | conn=a user=1', 'SEND private hi']);
        expect(lines[0]?.channel).toBe('message');
    });

    it('should respect the level', () => {
        const { logger, lines } = capture('info');
        logger.logMessage('RECV', 'meta.heartbeat', '', undefined, 'debug');
        expect(lines).toHaveLength(0);
    });

    it('should redact API keys', () => {
        const { logger, lines } = capture();
        logger.web.info({ apiKey: 'test-secret' }, 'config');
        expect(lines[0]?.apiKey).toBe('[redacted]');
    });
});

describe('truncateForLog', () => {
    it('should keep short text', () => {
        expect(truncateForLog('short')).toBe('short');
    });

    it('should cut long text and note the length', () => {
        expect(truncateForLog('x'.repeat(12), 5)).toBe('xxxxx...[total length: 12]');
    });
});
