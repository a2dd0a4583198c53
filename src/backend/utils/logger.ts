/**
 * Channel Logger
 *
 * The relay logs through five pino loggers ("channels") so that busy traffic
 * does not drown out lifecycle messages:
 * - main: startup, shutdown, config
 * - ws: WebSocket listeners, sessions, targets
 * - message: flat RECV/SEND traffic lines
 * - command: auth command and auth manager
 * - web: HTTP API
 *
 * Every channel writes to stdout and, when file output is enabled, to its own
 * file: `logs/app.log` for main, `logs/<channel>/<channel>.log` otherwise.
 */

import path from 'path';
import pino, { type DestinationStream, type Level, type Logger } from 'pino';
import type { LoggingConfig, MessageDirection } from '../../shared/types';

export type LogChannel = 'main' | 'ws' | 'message' | 'command' | 'web';

export const LOG_CHANNELS: readonly LogChannel[] = ['main', 'ws', 'message', 'command', 'web'];

export interface AppLogger {
    main: Logger;
    ws: Logger;
    message: Logger;
    command: Logger;
    web: Logger;
    /**
     * Writes one flat traffic line to the message channel:
     * `<direction> <type> <summary> | <extra>`.
     */
    logMessage(
        direction: MessageDirection,
        messageType: string,
        summary: string,
        extra?: string,
        level?: 'debug' | 'info' | 'warn' | 'error'
    ): void;
}

export interface CreateLoggerOptions extends Partial<LoggingConfig> {
    /** Directory for log files */
    logDir?: string;
    /** Extra destination, used by tests to capture output */
    destination?: DestinationStream;
}

const DEFAULT_LOG_DIR = path.join(process.cwd(), 'logs');

function channelFile(logDir: string, channel: LogChannel): string {
    if (channel === 'main') {
        return path.join(logDir, 'app.log');
    }
    return path.join(logDir, channel, `${channel}.log`);
}

function createChannel(channel: LogChannel, options: CreateLoggerOptions): Logger {
    const level = options.level ?? 'info';

    if (level === 'silent') {
        return pino({ level: 'silent' });
    }

    const streamLevel: Level = level;
    const streams: Array<{ level: Level; stream: DestinationStream }> = [];

    if (options.destination) {
        streams.push({ level: streamLevel, stream: options.destination });
    } else {
        streams.push({ level: streamLevel, stream: pino.destination(1) });
    }

    if (options.toFiles ?? true) {
        const dest = channelFile(options.logDir ?? DEFAULT_LOG_DIR, channel);
        streams.push({ level: streamLevel, stream: pino.destination({ dest, mkdir: true }) });
    }

    return pino(
        {
            level,
            base: { channel },
            timestamp: pino.stdTimeFunctions.isoTime,
            redact: {
                paths: ['headers.authorization', 'apiKey'],
                censor: '[redacted]',
            },
        },
        pino.multistream(streams)
    );
}

/**
 * Creates the channel loggers for the process.
 */
export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
    const main = createChannel('main', options);
    const ws = createChannel('ws', options);
    const message = createChannel('message', options);
    const command = createChannel('command', options);
    const web = createChannel('web', options);

    return {
        main,
        ws,
        message,
        command,
        web,
        logMessage(direction, messageType, summary, extra, level = 'info') {
            let line = `${direction} ${messageType} ${summary}`;
            if (extra) {
                line += ` | ${extra}`;
            }
            message[level](line);
        },
    };
}

/**
 * A logger that discards everything. Handy for tests and one-shot CLI commands.
 */
export function createSilentLogger(): AppLogger {
    return createLogger({ level: 'silent', toFiles: false });
}

/**
 * Shortens long payloads (base64 images, forwarded messages) for log lines.
 */
export function truncateForLog(text: string, maxLength: number = 200): string {
    if (text.length <= maxLength) {
        return text;
    }
    return `${text.slice(0, maxLength)}...[total length: ${text.length}]`;
}
