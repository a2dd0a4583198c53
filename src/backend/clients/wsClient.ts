/**
 * WebSocket Client
 *
 * Adapter around the `ws` library. The relay never touches `ws` directly
 * outside this module: client sockets accepted by the server and target
 * sockets opened by a proxy connection are both exposed as a ProxySocket.
 *
 * - ProxySocket is the only contract the relay logic depends on, so tests can
 *   drive a proxy connection with in-memory sockets
 * - Keepalive pings run every 5 minutes; a peer that misses a pong for a
 *   minute is terminated
 */

import WebSocket, { type RawData } from 'ws';
import type { Logger } from 'pino';

/**
 * The socket contract used by the relay.
 */
export interface ProxySocket {
    readonly isOpen: boolean;
    readonly remoteAddress?: string;
    send(data: string | Buffer): Promise<void>;
    close(code?: number, reason?: string): Promise<void>;
    onMessage(listener: (text: string) => void): void;
    onClose(listener: (code: number, reason: string) => void): void;
}

/**
 * Opens a socket to a target. Connection and handshake failures reject.
 */
export type TargetConnector = (url: string, headers: Record<string, string>) => Promise<ProxySocket>;

export interface WsClientConfig {
    /** Handshake timeout in milliseconds */
    handshakeTimeoutMs: number;
    pingIntervalMs: number;
    pongTimeoutMs: number;
    closeTimeoutMs: number;
    maxPayloadBytes: number;
}

export const DEFAULT_WS_CLIENT_CONFIG: WsClientConfig = {
    handshakeTimeoutMs: 10_000,
    pingIntervalMs: 300_000,
    pongTimeoutMs: 60_000,
    closeTimeoutMs: 3_000,
    maxPayloadBytes: 256 * 1024 * 1024,
};

/**
 * Raised when sending on a socket that is no longer open.
 */
export class SocketClosedError extends Error {
    constructor(message: string = 'Socket is closed') {
        super(message);
        this.name = 'SocketClosedError';
    }
}

export enum TargetConnectionErrorCode {
    /** Nothing is listening, or the host is unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** The server answered the upgrade with a non-101 status */
    HANDSHAKE_REJECTED = 'HANDSHAKE_REJECTED',
    TIMEOUT = 'TIMEOUT',
    INVALID_URL = 'INVALID_URL',
    UNKNOWN = 'UNKNOWN',
}

export class TargetConnectionError extends Error {
    constructor(
        message: string,
        public readonly code: TargetConnectionErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'TargetConnectionError';
    }
}

export function rawDataToString(data: RawData): string {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf-8');
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(data).toString('utf-8');
    }
    return data.toString('utf-8');
}

/**
 * ProxySocket over a `ws` WebSocket, for either side of the relay.
 */
export class WsProxySocket implements ProxySocket {
    readonly remoteAddress?: string;
    private readonly config: WsClientConfig;
    private pingTimer: NodeJS.Timeout | null = null;
    private awaitingPong = false;
    private lastPingAt = 0;
    private readonly messageListeners: Array<(text: string) => void> = [];
    /** Frames that arrived before anyone listened */
    private pending: string[] = [];

    constructor(
        private readonly ws: WebSocket,
        private readonly logger: Logger,
        options: { remoteAddress?: string; config?: Partial<WsClientConfig> } = {}
    ) {
        this.remoteAddress = options.remoteAddress;
        this.config = { ...DEFAULT_WS_CLIENT_CONFIG, ...options.config };

        ws.on('error', (error) => {
            this.logger.warn({ err: error, remoteAddress: this.remoteAddress }, 'WebSocket error');
        });
        ws.on('pong', () => {
            this.awaitingPong = false;
        });
        ws.on('close', () => this.stopKeepalive());
        ws.on('message', (data) => {
            const text = rawDataToString(data);
            if (this.messageListeners.length === 0) {
                this.pending.push(text);
                return;
            }
            for (const listener of this.messageListeners) {
                listener(text);
            }
        });

        this.startKeepalive();
    }

    get isOpen(): boolean {
        return this.ws.readyState === WebSocket.OPEN;
    }

    send(data: string | Buffer): Promise<void> {
        if (!this.isOpen) {
            return Promise.reject(new SocketClosedError());
        }
        return new Promise((resolve, reject) => {
            this.ws.send(data, (error) => {
                if (error) {
                    reject(this.isOpen ? error : new SocketClosedError(error.message));
                } else {
                    resolve();
                }
            });
        });
    }

    /**
     * Closes gracefully, terminating the socket if the peer doesn't
     * complete the closing handshake in time.
     */
    close(code: number = 1000, reason: string = ''): Promise<void> {
        if (this.ws.readyState === WebSocket.CLOSED) {
            return Promise.resolve();
        }

        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                this.ws.terminate();
                resolve();
            }, this.config.closeTimeoutMs);

            this.ws.once('close', () => {
                clearTimeout(timer);
                resolve();
            });

            if (this.ws.readyState !== WebSocket.CLOSING) {
                this.ws.close(code, reason);
            }
        });
    }

    /**
     * The first listener also receives the frames buffered so far.
     */
    onMessage(listener: (text: string) => void): void {
        this.messageListeners.push(listener);
        const pending = this.pending;
        this.pending = [];
        for (const text of pending) {
            listener(text);
        }
    }

    onClose(listener: (code: number, reason: string) => void): void {
        this.ws.on('close', (code, reason) => listener(code, reason.toString('utf-8')));
    }

    private startKeepalive(): void {
        this.pingTimer = setInterval(() => {
            if (!this.isOpen) {
                return;
            }
            if (this.awaitingPong && Date.now() - this.lastPingAt >= this.config.pongTimeoutMs) {
                this.logger.warn({ remoteAddress: this.remoteAddress }, 'Peer missed keepalive pong, terminating');
                this.ws.terminate();
                return;
            }
            if (!this.awaitingPong) {
                this.awaitingPong = true;
                this.lastPingAt = Date.now();
                this.ws.ping();
            }
        }, Math.min(this.config.pingIntervalMs, this.config.pongTimeoutMs));
        this.pingTimer.unref();
    }

    private stopKeepalive(): void {
        if (this.pingTimer) {
            clearInterval(this.pingTimer);
            this.pingTimer = null;
        }
    }
}

/**
 * Creates a TargetConnector that opens real WebSocket connections.
 */
export function createWsConnector(logger: Logger, config: Partial<WsClientConfig> = {}): TargetConnector {
    const merged = { ...DEFAULT_WS_CLIENT_CONFIG, ...config };

    return (url, headers) =>
        new Promise<ProxySocket>((resolve, reject) => {
            let ws: WebSocket;
            try {
                ws = new WebSocket(url, {
                    headers,
                    handshakeTimeout: merged.handshakeTimeoutMs,
                    maxPayload: merged.maxPayloadBytes,
                    perMessageDeflate: true,
                });
            } catch (error) {
                reject(
                    new TargetConnectionError(
                        `Invalid target URL ${url}`,
                        TargetConnectionErrorCode.INVALID_URL,
                        error instanceof Error ? error : undefined
                    )
                );
                return;
            }

            const cleanup = (): void => {
                ws.removeListener('open', onOpen);
                ws.removeListener('error', onError);
                ws.removeListener('unexpected-response', onUnexpectedResponse);
            };

            const onOpen = (): void => {
                cleanup();
                resolve(new WsProxySocket(ws, logger, { remoteAddress: url, config: merged }));
            };

            const onError = (error: Error & { code?: string }): void => {
                cleanup();
                ws.terminate();
                reject(wrapConnectError(url, error));
            };

            const onUnexpectedResponse = (_request: unknown, response: { statusCode?: number }): void => {
                cleanup();
                ws.terminate();
                reject(
                    new TargetConnectionError(
                        `Target ${url} rejected the upgrade with HTTP ${response.statusCode ?? 'unknown'}`,
                        TargetConnectionErrorCode.HANDSHAKE_REJECTED
                    )
                );
            };

            ws.on('open', onOpen);
            ws.on('error', onError);
            ws.on('unexpected-response', onUnexpectedResponse);
        });
}

function wrapConnectError(url: string, error: Error & { code?: string }): TargetConnectionError {
    if (error.code === 'ECONNREFUSED' || error.code === 'EHOSTUNREACH' || error.code === 'ENOTFOUND') {
        return new TargetConnectionError(
            `Cannot connect to ${url}: ${error.code}`,
            TargetConnectionErrorCode.CONNECTION_REFUSED,
            error
        );
    }
    if (error.message.includes('timed out')) {
        return new TargetConnectionError(
            `Handshake with ${url} timed out`,
            TargetConnectionErrorCode.TIMEOUT,
            error
        );
    }
    return new TargetConnectionError(`Failed to connect to ${url}: ${error.message}`, TargetConnectionErrorCode.UNKNOWN, error);
}
