/**
 * Proxy Connection
 *
 * One session of a bot client on a routed path. The client's traffic is fanned
 * out to the connection's targets; API calls from the targets go back to the
 * client, and the client's responses are routed to the target that asked.
 *
 * Target indexes start at 1 in configuration order; index 0 is the relay
 * itself (replies of the built-in commands).
 *
 * Lifecycle:
 * 1. nothing happens until the client's first message
 * 2. the first message connects every enabled target, then is processed
 * 3. a target that fails or drops is reconnected in the background
 * 4. the session stops when the client leaves or the server stops it
 */

import { setTimeout as sleep } from 'timers/promises';
import type {
    ConnectionConfig,
    ConnectionStatus,
    OneBotPayload,
    ReconnectConfig,
    TargetEndpoint,
} from '../../shared/types';
import { SocketClosedError, type ProxySocket, type TargetConnector } from '../clients/wsClient';
import type { AppLogger } from '../utils/logger';
import { truncateForLog } from '../utils/logger';
import type { CommandHandler } from './commandHandler';
import { EchoCache } from './echoCache';
import { buildSentRecord, type MessageRecorder } from './messageRecorder';
import {
    echoText,
    isApiCallSucceeded,
    isApiResponse,
    isMetaEvent,
    isRecord,
    parseJsonObject,
    stringField,
    toNumericId,
} from './onebot';
import { SakoyaTargetSocket } from './sakoyaAdapter';
import { botIdFromUrl, PASSTHROUGH_ACTIONS } from './sakoyaModels';

/**
 * Upgrade request headers passed on to the targets.
 */
export const FORWARDED_HEADERS: readonly string[] = ['authorization', 'x-self-id', 'x-client-role', 'user-agent'];

export interface TargetSlot {
    /** 1-based */
    index: number;
    url: string;
    headers: Record<string, string>;
    disabled: boolean;
    sakoya: boolean;
    socket: ProxySocket | null;
    reconnecting: boolean;
}

export interface ProxyConnectionDeps {
    connectionId: string;
    config: ConnectionConfig;
    client: ProxySocket;
    /** Already filtered to FORWARDED_HEADERS */
    clientHeaders: Record<string, string>;
    connector: TargetConnector;
    logger: AppLogger;
    recorder: MessageRecorder;
    reconnect: ReconnectConfig;
    commandHandler?: CommandHandler;
    echoCache?: EchoCache;
    onStopped?: (connection: ProxyConnection) => void;
}

/**
 * Picks the forwarded headers out of an upgrade request's headers.
 */
export function pickForwardedHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
    const picked: Record<string, string> = {};
    for (const name of FORWARDED_HEADERS) {
        const value = headers[name];
        if (typeof value === 'string') {
            picked[name] = value;
        } else if (Array.isArray(value) && value.length > 0) {
            picked[name] = value.join(', ');
        }
    }
    return picked;
}

export function buildTargetSlots(endpoints: TargetEndpoint[]): TargetSlot[] {
    return endpoints.map((endpoint, listIndex) => {
        const config = typeof endpoint === 'string' ? { url: endpoint } : endpoint;
        return {
            index: listIndex + 1,
            url: config.url,
            headers: config.headers ?? {},
            disabled: config.disabled ?? false,
            sakoya: config.sakoyaProtocol ?? false,
            socket: null,
            reconnecting: false,
        };
    });
}

/**
 * Sakoya backends only want messages and message API calls.
 */
function skippedBySakoya(payload: OneBotPayload): boolean {
    return isMetaEvent(payload) || PASSTHROUGH_ACTIONS.has(stringField(payload, 'action'));
}

function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

export class ProxyConnection {
    readonly connectionId: string;
    readonly connectedAt = new Date();

    private config: ConnectionConfig;
    private readonly client: ProxySocket;
    private readonly clientHeaders: Record<string, string>;
    private readonly connector: TargetConnector;
    private readonly logger: AppLogger;
    private readonly recorder: MessageRecorder;
    private readonly reconnect: ReconnectConfig;
    private readonly commandHandler?: CommandHandler;
    private readonly echoCache: EchoCache;
    private readonly onStopped?: (connection: ProxyConnection) => void;

    private slots: TargetSlot[] = [];
    private firstMessage: string | null = null;
    private selfId: number | null = null;
    /** Client messages and reloads run one at a time, in order */
    private queue: Promise<void> = Promise.resolve();
    private abort = new AbortController();
    private reloading = false;
    private stopped = false;
    private stopPromise: Promise<void> | null = null;

    constructor(deps: ProxyConnectionDeps) {
        this.connectionId = deps.connectionId;
        this.config = deps.config;
        this.client = deps.client;
        this.clientHeaders = deps.clientHeaders;
        this.connector = deps.connector;
        this.logger = deps.logger;
        this.recorder = deps.recorder;
        this.reconnect = deps.reconnect;
        this.commandHandler = deps.commandHandler;
        this.echoCache = deps.echoCache ?? new EchoCache(deps.logger.ws);
        this.onStopped = deps.onStopped;
        this.slots = buildTargetSlots(this.config.targetEndpoints);
    }

    get isStopped(): boolean {
        return this.stopped;
    }

    get targets(): readonly TargetSlot[] {
        return this.slots;
    }

    /**
     * Starts listening to the client.
     */
    start(): void {
        this.logger.ws.info(
            { connectionId: this.connectionId, remoteAddress: this.client.remoteAddress },
            `[${this.connectionId}] Client connected, waiting for its first message`
        );

        this.client.onMessage((text) => {
            void this.enqueue(() => this.handleClientText(text));
        });
        this.client.onClose((code, reason) => {
            this.logger.ws.info({ connectionId: this.connectionId, code, reason }, `[${this.connectionId}] Client disconnected`);
            this.stop().catch((error: unknown) => {
                this.logger.ws.error({ err: error, connectionId: this.connectionId }, 'Failed to stop connection');
            });
        });
    }

    /**
     * Replaces the target list: closes every target, then connects the new ones.
     * Closures caused by the reload don't trigger reconnects.
     */
    reloadTargets(config: ConnectionConfig): Promise<void> {
        return this.enqueue(async () => {
            if (this.stopped) {
                return;
            }

            this.reloading = true;
            try {
                this.abort.abort();
                this.abort = new AbortController();

                const previous = this.slots;
                this.slots = [];
                await Promise.all(previous.map((slot) => this.closeTarget(slot, 'reload')));

                this.config = config;
                this.slots = buildTargetSlots(config.targetEndpoints);
                this.logger.ws.info(
                    { connectionId: this.connectionId, targets: this.slots.length },
                    `[${this.connectionId}] Targets reloaded`
                );
            } finally {
                this.reloading = false;
            }

            // Before the first message there's nothing to connect yet
            if (this.firstMessage !== null) {
                await this.connectTargets();
                await Promise.all(this.slots.map((slot) => this.replayFirstMessage(slot)));
            }
        });
    }

    /**
     * Stops reconnects and closes the targets and the client. Safe to call twice.
     */
    stop(): Promise<void> {
        if (!this.stopPromise) {
            this.stopPromise = this.shutdown();
        }
        return this.stopPromise;
    }

    status(): ConnectionStatus {
        const counters = this.recorder.getCounters(this.connectionId);
        return {
            connectionId: this.connectionId,
            selfId: this.selfId,
            remoteAddress: this.client.remoteAddress,
            connectedAt: this.connectedAt.toISOString(),
            targets: this.slots.map((slot) => ({
                index: slot.index,
                url: slot.url,
                connected: slot.socket?.isOpen ?? false,
                sakoya: slot.sakoya,
                disabled: slot.disabled,
            })),
            received: counters.received,
            sent: counters.sent,
        };
    }

    private enqueue(task: () => Promise<void>): Promise<void> {
        const run = this.queue.then(task);
        this.queue = run.catch((error: unknown) => {
            this.logger.ws.error({ err: error, connectionId: this.connectionId }, `[${this.connectionId}] Task failed`);
        });
        return run;
    }

    private async shutdown(): Promise<void> {
        this.stopped = true;
        this.abort.abort();

        const slots = this.slots;
        await Promise.all([
            ...slots.map((slot) => this.closeTarget(slot, 'stop')),
            this.client.close(1000, 'relay session closed').catch((error: unknown) => {
                this.logger.ws.warn({ err: error, connectionId: this.connectionId }, 'Failed to close client');
            }),
        ]);

        this.echoCache.clear();
        this.logger.ws.info({ connectionId: this.connectionId }, `[${this.connectionId}] Connection stopped`);
        this.onStopped?.(this);
    }

    private async closeTarget(slot: TargetSlot, reason: string): Promise<void> {
        const socket = slot.socket;
        slot.socket = null;
        if (!socket) {
            return;
        }
        try {
            await socket.close(1000, reason);
        } catch (error) {
            this.logger.ws.warn({ err: error, connectionId: this.connectionId, target: slot.index }, 'Failed to close target');
        }
    }

    // ========================================================================
    // Targets
    // ========================================================================

    private async connectTargets(): Promise<void> {
        for (const slot of this.slots) {
            if (slot.disabled || slot.socket) {
                continue;
            }

            try {
                const socket = await this.openTarget(slot);
                if (this.stopped || !this.isCurrent(slot)) {
                    await socket.close(1000, 'connection closed');
                    return;
                }
                this.attachTarget(slot, socket);
                this.logger.ws.info(
                    { connectionId: this.connectionId, target: slot.index, url: slot.url, sakoya: slot.sakoya },
                    `[${this.connectionId}] Connected to target ${slot.index}`
                );
            } catch (error) {
                this.logger.ws.warn(
                    { err: error, connectionId: this.connectionId, target: slot.index, url: slot.url },
                    `[${this.connectionId}] Could not connect to target ${slot.index}, will retry`
                );
                this.startReconnect(slot, this.reconnect.initialDelayMs);
            }
        }
    }

    private async openTarget(slot: TargetSlot): Promise<ProxySocket> {
        const socket = await this.connector(slot.url, { ...this.clientHeaders, ...slot.headers });
        return slot.sakoya ? new SakoyaTargetSocket(socket, botIdFromUrl(slot.url), this.logger.ws) : socket;
    }

    private attachTarget(slot: TargetSlot, socket: ProxySocket): void {
        slot.socket = socket;

        socket.onMessage((text) => {
            this.handleTargetText(slot, text).catch((error: unknown) => {
                this.logger.ws.error(
                    { err: error, connectionId: this.connectionId, target: slot.index },
                    `[${this.connectionId}] Failed to handle message from target ${slot.index}`
                );
            });
        });

        socket.onClose((code, reason) => {
            if (slot.socket !== socket) {
                return;
            }
            slot.socket = null;
            if (this.stopped || this.reloading || !this.isCurrent(slot)) {
                return;
            }
            this.logger.ws.warn(
                { connectionId: this.connectionId, target: slot.index, code, reason },
                `[${this.connectionId}] Target ${slot.index} closed, reconnecting`
            );
            this.startReconnect(slot, 0);
        });
    }

    private isCurrent(slot: TargetSlot): boolean {
        return this.slots[slot.index - 1] === slot;
    }

    private canReconnect(slot: TargetSlot): boolean {
        return !this.stopped && this.client.isOpen && this.isCurrent(slot) && !slot.disabled && !slot.socket;
    }

    private startReconnect(slot: TargetSlot, initialDelayMs: number): void {
        if (slot.reconnecting || !this.canReconnect(slot)) {
            return;
        }
        slot.reconnecting = true;

        this.reconnectLoop(slot, initialDelayMs, this.abort.signal)
            .catch((error: unknown) => {
                if (isAbortError(error)) {
                    this.logger.ws.debug({ connectionId: this.connectionId, target: slot.index }, 'Reconnect cancelled');
                    return;
                }
                this.logger.ws.error(
                    { err: error, connectionId: this.connectionId, target: slot.index },
                    `[${this.connectionId}] Reconnect loop for target ${slot.index} failed`
                );
            })
            .finally(() => {
                slot.reconnecting = false;
            });
    }

    /**
     * `fastAttempts` tries every `fastIntervalMs`, then every `slowIntervalMs`
     * for as long as the client stays connected.
     */
    private async reconnectLoop(slot: TargetSlot, initialDelayMs: number, signal: AbortSignal): Promise<void> {
        if (initialDelayMs > 0) {
            await sleep(initialDelayMs, undefined, { signal });
        }

        for (let attempt = 1; this.canReconnect(slot); attempt++) {
            const fast = attempt <= this.reconnect.fastAttempts;
            await sleep(fast ? this.reconnect.fastIntervalMs : this.reconnect.slowIntervalMs, undefined, { signal });
            if (!this.canReconnect(slot)) {
                break;
            }

            let socket: ProxySocket;
            try {
                socket = await this.openTarget(slot);
            } catch (error) {
                this.logger.ws.debug(
                    { err: error, connectionId: this.connectionId, target: slot.index, attempt },
                    `[${this.connectionId}] Reconnect attempt ${attempt} to target ${slot.index} failed`
                );
                continue;
            }

            if (!this.canReconnect(slot)) {
                await socket.close(1000, 'connection closed');
                break;
            }

            this.attachTarget(slot, socket);
            this.logger.ws.info(
                { connectionId: this.connectionId, target: slot.index, attempt },
                `[${this.connectionId}] Target ${slot.index} reconnected`
            );

            await this.replayFirstMessage(slot);
            return;
        }

        this.logger.ws.info(
            { connectionId: this.connectionId, target: slot.index },
            `[${this.connectionId}] Giving up reconnecting target ${slot.index}`
        );
    }

    /**
     * Some frameworks (Yunzai) register on the client's first message, so
     * targets connected late get it too.
     */
    private async replayFirstMessage(slot: TargetSlot): Promise<void> {
        if (this.firstMessage === null) {
            return;
        }
        const first = parseJsonObject(this.firstMessage);
        if (first) {
            await this.sendToTarget(slot, first, this.firstMessage);
        }
    }

    private async sendToTarget(slot: TargetSlot, payload: OneBotPayload, text: string): Promise<void> {
        const socket = slot.socket;
        if (!socket || !socket.isOpen || slot.disabled) {
            return;
        }
        if (slot.sakoya && skippedBySakoya(payload)) {
            this.logger.ws.trace({ connectionId: this.connectionId, target: slot.index }, 'Skipping Sakoya target');
            return;
        }

        try {
            await socket.send(text);
        } catch (error) {
            if (error instanceof SocketClosedError) {
                this.logger.ws.debug({ connectionId: this.connectionId, target: slot.index }, 'Target closed while sending');
                return;
            }
            this.logger.ws.error(
                { err: error, connectionId: this.connectionId, target: slot.index },
                `[${this.connectionId}] Failed to send to target ${slot.index}`
            );
        }
    }

    // ========================================================================
    // Client -> targets
    // ========================================================================

    private async handleClientText(text: string): Promise<void> {
        if (this.stopped) {
            return;
        }
        if (this.firstMessage === null) {
            this.firstMessage = text;
            await this.connectTargets();
        }

        const payload = parseJsonObject(text);
        if (!payload) {
            this.logger.ws.warn(
                { connectionId: this.connectionId, text: truncateForLog(text) },
                `[${this.connectionId}] Ignoring non-JSON message from client`
            );
            return;
        }

        this.trackSelfId(payload);
        this.record(payload);

        if (this.commandHandler) {
            const outcome = await this.commandHandler.handle(payload);
            if (outcome.action === 'reply') {
                await this.handleTargetPayload(0, outcome.reply);
                return;
            }
            if (outcome.action === 'drop') {
                return;
            }
        }

        const echo = echoText(payload);
        if (echo !== null) {
            await this.routeResponse(echo, payload, text);
        } else {
            await Promise.all(this.slots.map((slot) => this.sendToTarget(slot, payload, text)));
        }
    }

    private trackSelfId(payload: OneBotPayload): void {
        const selfId = toNumericId(payload.self_id);
        if (!selfId) {
            return;
        }
        if (this.selfId !== null && this.selfId !== selfId) {
            this.logger.ws.warn(
                { connectionId: this.connectionId, previous: this.selfId, current: selfId },
                `[${this.connectionId}] Client switched account to ${selfId}; restart the connection`
            );
        }
        this.selfId = selfId;
    }

    private record(payload: OneBotPayload): void {
        const echo = echoText(payload);
        const request = echo !== null ? this.echoCache.peek(echo, this.slots.length, 0) : undefined;

        if (isApiCallSucceeded(payload)) {
            // List results are never sends
            const data = payload.data;
            if (request && isRecord(data)) {
                const sent = buildSentRecord(request.data, this.selfId, { message_id: data.message_id });
                if (sent) {
                    this.recorder.recordSent(this.connectionId, sent);
                }
            }
            return;
        }

        if (isApiResponse(payload) && request) {
            this.logger.ws.warn(
                {
                    connectionId: this.connectionId,
                    request: truncateForLog(JSON.stringify(request.data)),
                    status: payload.status,
                    retcode: payload.retcode,
                },
                `[${this.connectionId}] API call failed`
            );
        }
        this.recorder.recordReceived(this.connectionId, payload);
    }

    private async routeResponse(echo: string, payload: OneBotPayload, text: string): Promise<void> {
        const entry = this.echoCache.take(echo, this.slots.length);
        if (!entry) {
            // Responses to the relay's own calls end here
            this.echoCache.take(echo, 0, 0);
            this.logger.ws.debug({ connectionId: this.connectionId, echo }, 'No target is waiting for this response');
            return;
        }

        const slot = this.slots[entry.targetIndex - 1];
        if (!slot) {
            return;
        }
        await this.sendToTarget(slot, payload, text);
    }

    // ========================================================================
    // Targets -> client
    // ========================================================================

    private async handleTargetText(slot: TargetSlot, text: string): Promise<void> {
        const payload = parseJsonObject(text);
        if (!payload) {
            this.logger.ws.warn(
                { connectionId: this.connectionId, target: slot.index, text: truncateForLog(text) },
                `[${this.connectionId}] Ignoring non-JSON message from target ${slot.index}`
            );
            return;
        }
        await this.handleTargetPayload(slot.index, payload);
    }

    private async handleTargetPayload(targetIndex: number, payload: OneBotPayload): Promise<void> {
        const echo = echoText(payload);
        if (echo !== null) {
            this.echoCache.remember(targetIndex, echo, payload);
        } else {
            // Frameworks that don't use echo still get their sends recorded
            const sent = buildSentRecord(payload, this.selfId);
            if (sent) {
                this.recorder.recordSent(this.connectionId, sent);
            }
        }

        if (!this.client.isOpen) {
            this.logger.ws.debug({ connectionId: this.connectionId, target: targetIndex }, 'Client gone, dropping message');
            return;
        }

        try {
            await this.client.send(JSON.stringify(payload));
        } catch (error) {
            if (error instanceof SocketClosedError) {
                this.logger.ws.warn({ connectionId: this.connectionId }, `[${this.connectionId}] Client closed while sending`);
                return;
            }
            throw error;
        }
    }
}

export function createProxyConnection(deps: ProxyConnectionDeps): ProxyConnection {
    return new ProxyConnection(deps);
}
