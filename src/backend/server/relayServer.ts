/**
 * Relay Server
 *
 * Owns the listeners and the active sessions. The main port serves the HTTP
 * API and WebSocket upgrades; every other port named by a client endpoint gets
 * a bare listener that only accepts upgrades.
 *
 * Upgrades are routed by port and path at upgrade time, so path edits on an
 * existing port apply without rebinding anything.
 */

import http from 'http';
import type { Duplex } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import { WebSocketServer, type WebSocket } from 'ws';
import type { HealthResponse, HealthStatus, StatusResponse } from '../../shared/types';
import { WsProxySocket, DEFAULT_WS_CLIENT_CONFIG, type TargetConnector } from '../clients/wsClient';
import type { CommandHandler } from '../services/commandHandler';
import type { ConfigManager } from '../services/configManager';
import { buildRouteMap, listRoutes, lookupRoute, normalizePath, type RouteMap } from '../services/endpoint';
import type { MessageRecorder } from '../services/messageRecorder';
import { createProxyConnection, pickForwardedHeaders, type ProxyConnection } from '../services/proxyConnection';
import type { AppLogger } from '../utils/logger';

/**
 * What the HTTP API needs from the relay.
 */
export interface RelayController {
    health(): HealthResponse;
    status(): StatusResponse;
    /**
     * Re-applies the stored config of one connection: routes are rebuilt and
     * an active session is reloaded, or stopped if the connection is gone or
     * disabled.
     */
    applyConnectionChange(connectionId: string): Promise<void>;
    /**
     * Re-applies every connection after the config files were re-read.
     */
    applyConfigReload(): Promise<void>;
}

export interface RelayServerDeps {
    configManager: ConfigManager;
    logger: AppLogger;
    connector: TargetConnector;
    recorder: MessageRecorder;
    commandHandler?: CommandHandler;
}

export const UNKNOWN_PATH_CLOSE_CODE = 1008;

export class RelayServer implements RelayController {
    private readonly configManager: ConfigManager;
    private readonly logger: AppLogger;
    private readonly connector: TargetConnector;
    private readonly recorder: MessageRecorder;
    private readonly commandHandler?: CommandHandler;

    private readonly wss = new WebSocketServer({
        noServer: true,
        maxPayload: DEFAULT_WS_CLIENT_CONFIG.maxPayloadBytes,
        perMessageDeflate: true,
    });
    private readonly listeners = new Map<number, http.Server>();
    private readonly sessions = new Map<string, ProxyConnection>();
    /** Latest upgrade per connection; an older one still waiting gives way */
    private readonly acceptGenerations = new Map<string, number>();
    private routes: RouteMap = new Map();
    private state: HealthStatus = 'starting';
    private startedAt: number | null = null;
    private mainPort: number | null = null;

    constructor(deps: RelayServerDeps) {
        this.configManager = deps.configManager;
        this.logger = deps.logger;
        this.connector = deps.connector;
        this.recorder = deps.recorder;
        this.commandHandler = deps.commandHandler;
    }

    get isReady(): boolean {
        return this.state === 'ok';
    }

    get activeConnections(): number {
        return this.sessions.size;
    }

    /**
     * Port the main listener is bound to, once started.
     */
    get boundPort(): number | null {
        return this.mainPort;
    }

    getSession(connectionId: string): ProxyConnection | undefined {
        return this.sessions.get(connectionId);
    }

    /**
     * Binds the main listener (with `requestListener` serving HTTP) and one
     * listener per other routed port.
     *
     * @throws if the main port can't be bound
     */
    async start(requestListener?: http.RequestListener): Promise<void> {
        const { host, port } = this.configManager.getGlobalConfig().server;
        this.routes = buildRouteMap(this.configManager.getConnectionsConfig(), this.logger.ws);

        const main = await this.listen(port, host, requestListener, true);
        if (main) {
            const address = main.address();
            this.mainPort = typeof address === 'object' && address ? address.port : port;
            this.listeners.set(this.mainPort, main);
        }
        this.logger.main.info({ host, port: this.mainPort }, `HTTP and WebSocket listener on ${host}:${this.mainPort}`);

        await this.bindRoutedPorts();

        this.state = 'ok';
        this.startedAt = Date.now();
        for (const route of listRoutes(this.routes)) {
            this.logger.ws.info(route, `Accepting clients on :${route.port}${route.path} for ${route.connectionId}`);
        }
    }

    /**
     * Rebuilds the route map, binds new ports and closes ports left without
     * routes. The main port always stays.
     */
    async reloadRoutes(): Promise<void> {
        this.routes = buildRouteMap(this.configManager.getConnectionsConfig(), this.logger.ws);
        await this.bindRoutedPorts();

        for (const [port, server] of this.listeners) {
            if (port === this.mainPort || this.routes.has(port)) {
                continue;
            }
            this.listeners.delete(port);
            await this.closeListener(server, false);
            this.logger.ws.info({ port }, `Closed listener on port ${port}, no routes left`);
        }
    }

    async applyConnectionChange(connectionId: string): Promise<void> {
        await this.applySessionChange(connectionId);
        await this.reloadRoutes();
    }

    async applyConfigReload(): Promise<void> {
        for (const connectionId of [...this.sessions.keys()]) {
            await this.applySessionChange(connectionId);
        }
        await this.reloadRoutes();
    }

    private async applySessionChange(connectionId: string): Promise<void> {
        const session = this.sessions.get(connectionId);
        if (!session) {
            return;
        }

        const config = this.configManager.getConnection(connectionId);
        if (!config || !config.enabled) {
            this.logger.ws.info({ connectionId }, `[${connectionId}] Connection removed or disabled, closing session`);
            await session.stop();
            return;
        }
        await session.reloadTargets(config);
    }

    /**
     * Stops every session (bounded by `stopTimeoutMs`) and closes the listeners.
     */
    async stop(): Promise<void> {
        this.state = 'stopping';
        const { stopTimeoutMs } = this.configManager.getGlobalConfig();

        const sessions = [...this.sessions.values()];
        const timeout = new AbortController();
        const deadline = sleep(stopTimeoutMs, true, { signal: timeout.signal }).catch(() => false);
        const timedOut = await Promise.race([
            Promise.all(sessions.map((session) => session.stop())).then(() => false),
            deadline,
        ]);
        timeout.abort();
        if (timedOut) {
            this.logger.main.warn({ remaining: this.sessions.size }, 'Timed out stopping sessions');
        }
        for (const ws of this.wss.clients) {
            ws.terminate();
        }

        const servers = [...this.listeners.values()];
        this.listeners.clear();
        await Promise.all(servers.map((server) => this.closeListener(server, true)));
        this.wss.close();
        this.logger.main.info('Relay stopped');
    }

    health(): HealthResponse {
        if (this.state !== 'ok' || this.startedAt === null) {
            return { status: this.state };
        }
        return {
            status: 'ok',
            uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
            activeConnections: this.sessions.size,
            routes: listRoutes(this.routes).length,
        };
    }

    status(): StatusResponse {
        return {
            uptimeSeconds: this.startedAt === null ? 0 : Math.floor((Date.now() - this.startedAt) / 1000),
            routes: listRoutes(this.routes),
            connections: [...this.sessions.values()].map((session) => session.status()),
        };
    }

    private async bindRoutedPorts(): Promise<void> {
        for (const [port, portRoutes] of this.routes) {
            if (this.listeners.has(port)) {
                continue;
            }
            const server = await this.listen(port, portRoutes.host, undefined, false);
            if (server) {
                this.listeners.set(port, server);
            }
        }
    }

    /**
     * @returns the bound server, or null when an optional port is taken
     */
    private listen(
        port: number,
        host: string,
        requestListener: http.RequestListener | undefined,
        required: boolean
    ): Promise<http.Server | null> {
        const server = http.createServer(
            requestListener ??
                ((_req, res) => {
                    res.writeHead(426, { 'Content-Type': 'text/plain' });
                    res.end('WebSocket upgrade required');
                })
        );
        server.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
            this.handleUpgrade(port, req, socket, head);
        });

        return new Promise((resolve, reject) => {
            server.once('error', (error: NodeJS.ErrnoException) => {
                if (!required && error.code === 'EADDRINUSE') {
                    this.logger.ws.error({ port, host }, `Port ${port} is already in use, its routes are unavailable`);
                    resolve(null);
                    return;
                }
                reject(error);
            });
            server.listen(port, host, () => {
                server.removeAllListeners('error');
                server.on('error', (error) => {
                    this.logger.ws.error({ err: error, port }, 'Listener error');
                });
                resolve(server);
            });
        });
    }

    /**
     * Upgraded sockets keep `close` from calling back until they end, so
     * without `waitForConnections` this resolves once the port stops listening.
     */
    private closeListener(server: http.Server, waitForConnections: boolean): Promise<void> {
        return new Promise((resolve) => {
            server.close((error) => {
                if (error) {
                    this.logger.ws.warn({ err: error }, 'Listener was not running');
                }
                resolve();
            });
            server.closeAllConnections();
            if (!waitForConnections) {
                resolve();
            }
        });
    }

    private handleUpgrade(port: number, req: http.IncomingMessage, socket: Duplex, head: Buffer): void {
        if (this.state === 'stopping') {
            socket.destroy();
            return;
        }

        const path = normalizePath(req.url);
        const connectionId = lookupRoute(this.routes, port, path);

        this.wss.handleUpgrade(req, socket, head, (ws) => {
            if (!connectionId) {
                this.logger.ws.warn({ port, path, remoteAddress: req.socket.remoteAddress }, `No route for :${port}${path}`);
                ws.close(UNKNOWN_PATH_CLOSE_CODE, 'Unknown path');
                return;
            }
            this.acceptSession(connectionId, ws, req).catch((error: unknown) => {
                this.logger.ws.error({ err: error, connectionId }, `[${connectionId}] Failed to start session`);
                ws.close(1011, 'Internal error');
            });
        });
    }

    private async acceptSession(connectionId: string, ws: WebSocket, req: http.IncomingMessage): Promise<void> {
        const config = this.configManager.getConnection(connectionId);
        if (!config || !config.enabled) {
            ws.close(UNKNOWN_PATH_CLOSE_CODE, 'Connection disabled');
            return;
        }

        const client = new WsProxySocket(ws, this.logger.ws, { remoteAddress: req.socket.remoteAddress });
        const { replaceDelayMs, reconnect } = this.configManager.getGlobalConfig();
        const generation = (this.acceptGenerations.get(connectionId) ?? 0) + 1;
        this.acceptGenerations.set(connectionId, generation);

        const existing = this.sessions.get(connectionId);
        if (existing) {
            this.logger.ws.info({ connectionId }, `[${connectionId}] New client replaces the active session`);
            this.sessions.delete(connectionId);
            await existing.stop();
            await sleep(replaceDelayMs);
        }

        if (this.acceptGenerations.get(connectionId) !== generation) {
            this.logger.ws.info({ connectionId }, `[${connectionId}] A newer client took over, closing this one`);
            await client.close(1000, 'Replaced by a newer client');
            return;
        }
        if (!client.isOpen || this.state === 'stopping') {
            return;
        }

        const connection = createProxyConnection({
            connectionId,
            config,
            client,
            clientHeaders: pickForwardedHeaders(req.headers),
            connector: this.connector,
            logger: this.logger,
            recorder: this.recorder,
            reconnect,
            commandHandler: this.commandHandler,
            onStopped: (stopped) => {
                if (this.sessions.get(connectionId) === stopped) {
                    this.sessions.delete(connectionId);
                }
                if (!this.sessions.has(connectionId)) {
                    this.recorder.forget(connectionId);
                }
            },
        });
        this.sessions.set(connectionId, connection);
        connection.start();
    }
}

export function createRelayServer(deps: RelayServerDeps): RelayServer {
    return new RelayServer(deps);
}
