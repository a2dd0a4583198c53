/**
 * Relay Server Tests
 *
 * Runs the relay on a local port with a real `ws` client and an in-process
 * `ws` server as the target.
 */

import * as fs from 'fs';
import net from 'net';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import WebSocket, { WebSocketServer } from 'ws';
import { delay, waitFor } from '../../__tests__/fakes';
import { createWsConnector, rawDataToString } from '../../clients/wsClient';
import { ConfigManager } from '../../services/configManager';
import { MessageRecorder } from '../../services/messageRecorder';
import { parseJsonObject } from '../../services/onebot';
import { createSilentLogger } from '../../utils/logger';
import { RelayServer, UNKNOWN_PATH_CLOSE_CODE } from '../relayServer';

const LIFECYCLE = { post_type: 'meta_event', meta_event_type: 'lifecycle', self_id: 10 };

function freePort(): Promise<number> {
    return new Promise((resolve, reject) => {
        const server = net.createServer();
        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            const port = typeof address === 'object' && address ? address.port : 0;
            server.close(() => resolve(port));
        });
    });
}

/**
 * Collects the parsed frames a socket receives.
 */
function collect(ws: WebSocket): Array<Record<string, unknown>> {
    const frames: Array<Record<string, unknown>> = [];
    ws.on('message', (data) => {
        const payload = parseJsonObject(rawDataToString(data));
        if (payload) {
            frames.push(payload);
        }
    });
    return frames;
}

function listenOn(server: net.Server): Promise<number> {
    return new Promise((resolve) => {
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            resolve(address && typeof address === 'object' ? address.port : 0);
        });
    });
}

function isOpen(ws: WebSocket): boolean {
    return ws.readyState === WebSocket.OPEN;
}

function opened(ws: WebSocket): Promise<void> {
    return new Promise((resolve, reject) => {
        ws.once('open', () => resolve());
        ws.once('error', reject);
    });
}

describe('RelayServer', () => {
    const logger = createSilentLogger();
    let configDir: string;
    let target: WebSocketServer;
    let targetFrames: Array<Record<string, unknown>>;
    let targetSockets: WebSocket[];
    let targetUrl: string;
    let configManager: ConfigManager;
    let relay: RelayServer;
    let recorder: MessageRecorder;
    let relayPort: number;
    let clients: WebSocket[];

    beforeEach(async () => {
        configDir = path.join(process.cwd(), 'data', 'test-relay', uuidv4());
        clients = [];
        targetFrames = [];
        targetSockets = [];

        target = new WebSocketServer({ port: 0, host: '127.0.0.1' });
        await new Promise<void>((resolve) => target.once('listening', () => resolve()));
        target.on('connection', (socket) => {
            targetSockets.push(socket);
            socket.on('message', (data) => {
                const payload = parseJsonObject(rawDataToString(data));
                if (payload) {
                    targetFrames.push(payload);
                }
            });
        });
        const address = target.address();
        const targetPort = address && typeof address === 'object' ? address.port : 0;
        targetUrl = `ws://127.0.0.1:${targetPort}/onebot`;

        relayPort = await freePort();
        fs.mkdirSync(configDir, { recursive: true });
        fs.writeFileSync(
            path.join(configDir, 'global.json'),
            JSON.stringify({ server: { host: '127.0.0.1', port: relayPort }, replaceDelayMs: 0, stopTimeoutMs: 1000 })
        );
        fs.writeFileSync(
            path.join(configDir, 'connections.json'),
            JSON.stringify({
                a: {
                    clientEndpoint: `ws://127.0.0.1:${relayPort}/bs/a`,
                    targetEndpoints: [targetUrl],
                },
            })
        );

        configManager = new ConfigManager({ configDir, env: {} });
        configManager.load();
        recorder = new MessageRecorder(logger);
        relay = new RelayServer({
            configManager,
            logger,
            connector: createWsConnector(logger.ws),
            recorder,
        });
        await relay.start();
    });

    afterEach(async () => {
        for (const client of clients) {
            client.terminate();
        }
        await relay.stop();
        for (const socket of targetSockets) {
            socket.terminate();
        }
        await new Promise<void>((resolve) => target.close(() => resolve()));
        fs.rmSync(configDir, { recursive: true, force: true });
    });

    function connectClient(urlPath: string): WebSocket {
        const client = new WebSocket(`ws://127.0.0.1:${relayPort}${urlPath}`, { headers: { 'x-self-id': '10' } });
        clients.push(client);
        return client;
    }

    it('should report ok once started', () => {
        expect(relay.isReady).toBe(true);
        expect(relay.boundPort).toBe(relayPort);
        expect(relay.health()).toMatchObject({ status: 'ok', activeConnections: 0, routes: 1 });
    });

    it('should relay events to the target and API calls back to the client', async () => {
        const client = connectClient('/bs/a?access_token=test-secret');
        const clientFrames = collect(client);
        await opened(client);

        client.send(JSON.stringify(LIFECYCLE));
        await waitFor(() => targetFrames.length === 1);
        expect(targetFrames[0]).toMatchObject({ meta_event_type: 'lifecycle' });
        expect(relay.activeConnections).toBe(1);

        targetSockets[0]?.send(JSON.stringify({ action: 'get_login_info', params: {}, echo: 'e1' }));
        await waitFor(() => clientFrames.length === 1);
        expect(clientFrames[0]).toEqual({ action: 'get_login_info', params: {}, echo: 'e1' });

        client.send(JSON.stringify({ status: 'ok', retcode: 0, data: { user_id: 10 }, echo: 'e1' }));
        await waitFor(() => targetFrames.length === 2);
        expect(targetFrames[1]).toEqual({ status: 'ok', retcode: 0, data: { user_id: 10 }, echo: 'e1' });

        expect(relay.status().connections[0]).toMatchObject({ connectionId: 'a', selfId: 10 });
    });

    it('should close clients on unknown paths with 1008', async () => {
        const client = connectClient('/nowhere');
        const code = await new Promise<number>((resolve) => client.once('close', (closeCode) => resolve(closeCode)));
        expect(code).toBe(UNKNOWN_PATH_CLOSE_CODE);
    });

    it('should replace the session when the same endpoint reconnects', async () => {
        const first = connectClient('/bs/a');
        await opened(first);
        first.send(JSON.stringify(LIFECYCLE));
        await waitFor(() => targetFrames.length === 1);

        const firstClosed = new Promise<void>((resolve) => first.once('close', () => resolve()));
        const second = connectClient('/bs/a');
        await opened(second);
        await firstClosed;

        second.send(JSON.stringify(LIFECYCLE));
        await waitFor(() => targetFrames.length === 2);
        expect(relay.activeConnections).toBe(1);
    });

    it('should keep only the newest client when two replace a session at once', async () => {
        configManager.saveGlobalConfig({ ...configManager.getGlobalConfig(), replaceDelayMs: 200 });
        const first = connectClient('/bs/a');
        await opened(first);
        first.send(JSON.stringify(LIFECYCLE));
        await waitFor(() => targetFrames.length === 1);

        const second = connectClient('/bs/a');
        const third = connectClient('/bs/a');
        await Promise.all([opened(second), opened(third)]);

        const all = [first, second, third];
        await waitFor(() => all.filter(isOpen).length === 1, 3000);
        await delay(300);
        const survivors = all.filter(isOpen);
        expect(survivors).toHaveLength(1);
        expect(relay.activeConnections).toBe(1);

        survivors[0]?.send(JSON.stringify(LIFECYCLE));
        await waitFor(() => targetFrames.length === 2);
        await waitFor(() => targetSockets.filter(isOpen).length === 1);
        await delay(50);
        expect(targetSockets.filter(isOpen)).toHaveLength(1);
    });

    it('should bind new ports and close ports left without routes', async () => {
        const extraPort = await freePort();
        configManager.saveConnection('b', {
            clientEndpoint: `ws://127.0.0.1:${extraPort}/bs/b`,
            targetEndpoints: [targetUrl],
        });
        await relay.applyConnectionChange('b');

        const onExtra = new WebSocket(`ws://127.0.0.1:${extraPort}/bs/b`);
        clients.push(onExtra);
        await opened(onExtra);
        await waitFor(() => relay.activeConnections === 1);
        expect(relay.status().routes).toContainEqual({ port: extraPort, path: '/bs/b', connectionId: 'b' });

        const extraClosed = new Promise<void>((resolve) => onExtra.once('close', () => resolve()));
        configManager.deleteConnection('b');
        configManager.deleteConnection('a');
        await relay.applyConnectionChange('b');
        await relay.applyConnectionChange('a');
        await extraClosed;
        await delay(20);

        const refused = new WebSocket(`ws://127.0.0.1:${extraPort}/bs/b`);
        clients.push(refused);
        await expect(opened(refused)).rejects.toThrow();

        // The main port stays up without routes
        const onMain = connectClient('/bs/a');
        const code = await new Promise<number>((resolve) => onMain.once('close', (closeCode) => resolve(closeCode)));
        expect(code).toBe(UNKNOWN_PATH_CLOSE_CODE);
    });

    it('should skip a routed port that is taken and bind it once free', async () => {
        const blocker = net.createServer();
        const busyPort = await listenOn(blocker);
        configManager.saveConnection('c', { clientEndpoint: `ws://127.0.0.1:${busyPort}/bs/c`, targetEndpoints: [] });

        await expect(relay.reloadRoutes()).resolves.toBeUndefined();
        expect(relay.isReady).toBe(true);

        await new Promise<void>((resolve) => blocker.close(() => resolve()));
        await relay.reloadRoutes();

        const client = new WebSocket(`ws://127.0.0.1:${busyPort}/bs/c`);
        clients.push(client);
        await opened(client);
        await waitFor(() => relay.activeConnections === 1);
    });

    it('should stop the session when its connection is deleted', async () => {
        const client = connectClient('/bs/a');
        await opened(client);
        client.send(JSON.stringify(LIFECYCLE));
        await waitFor(() => relay.activeConnections === 1 && targetFrames.length === 1);
        expect(recorder.getCounters('a').received).toBe(1);

        const closed = new Promise<void>((resolve) => client.once('close', () => resolve()));
        configManager.deleteConnection('a');
        await relay.applyConnectionChange('a');
        await closed;

        expect(relay.activeConnections).toBe(0);
        expect(relay.status().routes).toEqual([]);
        expect(recorder.getCounters('a')).toEqual({ received: 0, sent: 0 });
    });
});
