/**
 * Proxy Connection Tests
 *
 * Sessions are driven through FakeSockets: the client is a FakeSocket and
 * targets are opened by a FakeConnector. Reconnect timing is shortened to
 * a few milliseconds.
 */

import type { ConnectionConfig, ReconnectConfig, TargetEndpoint } from '../../../shared/types';
import { delay, FakeConnector, FakeSocket, waitFor } from '../../__tests__/fakes';
import type { TargetConnector } from '../../clients/wsClient';
import { InMemoryAuthStore } from '../../storage/authStore';
import { createSilentLogger } from '../../utils/logger';
import { AuthManager } from '../authManager';
import { CommandHandler } from '../commandHandler';
import { MessageRecorder } from '../messageRecorder';
import { buildTargetSlots, createProxyConnection, pickForwardedHeaders, type ProxyConnection } from '../proxyConnection';

const T1 = 'ws://t1.test/onebot';
const T2 = 'ws://t2.test/onebot';

const FAST_RECONNECT: ReconnectConfig = {
    initialDelayMs: 5,
    fastAttempts: 2,
    fastIntervalMs: 5,
    slowIntervalMs: 20,
};

const LIFECYCLE = { post_type: 'meta_event', meta_event_type: 'lifecycle', sub_type: 'connect', self_id: 10 };

function connectionConfig(targetEndpoints: TargetEndpoint[]): ConnectionConfig {
    return { enabled: true, clientEndpoint: 'ws://0.0.0.0:5111/a', targetEndpoints };
}

function groupMessage(text: string) {
    return {
        post_type: 'message',
        message_type: 'group',
        group_id: 100,
        user_id: 200,
        self_id: 10,
        message_id: 1,
        message: [{ type: 'text', data: { text } }],
    };
}

describe('ProxyConnection', () => {
    const logger = createSilentLogger();
    let client: FakeSocket;
    let connector: FakeConnector;
    let recorder: MessageRecorder;
    let connection: ProxyConnection;
    let stoppedCalls: number;

    function start(
        targets: TargetEndpoint[],
        commandHandler?: CommandHandler,
        options: { reconnect?: ReconnectConfig; connect?: TargetConnector } = {}
    ): ProxyConnection {
        connection = createProxyConnection({
            connectionId: 'a',
            config: connectionConfig(targets),
            client,
            clientHeaders: { 'x-self-id': '10' },
            connector: options.connect ?? connector.connect,
            logger,
            recorder,
            reconnect: options.reconnect ?? FAST_RECONNECT,
            commandHandler,
            onStopped: () => {
                stoppedCalls += 1;
            },
        });
        connection.start();
        return connection;
    }

    /**
     * Sends the first message and waits until every listed target got it.
     */
    async function connectWith(urls: string[]): Promise<void> {
        client.receive(LIFECYCLE);
        await waitFor(() => urls.every((url) => (connector.latest(url)?.sent.length ?? 0) >= 1));
    }

    beforeEach(() => {
        client = new FakeSocket('10.0.0.1');
        connector = new FakeConnector();
        recorder = new MessageRecorder(logger);
        stoppedCalls = 0;
    });

    afterEach(async () => {
        await connection.stop();
    });

    describe('connecting', () => {
        it('should not connect targets before the first client message', async () => {
            start([T1, T2]);
            await delay(10);
            expect(connector.calls).toHaveLength(0);
        });

        it('should connect every enabled target on the first message and forward it', async () => {
            start([T1, { url: T2, headers: { authorization: 'Bearer test-secret' } }]);
            await connectWith([T1, T2]);

            expect(connector.calls.map((call) => call.url)).toEqual([T1, T2]);
            expect(connector.calls[0]?.headers).toEqual({ 'x-self-id': '10' });
            expect(connector.calls[1]?.headers).toEqual({
                'x-self-id': '10',
                authorization: 'Bearer test-secret',
            });
            expect(connector.latest(T1)?.sentPayloads()).toEqual([LIFECYCLE]);
        });

        it('should skip disabled targets', async () => {
            start([{ url: T1, disabled: true }, T2]);
            await connectWith([T2]);
            expect(connector.attempts(T1)).toBe(0);
        });
    });

    describe('client to targets', () => {
        it('should broadcast events without echo to every target', async () => {
            start([T1, T2]);
            await connectWith([T1, T2]);

            client.receive(groupMessage('hello'));
            await waitFor(() => connector.latest(T2)?.sent.length === 2);

            expect(connector.latest(T1)?.sentPayloads()[1]).toEqual(groupMessage('hello'));
            expect(connector.latest(T2)?.sentPayloads()[1]).toEqual(groupMessage('hello'));
        });

        it('should keep client messages in order while targets are still connecting', async () => {
            let release: () => void = () => undefined;
            const gate = new Promise<void>((resolve) => {
                release = resolve;
            });
            const slowConnect: TargetConnector = async (url, headers) => {
                await gate;
                return connector.connect(url, headers);
            };
            start([T1], undefined, { connect: slowConnect });

            client.receive(LIFECYCLE);
            client.receive(groupMessage('one'));
            client.receive(groupMessage('two'));
            await delay(10);
            expect(connector.calls).toHaveLength(0);

            release();
            await waitFor(() => connector.latest(T1)?.sent.length === 3);
            expect(connector.latest(T1)?.sentPayloads()).toEqual([LIFECYCLE, groupMessage('one'), groupMessage('two')]);
        });

        it('should ignore non-JSON client messages', async () => {
            start([T1]);
            await connectWith([T1]);

            client.receive('not json');
            client.receive(groupMessage('after'));
            await waitFor(() => connector.latest(T1)?.sent.length === 2);

            expect(connector.latest(T1)?.sentPayloads()[1]).toEqual(groupMessage('after'));
        });

        it('should route a response only to the target that asked', async () => {
            start([T1, T2]);
            await connectWith([T1, T2]);

            connector.latest(T2)?.receive({ action: 'get_group_list', params: {}, echo: 'e1' });
            await waitFor(() => client.sent.length === 1);
            expect(client.sentPayloads()).toEqual([{ action: 'get_group_list', params: {}, echo: 'e1' }]);

            const response = { status: 'ok', retcode: 0, data: [], echo: 'e1' };
            client.receive(response);
            await waitFor(() => connector.latest(T2)?.sent.length === 2);

            expect(connector.latest(T2)?.sentPayloads()[1]).toEqual(response);
            expect(connector.latest(T1)?.sent).toHaveLength(1);
        });

        it('should keep equal echoes of different targets apart', async () => {
            start([T1, T2]);
            await connectWith([T1, T2]);

            connector.latest(T1)?.receive({ action: 'get_status', params: {}, echo: 'same' });
            connector.latest(T2)?.receive({ action: 'get_status', params: {}, echo: 'same' });
            await waitFor(() => client.sent.length === 2);

            client.receive({ status: 'ok', retcode: 0, data: { n: 1 }, echo: 'same' });
            await waitFor(() => connector.latest(T1)?.sent.length === 2);
            client.receive({ status: 'ok', retcode: 0, data: { n: 2 }, echo: 'same' });
            await waitFor(() => connector.latest(T2)?.sent.length === 2);

            expect(connector.latest(T1)?.sentPayloads()[1]).toMatchObject({ data: { n: 1 } });
            expect(connector.latest(T2)?.sentPayloads()[1]).toMatchObject({ data: { n: 2 } });
        });

        it('should drop responses nobody is waiting for', async () => {
            start([T1]);
            await connectWith([T1]);

            client.receive({ status: 'ok', retcode: 0, data: null, echo: 'unknown' });
            client.receive(groupMessage('marker'));
            await waitFor(() => connector.latest(T1)?.sent.length === 2);

            expect(connector.latest(T1)?.sentPayloads()[1]).toEqual(groupMessage('marker'));
        });

        it('should record sends confirmed by the client', async () => {
            start([T1]);
            await connectWith([T1]);

            connector.latest(T1)?.receive({
                action: 'send_group_msg',
                params: { group_id: 100, message: 'hi' },
                echo: 'e9',
            });
            await waitFor(() => client.sent.length === 1);
            client.receive({ status: 'ok', retcode: 0, data: { message_id: 77 }, echo: 'e9' });
            await waitFor(() => connector.latest(T1)?.sent.length === 2);

            // lifecycle event received, one send confirmed
            expect(recorder.getCounters('a')).toEqual({ received: 1, sent: 1 });
        });
    });

    describe('Sakoya targets', () => {
        it('should convert messages for targets flagged sakoyaProtocol', async () => {
            const url = 'ws://gs.test/ws/gs';
            start([{ url, sakoyaProtocol: true }]);
            client.receive(LIFECYCLE);
            await waitFor(() => connector.latest(url) !== undefined);
            await delay(10);
            expect(connector.latest(url)?.sent).toHaveLength(0);

            client.receive(groupMessage('hi'));
            await waitFor(() => connector.latest(url)?.sent.length === 1);
            expect(connector.latest(url)?.sentPayloads()[0]).toMatchObject({
                bot_id: 'gs',
                user_type: 'group',
                content: [{ type: 'text', data: 'hi' }],
            });
        });
    });

    describe('Sakoya passthrough actions', () => {
        it('should send status actions to plain targets only', async () => {
            const url = 'ws://gs.test/ws/gs';
            start([T1, { url, sakoyaProtocol: true }]);
            await connectWith([T1]);

            client.receive({ action: 'get_status', params: {} });
            client.receive(groupMessage('after'));
            await waitFor(() => connector.latest(T1)?.sent.length === 3 && connector.latest(url)?.sent.length === 1);

            expect(connector.latest(T1)?.sentPayloads()[1]).toEqual({ action: 'get_status', params: {} });
            expect(connector.latest(url)?.sentPayloads()).toEqual([
                expect.objectContaining({ bot_id: 'gs', content: [{ type: 'text', data: 'after' }] }),
            ]);
        });
    });

    describe('reconnecting', () => {
        it('should reconnect a dropped target and replay the first message to it', async () => {
            start([T1, T2]);
            await connectWith([T1, T2]);

            connector.latest(T1)?.drop();
            await waitFor(() => connector.socketsFor(T1).length === 2 && connector.latest(T1)?.sent.length === 1);

            expect(connector.latest(T1)?.sentPayloads()).toEqual([LIFECYCLE]);
            expect(connector.latest(T2)?.sent).toHaveLength(1);
        });

        it('should retry a target that failed its first connect', async () => {
            connector.failNext(T1, 2);
            start([T1]);
            client.receive(LIFECYCLE);

            await waitFor(() => connector.latest(T1)?.sent.length === 1);
            expect(connector.attempts(T1)).toBe(3);
        });

        it('should slow down after the fast attempts run out', async () => {
            connector.failNext(T1, 1000);
            start([T1], undefined, {
                reconnect: { initialDelayMs: 0, fastAttempts: 2, fastIntervalMs: 5, slowIntervalMs: 60_000 },
            });
            client.receive(LIFECYCLE);

            // the first connect, then two fast retries
            await waitFor(() => connector.attempts(T1) === 3);
            await delay(60);
            expect(connector.attempts(T1)).toBe(3);
        });

        it('should stop retrying once the client is gone', async () => {
            connector.failNext(T1, 1000);
            start([T1]);
            client.receive(LIFECYCLE);
            await waitFor(() => connector.attempts(T1) >= 2);

            client.drop();
            await waitFor(() => connection.isStopped);
            const attempts = connector.attempts(T1);
            await delay(40);
            expect(connector.attempts(T1)).toBe(attempts);
        });
    });

    describe('reloadTargets', () => {
        it('should replace the targets without reconnecting the old ones', async () => {
            const T3 = 'ws://t3.test/onebot';
            start([T1, T2]);
            await connectWith([T1, T2]);
            const old = [connector.latest(T1), connector.latest(T2)];

            await connection.reloadTargets(connectionConfig([T3]));
            await waitFor(() => connector.latest(T3)?.sent.length === 1);

            expect(old.map((socket) => socket?.isOpen)).toEqual([false, false]);
            await delay(20);
            expect(connector.attempts(T1)).toBe(1);
            expect(connection.targets.map((slot) => slot.url)).toEqual([T3]);
        });

        it('should not connect before the first message', async () => {
            start([T1]);
            await connection.reloadTargets(connectionConfig([T2]));
            expect(connector.calls).toHaveLength(0);
        });
    });

    describe('stop', () => {
        it('should close targets and the client once', async () => {
            start([T1]);
            await connectWith([T1]);

            await Promise.all([connection.stop(), connection.stop()]);

            expect(connection.isStopped).toBe(true);
            expect(client.isOpen).toBe(false);
            expect(connector.latest(T1)?.isOpen).toBe(false);
            expect(stoppedCalls).toBe(1);
        });

        it('should stop when the client disconnects', async () => {
            start([T1]);
            await connectWith([T1]);

            client.drop();
            await waitFor(() => stoppedCalls === 1);
            expect(connector.latest(T1)?.isOpen).toBe(false);
        });
    });

    describe('status', () => {
        it('should report targets and counters', async () => {
            start([T1, { url: T2, disabled: true }]);
            await connectWith([T1]);

            const status = connection.status();
            expect(status.connectionId).toBe('a');
            expect(status.selfId).toBe(10);
            expect(status.remoteAddress).toBe('10.0.0.1');
            expect(status.targets).toEqual([
                { index: 1, url: T1, connected: true, sakoya: false, disabled: false },
                { index: 2, url: T2, connected: false, sakoya: false, disabled: true },
            ]);
            expect(status.received).toBe(1);
        });
    });

    describe('auth command', () => {
        function authHandler(): CommandHandler {
            const authManager = new AuthManager({
                getSecurityConfig: () => ({ authEnabled: true, maxAttempts: 3, banDurationMinutes: 30 }),
                store: new InMemoryAuthStore(),
                logger: logger.command,
            });
            return new CommandHandler({ authManager, getCommandPrefix: () => 'bs', logger: logger.command });
        }

        it('should answer the command itself and hold back messages of unauthenticated bots', async () => {
            start([T1], authHandler());
            await connectWith([T1]);

            client.receive(groupMessage('bs鉴权'));
            await waitFor(() => client.sent.length === 1);
            const reply = client.sentPayloads()[0];
            expect(reply?.action).toBe('send_group_msg');
            expect(typeof reply?.echo).toBe('string');

            client.receive(groupMessage('hello'));
            client.receive({ post_type: 'notice', notice_type: 'group_increase', self_id: 10 });
            await waitFor(() => connector.latest(T1)?.sent.length === 2);

            // only the lifecycle event and the notice reached the target
            expect(connector.latest(T1)?.sentPayloads()[1]).toMatchObject({ post_type: 'notice' });
        });

        it('should record the reply as sent once the client confirms it', async () => {
            start([T1], authHandler());
            await connectWith([T1]);

            client.receive(groupMessage('bs auth'));
            await waitFor(() => client.sent.length === 1);
            const echo = client.sentPayloads()[0]?.echo;

            client.receive({ status: 'ok', retcode: 0, data: { message_id: 5 }, echo });
            await waitFor(() => recorder.getCounters('a').sent === 1);
            expect(connector.latest(T1)?.sent).toHaveLength(1);
        });
    });
});

describe('pickForwardedHeaders', () => {
    it('should keep only the forwarded headers', () => {
        expect(
            pickForwardedHeaders({
                authorization: 'Bearer test-secret',
                'x-self-id': '10',
                host: 'relay.test',
                'x-client-role': ['Universal', 'Event'],
            })
        ).toEqual({ authorization: 'Bearer test-secret', 'x-self-id': '10', 'x-client-role': 'Universal, Event' });
    });
});

describe('buildTargetSlots', () => {
    it('should number targets from 1 and apply defaults', () => {
        const slots = buildTargetSlots([T1, { url: T2, sakoyaProtocol: true, headers: { 'x-a': '1' } }]);
        expect(slots.map(({ index, url, disabled, sakoya, headers }) => ({ index, url, disabled, sakoya, headers }))).toEqual([
            { index: 1, url: T1, disabled: false, sakoya: false, headers: {} },
            { index: 2, url: T2, disabled: false, sakoya: true, headers: { 'x-a': '1' } },
        ]);
    });
});
