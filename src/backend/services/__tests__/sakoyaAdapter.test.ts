/**
 * Sakoya Adapter Tests
 *
 * The adapter wraps a target socket; a FakeSocket stands in for the gscore side.
 */

import { FakeSocket } from '../../__tests__/fakes';
import { createSilentLogger } from '../../utils/logger';
import { isSakoyaFrame, SakoyaTargetSocket } from '../sakoyaAdapter';

function groupMessage(messageId: number, message: unknown[]) {
    return {
        post_type: 'message',
        message_type: 'group',
        group_id: 100,
        user_id: 200,
        self_id: 300,
        message_id: messageId,
        sender: { nickname: 'alice' },
        message,
    };
}

describe('SakoyaTargetSocket', () => {
    let inner: FakeSocket;
    let socket: SakoyaTargetSocket;

    beforeEach(() => {
        inner = new FakeSocket('ws://gs.test/ws/gs');
        socket = new SakoyaTargetSocket(inner, 'gs', createSilentLogger().ws);
    });

    describe('send', () => {
        it('should convert message events to MessageReceive', async () => {
            await socket.send(JSON.stringify(groupMessage(1, [{ type: 'text', data: { text: 'hi' } }])));

            const [frame] = inner.sentPayloads();
            expect(frame).toMatchObject({
                bot_id: 'gs',
                user_type: 'group',
                group_id: '100',
                user_id: '200',
                msg_id: '1',
                content: [{ type: 'text', data: 'hi' }],
            });
        });

        it('should drop meta events', async () => {
            await socket.send(JSON.stringify({ post_type: 'meta_event', meta_event_type: 'heartbeat' }));
            expect(inner.sent).toHaveLength(0);
        });

        it('should pass API responses through unchanged', async () => {
            const response = { status: 'ok', retcode: 0, data: { message_id: 1 }, echo: 'e1' };
            await socket.send(JSON.stringify(response));
            expect(inner.sentPayloads()).toEqual([response]);
        });

        it('should pass passthrough actions through unchanged', async () => {
            const call = { action: 'get_login_info', params: {} };
            await socket.send(JSON.stringify(call));
            expect(inner.sentPayloads()).toEqual([call]);
        });

        it('should convert send message calls to MessageSend', async () => {
            await socket.send(
                JSON.stringify({ action: 'send_private_msg', params: { user_id: 9, message: 'pong' } })
            );
            expect(inner.sentPayloads()).toEqual([
                {
                    bot_id: 'gs',
                    bot_self_id: '',
                    msg_id: '',
                    target_type: 'direct',
                    target_id: '9',
                    content: [{ type: 'text', data: 'pong' }],
                },
            ]);
        });

        it('should forward non-JSON text as is', async () => {
            await socket.send('plain text');
            expect(inner.sent).toEqual(['plain text']);
        });

        it('should put images of a quoted message in front of the reply', async () => {
            await socket.send(
                JSON.stringify(groupMessage(1, [{ type: 'image', data: { file: 'a.png', url: 'http://img.test/a.png' } }]))
            );
            await socket.send(
                JSON.stringify(
                    groupMessage(2, [
                        { type: 'reply', data: { id: '1' } },
                        { type: 'text', data: { text: 'look' } },
                    ])
                )
            );

            const frame = inner.sentPayloads()[1];
            expect(frame?.content).toEqual([
                { type: 'image', data: 'http://img.test/a.png' },
                { type: 'text', data: 'look' },
            ]);
        });

        it('should keep the reply segment when the quoted message is unknown', async () => {
            await socket.send(JSON.stringify(groupMessage(2, [{ type: 'reply', data: { id: '77' } }])));
            expect(inner.sentPayloads()[0]?.content).toEqual([{ type: 'reply', data: '77' }]);
        });
    });

    describe('onMessage', () => {
        let received: string[];

        beforeEach(() => {
            received = [];
            socket.onMessage((text) => received.push(text));
        });

        it('should convert MessageSend frames to send API calls', () => {
            inner.receive({
                bot_id: 'gs',
                target_type: 'group',
                target_id: '100',
                content: [{ type: 'text', data: 'done' }],
            });

            expect(received).toHaveLength(1);
            const call = JSON.parse(received[0] ?? '{}');
            expect(call.action).toBe('send_group_msg');
            expect(call.params).toEqual({ group_id: 100, message: [{ type: 'text', data: { text: 'done' } }] });
            expect(call.echo).toMatch(/^[0-9a-f]{32}$/);
        });

        it('should not deliver log-only frames', () => {
            inner.receive({ target_type: 'group', target_id: '100', content: [{ type: 'log_INFO', data: 'x' }] });
            expect(received).toHaveLength(0);
        });

        it('should convert MessageReceive frames to message events', () => {
            inner.receive({ user_type: 'direct', user_id: '200', content: [{ type: 'text', data: 'hi' }] });
            const event = JSON.parse(received[0] ?? '{}');
            expect(event.post_type).toBe('message');
            expect(event.message_type).toBe('private');
            expect(event.raw_message).toBe('hi');
        });

        it('should pass OneBot frames through', () => {
            const call = { action: 'get_group_list', params: {}, echo: 'e2' };
            inner.receive(call);
            expect(received).toEqual([JSON.stringify(call)]);
        });
    });

    it('should mirror the inner socket state', async () => {
        expect(socket.isOpen).toBe(true);
        expect(socket.remoteAddress).toBe('ws://gs.test/ws/gs');
        await socket.close();
        expect(socket.isOpen).toBe(false);
    });
});

describe('isSakoyaFrame', () => {
    it('should recognise content arrays and target_type', () => {
        expect(isSakoyaFrame({ content: [] })).toBe(true);
        expect(isSakoyaFrame({ target_type: 'group' })).toBe(true);
        expect(isSakoyaFrame({ action: 'send_msg' })).toBe(false);
        expect(isSakoyaFrame('text')).toBe(false);
    });
});
