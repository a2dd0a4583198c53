/**
 * Sakoya Adapter
 *
 * Wraps the socket of a Sakoya (gscore) target so the proxy connection can
 * keep speaking OneBot v11 to it. Outgoing frames are converted to Sakoya and
 * sent as binary; incoming Sakoya frames are converted back to OneBot.
 */

import type { Logger } from 'pino';
import type { MessageSegment, OneBotPayload } from '../../shared/types';
import type { ProxySocket } from '../clients/wsClient';
import { truncateForLog } from '../utils/logger';
import { isRecord, isSendMessageAction, parseJsonObject, stringField, toSegments } from './onebot';
import { onebotApiToSakoya, onebotEventToSakoya, sakoyaSendToOnebotApi, sakoyaToOnebot } from './sakoyaConverter';
import { messageReceiveSchema, messageSendSchema, PASSTHROUGH_ACTIONS } from './sakoyaModels';

export const REPLY_CACHE_SIZE = 100;

export class SakoyaTargetSocket implements ProxySocket {
    /** message_id -> segments of recently seen messages, oldest first */
    private readonly recentMessages = new Map<string, MessageSegment[]>();

    constructor(
        private readonly inner: ProxySocket,
        readonly botId: string,
        private readonly logger: Logger
    ) {}

    get isOpen(): boolean {
        return this.inner.isOpen;
    }

    get remoteAddress(): string | undefined {
        return this.inner.remoteAddress;
    }

    close(code?: number, reason?: string): Promise<void> {
        return this.inner.close(code, reason);
    }

    onClose(listener: (code: number, reason: string) => void): void {
        this.inner.onClose(listener);
    }

    /**
     * Sends a OneBot frame, converted to Sakoya where a conversion applies.
     * Meta events are dropped.
     */
    async send(data: string | Buffer): Promise<void> {
        const text = typeof data === 'string' ? data : data.toString('utf-8');
        const payload = parseJsonObject(text);
        if (!payload) {
            await this.inner.send(Buffer.from(text, 'utf-8'));
            return;
        }

        let converted: string | null;
        try {
            converted = this.toSakoya(payload);
        } catch (error) {
            this.logger.error({ err: error, botId: this.botId }, 'Sakoya conversion failed, sending OneBot payload as is');
            converted = text;
        }

        if (converted !== null) {
            await this.inner.send(Buffer.from(converted, 'utf-8'));
        }
    }

    onMessage(listener: (text: string) => void): void {
        this.inner.onMessage((text) => {
            const converted = this.fromSakoya(text);
            if (converted !== null) {
                listener(converted);
            }
        });
    }

    /**
     * @returns the text to send, or null to drop the frame
     */
    private toSakoya(payload: OneBotPayload): string | null {
        if ('echo' in payload || 'retcode' in payload || 'status' in payload) {
            return JSON.stringify(payload);
        }

        if (payload.post_type === 'meta_event') {
            this.logger.trace({ botId: this.botId }, 'Dropping meta event for Sakoya target');
            return null;
        }

        if (payload.post_type === 'message') {
            const frame = onebotEventToSakoya(this.completeReplyImages(payload), this.botId);
            if (!frame) {
                this.logger.warn({ botId: this.botId }, 'Message event could not be converted to Sakoya');
                return JSON.stringify(payload);
            }
            return JSON.stringify(frame);
        }

        const action = stringField(payload, 'action');
        if (PASSTHROUGH_ACTIONS.has(action) || !isSendMessageAction(action)) {
            return JSON.stringify(payload);
        }

        return JSON.stringify(onebotApiToSakoya(payload, this.botId));
    }

    /**
     * Remembers the event's segments and, when it quotes a remembered message
     * that carried images, puts those images in front and drops the reply
     * segment. Returns a new event; the input is not modified.
     */
    private completeReplyImages(event: OneBotPayload): OneBotPayload {
        const segments = toSegments(event.message);
        const messageId = stringField(event, 'message_id');
        if (messageId) {
            this.recentMessages.set(messageId, segments);
            if (this.recentMessages.size > REPLY_CACHE_SIZE) {
                const oldest = this.recentMessages.keys().next();
                if (!oldest.done) {
                    this.recentMessages.delete(oldest.value);
                }
            }
        }

        const reply = segments.find((segment) => segment.type === 'reply');
        if (!reply) {
            return event;
        }

        const replyId = stringField(reply.data, 'id');
        const quoted = this.recentMessages.get(replyId);
        if (!quoted) {
            this.logger.debug({ botId: this.botId, replyId }, 'Quoted message not in cache');
            return event;
        }

        const images: MessageSegment[] = quoted
            .filter((segment) => segment.type === 'image')
            .map((segment) => {
                const url = stringField(segment.data, 'url');
                return url ? { type: 'image', data: { url } } : segment;
            });

        if (images.length === 0) {
            return event;
        }

        return {
            ...event,
            message: [...images, ...segments.filter((segment) => segment.type !== 'reply')],
        };
    }

    /**
     * @returns the OneBot text to hand to the relay, or null when the frame
     * carries nothing deliverable
     */
    private fromSakoya(text: string): string | null {
        const payload = parseJsonObject(text);
        if (!payload || !isSakoyaFrame(payload)) {
            return text;
        }

        try {
            if ('user_type' in payload) {
                const parsed = messageReceiveSchema.safeParse(payload);
                if (parsed.success) {
                    return JSON.stringify(sakoyaToOnebot(parsed.data));
                }
                this.logger.warn({ botId: this.botId, issues: parsed.error.issues }, 'Invalid Sakoya MessageReceive');
                return text;
            }

            const parsed = messageSendSchema.safeParse(payload);
            if (!parsed.success) {
                this.logger.warn({ botId: this.botId, issues: parsed.error.issues }, 'Invalid Sakoya MessageSend');
                return text;
            }

            const call = sakoyaSendToOnebotApi(parsed.data);
            if (!call) {
                this.logger.debug(
                    { botId: this.botId, content: truncateForLog(JSON.stringify(parsed.data.content)) },
                    'Sakoya log message, not delivered'
                );
                return null;
            }
            return JSON.stringify(call);
        } catch (error) {
            this.logger.error({ err: error, botId: this.botId }, 'Failed to convert Sakoya frame');
            return text;
        }
    }
}

/**
 * Checks whether the parsed object looks like a Sakoya frame at all.
 */
export function isSakoyaFrame(payload: unknown): boolean {
    return isRecord(payload) && (Array.isArray(payload.content) || 'target_type' in payload);
}
