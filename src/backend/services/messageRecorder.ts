/**
 * Message Recorder
 *
 * Writes relayed traffic to the `message` log channel and keeps per-connection
 * RECV/SEND counters for the status API.
 *
 * RECV is what the bot account received (events from the client); SEND is
 * what it sent, rebuilt from the API call a target issued.
 */

import type { MessageDirection, OneBotPayload } from '../../shared/types';
import type { AppLogger } from '../utils/logger';
import { truncateForLog } from '../utils/logger';
import { isRecord, messageToRaw, stringField } from './onebot';

export const SENT_SENDER_NICKNAME = 'BS Bot Send';

export interface MessageCounters {
    received: number;
    sent: number;
}

/**
 * Rebuilds a message record from a send API call: the call's params plus
 * `self_id`, a default sender, `post_type: 'message_sent'` and `raw_message`.
 * Returns null for actions that don't send anything.
 */
export function buildSentRecord(
    call: OneBotPayload,
    selfId: number | null,
    extra: Record<string, unknown> = {}
): OneBotPayload | null {
    const action = stringField(call, 'action');
    if (!action.includes('send')) {
        return null;
    }

    const params = isRecord(call.params) ? call.params : {};
    const record: OneBotPayload = { ...params, self_id: selfId };
    if (!('sender' in record)) {
        record.sender = { user_id: selfId, nickname: SENT_SENDER_NICKNAME };
    }
    record.post_type = 'message_sent';
    record.raw_message = messageToRaw(params.message);
    return { ...record, ...extra };
}

/**
 * `<type>` and `<extra>` parts of a traffic line.
 */
function describe(payload: OneBotPayload): { type: string; summary: string; extra: string } {
    const postType = stringField(payload, 'post_type');
    const ids = [
        ['user', stringField(payload, 'user_id')],
        ['group', stringField(payload, 'group_id')],
    ]
        .filter(([, value]) => value)
        .map(([key, value]) => `${key}=${value}`)
        .join(' ');

    switch (postType) {
        case 'message':
        case 'message_sent': {
            const raw = stringField(payload, 'raw_message') || messageToRaw(payload.message);
            return { type: stringField(payload, 'message_type') || postType, summary: truncateForLog(raw), extra: ids };
        }
        case 'notice':
            return { type: `notice.${stringField(payload, 'notice_type')}`, summary: '', extra: ids };
        case 'request':
            return { type: `request.${stringField(payload, 'request_type')}`, summary: '', extra: ids };
        case 'meta_event':
            return { type: `meta.${stringField(payload, 'meta_event_type')}`, summary: '', extra: '' };
        default:
            if ('retcode' in payload) {
                return {
                    type: 'api_response',
                    summary: `status=${stringField(payload, 'status')} retcode=${stringField(payload, 'retcode')}`,
                    extra: '',
                };
            }
            return { type: stringField(payload, 'action') || 'unknown', summary: '', extra: ids };
    }
}

export class MessageRecorder {
    private readonly counters = new Map<string, MessageCounters>();

    constructor(private readonly logger: AppLogger) {}

    recordReceived(connectionId: string, payload: OneBotPayload): void {
        this.record(connectionId, 'RECV', payload);
    }

    recordSent(connectionId: string, record: OneBotPayload): void {
        this.record(connectionId, 'SEND', record);
    }

    getCounters(connectionId: string): MessageCounters {
        return { ...(this.counters.get(connectionId) ?? { received: 0, sent: 0 }) };
    }

    forget(connectionId: string): void {
        this.counters.delete(connectionId);
    }

    private record(connectionId: string, direction: MessageDirection, payload: OneBotPayload): void {
        const counters = this.counters.get(connectionId) ?? { received: 0, sent: 0 };
        if (direction === 'RECV') {
            counters.received += 1;
        } else {
            counters.sent += 1;
        }
        this.counters.set(connectionId, counters);

        const { type, summary, extra } = describe(payload);
        // Heartbeats and API responses would flood the info level
        const level = type.startsWith('meta.') || type === 'api_response' ? 'debug' : 'info';
        this.logger.logMessage(direction, type, summary, [`conn=${connectionId}`, extra].filter(Boolean).join(' '), level);
    }
}
