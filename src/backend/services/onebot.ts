/**
 * OneBot v11 helpers
 *
 * Small, pure functions for inspecting payloads that arrive as loosely
 * typed JSON: type guards, message segment access, CQ-code rendering.
 */

import type { ApiResponse, MessageSegment, OneBotPayload } from '../../shared/types';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a socket frame into a JSON object.
 * Returns null for non-JSON text and for JSON that is not an object.
 */
export function parseJsonObject(text: string): OneBotPayload | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    return isRecord(parsed) ? parsed : null;
}

export function stringField(payload: Record<string, unknown>, key: string): string {
    const value = payload[key];
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'bigint') {
        return String(value);
    }
    return '';
}

export function hasEcho(payload: OneBotPayload): boolean {
    const echo = payload.echo;
    return echo !== undefined && echo !== null && echo !== '';
}

/**
 * The echo as a cache key, or null when the payload has none.
 * Frameworks send strings, numbers or even objects.
 */
export function echoText(payload: OneBotPayload): string | null {
    if (!hasEcho(payload)) {
        return null;
    }
    const echo = payload.echo;
    return typeof echo === 'string' ? echo : JSON.stringify(echo);
}

/**
 * An API response carries `status` and `retcode` (and usually `echo`).
 */
export function isApiResponse(payload: OneBotPayload): payload is OneBotPayload & ApiResponse {
    return typeof payload.status === 'string' && typeof payload.retcode === 'number';
}

export function isApiCallSucceeded(payload: OneBotPayload): boolean {
    return isApiResponse(payload) && payload.status === 'ok' && payload.retcode === 0;
}

export function isMessageEvent(payload: OneBotPayload): boolean {
    return payload.post_type === 'message';
}

export function isMetaEvent(payload: OneBotPayload): boolean {
    return payload.post_type === 'meta_event';
}

/**
 * `send_msg`, `send_group_msg`, `send_private_msg`, `send_group_forward_msg`...
 */
export function isSendAction(action: string): boolean {
    return action.includes('send');
}

export function isSendMessageAction(action: string): boolean {
    return action.includes('send') && action.includes('_msg');
}

/**
 * Normalizes the `message` field of an event or API call into segments.
 * A plain string becomes a single text segment.
 */
export function toSegments(message: unknown): MessageSegment[] {
    if (typeof message === 'string') {
        return [{ type: 'text', data: { text: message } }];
    }
    if (!Array.isArray(message)) {
        return [];
    }

    const segments: MessageSegment[] = [];
    for (const item of message) {
        if (isRecord(item) && typeof item.type === 'string') {
            segments.push({ type: item.type, data: isRecord(item.data) ? item.data : {} });
        }
    }
    return segments;
}

/**
 * Concatenated text of all text segments.
 */
export function plainText(segments: MessageSegment[]): string {
    return segments
        .filter((segment) => segment.type === 'text')
        .map((segment) => stringField(segment.data, 'text'))
        .join('');
}

function escapeCq(text: string, inParam: boolean): string {
    let escaped = text.replace(/&/g, '&amp;').replace(/\[/g, '&#91;').replace(/\]/g, '&#93;');
    if (inParam) {
        escaped = escaped.replace(/,/g, '&#44;');
    }
    return escaped;
}

function cqValue(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (value === null || value === undefined) {
        return '';
    }
    return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Renders segments as a CQ-code string, the `raw_message` form:
 * text stays text, everything else becomes `[CQ:type,key=value,...]`.
 */
export function messageToRaw(message: unknown): string {
    return toSegments(message)
        .map((segment) => {
            if (segment.type === 'text') {
                return escapeCq(stringField(segment.data, 'text'), false);
            }
            const params = Object.entries(segment.data)
                .map(([key, value]) => `,${key}=${escapeCq(cqValue(value), true)}`)
                .join('');
            return `[CQ:${segment.type}${params}]`;
        })
        .join('');
}

/**
 * Numeric id for OneBot fields; anything that isn't all digits maps to 0.
 */
export function toNumericId(value: unknown): number {
    const text = typeof value === 'number' ? String(value) : typeof value === 'string' ? value : '';
    return /^\d+$/.test(text) ? Number(text) : 0;
}

/**
 * Builds a reply API call addressed to the source of a message event.
 */
export function buildReply(event: OneBotPayload, text: string, echo?: string): OneBotPayload {
    const message: MessageSegment[] = [{ type: 'text', data: { text } }];
    const reply: OneBotPayload =
        event.message_type === 'group'
            ? { action: 'send_group_msg', params: { group_id: event.group_id, message } }
            : { action: 'send_private_msg', params: { user_id: event.user_id, message } };
    if (echo) {
        reply.echo = echo;
    }
    return reply;
}
