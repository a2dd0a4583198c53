/**
 * Sakoya <-> OneBot v11 conversion
 *
 * Four pure conversions:
 * - onebotEventToSakoya: OneBot message event -> MessageReceive (to the backend)
 * - onebotApiToSakoya:   OneBot send_*_msg call -> MessageSend (to the backend)
 * - sakoyaSendToOnebotApi: MessageSend -> OneBot send_*_msg call (from the backend)
 * - sakoyaToOnebot:      MessageReceive -> OneBot message event (from the backend)
 */

import { v4 as uuidv4 } from 'uuid';
import type { MessageSegment, OneBotPayload } from '../../shared/types';
import { isRecord, stringField, toNumericId, toSegments } from './onebot';
import {
    DEFAULT_BOT_ID,
    sakoyaImageSchema,
    type MessageReceive,
    type MessageSend,
    type SakoyaSegment,
} from './sakoyaModels';

const BASE64_PREFIX = 'base64://';

/**
 * Wire shape of an outgoing MessageReceive. `group_id` is only present for groups.
 */
export interface SakoyaReceiveFrame {
    bot_id: string;
    bot_self_id: string;
    msg_id: string;
    user_type: 'group' | 'direct';
    group_id?: string;
    user_id: string;
    sender: { nickname: string; card: string };
    user_pm: number;
    content: SakoyaSegment[];
}

export interface SakoyaSendFrame {
    bot_id: string;
    bot_self_id: string;
    msg_id: string;
    target_type: 'group' | 'direct';
    target_id: string;
    content: SakoyaSegment[];
}

function str(value: unknown): string {
    if (value === undefined || value === null) {
        return '';
    }
    if (typeof value === 'string') {
        return value;
    }
    return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Image reference in the Sakoya object form, chosen from a OneBot `file` value.
 */
function imageObject(file: string): { type: 'b64' | 'url' | 'file'; content: string } {
    if (file.startsWith(BASE64_PREFIX)) {
        return { type: 'b64', content: file.slice(BASE64_PREFIX.length) };
    }
    if (file.startsWith('http')) {
        return { type: 'url', content: file };
    }
    return { type: 'file', content: file };
}

function withBase64Prefix(content: string): string {
    return content.startsWith(BASE64_PREFIX) ? content : `${BASE64_PREFIX}${content}`;
}

// ============================================================================
// OneBot -> Sakoya
// ============================================================================

/**
 * Converts a OneBot message event into a MessageReceive frame.
 * Returns null for anything that is not a message event.
 */
export function onebotEventToSakoya(event: OneBotPayload, botId: string = DEFAULT_BOT_ID): SakoyaReceiveFrame | null {
    if (event.post_type !== 'message') {
        return null;
    }

    const isGroup = event.message_type === 'group';
    const content: SakoyaSegment[] = [];

    for (const segment of toSegments(event.message)) {
        const data = segment.data;
        switch (segment.type) {
            case 'text':
                content.push({ type: 'text', data: str(data.text) });
                break;
            case 'at':
                content.push({ type: 'at', data: str(data.qq) });
                break;
            case 'image':
                // url is resolvable by the backend; file may only be a local name
                content.push({ type: 'image', data: stringField(data, 'url') || stringField(data, 'file') });
                break;
            case 'record':
                content.push({ type: 'record', data: str(data.file) });
                break;
            case 'reply':
                content.push({ type: 'reply', data: str(data.id) });
                break;
            default:
                content.push({ type: 'text', data: str(data) });
        }
    }

    // Some implementations (NapCat) inline the quoted message under `reply`
    if (isRecord(event.reply)) {
        for (const segment of toSegments(event.reply.message)) {
            if (segment.type !== 'image' || Object.keys(segment.data).length === 0) {
                continue;
            }
            content.push({ type: 'image', data: imageObject(stringField(segment.data, 'file')) });
        }
    }

    const sender = isRecord(event.sender) ? event.sender : {};
    const frame: SakoyaReceiveFrame = {
        bot_id: botId,
        bot_self_id: str(event.self_id),
        msg_id: str(event.message_id),
        user_type: isGroup ? 'group' : 'direct',
        user_id: str(event.user_id),
        sender: {
            nickname: str(sender.nickname),
            card: str(sender.card),
        },
        user_pm: 3,
        content,
    };

    if (isGroup) {
        frame.group_id = str(event.group_id);
    }

    return frame;
}

/**
 * Converts a OneBot send-message API call into a MessageSend frame.
 */
export function onebotApiToSakoya(
    call: OneBotPayload,
    botId: string = DEFAULT_BOT_ID,
    selfId: string = ''
): SakoyaSendFrame {
    const params = isRecord(call.params) ? call.params : {};
    const isGroup =
        params.message_type === 'group' ||
        (params.message_type === undefined && call.action === 'send_group_msg');

    const content: SakoyaSegment[] = [];
    for (const segment of toSegments(params.message)) {
        const data = segment.data;
        switch (segment.type) {
            case 'text':
                content.push({ type: 'text', data: str(data.text) });
                break;
            case 'at':
                content.push({ type: 'at', data: str(data.qq) });
                break;
            case 'image':
                content.push({ type: 'image', data: imageObject(stringField(data, 'file')) });
                break;
            case 'record':
                content.push({ type: 'record', data: str(data.file) });
                break;
            case 'file': {
                const file = stringField(data, 'file');
                const name = stringField(data, 'name') || 'unknown';
                if (file.startsWith(BASE64_PREFIX)) {
                    content.push({ type: 'file', data: `${name}|${file.slice(BASE64_PREFIX.length)}` });
                } else {
                    content.push({ type: 'text', data: `[文件: ${name}]` });
                }
                break;
            }
            case 'reply':
                content.push({ type: 'reply', data: str(data.id) });
                break;
            case 'forward':
            case 'node':
                content.push({ type: 'text', data: '[合并转发消息暂不支持]' });
                break;
            default:
                content.push({ type: 'text', data: str(data) });
        }
    }

    return {
        bot_id: botId,
        bot_self_id: str(call.self_id) || selfId,
        msg_id: '',
        target_type: isGroup ? 'group' : 'direct',
        target_id: isGroup ? str(params.group_id) : str(params.user_id),
        content,
    };
}

// ============================================================================
// Sakoya -> OneBot
// ============================================================================

function imageSegmentFromSakoya(data: unknown): MessageSegment | null {
    if (isRecord(data)) {
        const parsed = sakoyaImageSchema.safeParse(data);
        if (!parsed.success) {
            return null;
        }
        const { type, content } = parsed.data;
        return { type: 'image', data: { file: type === 'b64' ? withBase64Prefix(content) : content } };
    }
    const text = str(data);
    return text ? { type: 'image', data: { file: text } } : null;
}

/**
 * Sakoya files are `{name}|{base64}`.
 */
function fileSegmentFromSakoya(data: unknown): MessageSegment | null {
    if (typeof data !== 'string') {
        return null;
    }
    const separator = data.indexOf('|');
    if (separator === -1) {
        return null;
    }
    return {
        type: 'file',
        data: { file: `${BASE64_PREFIX}${data.slice(separator + 1)}`, name: data.slice(0, separator) },
    };
}

/**
 * Converts a MessageSend frame into a OneBot send API call.
 * Returns null when the frame only carries `log_*` segments, which are
 * console output of the backend and not meant for delivery.
 */
export function sakoyaSendToOnebotApi(message: MessageSend, echo: string = newEcho()): OneBotPayload | null {
    const isGroup = message.target_type === 'group';
    const segments: MessageSegment[] = [];
    const content = message.content ?? [];
    let logOnly = content.length > 0;

    for (const item of content) {
        const type = item.type ?? '';
        if (type.startsWith('log_')) {
            continue;
        }
        logOnly = false;

        switch (type) {
            case 'text':
                segments.push({ type: 'text', data: { text: str(item.data) } });
                break;
            case 'at':
                segments.push({ type: 'at', data: { qq: str(item.data) } });
                break;
            case 'image': {
                const image = imageSegmentFromSakoya(item.data);
                if (image) {
                    segments.push(image);
                }
                break;
            }
            case 'reply':
                segments.push({ type: 'reply', data: { id: str(item.data) } });
                break;
            case 'record':
                segments.push({ type: 'record', data: { file: str(item.data) } });
                break;
            case 'file': {
                const file = fileSegmentFromSakoya(item.data);
                if (file) {
                    segments.push(file);
                }
                break;
            }
            case 'markdown':
                segments.push({ type: 'text', data: { text: str(item.data) } });
                break;
            default:
                if (item.data) {
                    segments.push({ type: 'text', data: { text: str(item.data) } });
                }
        }
    }

    if (logOnly) {
        return null;
    }

    // Implementations reject an empty message array
    if (segments.length === 0) {
        segments.push({ type: 'text', data: { text: '' } });
    }

    const targetId = toNumericId(message.target_id);
    return isGroup
        ? { action: 'send_group_msg', params: { group_id: targetId, message: segments }, echo }
        : { action: 'send_private_msg', params: { user_id: targetId, message: segments }, echo };
}

/**
 * Converts a MessageReceive frame into a OneBot message event.
 */
export function sakoyaToOnebot(
    message: MessageReceive,
    nowSeconds: number = Math.floor(Date.now() / 1000)
): OneBotPayload {
    const isGroup = message.user_type === 'group';
    const segments: MessageSegment[] = [];
    const raw: string[] = [];

    for (const item of message.content) {
        switch (item.type) {
            case 'text':
            case 'markdown': {
                const text = str(item.data);
                segments.push({ type: 'text', data: { text } });
                raw.push(text);
                break;
            }
            case 'at': {
                const qq = str(item.data);
                segments.push({ type: 'at', data: { qq } });
                raw.push(`@${qq}`);
                break;
            }
            case 'image': {
                if (isRecord(item.data)) {
                    const image = imageSegmentFromSakoya(item.data);
                    if (image) {
                        segments.push(image);
                    }
                }
                raw.push('[图片]');
                break;
            }
            case 'reply':
                segments.push({ type: 'reply', data: { id: str(item.data) } });
                raw.push('[回复]');
                break;
            case 'record':
                if (typeof item.data === 'string') {
                    segments.push({ type: 'record', data: { file: item.data } });
                }
                raw.push('[语音]');
                break;
            case 'file': {
                const file = fileSegmentFromSakoya(item.data);
                if (file) {
                    segments.push(file);
                }
                raw.push('[文件]');
                break;
            }
            case 'node':
                // Forwarded nodes only contribute their text to raw_message
                if (Array.isArray(item.data)) {
                    for (const node of item.data) {
                        for (const sub of toSegments(node)) {
                            if (sub.type === 'text') {
                                raw.push(stringField(sub.data, 'text'));
                            }
                        }
                    }
                }
                break;
            case 'buttons':
                raw.push('[按钮消息]');
                break;
            default:
                if (item.data) {
                    raw.push(str(item.data));
                }
        }
    }

    const sender = message.sender;
    const userId = toNumericId(message.user_id);
    const onebotSender = {
        user_id: userId,
        nickname: str(sender.nickname),
        card: str(sender.card),
        sex: sender.sex ?? 'unknown',
        age: sender.age ?? 0,
        area: sender.area ?? '',
        level: sender.level ?? '',
        role: sender.role ?? 'member',
        title: sender.title ?? '',
    };

    const event: OneBotPayload = {
        post_type: 'message',
        message_type: isGroup ? 'group' : 'private',
        sub_type: isGroup ? 'normal' : 'friend',
        message_id: toNumericId(message.msg_id),
        user_id: userId,
        raw_message: raw.join(''),
        message: segments,
        font: 0,
        sender: onebotSender,
        time: nowSeconds,
        self_id: toNumericId(message.bot_self_id),
    };

    if (isGroup) {
        event.group_id = toNumericId(message.group_id);
    }

    return event;
}

export function newEcho(): string {
    return uuidv4().replace(/-/g, '');
}
