/**
 * Sakoya protocol models
 *
 * Sakoya is the WebSocket protocol spoken by gscore backends. Frames are JSON
 * objects in one of two shapes:
 * - MessageReceive: a user message reported to the backend
 * - MessageSend: a message the backend wants delivered
 *
 * All ids travel as strings.
 */

import { z } from 'zod';

export const sakoyaSegmentSchema = z.object({
    type: z.string().nullable().optional(),
    data: z.unknown().optional(),
});

export type SakoyaSegment = z.infer<typeof sakoyaSegmentSchema>;

export const sakoyaUserTypeSchema = z.enum(['group', 'direct', 'channel', 'sub_channel']);

export const messageReceiveSchema = z.object({
    bot_id: z.string().default('Bot'),
    bot_self_id: z.string().default(''),
    msg_id: z.string().default(''),
    user_type: sakoyaUserTypeSchema.default('group'),
    group_id: z.string().nullable().optional(),
    user_id: z.string().nullable().optional(),
    sender: z.record(z.unknown()).default({}),
    user_pm: z.number().int().default(3),
    content: z.array(sakoyaSegmentSchema).default([]),
});

export type MessageReceive = z.infer<typeof messageReceiveSchema>;

export const messageSendSchema = z.object({
    bot_id: z.string().default('Bot'),
    bot_self_id: z.string().default(''),
    msg_id: z.string().default(''),
    target_type: z.string().nullable().optional(),
    target_id: z.string().nullable().optional(),
    content: z.array(sakoyaSegmentSchema).nullable().optional(),
});

export type MessageSend = z.infer<typeof messageSendSchema>;

/**
 * Image payload inside a Sakoya segment: `{ type: 'url' | 'b64' | 'file', content }`.
 */
export const sakoyaImageSchema = z.object({
    type: z.enum(['url', 'b64', 'file']).default('url'),
    content: z.string().default(''),
});

export const DEFAULT_BOT_ID = 'Bot';

/**
 * Actions that Sakoya backends never need to see; they go out as plain OneBot.
 */
export const PASSTHROUGH_ACTIONS: ReadonlySet<string> = new Set([
    'get_login_info',
    'get_status',
    'get_version_info',
    'lifecycle',
    '_connect',
]);

/**
 * Sakoya endpoints live at `/ws/{botId}`.
 */
export function extractBotIdFromPath(path: string): string | null {
    if (!path) {
        return null;
    }
    const normalized = path.startsWith('/') ? path : `/${path}`;
    const parts = normalized.split('/');
    if (parts.length >= 3 && parts[1] === 'ws') {
        return parts[2] ?? null;
    }
    return null;
}

/**
 * Bot id for a Sakoya target URL, `Bot` when the path doesn't carry one.
 */
export function botIdFromUrl(url: string): string {
    try {
        return extractBotIdFromPath(new URL(url).pathname) || DEFAULT_BOT_ID;
    } catch {
        return DEFAULT_BOT_ID;
    }
}
