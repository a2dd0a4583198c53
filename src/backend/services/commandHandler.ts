/**
 * Command Handler
 *
 * Inspects client events before they are relayed. The only built-in command
 * is authentication (`<prefix>鉴权`, `<prefix>auth`, `<prefix>authenticate`):
 * - no argument: issue a temporary key for the bot
 * - with a key: verify it
 *
 * While auth is enabled, message events of a bot that hasn't authenticated
 * are held back from the targets.
 */

import type { Logger } from 'pino';
import type { OneBotPayload } from '../../shared/types';
import type { AuthManager } from './authManager';
import { buildReply, isMessageEvent, plainText, stringField, toSegments } from './onebot';
import { newEcho } from './sakoyaConverter';

export const AUTH_COMMAND_NAMES: readonly string[] = ['鉴权', 'auth', 'authenticate'];

export type CommandOutcome =
    | { action: 'forward' }
    | { action: 'reply'; reply: OneBotPayload }
    | { action: 'drop'; reason: string };

export interface ParsedCommand {
    name: string;
    args: string[];
}

export interface CommandHandlerDeps {
    authManager: AuthManager;
    getCommandPrefix: () => string;
    logger: Logger;
}

/**
 * Splits `<prefix><name> [args...]` into name and arguments.
 * Returns null when the text doesn't start with the prefix.
 */
export function parseCommand(text: string, prefix: string): ParsedCommand | null {
    const trimmed = text.trim();
    if (!prefix || !trimmed.startsWith(prefix)) {
        return null;
    }
    const [name, ...args] = trimmed.slice(prefix.length).trim().split(/\s+/);
    if (!name) {
        return null;
    }
    return { name, args };
}

export class CommandHandler {
    private readonly authManager: AuthManager;
    private readonly getCommandPrefix: () => string;
    private readonly logger: Logger;

    constructor(deps: CommandHandlerDeps) {
        this.authManager = deps.authManager;
        this.getCommandPrefix = deps.getCommandPrefix;
        this.logger = deps.logger;
    }

    async handle(event: OneBotPayload): Promise<CommandOutcome> {
        if (!isMessageEvent(event)) {
            return { action: 'forward' };
        }

        const botId = stringField(event, 'self_id');
        const command = parseCommand(plainText(toSegments(event.message)), this.getCommandPrefix());

        if (command && AUTH_COMMAND_NAMES.includes(command.name)) {
            const text = await this.runAuthCommand(botId, command.args[0]);
            this.logger.info(
                { botId, userId: stringField(event, 'user_id'), withKey: command.args.length > 0 },
                `Auth command from bot ${botId}`
            );
            return { action: 'reply', reply: buildReply(event, text, newEcho()) };
        }

        if (!(await this.authManager.isBotAuthenticated(botId))) {
            this.logger.debug({ botId }, 'Holding back message of unauthenticated bot');
            return { action: 'drop', reason: 'unauthenticated' };
        }

        return { action: 'forward' };
    }

    private async runAuthCommand(botId: string, key: string | undefined): Promise<string> {
        if (!this.authManager.isAuthEnabled()) {
            return '未启用密钥鉴权功能，无需验证';
        }

        if (!key) {
            this.authManager.generateTempKey(botId);
            return [
                `已为Bot ${botId} 生成临时验证密钥`,
                '',
                '密钥有效期3分钟',
                '请通过管理接口 GET /api/auth/keys 查看密钥',
                '',
                '请使用以下指令验证：',
                `${this.getCommandPrefix()}${AUTH_COMMAND_NAMES[0]} <密钥>`,
            ].join('\n');
        }

        const result = await this.authManager.verifyKey(botId, key);
        return result.message;
    }
}

export function createCommandHandler(deps: CommandHandlerDeps): CommandHandler {
    return new CommandHandler(deps);
}
