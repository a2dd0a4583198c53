/**
 * Auth Manager
 *
 * Key-based authentication of bot accounts. When `security.authEnabled` is
 * on, a bot has to prove ownership before its messages reach any target:
 * 1. the bot runs the auth command and a temporary key is issued
 * 2. the operator reads the key from the HTTP API
 * 3. the bot runs the auth command again with the key
 *
 * Temporary keys live in memory only. Authentication state, failed attempts
 * and bans are persisted through an AuthStore.
 */

import { createHash, randomBytes } from 'crypto';
import type { Logger } from 'pino';
import type { AuthRecord, SecurityConfig, TempKeyInfo } from '../../shared/types';
import type { AuthStore } from '../storage/authStore';

export const TEMP_KEY_TTL_SECONDS = 180;
const TEMP_KEY_LENGTH = 20;

export type VerifyFailureReason = 'BANNED' | 'UNKNOWN_KEY' | 'FOREIGN_KEY';

export interface VerifyResult {
    success: boolean;
    message: string;
    reason?: VerifyFailureReason;
}

export interface AuthManagerDeps {
    /** Read on every call so config edits apply without a restart */
    getSecurityConfig: () => SecurityConfig;
    store: AuthStore;
    logger: Logger;
    /** Clock in milliseconds */
    now?: () => number;
}

function emptyRecord(botId: string): AuthRecord {
    return { botId, isAuthenticated: false, failedAttempts: 0, isBanned: false };
}

export class AuthManager {
    private readonly getSecurityConfig: () => SecurityConfig;
    private readonly store: AuthStore;
    private readonly logger: Logger;
    private readonly now: () => number;
    /** key -> owner and expiry */
    private readonly validKeys = new Map<string, TempKeyInfo>();

    constructor(deps: AuthManagerDeps) {
        this.getSecurityConfig = deps.getSecurityConfig;
        this.store = deps.store;
        this.logger = deps.logger;
        this.now = deps.now ?? Date.now;
    }

    isAuthEnabled(): boolean {
        return this.getSecurityConfig().authEnabled;
    }

    get maxAttempts(): number {
        return this.getSecurityConfig().maxAttempts;
    }

    get banDurationMinutes(): number {
        return this.getSecurityConfig().banDurationMinutes;
    }

    /**
     * Issues a temporary key for `botId`, valid for three minutes.
     * The key is the first 20 hex digits (upper case) of a SHA-256 over the
     * bot id, the issue time and 16 random bytes.
     */
    generateTempKey(botId: string): TempKeyInfo {
        const issuedAt = Math.floor(this.now() / 1000);
        const material = `${botId}:${issuedAt}:${randomBytes(16).toString('hex')}`;
        const key = createHash('sha256').update(material).digest('hex').slice(0, TEMP_KEY_LENGTH).toUpperCase();

        const info: TempKeyInfo = { key, botId, expiresAt: issuedAt + TEMP_KEY_TTL_SECONDS };
        this.validKeys.set(key, info);
        this.purgeExpiredKeys();

        this.logger.info(
            { botId, expiresAt: new Date(info.expiresAt * 1000).toISOString() },
            `Issued temporary key for bot ${botId}`
        );
        return info;
    }

    async verifyKey(botId: string, key: string): Promise<VerifyResult> {
        // Expired keys are gone after this, so they read as unknown
        this.purgeExpiredKeys();

        const record = await this.loadRecord(botId);
        if (record.isBanned && record.bannedUntil) {
            const remaining = Math.max(0, Math.floor((record.bannedUntil.getTime() - this.now()) / 60_000));
            return {
                success: false,
                reason: 'BANNED',
                message: `验证失败次数过多，已被封禁 ${remaining} 分钟`,
            };
        }

        const normalized = key.trim().toUpperCase();
        const info = this.validKeys.get(normalized);

        if (!info) {
            return this.recordFailedAttempt(record, 'UNKNOWN_KEY', '密钥无效或已过期');
        }
        if (info.botId !== botId) {
            return this.recordFailedAttempt(record, 'FOREIGN_KEY', '密钥不属于当前Bot');
        }

        this.validKeys.delete(normalized);
        await this.store.save({
            ...record,
            isAuthenticated: true,
            authenticatedAt: new Date(this.now()),
            failedAttempts: 0,
            isBanned: false,
            bannedUntil: undefined,
        });

        this.logger.info({ botId }, `Bot ${botId} authenticated`);
        return { success: true, message: '验证成功！该Bot已获得访问权限' };
    }

    /**
     * Always true while auth is disabled.
     */
    async isBotAuthenticated(botId: string): Promise<boolean> {
        if (!this.isAuthEnabled()) {
            return true;
        }
        const record = await this.store.get(botId);
        return record?.isAuthenticated ?? false;
    }

    async getAuthStatus(botId: string): Promise<AuthRecord | null> {
        const record = await this.store.get(botId);
        return record ? this.liftExpiredBan(record) : null;
    }

    async listAuthStatuses(): Promise<AuthRecord[]> {
        const records = await this.store.list();
        const result: AuthRecord[] = [];
        for (const record of records) {
            result.push(await this.liftExpiredBan(record));
        }
        return result;
    }

    /**
     * Logs a bot out by dropping its persisted state.
     *
     * @returns true if the bot had any state
     */
    async clearBotSession(botId: string): Promise<boolean> {
        const removed = await this.store.delete(botId);
        if (removed) {
            this.logger.info({ botId }, `Bot ${botId} logged out`);
        }
        return removed;
    }

    listValidKeys(): TempKeyInfo[] {
        this.purgeExpiredKeys();
        return [...this.validKeys.values()].map((info) => ({ ...info }));
    }

    private async loadRecord(botId: string): Promise<AuthRecord> {
        const record = await this.store.get(botId);
        return record ? this.liftExpiredBan(record) : emptyRecord(botId);
    }

    private async liftExpiredBan(record: AuthRecord): Promise<AuthRecord> {
        if (!record.isBanned || (record.bannedUntil && record.bannedUntil.getTime() > this.now())) {
            return record;
        }

        const lifted: AuthRecord = { ...record, isBanned: false, bannedUntil: undefined, failedAttempts: 0 };
        await this.store.save(lifted);
        this.logger.info({ botId: record.botId }, `Ban on bot ${record.botId} expired`);
        return lifted;
    }

    private async recordFailedAttempt(
        record: AuthRecord,
        reason: VerifyFailureReason,
        reasonText: string
    ): Promise<VerifyResult> {
        const now = new Date(this.now());
        const failedAttempts = record.failedAttempts + 1;
        const maxAttempts = this.maxAttempts;

        if (failedAttempts >= maxAttempts) {
            const banMinutes = this.banDurationMinutes;
            await this.store.save({
                ...record,
                failedAttempts,
                lastAttemptAt: now,
                isBanned: true,
                bannedUntil: new Date(now.getTime() + banMinutes * 60_000),
            });
            this.logger.warn({ botId: record.botId, failedAttempts }, `Bot ${record.botId} banned for ${banMinutes} minutes`);
            return { success: false, reason, message: `验证失败次数过多，已被封禁 ${banMinutes} 分钟` };
        }

        await this.store.save({ ...record, failedAttempts, lastAttemptAt: now });
        this.logger.info({ botId: record.botId, failedAttempts, reason }, 'Auth attempt failed');
        return {
            success: false,
            reason,
            message: `${reasonText}，还剩 ${maxAttempts - failedAttempts} 次尝试机会`,
        };
    }

    private purgeExpiredKeys(): void {
        const nowSeconds = this.now() / 1000;
        for (const [key, info] of this.validKeys) {
            if (nowSeconds > info.expiresAt) {
                this.validKeys.delete(key);
            }
        }
    }
}

export function createAuthManager(deps: AuthManagerDeps): AuthManager {
    return new AuthManager(deps);
}
