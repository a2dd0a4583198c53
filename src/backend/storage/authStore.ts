/**
 * Auth Store
 *
 * Persists the authentication state of bot accounts, one JSON file per bot
 * under `data/auth/`. Dates are stored as ISO strings and revived on read.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import type { AuthRecord, StoredAuthRecord } from '../../shared/types';

export interface AuthStore {
    get(botId: string): Promise<AuthRecord | null>;
    save(record: AuthRecord): Promise<void>;
    /**
     * @returns true if a record was removed
     */
    delete(botId: string): Promise<boolean>;
    list(): Promise<AuthRecord[]>;
}

export interface JsonFileAuthStoreConfig {
    storagePath: string;
    logger?: Logger;
}

const DEFAULT_STORAGE_PATH = path.join(process.cwd(), 'data', 'auth');

const PLAIN_BOT_ID = /^[A-Za-z0-9-]+$/;

/**
 * Bot ids are QQ numbers in practice and keep their name. Anything else is
 * hex-encoded behind a `_`, which plain names never contain.
 */
function fileNameFor(botId: string): string {
    if (PLAIN_BOT_ID.test(botId)) {
        return `${botId}.json`;
    }
    return `_${Buffer.from(botId, 'utf-8').toString('hex')}.json`;
}

export function serializeAuthRecord(record: AuthRecord): StoredAuthRecord {
    return {
        botId: record.botId,
        isAuthenticated: record.isAuthenticated,
        authenticatedAt: record.authenticatedAt?.toISOString(),
        failedAttempts: record.failedAttempts,
        lastAttemptAt: record.lastAttemptAt?.toISOString(),
        isBanned: record.isBanned,
        bannedUntil: record.bannedUntil?.toISOString(),
    };
}

export function deserializeAuthRecord(stored: StoredAuthRecord): AuthRecord {
    return {
        botId: stored.botId,
        isAuthenticated: stored.isAuthenticated,
        authenticatedAt: stored.authenticatedAt ? new Date(stored.authenticatedAt) : undefined,
        failedAttempts: stored.failedAttempts,
        lastAttemptAt: stored.lastAttemptAt ? new Date(stored.lastAttemptAt) : undefined,
        isBanned: stored.isBanned,
        bannedUntil: stored.bannedUntil ? new Date(stored.bannedUntil) : undefined,
    };
}

function isStoredAuthRecord(value: unknown): value is StoredAuthRecord {
    return (
        typeof value === 'object' &&
        value !== null &&
        'botId' in value &&
        typeof value.botId === 'string' &&
        'isAuthenticated' in value &&
        typeof value.isAuthenticated === 'boolean' &&
        'failedAttempts' in value &&
        typeof value.failedAttempts === 'number' &&
        'isBanned' in value &&
        typeof value.isBanned === 'boolean'
    );
}

export class JsonFileAuthStore implements AuthStore {
    private readonly storagePath: string;
    private readonly logger?: Logger;

    constructor(config?: Partial<JsonFileAuthStoreConfig>) {
        this.storagePath = config?.storagePath || DEFAULT_STORAGE_PATH;
        this.logger = config?.logger;
        fs.mkdirSync(this.storagePath, { recursive: true });
    }

    private filePath(botId: string): string {
        return path.join(this.storagePath, fileNameFor(botId));
    }

    async get(botId: string): Promise<AuthRecord | null> {
        const file = this.filePath(botId);
        if (!fs.existsSync(file)) {
            return null;
        }
        return this.readFile(file);
    }

    async save(record: AuthRecord): Promise<void> {
        const file = this.filePath(record.botId);
        const tempPath = `${file}.tmp`;
        await fs.promises.writeFile(tempPath, JSON.stringify(serializeAuthRecord(record), null, 2));
        await fs.promises.rename(tempPath, file);
    }

    async delete(botId: string): Promise<boolean> {
        const file = this.filePath(botId);
        if (!fs.existsSync(file)) {
            return false;
        }
        await fs.promises.unlink(file);
        return true;
    }

    async list(): Promise<AuthRecord[]> {
        const files = await fs.promises.readdir(this.storagePath);
        const records: AuthRecord[] = [];
        for (const file of files) {
            if (!file.endsWith('.json')) {
                continue;
            }
            const record = await this.readFile(path.join(this.storagePath, file));
            if (record) {
                records.push(record);
            }
        }
        records.sort((a, b) => a.botId.localeCompare(b.botId));
        return records;
    }

    /**
     * A corrupt file reads as "no record" so one bad file can't lock a bot out.
     */
    private async readFile(file: string): Promise<AuthRecord | null> {
        try {
            const parsed: unknown = JSON.parse(await fs.promises.readFile(file, 'utf-8'));
            if (!isStoredAuthRecord(parsed)) {
                this.logger?.warn({ file }, 'Ignoring malformed auth record');
                return null;
            }
            return deserializeAuthRecord(parsed);
        } catch (error) {
            this.logger?.error({ err: error, file }, 'Failed to read auth record');
            return null;
        }
    }
}

/**
 * Non-persistent store, for tests and for running without a data directory.
 */
export class InMemoryAuthStore implements AuthStore {
    private readonly records = new Map<string, AuthRecord>();

    async get(botId: string): Promise<AuthRecord | null> {
        const record = this.records.get(botId);
        return record ? { ...record } : null;
    }

    async save(record: AuthRecord): Promise<void> {
        this.records.set(record.botId, { ...record });
    }

    async delete(botId: string): Promise<boolean> {
        return this.records.delete(botId);
    }

    async list(): Promise<AuthRecord[]> {
        return [...this.records.values()]
            .map((record) => ({ ...record }))
            .sort((a, b) => a.botId.localeCompare(b.botId));
    }
}

export function createJsonFileAuthStore(config?: Partial<JsonFileAuthStoreConfig>): JsonFileAuthStore {
    return new JsonFileAuthStore(config);
}
