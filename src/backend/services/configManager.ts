/**
 * Config Manager
 *
 * Loads and persists the two configuration files of the relay:
 * - `global.json`: listener address, security, logging and reconnect timing
 * - `connections.json`: client endpoints and their targets, keyed by id
 *
 * Files are validated with zod. Missing files are created with defaults.
 * `BS_HOST`, `BS_PORT` and `LOG_LEVEL` override the file values in memory
 * only; they are never written back.
 *
 * Both files can be edited or re-read while the relay runs. Readers get the
 * current values on every call.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ConnectionConfig, ConnectionsConfig, GlobalConfig } from '../../shared/types';
import { envInt } from '../utils/env';

export enum ConfigErrorCode {
    INVALID_JSON = 'INVALID_JSON',
    VALIDATION_FAILED = 'VALIDATION_FAILED',
    NOT_LOADED = 'NOT_LOADED',
}

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly code: ConfigErrorCode,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

// ============================================================================
// Schemas
// ============================================================================

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const targetEndpointSchema = z.union([
    z.string().min(1),
    z.object({
        url: z.string().min(1),
        headers: z.record(z.string()).optional(),
        disabled: z.boolean().optional(),
        sakoyaProtocol: z.boolean().optional(),
    }),
]);

export const connectionConfigSchema = z.object({
    name: z.string().optional(),
    description: z.string().optional(),
    enabled: z.boolean().default(true),
    clientEndpoint: z.string().regex(/^ws:\/\//, 'clientEndpoint must start with ws://'),
    targetEndpoints: z.array(targetEndpointSchema).default([]),
});

export const connectionsConfigSchema = z.record(connectionConfigSchema);

export const globalConfigSchema = z.object({
    server: z
        .object({
            host: z.string().min(1).default('0.0.0.0'),
            port: z.number().int().min(1).max(65535).default(5111),
        })
        .default({}),
    commandPrefix: z.string().default('bs'),
    apiKey: z.string().min(16).optional(),
    security: z
        .object({
            authEnabled: z.boolean().default(false),
            maxAttempts: z.number().int().positive().default(3),
            banDurationMinutes: z.number().int().positive().default(30),
        })
        .default({}),
    logging: z
        .object({
            level: logLevelSchema.default('info'),
            toFiles: z.boolean().default(true),
        })
        .default({}),
    reconnect: z
        .object({
            initialDelayMs: z.number().int().nonnegative().default(5_000),
            fastAttempts: z.number().int().nonnegative().default(40),
            fastIntervalMs: z.number().int().nonnegative().default(3_000),
            slowIntervalMs: z.number().int().positive().default(600_000),
        })
        .default({}),
    replaceDelayMs: z.number().int().nonnegative().default(1_000),
    stopTimeoutMs: z.number().int().positive().default(5_000),
});

export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = globalConfigSchema.parse({});

// ============================================================================
// Manager
// ============================================================================

export interface ConfigManagerConfig {
    /** Directory holding global.json and connections.json */
    configDir: string;
    /** Environment used for overrides */
    env: NodeJS.ProcessEnv;
}

export class ConfigManager {
    private readonly configDir: string;
    private readonly env: NodeJS.ProcessEnv;
    private globalConfig: GlobalConfig | null = null;
    /** global.json as stored, before env overrides */
    private fileGlobalConfig: GlobalConfig | null = null;
    private connections: ConnectionsConfig | null = null;

    constructor(config: Partial<ConfigManagerConfig> = {}) {
        this.configDir = config.configDir ?? path.join(process.cwd(), 'config');
        this.env = config.env ?? process.env;
    }

    get globalFile(): string {
        return path.join(this.configDir, 'global.json');
    }

    get connectionsFile(): string {
        return path.join(this.configDir, 'connections.json');
    }

    /**
     * Reads both files, creating them with defaults when missing. Nothing
     * changes unless both files are valid.
     *
     * @throws ConfigError if a file is not valid JSON or fails validation
     */
    load(): void {
        fs.mkdirSync(this.configDir, { recursive: true });

        const rawGlobal = this.readOrCreate(this.globalFile, {});
        const rawConnections = this.readOrCreate(this.connectionsFile, {});

        const globalConfig = this.validate(globalConfigSchema, rawGlobal, this.globalFile);
        this.connections = this.validate(connectionsConfigSchema, rawConnections, this.connectionsFile);
        this.fileGlobalConfig = globalConfig;
        this.globalConfig = this.applyEnvOverrides(globalConfig);
    }

    getGlobalConfig(): GlobalConfig {
        if (!this.globalConfig) {
            throw new ConfigError('Configuration has not been loaded', ConfigErrorCode.NOT_LOADED);
        }
        return this.globalConfig;
    }

    getConnectionsConfig(): ConnectionsConfig {
        if (!this.connections) {
            throw new ConfigError('Configuration has not been loaded', ConfigErrorCode.NOT_LOADED);
        }
        return this.connections;
    }

    getConnection(connectionId: string): ConnectionConfig | undefined {
        return this.getConnectionsConfig()[connectionId];
    }

    /**
     * Validates and stores the global settings. Leaving `apiKey` out keeps the
     * current key.
     *
     * @returns the effective config, env overrides applied
     * @throws ConfigError with VALIDATION_FAILED when the input is rejected
     */
    saveGlobalConfig(input: unknown): GlobalConfig {
        const parsed = this.validate(globalConfigSchema, input, 'global config');
        const currentKey = this.fileGlobalConfig?.apiKey;
        const next: GlobalConfig =
            parsed.apiKey === undefined && currentKey !== undefined ? { ...parsed, apiKey: currentKey } : parsed;

        this.writeJson(this.globalFile, next);
        this.fileGlobalConfig = next;
        this.globalConfig = this.applyEnvOverrides(next);
        return this.globalConfig;
    }

    /**
     * Validates and stores a connection, replacing any existing one with the same id.
     *
     * @throws ConfigError with VALIDATION_FAILED when the input is rejected
     */
    saveConnection(connectionId: string, input: unknown): ConnectionConfig {
        const connection = this.validate(connectionConfigSchema, input, `connection "${connectionId}"`);
        const next = { ...this.getConnectionsConfig(), [connectionId]: connection };
        this.writeJson(this.connectionsFile, next);
        this.connections = next;
        return connection;
    }

    /**
     * @returns true if deleted, false if the connection didn't exist
     */
    deleteConnection(connectionId: string): boolean {
        const current = this.getConnectionsConfig();
        if (!(connectionId in current)) {
            return false;
        }
        const next = { ...current };
        delete next[connectionId];
        this.writeJson(this.connectionsFile, next);
        this.connections = next;
        return true;
    }

    private applyEnvOverrides(config: GlobalConfig): GlobalConfig {
        const host = this.env.BS_HOST?.trim();
        const port = envInt(this.env, 'BS_PORT');
        const level = logLevelSchema.safeParse(this.env.LOG_LEVEL?.trim().toLowerCase());

        return {
            ...config,
            server: {
                host: host || config.server.host,
                port: port ?? config.server.port,
            },
            logging: {
                ...config.logging,
                level: level.success ? level.data : config.logging.level,
            },
        };
    }

    private readOrCreate(file: string, fallback: unknown): unknown {
        if (!fs.existsSync(file)) {
            this.writeJson(file, fallback);
            return fallback;
        }

        const content = fs.readFileSync(file, 'utf-8');
        try {
            return JSON.parse(content);
        } catch (error) {
            throw new ConfigError(
                `${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
                ConfigErrorCode.INVALID_JSON
            );
        }
    }

    private validate<T extends z.ZodTypeAny>(schema: T, value: unknown, source: string): z.output<T> {
        const result = schema.safeParse(value);
        if (!result.success) {
            throw new ConfigError(
                `Invalid configuration in ${source}`,
                ConfigErrorCode.VALIDATION_FAILED,
                result.error.flatten()
            );
        }
        return result.data;
    }

    /**
     * Write to a temp file first, then rename, so a crash never leaves half a file.
     */
    private writeJson(file: string, value: unknown): void {
        const tempPath = `${file}.tmp`;
        fs.writeFileSync(tempPath, JSON.stringify(value, null, 2));
        fs.renameSync(tempPath, file);
    }
}

export function createConfigManager(config?: Partial<ConfigManagerConfig>): ConfigManager {
    return new ConfigManager(config);
}
