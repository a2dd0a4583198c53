/**
 * HTTP API
 *
 * Served on the main port next to the WebSocket upgrades:
 * - health checks (`/health`, `/api/health`), always open
 * - relay status, connection management and global settings
 * - auth keys and per-bot auth state
 *
 * When `apiKey` is configured, every other `/api` route needs
 * `Authorization: Bearer <apiKey>`.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { ErrorResponse, GlobalConfig, GlobalConfigResponse, GlobalConfigView } from '../../shared/types';
import type { AuthManager } from '../services/authManager';
import { ConfigError, ConfigErrorCode, type ConfigManager } from '../services/configManager';
import type { AppLogger } from '../utils/logger';
import type { RelayController } from './relayServer';

export interface ServerConfig {
    /** CORS origin (default: allow all) */
    corsOrigin?: string;
    relay: RelayController;
    configManager: ConfigManager;
    authManager: AuthManager;
    logger: AppLogger;
}

export const DEFAULT_CORS_ORIGIN = '*';

/**
 * Error raised by route handlers, turned into a JSON response by the error middleware.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

function bearerToken(header: string | undefined): string | null {
    if (!header) {
        return null;
    }
    const match = /^Bearer\s+(.+)$/i.exec(header.trim());
    return match?.[1] ?? null;
}

/**
 * Runs a config write or read, turning rejected input into 400 INVALID_CONFIG.
 */
function withConfigErrors<T>(operation: () => T): T {
    try {
        return operation();
    } catch (error) {
        if (
            error instanceof ConfigError &&
            (error.code === ConfigErrorCode.VALIDATION_FAILED || error.code === ConfigErrorCode.INVALID_JSON)
        ) {
            throw new ApiError(error.message, 400, 'INVALID_CONFIG', error.details);
        }
        throw error;
    }
}

function globalConfigView(config: GlobalConfig): GlobalConfigView {
    const { apiKey, ...rest } = config;
    return { ...rest, apiKeySet: apiKey !== undefined };
}

function sameSettings(a: object, b: object): boolean {
    return JSON.stringify(a) === JSON.stringify(b);
}

export function createApp(config: ServerConfig): Express {
    const { relay, configManager, authManager, logger } = config;
    const app = express();

    app.use(
        cors({
            origin: config.corsOrigin ?? DEFAULT_CORS_ORIGIN,
            methods: ['GET', 'POST', 'PUT', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );
    app.use(express.json({ limit: '1mb' }));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.web.debug({ method: req.method, path: req.path }, `${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health
    // =========================================================================

    const health = (_req: Request, res: Response) => {
        const response = relay.health();
        res.status(response.status === 'ok' ? 200 : 503).json(response);
    };
    app.get('/health', health);
    app.get('/api/health', health);

    // =========================================================================
    // API key
    // =========================================================================

    app.use('/api', (req: Request, _res: Response, next: NextFunction) => {
        const apiKey = configManager.getGlobalConfig().apiKey;
        if (!apiKey) {
            next();
            return;
        }
        if (bearerToken(req.header('authorization')) !== apiKey) {
            next(new ApiError('Missing or invalid API key', 401, 'UNAUTHORIZED'));
            return;
        }
        next();
    });

    // =========================================================================
    // Status and connections
    // =========================================================================

    app.get('/api/status', (_req: Request, res: Response) => {
        res.json(relay.status());
    });

    app.get('/api/connections', (_req: Request, res: Response) => {
        res.json({ connections: configManager.getConnectionsConfig() });
    });

    app.get('/api/connections/:id', (req: Request, res: Response, next: NextFunction) => {
        const connection = configManager.getConnection(req.params.id);
        if (!connection) {
            next(new ApiError('Connection not found', 404, 'CONNECTION_NOT_FOUND'));
            return;
        }
        res.json({ connectionId: req.params.id, connection });
    });

    /**
     * PUT /api/connections/:id
     *
     * Creates or replaces a connection and applies it to the running relay.
     */
    app.put('/api/connections/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const connectionId = req.params.id;
            const connection = withConfigErrors(() => configManager.saveConnection(connectionId, req.body));
            await relay.applyConnectionChange(connectionId);
            logger.web.info({ connectionId }, `Connection ${connectionId} saved`);
            res.json({ connectionId, connection });
        } catch (error) {
            next(error);
        }
    });

    app.delete('/api/connections/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const connectionId = req.params.id;
            if (!configManager.deleteConnection(connectionId)) {
                throw new ApiError('Connection not found', 404, 'CONNECTION_NOT_FOUND');
            }
            await relay.applyConnectionChange(connectionId);
            logger.web.info({ connectionId }, `Connection ${connectionId} deleted`);
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    app.post('/api/connections/:id/reload', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const connectionId = req.params.id;
            if (!configManager.getConnection(connectionId)) {
                throw new ApiError('Connection not found', 404, 'CONNECTION_NOT_FOUND');
            }
            await relay.applyConnectionChange(connectionId);
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Global settings
    // =========================================================================

    app.get('/api/config/global', (_req: Request, res: Response) => {
        const body: GlobalConfigResponse = { config: globalConfigView(configManager.getGlobalConfig()) };
        res.json(body);
    });

    /**
     * PUT /api/config/global
     *
     * Replaces global.json. Security, command prefix, API key and timings
     * apply at once; `server` and `logging` on the next start.
     */
    app.put('/api/config/global', (req: Request, res: Response, next: NextFunction) => {
        try {
            const before = configManager.getGlobalConfig();
            const config = withConfigErrors(() => configManager.saveGlobalConfig(req.body));
            const restartRequired =
                !sameSettings(before.server, config.server) || !sameSettings(before.logging, config.logging);
            logger.web.info({ restartRequired }, 'Global config saved');

            const body: GlobalConfigResponse = { config: globalConfigView(config), restartRequired };
            res.json(body);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/config/reload
     *
     * Re-reads both files from disk and applies them to the running relay.
     */
    app.post('/api/config/reload', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            withConfigErrors(() => configManager.load());
            await relay.applyConfigReload();
            logger.web.info('Configuration reloaded from disk');
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Auth
    // =========================================================================

    app.get('/api/auth/keys', (_req: Request, res: Response) => {
        res.json({ authEnabled: authManager.isAuthEnabled(), keys: authManager.listValidKeys() });
    });

    app.get('/api/auth/bots', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json({ bots: await authManager.listAuthStatuses() });
        } catch (error) {
            next(error);
        }
    });

    app.get('/api/auth/bots/:botId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const status = await authManager.getAuthStatus(req.params.botId);
            if (!status) {
                throw new ApiError('No auth state for this bot', 404, 'BOT_NOT_FOUND');
            }
            res.json({ status });
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/auth/bots/:botId
     *
     * Logs the bot out; it has to authenticate again.
     */
    app.delete('/api/auth/bots/:botId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            if (!(await authManager.clearBotSession(req.params.botId))) {
                throw new ApiError('No auth state for this bot', 404, 'BOT_NOT_FOUND');
            }
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Errors
    // =========================================================================

    app.use((_req: Request, _res: Response, next: NextFunction) => {
        next(new ApiError('Not found', 404, 'NOT_FOUND'));
    });

    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ApiError) {
            if (err.statusCode >= 500) {
                logger.web.error({ err, path: req.path }, err.message);
            }
            const body: ErrorResponse = { error: err.message, code: err.code };
            if (err.details !== undefined) {
                body.details = err.details;
            }
            res.status(err.statusCode).json(body);
            return;
        }

        // express.json() rejects malformed bodies with a 400 SyntaxError
        if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
            const body: ErrorResponse = { error: 'Malformed JSON body', code: 'INVALID_JSON' };
            res.status(400).json(body);
            return;
        }

        logger.web.error({ err, path: req.path }, 'Unhandled error');
        const body: ErrorResponse = { error: 'Internal server error' };
        res.status(500).json(body);
    });

    return app;
}
