/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: HTTP API and the relay server that owns listeners and sessions
 * - services/: relay logic (proxy connections, echo routing, Sakoya, auth)
 * - clients/: WebSocket sockets and the target connector
 * - storage/: persisted auth state
 * - utils/: logging, env and security helpers
 *
 * When run directly, this file starts the service.
 * When imported, it exports the building blocks and `startService`.
 */

import path from 'path';
import { createWsConnector } from './clients/wsClient';
import { createApp } from './server';
import { createRelayServer, type RelayServer } from './server/relayServer';
import { createAuthManager, type AuthManager } from './services/authManager';
import { createCommandHandler } from './services/commandHandler';
import { createConfigManager, type ConfigManager } from './services/configManager';
import { MessageRecorder } from './services/messageRecorder';
import { createJsonFileAuthStore } from './storage/authStore';
import { ensureRuntimeDirectories, loadEnvFile, resolveRuntimePaths, type RuntimePaths } from './utils/env';
import { createLogger, type AppLogger } from './utils/logger';

// Re-export server components
export { createApp, ApiError, DEFAULT_CORS_ORIGIN } from './server';
export type { ServerConfig } from './server';
export { RelayServer, createRelayServer, UNKNOWN_PATH_CLOSE_CODE } from './server/relayServer';
export type { RelayController, RelayServerDeps } from './server/relayServer';

// Re-export services, clients and storage
export * from './services';
export * from './clients';
export * from './storage';

export { createLogger, createSilentLogger, truncateForLog } from './utils/logger';
export type { AppLogger, LogChannel } from './utils/logger';

export interface RunningService {
    paths: RuntimePaths;
    configManager: ConfigManager;
    authManager: AuthManager;
    relay: RelayServer;
    logger: AppLogger;
    stop(): Promise<void>;
}

export interface StartServiceOptions {
    env?: NodeJS.ProcessEnv;
    baseDir?: string;
    /** Load `.env` from baseDir first (default: true) */
    loadEnv?: boolean;
}

/**
 * Loads configuration, wires the services together and starts listening.
 *
 * @throws ConfigError on bad configuration, or the listen error of the main port
 */
export async function startService(options: StartServiceOptions = {}): Promise<RunningService> {
    const baseDir = options.baseDir ?? process.cwd();
    if (options.loadEnv ?? true) {
        loadEnvFile(path.join(baseDir, '.env'));
    }
    const env = options.env ?? process.env;

    const paths = resolveRuntimePaths(env, baseDir);
    ensureRuntimeDirectories(paths);

    const configManager = createConfigManager({ configDir: paths.configDir, env });
    configManager.load();
    const globalConfig = configManager.getGlobalConfig();

    const logger = createLogger({ ...globalConfig.logging, logDir: paths.logDir });
    logger.main.info({ configDir: paths.configDir, dataDir: paths.dataDir }, 'Configuration loaded');
    if (!globalConfig.apiKey) {
        logger.main.warn('No apiKey configured, the /api routes are open');
    }

    const authManager = createAuthManager({
        getSecurityConfig: () => configManager.getGlobalConfig().security,
        store: createJsonFileAuthStore({ storagePath: path.join(paths.dataDir, 'auth'), logger: logger.command }),
        logger: logger.command,
    });
    const commandHandler = createCommandHandler({
        authManager,
        getCommandPrefix: () => configManager.getGlobalConfig().commandPrefix,
        logger: logger.command,
    });

    const relay = createRelayServer({
        configManager,
        logger,
        connector: createWsConnector(logger.ws),
        recorder: new MessageRecorder(logger),
        commandHandler,
    });

    const app = createApp({ relay, configManager, authManager, logger });
    await relay.start(app);
    logger.main.info(`Relay ready, health check on http://localhost:${relay.boundPort}/health`);

    return {
        paths,
        configManager,
        authManager,
        relay,
        logger,
        stop: () => relay.stop(),
    };
}

/**
 * Starts the service and stops it on SIGINT/SIGTERM.
 * Exits with code 1 when startup fails.
 */
export async function runService(options: StartServiceOptions = {}): Promise<void> {
    let service: RunningService;
    try {
        service = await startService(options);
    } catch (error) {
        console.error('Failed to start service:', error instanceof Error ? error.message : error);
        process.exit(1);
    }

    let stopping = false;
    const shutdown = (signal: NodeJS.Signals) => {
        if (stopping) {
            return;
        }
        stopping = true;
        service.logger.main.info({ signal }, `Received ${signal}, shutting down`);
        service
            .stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                service.logger.main.error({ err: error }, 'Shutdown failed');
                process.exit(1);
            });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

// Main entry point - start the service when run directly
if (require.main === module) {
    void runService();
}
