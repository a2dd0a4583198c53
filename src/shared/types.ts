/**
 * Shared type definitions for the OneBot relay
 *
 * They're organized by domain:
 * - OneBot: wire shapes exchanged with bot clients and frameworks
 * - Config: global and per-connection configuration
 * - Auth: bot authentication state
 * - API: HTTP request/response shapes
 */

// ============================================================================
// OneBot Types
// ============================================================================

/**
 * A OneBot v11 message segment, e.g. `{ type: 'text', data: { text: 'hi' } }`.
 */
export interface MessageSegment {
    type: string;
    data: Record<string, unknown>;
}

/**
 * Any JSON object travelling over a relay socket.
 * Events, API calls and API responses all share this loose shape.
 */
export type OneBotPayload = Record<string, unknown>;

/**
 * Response to an API call, sent by the client back to the framework.
 */
export interface ApiResponse {
    status: string;
    retcode: number;
    data: unknown;
    echo: unknown;
}

/**
 * API call issued by a framework (or by the relay itself).
 */
export interface ApiCall {
    action: string;
    params: Record<string, unknown>;
    echo?: string;
}

/**
 * Direction of a recorded message, seen from the bot account.
 */
export type MessageDirection = 'RECV' | 'SEND';

// ============================================================================
// Config Types
// ============================================================================

/**
 * Target endpoint in object form. The string form is just the URL.
 */
export interface TargetEndpointConfig {
    url: string;
    headers?: Record<string, string>;
    disabled?: boolean;
    /** Target speaks the Sakoya (gscore) protocol instead of OneBot v11 */
    sakoyaProtocol?: boolean;
}

export type TargetEndpoint = string | TargetEndpointConfig;

/**
 * One client endpoint and the targets its traffic is relayed to.
 */
export interface ConnectionConfig {
    name?: string;
    description?: string;
    enabled: boolean;
    clientEndpoint: string;
    targetEndpoints: TargetEndpoint[];
}

export type ConnectionsConfig = Record<string, ConnectionConfig>;

export interface SecurityConfig {
    authEnabled: boolean;
    maxAttempts: number;
    banDurationMinutes: number;
}

export interface LoggingConfig {
    level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
    toFiles: boolean;
}

/**
 * Timing of target reconnects.
 * The fast phase retries `fastAttempts` times, then the slow phase
 * retries every `slowIntervalMs` for as long as the client stays connected.
 */
export interface ReconnectConfig {
    initialDelayMs: number;
    fastAttempts: number;
    fastIntervalMs: number;
    slowIntervalMs: number;
}

export interface GlobalConfig {
    server: {
        host: string;
        port: number;
    };
    commandPrefix: string;
    /** Bearer key for /api routes; unset means the API is open */
    apiKey?: string;
    security: SecurityConfig;
    logging: LoggingConfig;
    reconnect: ReconnectConfig;
    /** Pause between stopping a replaced session and starting its successor */
    replaceDelayMs: number;
    stopTimeoutMs: number;
}

// ============================================================================
// Auth Types
// ============================================================================

/**
 * Persisted authentication state of a bot account.
 */
export interface AuthRecord {
    botId: string;
    isAuthenticated: boolean;
    authenticatedAt?: Date;
    failedAttempts: number;
    lastAttemptAt?: Date;
    isBanned: boolean;
    bannedUntil?: Date;
}

/**
 * Serialized version of AuthRecord for JSON storage.
 */
export interface StoredAuthRecord {
    botId: string;
    isAuthenticated: boolean;
    authenticatedAt?: string;
    failedAttempts: number;
    lastAttemptAt?: string;
    isBanned: boolean;
    bannedUntil?: string;
}

export interface TempKeyInfo {
    key: string;
    botId: string;
    /** Unix seconds */
    expiresAt: number;
}

// ============================================================================
// API Types
// ============================================================================

export type HealthStatus = 'ok' | 'starting' | 'stopping';

export interface HealthResponse {
    status: HealthStatus;
    uptimeSeconds?: number;
    activeConnections?: number;
    routes?: number;
}

export interface ConnectionStatus {
    connectionId: string;
    selfId: number | null;
    remoteAddress?: string;
    connectedAt: string;
    targets: Array<{
        index: number;
        url: string;
        connected: boolean;
        sakoya: boolean;
        disabled: boolean;
    }>;
    received: number;
    sent: number;
}

export interface StatusResponse {
    uptimeSeconds: number;
    routes: Array<{ port: number; path: string; connectionId: string }>;
    connections: ConnectionStatus[];
}

/**
 * Global config as the API shows it: the key itself never leaves the server.
 */
export type GlobalConfigView = Omit<GlobalConfig, 'apiKey'> & { apiKeySet: boolean };

export interface GlobalConfigResponse {
    config: GlobalConfigView;
    /** Set after a save that changed `server` or `logging`, which apply on the next start */
    restartRequired?: boolean;
}

export interface ErrorResponse {
    error: string;
    code?: string;
    details?: unknown;
}
