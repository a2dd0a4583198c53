/**
 * Backend services
 *
 * Core relay logic:
 * - ConfigManager: global and connection configuration
 * - ProxyConnection: one client session and its targets
 * - EchoCache: routes API responses back to the target that asked
 * - Sakoya adapter and converter: OneBot v11 <-> Sakoya translation
 * - AuthManager / CommandHandler: bot authentication and the auth command
 * - MessageRecorder: RECV/SEND traffic lines and counters
 */

export {
    ConfigManager,
    createConfigManager,
    ConfigError,
    ConfigErrorCode,
    DEFAULT_GLOBAL_CONFIG,
    globalConfigSchema,
    connectionConfigSchema,
    connectionsConfigSchema,
} from './configManager';

export type { ConfigManagerConfig } from './configManager';

export { parseEndpoint, normalizePath, buildRouteMap, lookupRoute, listRoutes } from './endpoint';

export type { ParsedEndpoint, PortRoutes, RouteMap } from './endpoint';

export { EchoCache, echoKey, DEFAULT_ECHO_CACHE_CONFIG } from './echoCache';

export type { EchoEntry, EchoCacheConfig } from './echoCache';

export {
    ProxyConnection,
    createProxyConnection,
    pickForwardedHeaders,
    buildTargetSlots,
    FORWARDED_HEADERS,
} from './proxyConnection';

export type { ProxyConnectionDeps, TargetSlot } from './proxyConnection';

export { SakoyaTargetSocket, isSakoyaFrame, REPLY_CACHE_SIZE } from './sakoyaAdapter';

export {
    onebotEventToSakoya,
    onebotApiToSakoya,
    sakoyaSendToOnebotApi,
    sakoyaToOnebot,
    newEcho,
} from './sakoyaConverter';

export type { SakoyaReceiveFrame, SakoyaSendFrame } from './sakoyaConverter';

export {
    DEFAULT_BOT_ID,
    PASSTHROUGH_ACTIONS,
    extractBotIdFromPath,
    botIdFromUrl,
    messageReceiveSchema,
    messageSendSchema,
} from './sakoyaModels';

export type { MessageReceive, MessageSend, SakoyaSegment } from './sakoyaModels';

export { AuthManager, createAuthManager, TEMP_KEY_TTL_SECONDS } from './authManager';

export type { AuthManagerDeps, VerifyResult, VerifyFailureReason } from './authManager';

export { CommandHandler, createCommandHandler, parseCommand, AUTH_COMMAND_NAMES } from './commandHandler';

export type { CommandHandlerDeps, CommandOutcome, ParsedCommand } from './commandHandler';

export { MessageRecorder, buildSentRecord, SENT_SENDER_NICKNAME } from './messageRecorder';

export type { MessageCounters } from './messageRecorder';

export {
    isRecord,
    parseJsonObject,
    stringField,
    hasEcho,
    echoText,
    isApiResponse,
    isMessageEvent,
    isMetaEvent,
    toSegments,
    plainText,
    messageToRaw,
    buildReply,
} from './onebot';
