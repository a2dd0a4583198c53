/**
 * Socket clients
 *
 * - WsProxySocket: ProxySocket over a `ws` WebSocket
 * - createWsConnector: opens target connections
 */

export {
    WsProxySocket,
    createWsConnector,
    rawDataToString,
    SocketClosedError,
    TargetConnectionError,
    TargetConnectionErrorCode,
    DEFAULT_WS_CLIENT_CONFIG,
    type ProxySocket,
    type TargetConnector,
    type WsClientConfig,
} from './wsClient';
