/**
 * Client endpoint parsing and the port/path route map.
 *
 * A client endpoint such as `ws://0.0.0.0:5111/bs/yunzai` tells the relay
 * where to accept the bot client for one connection. Several connections may
 * share a port; the path tells them apart.
 */

import type { Logger } from 'pino';
import type { ConnectionsConfig } from '../../shared/types';

export interface ParsedEndpoint {
    host: string;
    port: number;
    path: string;
}

export interface PortRoutes {
    host: string;
    /** path -> connection id */
    paths: Map<string, string>;
}

/** port -> routes on that port */
export type RouteMap = Map<number, PortRoutes>;

const WS_SCHEME = 'ws://';

/**
 * Parses a `ws://host[:port][/path]` endpoint.
 * The port defaults to 80 and the path to `/`.
 *
 * @throws Error for other schemes or a malformed port
 */
export function parseEndpoint(endpoint: string): ParsedEndpoint {
    if (!endpoint.startsWith(WS_SCHEME)) {
        throw new Error(`Unsupported endpoint format: ${endpoint}`);
    }

    const rest = endpoint.slice(WS_SCHEME.length);
    const slash = rest.indexOf('/');
    const hostPort = slash === -1 ? rest : rest.slice(0, slash);
    const path = slash === -1 ? '/' : rest.slice(slash);

    const colon = hostPort.indexOf(':');
    if (colon === -1) {
        return { host: hostPort, port: 80, path };
    }

    const host = hostPort.slice(0, colon);
    const portText = hostPort.slice(colon + 1);
    const port = Number(portText);
    if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
        throw new Error(`Invalid port in endpoint: ${endpoint}`);
    }

    return { host, port, path };
}

/**
 * Normalizes a request path for route lookup: leading slash, no query string.
 */
export function normalizePath(rawPath: string | undefined): string {
    if (!rawPath) {
        return '/';
    }
    const withoutQuery = rawPath.split('?')[0] ?? '';
    return withoutQuery.startsWith('/') ? withoutQuery : `/${withoutQuery}`;
}

/**
 * Builds the route map from the enabled connections.
 *
 * The first connection to claim a port and path keeps it; later claims are
 * logged and ignored. Unparsable endpoints are logged and skipped.
 */
export function buildRouteMap(connections: ConnectionsConfig, logger: Logger): RouteMap {
    const routes: RouteMap = new Map();

    for (const [connectionId, config] of Object.entries(connections)) {
        if (!config.enabled) {
            continue;
        }

        let endpoint: ParsedEndpoint;
        try {
            endpoint = parseEndpoint(config.clientEndpoint);
        } catch (error) {
            logger.error(
                { connectionId, clientEndpoint: config.clientEndpoint, err: error },
                'Failed to parse client endpoint'
            );
            continue;
        }

        let portRoutes = routes.get(endpoint.port);
        if (!portRoutes) {
            portRoutes = { host: endpoint.host, paths: new Map() };
            routes.set(endpoint.port, portRoutes);
        }

        const existing = portRoutes.paths.get(endpoint.path);
        if (existing) {
            logger.warn(
                { connectionId, path: endpoint.path, existing },
                `Path conflict: ${endpoint.path} is already used by ${existing}, ignoring ${connectionId}`
            );
            continue;
        }

        portRoutes.paths.set(endpoint.path, connectionId);
        logger.debug({ connectionId }, `Route ${endpoint.host}:${endpoint.port}${endpoint.path} -> ${connectionId}`);
    }

    return routes;
}

/**
 * Resolves the connection id routed at `port` + `path`, if any.
 */
export function lookupRoute(routes: RouteMap, port: number, path: string): string | undefined {
    return routes.get(port)?.paths.get(path);
}

/**
 * Flattens the route map for status output, sorted by port then path.
 */
export function listRoutes(routes: RouteMap): Array<{ port: number; path: string; connectionId: string }> {
    const list: Array<{ port: number; path: string; connectionId: string }> = [];
    for (const [port, portRoutes] of routes) {
        for (const [path, connectionId] of portRoutes.paths) {
            list.push({ port, path, connectionId });
        }
    }
    list.sort((a, b) => a.port - b.port || a.path.localeCompare(b.path));
    return list;
}
