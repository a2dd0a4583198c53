/**
 * Echo Cache
 *
 * Remembers API calls issued by targets so that the client's response can be
 * routed back to the target that asked. Keys are `<targetIndex>_<echo>`:
 * two targets may reuse the same echo value without colliding.
 */

import type { Logger } from 'pino';
import type { OneBotPayload } from '../../shared/types';

export interface EchoEntry {
    data: OneBotPayload;
    /** Unix seconds */
    createdAt: number;
    targetIndex: number;
    originalEcho: string;
}

export interface EchoCacheConfig {
    /** Entries older than this are purged */
    maxAgeSeconds: number;
    /** A purge runs after every `purgeEvery` insertions */
    purgeEvery: number;
    /** Clock in unix seconds */
    now: () => number;
}

export const DEFAULT_ECHO_CACHE_CONFIG: EchoCacheConfig = {
    maxAgeSeconds: 120,
    purgeEvery: 100,
    now: () => Date.now() / 1000,
};

export function echoKey(targetIndex: number, echo: string): string {
    return `${targetIndex}_${echo}`;
}

export class EchoCache {
    private readonly entries = new Map<string, EchoEntry>();
    private readonly config: EchoCacheConfig;
    private insertions = 0;

    constructor(
        private readonly logger: Logger,
        config?: Partial<EchoCacheConfig>
    ) {
        this.config = { ...DEFAULT_ECHO_CACHE_CONFIG, ...config };
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Stores the request a target sent under its echo.
     */
    remember(targetIndex: number, echo: string, data: OneBotPayload): void {
        const key = echoKey(targetIndex, echo);
        if (this.entries.has(key)) {
            this.logger.warn({ key }, 'Echo key reused before its response arrived, overwriting');
        }

        this.entries.set(key, {
            data,
            createdAt: this.config.now(),
            targetIndex,
            originalEcho: echo,
        });

        this.insertions += 1;
        if (this.insertions % this.config.purgeEvery === 0) {
            this.purgeExpired();
        }
    }

    /**
     * Finds and removes the entry for `echo`, trying indexes firstIndex..lastIndex in order.
     * Index 0 is the relay itself.
     */
    take(echo: string, lastIndex: number, firstIndex: number = 1): EchoEntry | undefined {
        for (let index = firstIndex; index <= lastIndex; index++) {
            const key = echoKey(index, echo);
            const entry = this.entries.get(key);
            if (entry) {
                this.entries.delete(key);
                return entry;
            }
        }
        return undefined;
    }

    /**
     * Looks up the request of a response without removing it.
     */
    peek(echo: string, lastIndex: number, firstIndex: number = 1): EchoEntry | undefined {
        for (let index = firstIndex; index <= lastIndex; index++) {
            const entry = this.entries.get(echoKey(index, echo));
            if (entry) {
                return entry;
            }
        }
        return undefined;
    }

    /**
     * @returns number of purged entries
     */
    purgeExpired(): number {
        const cutoff = this.config.now() - this.config.maxAgeSeconds;
        let purged = 0;
        for (const [key, entry] of this.entries) {
            if (entry.createdAt < cutoff) {
                this.entries.delete(key);
                purged += 1;
            }
        }
        if (purged > 0) {
            this.logger.debug({ purged, remaining: this.entries.size }, 'Purged expired echo entries');
        }
        return purged;
    }

    clear(): void {
        this.entries.clear();
    }
}
