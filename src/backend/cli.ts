#!/usr/bin/env node
/**
 * `bs` command line
 *
 *   bs                  start the relay (same as `bs start`)
 *   bs healthcheck      check the health endpoint, exit 0 when healthy
 *   bs keygen           print API keys for `apiKey`
 */

import { Command, InvalidArgumentError } from 'commander';
import { runService } from './index';
import { envInt, loadEnvFile } from './utils/env';
import { generateMultipleApiKeys, MIN_API_KEY_LENGTH } from './utils/security';

export const DEFAULT_PORT = 5111;
export const DEFAULT_HEALTH_TIMEOUT_MS = 10_000;

/**
 * Health URL of a relay on this host, on `BS_PORT` when set.
 */
export function defaultHealthUrl(env: NodeJS.ProcessEnv = process.env): string {
    return `http://localhost:${envInt(env, 'BS_PORT') ?? DEFAULT_PORT}/health`;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

/**
 * @returns true when the URL answers 2xx within the timeout
 */
export async function checkHealth(url: string, timeoutMs: number): Promise<boolean> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
        const response = await fetch(url, { signal: controller.signal });
        return response.ok;
    } catch (error) {
        console.error(`Health check failed: ${error instanceof Error ? error.message : String(error)}`);
        return false;
    } finally {
        clearTimeout(timer);
    }
}

export function createProgram(): Command {
    const program = new Command();

    program.name('bs').description('OneBot v11 reverse WebSocket relay');

    program
        .command('start', { isDefault: true })
        .description('Start the relay and its HTTP API')
        .action(async () => {
            await runService();
        });

    program
        .command('healthcheck')
        .description('Probe the health endpoint')
        .option('--url <url>', `health endpoint (default http://localhost:$BS_PORT/health)`)
        .option('--timeout <ms>', 'timeout in milliseconds', parsePositiveInt, DEFAULT_HEALTH_TIMEOUT_MS)
        .action(async (options: { url?: string; timeout: number }) => {
            loadEnvFile();
            const healthy = await checkHealth(options.url ?? defaultHealthUrl(), options.timeout);
            process.exit(healthy ? 0 : 1);
        });

    program
        .command('keygen')
        .description('Generate API keys')
        .option('--length <n>', `key length (min ${MIN_API_KEY_LENGTH})`, parsePositiveInt, 32)
        .option('--count <n>', 'number of keys', parsePositiveInt, 1)
        .action((options: { length: number; count: number }) => {
            for (const key of generateMultipleApiKeys(options.count, options.length)) {
                console.log(key);
            }
        });

    return program;
}

if (require.main === module) {
    createProgram()
        .parseAsync(process.argv)
        .catch((error: unknown) => {
            console.error(error instanceof Error ? error.message : error);
            process.exit(1);
        });
}
