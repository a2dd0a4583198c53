/**
 * Process environment and runtime directory layout.
 *
 * Layout under the working directory (overridable through env):
 *   config/  BS_CONFIG_DIR  global.json, connections.json
 *   data/    BS_DATA_DIR    persisted auth state
 *   logs/    BS_LOG_DIR     channel log files
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

export interface RuntimePaths {
    baseDir: string;
    configDir: string;
    dataDir: string;
    logDir: string;
}

/**
 * Loads `.env` from the working directory when present.
 * Variables already set in the environment win.
 */
export function loadEnvFile(file: string = path.join(process.cwd(), '.env')): boolean {
    if (!fs.existsSync(file)) {
        return false;
    }
    const result = dotenv.config({ path: file });
    if (result.error) {
        throw new Error(`Failed to load env file ${file}: ${result.error.message}`);
    }
    return true;
}

function envPath(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
    const value = env[name]?.trim();
    return value ? path.resolve(value) : fallback;
}

export function resolveRuntimePaths(
    env: NodeJS.ProcessEnv = process.env,
    baseDir: string = process.cwd()
): RuntimePaths {
    return {
        baseDir,
        configDir: envPath(env, 'BS_CONFIG_DIR', path.join(baseDir, 'config')),
        dataDir: envPath(env, 'BS_DATA_DIR', path.join(baseDir, 'data')),
        logDir: envPath(env, 'BS_LOG_DIR', path.join(baseDir, 'logs')),
    };
}

/**
 * Creates the config, data and log directories if they are missing.
 */
export function ensureRuntimeDirectories(paths: RuntimePaths): void {
    for (const dir of [paths.configDir, paths.dataDir, paths.logDir]) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

/**
 * Parses an integer env var; returns undefined when unset or not a number.
 */
export function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name]?.trim();
    if (!raw) {
        return undefined;
    }
    const value = Number(raw);
    return Number.isInteger(value) ? value : undefined;
}
