/**
 * API key and token helpers.
 * All randomness comes from the crypto module's CSPRNG.
 */

import { randomBytes, randomInt } from 'crypto';

const API_KEY_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const API_KEY_PATTERN = /^[A-Za-z0-9]+$/;

export const MIN_API_KEY_LENGTH = 16;

/**
 * Generates an alphanumeric API key.
 *
 * @throws Error if length is below 16
 */
export function generateApiKey(length: number = 32): string {
    if (length < MIN_API_KEY_LENGTH) {
        throw new Error(`API key length must be at least ${MIN_API_KEY_LENGTH} characters`);
    }

    let key = '';
    for (let i = 0; i < length; i++) {
        key += API_KEY_ALPHABET[randomInt(API_KEY_ALPHABET.length)];
    }
    return key;
}

export function generateMultipleApiKeys(count: number, length: number = 32): string[] {
    if (count < 1) {
        throw new Error('Key count must be greater than 0');
    }
    return Array.from({ length: count }, () => generateApiKey(length));
}

export function validateApiKey(apiKey: unknown, minLength: number = MIN_API_KEY_LENGTH): boolean {
    if (typeof apiKey !== 'string') {
        return false;
    }
    if (apiKey.length < minLength) {
        return false;
    }
    return API_KEY_PATTERN.test(apiKey);
}

/**
 * URL-safe token from `byteLength` random bytes (base64url, no padding).
 */
export function generateSecureToken(byteLength: number = 32): string {
    return randomBytes(byteLength).toString('base64url');
}
