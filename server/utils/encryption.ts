/**
 * Secret Encryption Utility
 *
 * AES-256-GCM encryption for secret values stored in the local secret store.
 *
 * Behavior:
 * - Development (NODE_ENV=development): bypasses encryption (plaintext storage)
 * - Otherwise: requires SECRET_ENCRYPTION_KEY (64 hex characters = 32 bytes)
 *
 * Generate a key with: openssl rand -hex 32
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import logger from './logger';
import { extractErrorMessage } from '../integrations/errors';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;
const KEY_PATTERN = /^[0-9a-fA-F]{64}$/;

function isDevelopment(): boolean {
    return process.env.NODE_ENV === 'development';
}

// Cached key, keyed by the hex it was derived from so a changed env is picked up
let cachedKey: { hex: string; key: Buffer } | null = null;

/**
 * Resolve the encryption key, or null in development mode.
 * @throws Error if the key is missing or malformed
 */
function getEncryptionKey(): Buffer | null {
    if (isDevelopment()) {
        return null;
    }

    const keyHex = process.env.SECRET_ENCRYPTION_KEY;
    if (!keyHex) {
        throw new Error('SECRET_ENCRYPTION_KEY is not set (generate one with: openssl rand -hex 32)');
    }
    if (!KEY_PATTERN.test(keyHex)) {
        throw new Error(`SECRET_ENCRYPTION_KEY must be 64 hex characters (got ${keyHex.length})`);
    }

    if (cachedKey?.hex !== keyHex) {
        cachedKey = { hex: keyHex, key: Buffer.from(keyHex, 'hex') };
        logger.debug('[Encryption] Key validated successfully');
    }
    return cachedKey.key;
}

/**
 * Encrypt a plaintext string.
 *
 * @returns Base64 of IV + AuthTag + ciphertext, or the plaintext in development
 */
export function encrypt(plaintext: string): string {
    const key = getEncryptionKey();
    if (key === null) {
        return plaintext;
    }

    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const encrypted = Buffer.concat([
        cipher.update(plaintext, 'utf8'),
        cipher.final()
    ]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([iv, authTag, encrypted]).toString('base64');
}

/**
 * Decrypt a value produced by encrypt().
 *
 * @throws Error if decryption fails (wrong key, corrupted data)
 */
export function decrypt(ciphertext: string): string {
    const key = getEncryptionKey();
    if (key === null) {
        return ciphertext;
    }

    try {
        const data = Buffer.from(ciphertext, 'base64');
        const iv = data.subarray(0, IV_LENGTH);
        const authTag = data.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
        const encrypted = data.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

        const decipher = createDecipheriv(ALGORITHM, key, iv);
        decipher.setAuthTag(authTag);

        return Buffer.concat([
            decipher.update(encrypted),
            decipher.final()
        ]).toString('utf8');
    } catch (error) {
        logger.error(`[Encryption] Decryption failed: error="${extractErrorMessage(error)}"`);
        throw new Error('Failed to decrypt secret. The encryption key may have changed.');
    }
}

/**
 * Validate the encryption setup without throwing.
 * Used by the startup checks in index.ts and cli.ts.
 */
export function validateEncryptionSetup(): boolean {
    if (isDevelopment()) {
        logger.debug('[Encryption] Development mode - encryption bypassed');
        return true;
    }
    const keyHex = process.env.SECRET_ENCRYPTION_KEY;
    return !!keyHex && KEY_PATTERN.test(keyHex);
}
