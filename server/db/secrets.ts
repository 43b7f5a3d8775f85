/**
 * Secrets Database Layer
 *
 * Named secret values, encrypted at rest using AES-256-GCM.
 * Values are only ever returned decrypted to the secret resolver;
 * listing returns names.
 *
 * @module server/db/secrets
 */

import { getDb } from '../database/db';
import { encrypt, decrypt } from '../utils/encryption';
import logger from '../utils/logger';

interface SecretRow {
    name: string;
    value_encrypted: string;
    created_at: number;
    updated_at: number | null;
}

export interface SecretSummary {
    name: string;
    createdAt: string;
    updatedAt: string | null;
}

/**
 * Get the decrypted value of a secret, or null for an unknown name.
 * @throws Error if the stored value cannot be decrypted
 */
export function getSecretValue(name: string): string | null {
    const db = getDb();
    const row = db.prepare('SELECT value_encrypted FROM secrets WHERE name = ?')
        .get(name) as Pick<SecretRow, 'value_encrypted'> | undefined;

    if (!row) return null;
    return decrypt(row.value_encrypted);
}

/**
 * Insert or replace a secret value.
 */
export function putSecret(name: string, value: string): void {
    const db = getDb();
    db.prepare(`
        INSERT INTO secrets (name, value_encrypted)
        VALUES (?, ?)
        ON CONFLICT(name) DO UPDATE SET
            value_encrypted = excluded.value_encrypted,
            updated_at = strftime('%s', 'now')
    `).run(name, encrypt(value));

    logger.info(`[Secrets] Saved: name=${name}`);
}

/**
 * Delete a secret.
 * @returns true if a row was removed
 */
export function deleteSecret(name: string): boolean {
    const db = getDb();
    const result = db.prepare('DELETE FROM secrets WHERE name = ?').run(name);

    if (result.changes > 0) {
        logger.info(`[Secrets] Deleted: name=${name}`);
        return true;
    }
    return false;
}

/**
 * List secret names and timestamps (never values).
 */
export function listSecrets(): SecretSummary[] {
    const db = getDb();
    const rows = db.prepare(`
        SELECT name, created_at, updated_at
        FROM secrets
        ORDER BY name
    `).all() as Omit<SecretRow, 'value_encrypted'>[];

    return rows.map(row => ({
        name: row.name,
        createdAt: new Date(row.created_at * 1000).toISOString(),
        updatedAt: row.updated_at ? new Date(row.updated_at * 1000).toISOString() : null,
    }));
}
