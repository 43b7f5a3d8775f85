import type { DatabaseInstance } from '../db';

/**
 * A forward-only schema migration. `up` runs inside a transaction.
 */
export interface Migration {
    version: number;
    name: string;
    up: (db: DatabaseInstance) => void;
}
