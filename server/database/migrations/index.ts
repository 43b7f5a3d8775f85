/**
 * Registered migrations, in version order.
 * Add new migrations to the end of this list.
 */

import type { Migration } from './types';
import { migration as initialSchema } from './0001_initial_schema';

export const migrations: readonly Migration[] = [
    initialSchema,
];

export type { Migration };
