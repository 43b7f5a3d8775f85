/**
 * Execution Context
 *
 * Append-only accumulator for one execution. Every stage produces a new
 * frozen object; an extension that names an existing key is rejected by
 * the compiler and again at runtime.
 *
 * @module server/services/workflow/context
 */

import type { AppConfig, PollResult } from '../types';

export interface BaseContext {
    executionId: string;
    appName: string;
}

export type ConfiguredContext = BaseContext & { config: AppConfig };

export type PolledContext = ConfiguredContext & { poll: PollResult };

/** Whatever an execution had accumulated when it stopped */
export type AnyContext = Readonly<BaseContext & Partial<{ config: AppConfig; poll: PollResult }>>;

/** Keys of E that already exist on C must not be supplied */
type NoOverwrite<C, E> = { [K in keyof E & keyof C]: never };

export function createContext(executionId: string, appName: string): Readonly<BaseContext> {
    return Object.freeze({ executionId, appName });
}

/**
 * Return a new frozen context with `extension` merged in.
 * @throws Error if any key of `extension` already exists on `context`
 */
export function extendContext<C extends object, E extends object>(
    context: C,
    extension: E & NoOverwrite<C, E>
): Readonly<C & E> {
    for (const key of Object.keys(extension)) {
        if (Object.prototype.hasOwnProperty.call(context, key)) {
            throw new Error(`Execution context already has "${key}"`);
        }
    }
    const next: C & E = { ...context, ...extension };
    return Object.freeze(next);
}
