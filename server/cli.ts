#!/usr/bin/env node
/**
 * SaaS Poller CLI
 *
 * Admin command-line tool for local operation.
 *
 * Usage:
 *   saas-poller run <appName>
 *   saas-poller set-secret <name>          (value from a hidden prompt, or piped stdin)
 *   saas-poller put-config <file.json>
 *   saas-poller list
 *
 * In development:
 *   npm run build && node dist/server/cli.js list
 */

import 'dotenv/config';

import fs from 'fs';
import { createInterface } from 'readline';
import { Writable } from 'stream';
import { closeDatabase, getDb } from './database/db';
import { runMigrations } from './database/migrator';
import * as secretsDb from './db/secrets';
import { MonitorError, extractErrorMessage } from './integrations/errors';
import { createRuntime } from './services/runtime';
import { summarizeOutcome } from './services/workflow/states';
import { validateEncryptionSetup } from './utils/encryption';

// ============================================
// Input helpers
// ============================================

/**
 * Prompt without echoing what is typed.
 */
function askHidden(question: string): Promise<string> {
    let muted = false;
    const output = new Writable({
        write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
            if (!muted) process.stdout.write(chunk);
            callback();
        },
    });
    const rl = createInterface({ input: process.stdin, output, terminal: true });

    return new Promise((resolve) => {
        rl.question(question, (answer) => {
            rl.close();
            process.stdout.write('\n');
            resolve(answer);
        });
        muted = true;
    });
}

async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        const data: unknown = chunk;
        chunks.push(Buffer.isBuffer(data) ? data : Buffer.from(String(data)));
    }
    return Buffer.concat(chunks).toString('utf8').replace(/\r?\n$/, '');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function prepareDatabase(): void {
    if (!validateEncryptionSetup()) {
        throw new Error('SECRET_ENCRYPTION_KEY must be set to 64 hex characters');
    }
    const result = runMigrations(getDb());
    if (!result.success) {
        throw new Error(`Migration failed: ${result.error}`);
    }
}

// ============================================
// Commands
// ============================================

async function runCommand(appName: string): Promise<number> {
    const runtime = createRuntime();
    const outcome = await runtime.scheduler.runApp(appName);
    console.log(JSON.stringify(summarizeOutcome(outcome), null, 2));
    return outcome.kind === 'preprocessed' ? 0 : 1;
}

async function setSecretCommand(name: string): Promise<number> {
    const value = process.stdin.isTTY
        ? await askHidden(`Value for secret "${name}": `)
        : await readStdin();

    if (!value) {
        console.error('Error: secret value is empty');
        return 1;
    }
    secretsDb.putSecret(name, value);
    console.log(`Secret "${name}" saved`);
    return 0;
}

function putConfigCommand(file: string): number {
    const raw = fs.readFileSync(file, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
    const runtime = createRuntime();

    let failures = 0;
    for (const item of items) {
        if (!isPlainObject(item)) {
            console.error('Skipped: config item must be a JSON object');
            failures++;
            continue;
        }
        try {
            const config = runtime.configStore.put(item);
            console.log(`Config saved: ${config.appName} (${config.preprocessTarget}, "${config.schedule}")`);
        } catch (error) {
            if (!(error instanceof MonitorError)) throw error;
            console.error(`Rejected: ${error.message}`);
            failures++;
        }
    }
    return failures === 0 ? 0 : 1;
}

function listCommand(): number {
    const runtime = createRuntime();
    const apps = runtime.configStore.list();
    if (apps.length === 0) {
        console.log('No apps configured.');
    }
    for (const { appName, config, error } of apps) {
        if (config) {
            const state = config.enabled ? 'enabled' : 'disabled';
            console.log(`  ${appName.padEnd(24)} ${config.preprocessTarget.padEnd(14)} ${config.schedule.padEnd(16)} ${state}`);
        } else {
            console.log(`  ${appName.padEnd(24)} INVALID: ${error ?? 'unknown error'}`);
        }
    }

    const secrets = secretsDb.listSecrets();
    console.log(`\nSecrets (${secrets.length}): ${secrets.map(s => s.name).join(', ') || 'none'}`);
    return 0;
}

// ============================================
// Main CLI router
// ============================================

function showHelp(): void {
    console.log(`
SaaS Poller CLI

Usage:
  saas-poller <command> [arguments]

Commands:
  run <appName>            Run one execution now and print its outcome
  set-secret <name>        Store a secret (hidden prompt, or piped stdin)
  put-config <file.json>   Store one config item, or an array of them
  list                     List configured apps and secret names

Options:
  -h, --help               Show this help message

Examples:
  saas-poller put-config ./apps/m365.json
  echo '{"api_key":"test-secret"}' | saas-poller set-secret m365/graph
  saas-poller run m365
`);
}

async function main(): Promise<number> {
    const args = process.argv.slice(2);

    if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
        showHelp();
        return 0;
    }

    const [command, argument] = args;
    const requireArgument = (usage: string): string | null => {
        if (argument) return argument;
        console.error(`Usage: saas-poller ${usage}`);
        return null;
    };

    switch (command) {
        case 'run': {
            const appName = requireArgument('run <appName>');
            if (!appName) return 1;
            prepareDatabase();
            return runCommand(appName);
        }
        case 'set-secret': {
            const name = requireArgument('set-secret <name>');
            if (!name) return 1;
            prepareDatabase();
            return setSecretCommand(name);
        }
        case 'put-config': {
            const file = requireArgument('put-config <file.json>');
            if (!file) return 1;
            prepareDatabase();
            return putConfigCommand(file);
        }
        case 'list':
            prepareDatabase();
            return listCommand();
        default:
            console.error(`Unknown command: ${command}`);
            showHelp();
            return 1;
    }
}

main()
    .then((code) => {
        closeDatabase();
        process.exit(code);
    })
    .catch((err: unknown) => {
        console.error('Fatal error:', extractErrorMessage(err));
        closeDatabase();
        process.exit(1);
    });
