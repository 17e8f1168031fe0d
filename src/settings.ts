import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ClientError } from './errors.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// Settings – settings.json in the data directory, validated with zod
// ——————————————————————————————————————————————————————————————————————————————————————————

const DEFAULT_RELAYS = [
    'wss://relay.damus.io',
    'wss://nos.lol',
    'wss://relay.mostro.network'
];

const relayUrlSchema = z.string().trim().refine((url) => /^wss?:\/\/[^\s/]+/.test(url), {
    message: 'Relay URL must start with ws:// or wss://'
});

export const settingsSchema = z.object({
    mostroPubkey: z.string().trim().default(''),
    relays: z.array(relayUrlSchema).default(DEFAULT_RELAYS),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    pow: z.number().int().min(0).max(32).default(0),
    adminPrivkey: z.string().trim().default(''),
    currencies: z.array(z.string().trim().toUpperCase()).default([]),
    privacyMode: z.enum(['reputation', 'full-privacy']).default('reputation')
});

export type Settings = z.infer<typeof settingsSchema>;

export interface DataPaths {
    root: string;
    settingsFile: string;
    database: string;
    chatsDir: string;
    downloadsDir: string;
}

export function resolveDataPaths(root: string = process.env.RELAYDESK_HOME || join(homedir(), '.relaydesk')): DataPaths {
    return {
        root,
        settingsFile: join(root, 'settings.json'),
        database: join(root, 'relaydesk.db'),
        chatsDir: join(root, 'chats'),
        downloadsDir: join(root, 'downloads')
    };
}

export function defaultSettings(): Settings {
    return settingsSchema.parse({});
}

/** Parses raw settings; every invalid field is named in the CONFIG error */
export function parseSettings(raw: unknown): Settings {
    const parsed = settingsSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ClientError('CONFIG', `Invalid settings: ${problems.join('; ')}`, { problems });
    }
    return parsed.data;
}

/** Reads settings.json, writing the defaults on first run */
export function loadSettings(paths: DataPaths): Settings {
    mkdirSync(paths.root, { recursive: true });
    if (!existsSync(paths.settingsFile)) {
        const defaults = defaultSettings();
        saveSettings(paths, defaults);
        return defaults;
    }
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(paths.settingsFile, 'utf8'));
    } catch (err) {
        throw new ClientError('CONFIG', `${paths.settingsFile} is not valid JSON`, undefined, { cause: err });
    }
    return parseSettings(raw);
}

export function saveSettings(paths: DataPaths, settings: Settings): void {
    mkdirSync(paths.root, { recursive: true });
    writeFileSync(paths.settingsFile, JSON.stringify(settings, null, 2) + '\n', 'utf8');
}
