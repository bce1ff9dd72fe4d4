import * as dotenv from 'dotenv';
import { readFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import defaultProfile from '../config/site-profile.json';
import { ConfigError } from './errors.js';
import { SiteProfile, SiteProfileSchema } from './types/site-profile.js';

export interface Config {
    server: {
        name: string;
        version: string;
    };
    credentials?: {
        username: string;
        password: string;
    };
    search: {
        maxWorkers: number;
        minDelayMs: number;
        maxDelayMs: number;
        queryTimeoutMs: number;
        sessionsPerMinute: number;
        largeBatchThreshold: number;
    };
    browser: {
        headless: boolean;
        executablePath?: string;
        channel?: string;
    };
    outputDir: string;
    logging: {
        level: 'debug' | 'info' | 'warn' | 'error';
        file?: string;
    };
    siteProfile: SiteProfile;
}

const ConfigSchema = z.object({
    server: z.object({
        name: z.string().min(1),
        version: z.string().min(1)
    }),
    credentials: z.object({
        username: z.string().min(1, 'Username must not be empty'),
        password: z.string().min(1, 'Password must not be empty')
    }).optional(),
    search: z.object({
        maxWorkers: z.number().int().min(1).max(10),
        minDelayMs: z.number().int().min(0),
        maxDelayMs: z.number().int().min(0),
        queryTimeoutMs: z.number().int().min(1000).max(600000),
        sessionsPerMinute: z.number().int().min(1),
        largeBatchThreshold: z.number().int().min(1)
    }),
    browser: z.object({
        headless: z.boolean(),
        executablePath: z.string().min(1).optional(),
        channel: z.string().min(1).optional()
    }),
    outputDir: z.string().min(1),
    logging: z.object({
        level: z.enum(['debug', 'info', 'warn', 'error']),
        file: z.string().min(1).optional()
    }),
    siteProfile: SiteProfileSchema
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --max-workers 4 --site-profile ./profile.json --log-level debug
 */
export function parseArgs(argv: readonly string[]): Record<string, string | boolean> {
    const args: Record<string, string | boolean> = {};

    for (let i = 2; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            continue;
        }
        const key = arg.slice(2);
        if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
            args[key] = argv[++i];
        } else {
            args[key] = true;
        }
    }

    return args;
}

function loadSiteProfile(profilePath: string | undefined): unknown {
    if (!profilePath) {
        return defaultProfile;
    }
    try {
        return JSON.parse(readFileSync(path.resolve(profilePath), 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Could not read site profile ${profilePath}`, [
            error instanceof Error ? error.message : String(error)
        ]);
    }
}

/**
 * Builds the configuration from CLI flags, environment variables and the site
 * profile file, in that order of precedence. Throws ConfigError listing every
 * invalid setting.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    argv: readonly string[] = process.argv
): Config {
    const cliArgs = parseArgs(argv);

    const getString = (cliKey: string, envKey: string): string | undefined => {
        const cliValue = cliArgs[cliKey];
        if (typeof cliValue === 'string') return cliValue;
        return env[envKey] || undefined;
    };

    const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
        const cliValue = cliArgs[cliKey];
        if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
        const envValue = env[envKey];
        return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
    };

    const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
        const value = getString(cliKey, envKey);
        return value ? Number(value) : defaultValue;
    };

    const username = getString('username', 'BLOTTER_USERNAME');
    const password = getString('password', 'BLOTTER_PASSWORD');

    const minDelayMs = getNumber('min-delay', 'BLOTTER_MIN_DELAY_MS', 2000);
    let maxDelayMs = getNumber('max-delay', 'BLOTTER_MAX_DELAY_MS', 5000);
    if (maxDelayMs <= minDelayMs) {
        maxDelayMs = minDelayMs + 1000;
    }

    const rawConfig = {
        server: {
            name: 'mcp-booking-blotter',
            version: '0.1.0'
        },
        credentials: username !== undefined || password !== undefined
            ? { username: username ?? '', password: password ?? '' }
            : undefined,
        search: {
            maxWorkers: getNumber('max-workers', 'BLOTTER_MAX_WORKERS', 3),
            minDelayMs,
            maxDelayMs,
            queryTimeoutMs: getNumber('query-timeout', 'BLOTTER_QUERY_TIMEOUT_MS', 60000),
            sessionsPerMinute: getNumber('sessions-per-minute', 'BLOTTER_SESSIONS_PER_MINUTE', 6),
            largeBatchThreshold: getNumber('large-batch', 'BLOTTER_LARGE_BATCH', 50)
        },
        browser: {
            headless: getBoolean('headless', 'BLOTTER_HEADLESS', true),
            executablePath: getString('browser-path', 'BLOTTER_BROWSER_PATH'),
            channel: getString('browser-channel', 'BLOTTER_BROWSER_CHANNEL') ?? 'chrome'
        },
        outputDir: getString('output-dir', 'BLOTTER_OUTPUT_DIR') ?? path.join(os.tmpdir(), 'booking-blotter'),
        logging: {
            level: getString('log-level', 'BLOTTER_LOG_LEVEL') ?? 'info',
            file: getString('log-file', 'BLOTTER_LOG_FILE')
        },
        siteProfile: loadSiteProfile(getString('site-profile', 'BLOTTER_SITE_PROFILE'))
    };

    const parsed = ConfigSchema.safeParse(rawConfig);
    if (!parsed.success) {
        throw new ConfigError(
            'Configuration validation failed',
            parsed.error.errors.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

/** Reads `.env` into the process environment and loads the configuration. */
export function getConfig(): Config {
    dotenv.config();
    return loadConfig(process.env, process.argv);
}

export function describeConfig(config: Config): string {
    const { search, browser } = config;
    return [
        `${config.server.name} v${config.server.version}`,
        `site: ${config.siteProfile.name}`,
        `workers: ${search.maxWorkers} | delay: ${search.minDelayMs}-${search.maxDelayMs}ms | timeout: ${search.queryTimeoutMs}ms`,
        `browser: ${browser.executablePath ?? browser.channel ?? 'default'}${browser.headless ? ' (headless)' : ''}`,
        `credentials: ${config.credentials ? 'configured' : 'missing'}`,
        `output: ${config.outputDir}`
    ].join('\n');
}
