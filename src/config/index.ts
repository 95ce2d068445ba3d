import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const weight = z.number().nonnegative();

const ConfigSchema = z.object({
    severity: z.object({
        max_score: z.number().positive(),
        unreachable_score: weight,
        copyright_cutoff_year: z.number().int(),
        table_threshold: z.number().int().nonnegative(),
        heavy_page_chars: z.number().int().positive(),
        weights: z.object({
            missing_viewport: weight,
            insecure_transport: weight,
            table_layout: weight,
            marquee: weight,
            frames: weight,
            flash: weight,
            typography: weight,
            stale_copyright: weight,
            heavy_page: weight,
            under_construction: weight,
        }),
    }),
    opportunity: z.object({
        baseline: z.number().min(0).max(100),
        penalties: z.object({
            builder: weight,
            social_or_directory: weight,
            free_hosted: weight,
            parked: weight,
            legacy_tech: weight,
        }),
        bands: z.object({
            hot_below: z.number(),
            warm_below: z.number(),
        }),
    }),
    lists: z.object({
        site_builders: z.array(z.object({ marker: z.string().min(1), name: z.string().min(1) })),
        builder_domains: z.array(z.string().min(1)),
        social_domains: z.array(z.string().min(1)),
        free_hosted_domains: z.array(z.string().min(1)),
        parked_phrases: z.array(z.string().min(1)),
        legacy_tech_keywords: z.array(z.string().min(1)),
    }),
    contacts: z.object({
        max_per_kind: z.number().int().positive(),
    }),
    outreach: z.object({
        sender_name: z.string(),
        sender_company: z.string(),
        sender_email: z.string(),
        website: z.string(),
        offer: z.string(),
    }),
    fetcher: z.object({
        timeout_ms: z.coerce.number().int().min(100).max(120000),
        retries: z.number().int().min(0).max(10),
        backoff_ms: z.number().int().min(0),
        user_agent: z.string().min(1),
    }),
    system: z.object({
        concurrency: z.coerce.number().int().min(1).max(100),
        log_level: z.enum(['error', 'warn', 'info', 'debug']),
        log_dir: z.string(),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_PATH = path.join(__dirname, 'default.yaml');

let configInstance: Config | null = null;

// Environment wins over the YAML file for the few knobs worth tuning per run.
const applyEnvOverrides = (raw: unknown): unknown => {
    if (typeof raw !== 'object' || raw === null) return raw;
    const env = process.env;
    const merged: Record<string, unknown> = { ...raw };
    const section = (key: string): Record<string, unknown> => {
        const value = merged[key];
        return typeof value === 'object' && value !== null ? { ...value } : {};
    };

    const fetcher = section('fetcher');
    if (env.FETCH_TIMEOUT_MS) fetcher.timeout_ms = env.FETCH_TIMEOUT_MS;
    merged.fetcher = fetcher;

    const system = section('system');
    if (env.CONCURRENCY) system.concurrency = env.CONCURRENCY;
    if (env.LOG_LEVEL) system.log_level = env.LOG_LEVEL;
    if (env.LOG_DIR) system.log_dir = env.LOG_DIR;
    merged.system = system;

    return merged;
};

export const parseConfig = (raw: unknown): Config => {
    const result = ConfigSchema.safeParse(applyEnvOverrides(raw));
    if (!result.success) {
        const details = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration:\n  • ${details.join('\n  • ')}`);
    }
    return result.data;
};

export const loadConfig = (configPath?: string): Config => {
    if (configInstance && !configPath) return configInstance;

    const validPath = configPath || DEFAULT_CONFIG_PATH;
    let fileContents: string;
    try {
        fileContents = fs.readFileSync(validPath, 'utf8');
    } catch (e) {
        throw new ConfigurationError(`Cannot read config file ${validPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    configInstance = parseConfig(yaml.load(fileContents));

    return configInstance;
};

export const getConfig = (): Config => {
    if (!configInstance) {
        return loadConfig(); // Auto-load default
    }
    return configInstance;
};

export const resetConfig = (): void => {
    configInstance = null;
};
