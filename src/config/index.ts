/**
 * Scan configuration.
 *
 * Layers, lowest precedence first: `default.yaml`, an optional user YAML file,
 * `PROBE_*` environment variables, then explicit overrides (CLI flags).
 * The merged document is validated once; an invalid config never starts a scan.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { MAX_COMBINATION_LENGTH } from '../modules/candidates';

dotenv.config();

const Suffix = z
    .string()
    .trim()
    .transform(s => s.replace(/^\.+/, '').toLowerCase())
    .pipe(z.string().min(1, 'suffix must not be empty'));

const ConfigSchema = z.object({
    suffixes: z.array(Suffix).min(1),
    combination: z
        .object({
            start_length: z.coerce.number().int().min(1).max(MAX_COMBINATION_LENGTH).default(5),
            max_length: z.coerce.number().int().min(1).max(MAX_COMBINATION_LENGTH).optional(),
        })
        .refine(c => c.max_length === undefined || c.max_length >= c.start_length, {
            message: 'max_length must be >= start_length',
            path: ['max_length'],
        }),
    probe: z.object({
        workers: z.coerce.number().int().min(1).max(500).default(10),
        timeout_ms: z.coerce.number().int().min(100).max(120000).default(5000),
        checkpoint_every: z.coerce.number().int().min(1).default(25),
        user_agents: z.array(z.string().min(1)).min(1),
    }),
    classifier: z.object({
        min_content_length: z.coerce.number().int().min(0).default(100),
        parked_phrases: z.array(z.string().trim().min(1)).default([]),
    }),
    resume: z.boolean().default(true),
    output: z.object({
        dir: z.string().min(1).default('output'),
        outcome_log: z.string().min(1).default('empty_domains.txt'),
        results_json: z.string().min(1).default('domains.json'),
        html_report: z.string().min(1).nullable().default('found_websites.html'),
    }),
    housekeeping: z.object({
        interval_ms: z.coerce.number().int().min(0).default(60000),
        memory_warn_mb: z.coerce.number().int().min(1).default(2048),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Layer = Record<string, unknown>;

export interface LoadConfigOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: Layer;
}

export type OutputPaths = {
    dir: string;
    outcomeLog: string;
    resultsJson: string;
    htmlReport: string | null;
};

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('./default.yaml', import.meta.url));

const isPlainObject = (value: unknown): value is Layer =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** Arrays and scalars replace; objects merge key by key. `undefined` never overwrites. */
export const mergeLayers = (base: Layer, layer: Layer): Layer => {
    const merged: Layer = { ...base };
    for (const [key, value] of Object.entries(layer)) {
        if (value === undefined) continue;
        const current = merged[key];
        merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value;
    }
    return merged;
};

const readYaml = (filePath: string): Layer => {
    let parsed: unknown;
    try {
        parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (e) {
        throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(e)}`);
    }
    if (parsed === undefined || parsed === null) return {};
    if (!isPlainObject(parsed)) {
        throw new ConfigurationError(`Config file ${filePath} must contain a mapping`);
    }
    return parsed;
};

const envLayer = (env: NodeJS.ProcessEnv): Layer => ({
    probe: {
        workers: env.PROBE_WORKERS,
        timeout_ms: env.PROBE_TIMEOUT_MS,
    },
    output: {
        dir: env.PROBE_OUTPUT_DIR,
    },
});

export const parseConfig = (document: Layer): Config => {
    const result = ConfigSchema.safeParse(document);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration (${issues.length} issue(s))`, issues);
    }
    return result.data;
};

export const loadConfig = (options: LoadConfigOptions = {}): Config => {
    let document = readYaml(DEFAULT_CONFIG_PATH);
    if (options.configPath) {
        document = mergeLayers(document, readYaml(path.resolve(options.configPath)));
    }
    document = mergeLayers(document, envLayer(options.env ?? process.env));
    if (options.overrides) {
        document = mergeLayers(document, options.overrides);
    }
    return parseConfig(document);
};

export const resolveOutputPaths = (config: Config): OutputPaths => {
    const dir = path.resolve(config.output.dir);
    return {
        dir,
        outcomeLog: path.join(dir, config.output.outcome_log),
        resultsJson: path.join(dir, config.output.results_json),
        htmlReport: config.output.html_report ? path.join(dir, config.output.html_report) : null,
    };
};
