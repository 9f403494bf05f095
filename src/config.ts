import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { dbg, errorMessage } from './utils';

// Default paths and constants
export const DEFAULT_DATA_DIR = 'integrated_data';
export const DEFAULT_NER_MODEL = 'gpt-4o-mini';
export const DEFAULT_EMBEDDINGS_MODEL = 'text-embedding-3-small';

// Below this confidence the engine asks instead of answering.
export const CLARIFICATION_THRESHOLD = 0.4;
// Below this confidence the clarification also offers the intent menu.
export const INTENT_MENU_THRESHOLD = 0.3;

export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
    }
}

const BotConfigSchema = z.object({
    dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
    productsDir: z.string().min(1).optional(),
    useNlp: z.boolean().default(true),
    nerModel: z.string().min(1).default(DEFAULT_NER_MODEL),
    embeddingsModel: z.string().min(1).default(DEFAULT_EMBEDDINGS_MODEL),
    minConfidence: z.number().min(0).max(1).default(0.6),
    maxSearchResults: z.number().int().positive().default(5),
    responseTemplates: z.record(z.string()).default({}),
    cacheEnabled: z.boolean().default(true),
    cacheTtlMs: z.number().int().nonnegative().default(3_600_000),
    cacheMaxEntries: z.number().int().positive().default(500),
    debug: z.boolean().default(false),
    enableLearning: z.boolean().default(false),
}).strict();

export type BotConfigInput = z.input<typeof BotConfigSchema>;

type ParsedBotConfig = z.output<typeof BotConfigSchema>;

export type BotConfig = Readonly<Omit<ParsedBotConfig, 'productsDir' | 'responseTemplates'> & {
    productsDir: string;
    responseTemplates: Readonly<Record<string, string>>;
}>;

/** Settings file as written by hand: snake_case keys, TTL in seconds. */
const SettingsFileSchema = z.object({
    base_data_dir: z.string().optional(),
    integrated_data_dir: z.string().optional(),
    products_dir: z.string().optional(),
    use_nlp: z.boolean().optional(),
    ner_model: z.string().optional(),
    embeddings_model: z.string().optional(),
    min_confidence: z.number().optional(),
    max_search_results: z.number().optional(),
    response_templates: z.record(z.string()).optional(),
    cache_enabled: z.boolean().optional(),
    cache_ttl: z.number().optional(),
    cache_max_entries: z.number().optional(),
    debug: z.boolean().optional(),
    enable_learning: z.boolean().optional(),
}).passthrough();

type SettingsFile = z.infer<typeof SettingsFileSchema>;

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

const CONFIG_KEYS = BotConfigSchema.keyof().options;

function copyDefined<K extends keyof BotConfigInput>(target: BotConfigInput, source: BotConfigInput, key: K) {
    const value = source[key];
    if (value !== undefined) {
        target[key] = value;
    }
}

/** Later layers win; a key left undefined in a layer does not hide an earlier value. */
export function mergeConfigLayers(...layers: BotConfigInput[]): BotConfigInput {
    const merged: BotConfigInput = {};
    for (const layer of layers) {
        for (const key of CONFIG_KEYS) {
            copyDefined(merged, layer, key);
        }
    }
    return merged;
}

/**
 * Validates and freezes a configuration. Relative directories are resolved
 * against the current working directory.
 *
 * @throws ConfigError when a field is missing its expected type or range
 */
export function createBotConfig(input: BotConfigInput = {}): BotConfig {
    const parsed = BotConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
    }
    const dataDir = path.resolve(parsed.data.dataDir);
    const productsDir = parsed.data.productsDir
        ? path.resolve(parsed.data.productsDir)
        : path.join(dataDir, 'products');

    return Object.freeze({
        ...parsed.data,
        dataDir,
        productsDir,
        responseTemplates: Object.freeze({ ...parsed.data.responseTemplates }),
    });
}

function parseNumber(raw: string | undefined, name: string): number | undefined {
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
        throw new ConfigError(`Environment variable ${name} is not a number`, [`${name}=${raw}`]);
    }
    return value;
}

function parseBoolean(raw: string | undefined): boolean | undefined {
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): BotConfigInput {
    return {
        dataDir: env.PRODUCT_DATA_DIR || undefined,
        minConfidence: parseNumber(env.MIN_CONFIDENCE, 'MIN_CONFIDENCE'),
        maxSearchResults: parseNumber(env.MAX_SEARCH_RESULTS, 'MAX_SEARCH_RESULTS'),
        useNlp: parseBoolean(env.USE_NLP),
        debug: parseBoolean(env.DEBUG),
    };
}

export function configFromSettings(settings: SettingsFile): BotConfigInput {
    return {
        dataDir: settings.integrated_data_dir ?? settings.base_data_dir,
        productsDir: settings.products_dir,
        useNlp: settings.use_nlp,
        nerModel: settings.ner_model,
        embeddingsModel: settings.embeddings_model,
        minConfidence: settings.min_confidence,
        maxSearchResults: settings.max_search_results,
        responseTemplates: settings.response_templates,
        cacheEnabled: settings.cache_enabled,
        cacheTtlMs: settings.cache_ttl === undefined ? undefined : settings.cache_ttl * 1000,
        cacheMaxEntries: settings.cache_max_entries,
        debug: settings.debug,
        enableLearning: settings.enable_learning,
    };
}

export interface LoadConfigOptions {
    settingsPath?: string;
    overrides?: BotConfigInput;
    env?: NodeJS.ProcessEnv;
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
}

/**
 * Builds the configuration from its sources, lowest precedence first:
 * schema defaults, environment, JSON settings file, explicit overrides.
 */
export async function loadBotConfig(options: LoadConfigOptions = {}): Promise<BotConfig> {
    const readFileFn: (path: string, encoding: BufferEncoding) => Promise<string> = options.readFileFn || fs.readFile;
    let fromFile: BotConfigInput = {};

    if (options.settingsPath) {
        const settingsPath = path.resolve(options.settingsPath);
        let raw: unknown;
        try {
            raw = JSON.parse(await readFileFn(settingsPath, 'utf-8'));
        } catch (error) {
            throw new ConfigError(`Failed to load or parse settings file: ${settingsPath}. Original error: ${errorMessage(error)}`);
        }
        const settings = SettingsFileSchema.safeParse(raw);
        if (!settings.success) {
            throw new ConfigError(`Invalid settings file ${settingsPath}`, formatIssues(settings.error));
        }
        fromFile = configFromSettings(settings.data);
        dbg(`Loaded settings from ${settingsPath}`);
    }

    return createBotConfig(mergeConfigLayers(
        configFromEnv(options.env),
        fromFile,
        options.overrides ?? {},
    ));
}
