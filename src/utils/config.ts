import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type Credentials, type PaperFeedConfig } from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { getLogger, parseLogLevel } from './logger.js';

const backendSchema = z.object({
    model: z.string().min(1),
    rpm: z.number().positive(),
    rpd: z.number().int().positive(),
});

/**
 * Shape of paperfeed.config.json. Everything is optional here; required
 * values are checked after merging.
 */
const fileConfigSchema = z
    .object({
        keywords: z.array(z.string()),
        lookbackDays: z.number().int().positive(),
        maxResults: z.number().int().positive(),
        categories: z.array(z.string()),
        searchField: z.enum(['all', 'ti', 'abs']),
        researchArea: z.string(),
        summaryLanguage: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
        llm: z
            .object({
                backends: z.array(backendSchema).min(1),
                temperature: z.number().min(0).max(2),
                cooldownMs: z.number().int().nonnegative(),
                timeoutMs: z.number().int().positive(),
            })
            .partial()
            .strict(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Validate a parsed config file, reporting every problem at once.
 */
export function parseFileConfig(raw: unknown, filepath = 'config'): FileConfig {
    const result = fileConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration in ${filepath}: ${issues.join('; ')}`);
    }
    return result.data;
}

/**
 * Load configuration from paperfeed.config.json (or an explicit path) using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(configPath?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('paperfeed', {
        searchPlaces: ['paperfeed.config.json', '.paperfeedrc', '.paperfeedrc.json'],
    });

    let result;
    try {
        result = configPath ? await explorer.load(configPath) : await explorer.search();
    } catch (error) {
        throw new ConfigurationError(
            `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    if (!result || result.isEmpty) {
        return null;
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parseFileConfig(result.config, result.filepath);
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<PaperFeedConfig> {
    const config: Partial<PaperFeedConfig> = {};

    const lookbackDays = parsePositiveInt(env['PAPERFEED_LOOKBACK_DAYS'], 'PAPERFEED_LOOKBACK_DAYS');
    if (lookbackDays !== undefined) config.lookbackDays = lookbackDays;

    const maxResults = parsePositiveInt(env['PAPERFEED_MAX_RESULTS'], 'PAPERFEED_MAX_RESULTS');
    if (maxResults !== undefined) config.maxResults = maxResults;

    const logLevel = parseLogLevel(env['LOG_LEVEL']);
    if (logLevel) config.logLevel = logLevel;

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export function mergeConfig(
    fileConfig: FileConfig | null,
    envConfig: Partial<PaperFeedConfig>,
    cliFlags: Partial<PaperFeedConfig>
): PaperFeedConfig {
    const merged: PaperFeedConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        llm: {
            ...DEFAULT_CONFIG.llm,
            ...fileConfig?.llm,
            ...cliFlags.llm,
        },
    };

    validateConfig(merged);
    return merged;
}

/**
 * Resolve the full configuration for a run.
 */
export async function resolveConfig(
    cliFlags: Partial<PaperFeedConfig>,
    configPath?: string
): Promise<PaperFeedConfig> {
    const fileConfig = await loadConfigFile(configPath);
    return mergeConfig(fileConfig, loadEnvVars(), cliFlags);
}

/**
 * Read credentials from the environment. Throws listing every missing variable.
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
    const notionToken = env['NOTION_TOKEN'];
    const notionDatabaseId = env['NOTION_DATABASE_ID'] || env['DATABASE_ID'];
    const googleApiKey = env['GOOGLE_API_KEY'];

    const missing: string[] = [];
    if (!notionToken) missing.push('NOTION_TOKEN');
    if (!notionDatabaseId) missing.push('NOTION_DATABASE_ID');
    if (!googleApiKey) missing.push('GOOGLE_API_KEY');

    if (!notionToken || !notionDatabaseId || !googleApiKey) {
        throw new ConfigurationError(`Missing environment variables: ${missing.join(', ')}`);
    }

    return { notionToken, notionDatabaseId, googleApiKey };
}

function validateConfig(config: PaperFeedConfig): void {
    if (config.keywords.every((keyword) => keyword.trim() === '')) {
        throw new ConfigurationError('At least one keyword is required (set "keywords" in paperfeed.config.json)');
    }
    if (config.researchArea.trim() === '') {
        throw new ConfigurationError('"researchArea" must describe your research focus');
    }
    if (config.llm.backends.length === 0) {
        throw new ConfigurationError('At least one LLM backend is required');
    }
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
    if (value === undefined || value === '') return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
    }
    return parsed;
}
