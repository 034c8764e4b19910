/**
 * cardscan - Centralized Config Loader
 *
 * Loads configuration from ~/.config/cardscan/config.json with env var overrides.
 * Resolution order: process.env > config.json > defaults
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

import { ConfigError, errorMessage } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export const PROVIDERS = ['openai', 'anthropic'] as const;

export type Provider = (typeof PROVIDERS)[number];

const configFileSchema = z.object({
  version: z.number().int().default(1),
  trello_api_key: z.string().optional(),
  trello_api_token: z.string().optional(),
  openai_api_key: z.string().optional(),
  anthropic_api_key: z.string().optional(),
  provider: z.enum(PROVIDERS).optional(),
  model: z.string().optional(),
  max_tokens: z.number().int().positive().optional(),
  phone_region: z.string().optional(),
  data_dir: z.string().optional(),
});

export type CardscanConfigFile = z.infer<typeof configFileSchema>;

export type ConfigKey = Exclude<keyof CardscanConfigFile, 'version'>;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'trello_api_key',
  'trello_api_token',
  'openai_api_key',
  'anthropic_api_key',
  'provider',
  'model',
  'max_tokens',
  'phone_region',
  'data_dir',
];

const SECRET_KEYS: ReadonlySet<ConfigKey> = new Set([
  'trello_api_key',
  'trello_api_token',
  'openai_api_key',
  'anthropic_api_key',
]);

export interface ResolvedConfig {
  trelloApiKey?: string;
  trelloApiToken?: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  provider: Provider;
  model: string;
  maxTokens: number;
  phoneRegion: string;
  dataDir: string;
}

export interface DataPaths {
  dbPath: string;
  errorLogPath: string;
  markerPath: string;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MODELS: Record<Provider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};

export const DEFAULT_MAX_TOKENS = 100;
export const DEFAULT_PHONE_REGION = 'Australian';
export const DEFAULT_DATA_DIR = './data';

// ============================================================================
// Paths
// ============================================================================

export function getConfigDir(): string {
  return process.env.CARDSCAN_CONFIG_DIR || path.join(os.homedir(), '.config', 'cardscan');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

export function getDataPaths(dataDir: string): DataPaths {
  return {
    dbPath: path.join(dataDir, 'cardscan.db'),
    errorLogPath: path.join(dataDir, 'logs', 'errors.log'),
    markerPath: path.join(dataDir, 'last_board.txt'),
  };
}

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load config from disk. Returns null if the file doesn't exist.
 * A file that exists but fails validation is an error, not a silent default.
 */
export async function loadConfigFile(configPath = getConfigPath()): Promise<CardscanConfigFile | null> {
  if (!existsSync(configPath)) {
    return null;
  }

  const content = await readFile(configPath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${errorMessage(error)}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${configPath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function parseProvider(value: string | undefined): Provider | undefined {
  if (value === undefined || value === '') return undefined;
  const match = PROVIDERS.find((p) => p === value.toLowerCase());
  if (!match) {
    throw new ConfigError(`Unknown provider "${value}". Expected one of: ${PROVIDERS.join(', ')}`);
  }
  return match;
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

/**
 * Load resolved config: process.env takes precedence over config.json.
 */
export async function loadConfig(
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const file = await loadConfigFile(options.configPath);

  const provider = parseProvider(env.CARDSCAN_PROVIDER) ?? file?.provider ?? 'openai';

  return {
    trelloApiKey: env.TRELLO_API_KEY || file?.trello_api_key,
    trelloApiToken: env.TRELLO_API_TOKEN || file?.trello_api_token,
    openaiApiKey: env.OPENAI_API_KEY || file?.openai_api_key,
    anthropicApiKey: env.ANTHROPIC_API_KEY || file?.anthropic_api_key,
    provider,
    model: env.CARDSCAN_MODEL || file?.model || DEFAULT_MODELS[provider],
    maxTokens: parsePositiveInt('CARDSCAN_MAX_TOKENS', env.CARDSCAN_MAX_TOKENS) ?? file?.max_tokens ?? DEFAULT_MAX_TOKENS,
    phoneRegion: env.CARDSCAN_PHONE_REGION || file?.phone_region || DEFAULT_PHONE_REGION,
    dataDir: env.CARDSCAN_DATA_DIR || file?.data_dir || DEFAULT_DATA_DIR,
  };
}

export interface TrelloCredentials {
  trelloApiKey: string;
  trelloApiToken: string;
}

export interface Credentials extends TrelloCredentials {
  providerApiKey: string;
}

function providerKey(config: ResolvedConfig): { name: string; value: string | undefined } {
  return config.provider === 'openai'
    ? { name: 'OPENAI_API_KEY', value: config.openaiApiKey }
    : { name: 'ANTHROPIC_API_KEY', value: config.anthropicApiKey };
}

function missingKeys(config: ResolvedConfig, includeProvider: boolean): string[] {
  const missing: string[] = [];
  if (!config.trelloApiKey) missing.push('TRELLO_API_KEY');
  if (!config.trelloApiToken) missing.push('TRELLO_API_TOKEN');
  if (includeProvider) {
    const key = providerKey(config);
    if (!key.value) missing.push(key.name);
  }
  return missing;
}

function missingError(missing: string[]): ConfigError {
  return new ConfigError(
    `Missing required settings: ${missing.join(', ')}. Set them in .env or run 'cardscan config set'.`,
    missing,
  );
}

/**
 * Both Trello keys. Enough for read-only board commands.
 */
export function requireTrelloCredentials(config: ResolvedConfig): TrelloCredentials {
  const { trelloApiKey, trelloApiToken } = config;
  if (!trelloApiKey || !trelloApiToken) {
    throw missingError(missingKeys(config, false));
  }
  return { trelloApiKey, trelloApiToken };
}

/**
 * Every key a sync needs: both Trello keys plus the selected provider's key.
 * Reports all missing keys at once.
 */
export function requireCredentials(config: ResolvedConfig): Credentials {
  const providerApiKey = providerKey(config).value;
  const { trelloApiKey, trelloApiToken } = config;
  if (!trelloApiKey || !trelloApiToken || !providerApiKey) {
    throw missingError(missingKeys(config, true));
  }
  return { trelloApiKey, trelloApiToken, providerApiKey };
}

// ============================================================================
// Config Writing
// ============================================================================

const configEntrySchema = configFileSchema.omit({ version: true }).partial();

export type ConfigEntry = z.infer<typeof configEntrySchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

/**
 * Turn a `config set <key> <value>` pair into a validated config entry.
 */
export function parseConfigEntry(key: ConfigKey, value: string): ConfigEntry {
  const raw = key === 'max_tokens' ? Number(value) : key === 'provider' ? value.toLowerCase() : value;
  const parsed = configEntrySchema.safeParse({ [key]: raw });
  if (!parsed.success) {
    throw new ConfigError(`Invalid value for ${key}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Merge values into the config file, creating it if needed.
 */
export async function saveConfig(
  values: ConfigEntry,
  configPath = getConfigPath()
): Promise<CardscanConfigFile> {
  await mkdir(path.dirname(configPath), { recursive: true });

  const existing = await loadConfigFile(configPath);
  const merged: CardscanConfigFile = {
    ...existing,
    ...values,
    version: 1,
  };

  await writeFile(configPath, JSON.stringify(merged, null, 2) + '\n');
  return merged;
}

export function maskSecret(value: string): string {
  if (value.length <= 8) return '****';
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

/**
 * Config file entries for display, with API keys and tokens masked.
 */
export function describeConfig(file: CardscanConfigFile | null): Array<[ConfigKey, string]> {
  if (!file) return [];
  const rows: Array<[ConfigKey, string]> = [];
  for (const key of CONFIG_KEYS) {
    const value = file[key];
    if (value === undefined) continue;
    const text = String(value);
    rows.push([key, SECRET_KEYS.has(key) ? maskSecret(text) : text]);
  }
  return rows;
}
