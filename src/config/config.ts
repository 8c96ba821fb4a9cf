import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import { cleanUserPath } from '../utils/paths.js';
import { isErrnoCode } from '../utils/errors.js';
import { errorMessage, type Logger } from '../logging/logger.js';
import {
  booleanFlagSchema,
  defaultConfig,
  delimiterSchema,
  extensionListSchema,
  rawConfigSchema,
  retryCountSchema,
  retryDelaySchema,
  textSchema,
  urlSchema,
  watchIntervalSchema,
  DEFAULT_OBS_WEBSOCKET_URL,
  DEFAULT_RETRY_COUNT,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_WATCH_INTERVAL_MS,
  type RawConfig,
  type RecLedgerConfig,
} from './schema.js';

export const DEFAULT_CONFIG_FILE = 'recledger.config.json';

const ENV_KEYS: Record<string, keyof RawConfig> = {
  RECLEDGER_OUTPUT_DIR: 'ledger_output_directory',
  RECLEDGER_LEDGER_PATH: 'ledger_path',
  RECLEDGER_DELIMITER: 'delimiter',
  RECLEDGER_RETRY_COUNT: 'retry_count',
  RECLEDGER_RETRY_DELAY_MS: 'retry_delay_ms',
  RECLEDGER_CAPTURE_METADATA: 'capture_metadata',
  RECLEDGER_ORGANIZE_INTO_FOLDER: 'organize_into_folder',
  RECLEDGER_WATCH_EXTENSIONS: 'watch_extensions',
  RECLEDGER_WATCH_INTERVAL_MS: 'watch_interval_ms',
  OBS_WS_URL: 'obs_websocket_url',
  OBS_WS_PASSWORD: 'obs_websocket_password',
};

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function pick<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  fallback: T,
  warning: string,
  logger: Logger
): T {
  if (isAbsent(value)) return fallback;
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  logger.warn(warning, { value });
  return fallback;
}

/**
 * Validates raw settings one key at a time. Invalid values are replaced by
 * their default with a warning; this never throws.
 */
export function normalizeConfig(raw: RawConfig, logger: Logger): RecLedgerConfig {
  const defaults = defaultConfig();

  return {
    ledgerOutputDirectory: cleanUserPath(
      pick(
        textSchema,
        raw.ledger_output_directory,
        defaults.ledgerOutputDirectory,
        'ledger_output_directory invalid; writing sidecars beside the recording.',
        logger
      )
    ),
    ledgerPath: cleanUserPath(
      pick(
        textSchema,
        raw.ledger_path,
        defaults.ledgerPath,
        'ledger_path invalid; using a ledger beside each recording.',
        logger
      )
    ),
    delimiter: pick(
      delimiterSchema,
      raw.delimiter,
      defaults.delimiter,
      'CSV delimiter invalid; defaulting to comma.',
      logger
    ),
    retryCount: pick(
      retryCountSchema,
      raw.retry_count,
      defaults.retryCount,
      `Retry count invalid; defaulting to ${DEFAULT_RETRY_COUNT}.`,
      logger
    ),
    retryDelayMs: pick(
      retryDelaySchema,
      raw.retry_delay_ms,
      defaults.retryDelayMs,
      `Retry delay invalid; defaulting to ${DEFAULT_RETRY_DELAY_MS} ms.`,
      logger
    ),
    captureMetadata: pick(
      booleanFlagSchema,
      raw.capture_metadata,
      defaults.captureMetadata,
      'capture_metadata invalid; defaulting to false.',
      logger
    ),
    organizeIntoFolder: pick(
      booleanFlagSchema,
      raw.organize_into_folder,
      defaults.organizeIntoFolder,
      'organize_into_folder invalid; defaulting to false.',
      logger
    ),
    watchExtensions: pick(
      extensionListSchema,
      raw.watch_extensions,
      defaults.watchExtensions,
      'watch_extensions invalid; using the default allowlist.',
      logger
    ),
    watchIntervalMs: pick(
      watchIntervalSchema,
      raw.watch_interval_ms,
      defaults.watchIntervalMs,
      `Watch interval invalid; defaulting to ${DEFAULT_WATCH_INTERVAL_MS} ms.`,
      logger
    ),
    obsWebsocketUrl: pick(
      urlSchema,
      raw.obs_websocket_url,
      defaults.obsWebsocketUrl,
      `obs_websocket_url invalid; defaulting to ${DEFAULT_OBS_WEBSOCKET_URL}.`,
      logger
    ),
    obsWebsocketPassword: pick(
      textSchema,
      raw.obs_websocket_password,
      defaults.obsWebsocketPassword,
      'obs_websocket_password invalid; connecting without a password.',
      logger
    ),
  };
}

export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[configKey] = value;
    }
  }
  return raw;
}

/** Reads a JSON config file. Missing, unreadable or malformed files yield `{}` with a warning. */
export async function readConfigFile(
  path: string,
  logger: Logger,
  { required = false }: { required?: boolean } = {}
): Promise<RawConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (required || !isErrnoCode(err, 'ENOENT')) {
      logger.warn(`Config file unreadable, ignoring: ${path}`, { error: errorMessage(err) });
    }
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    logger.warn(`Config file is not valid JSON, ignoring: ${path}`, { error: errorMessage(err) });
    return {};
  }

  const parsed = rawConfigSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn(`Config file has an unexpected shape, ignoring: ${path}`, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return {};
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RawConfig;
  logger: Logger;
}

/** Merges config file, environment and overrides (later wins) and normalizes the result. */
export async function loadConfig(options: LoadConfigOptions): Promise<RecLedgerConfig> {
  const { logger } = options;
  const filePath = options.configPath ? cleanUserPath(options.configPath) : DEFAULT_CONFIG_FILE;
  const fromFile = await readConfigFile(filePath, logger, { required: Boolean(options.configPath) });
  const fromEnv = configFromEnv(options.env ?? process.env);

  const merged: RawConfig = { ...fromFile, ...fromEnv };
  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined) merged[key] = value;
  }

  return normalizeConfig(merged, logger);
}
