import { z } from 'zod';

export const DELIMITERS = [',', ';'] as const;
export type Delimiter = (typeof DELIMITERS)[number];

export const DEFAULT_RETRY_COUNT = 5;
export const DEFAULT_RETRY_DELAY_MS = 400;
export const DEFAULT_WATCH_INTERVAL_MS = 5_000;
export const DEFAULT_WATCH_EXTENSIONS = ['.mp4', '.mkv', '.mov', '.flv'];
export const DEFAULT_OBS_WEBSOCKET_URL = 'ws://127.0.0.1:4455';

/**
 * Raw configuration as it arrives from a JSON file, the environment or CLI
 * flags. Values stay loosely typed here; `normalizeConfig` validates each one
 * on its own so a single bad value never discards the rest.
 */
export const rawConfigSchema = z
  .object({
    ledger_output_directory: z.unknown().optional(),
    ledger_path: z.unknown().optional(),
    delimiter: z.unknown().optional(),
    retry_count: z.unknown().optional(),
    retry_delay_ms: z.unknown().optional(),
    capture_metadata: z.unknown().optional(),
    organize_into_folder: z.unknown().optional(),
    watch_extensions: z.unknown().optional(),
    watch_interval_ms: z.unknown().optional(),
    obs_websocket_url: z.unknown().optional(),
    obs_websocket_password: z.unknown().optional(),
  })
  .passthrough();

export type RawConfig = z.infer<typeof rawConfigSchema>;

export const textSchema = z.string();

export const urlSchema = z.string().trim().min(1);

export const delimiterSchema = z.enum(DELIMITERS);

export const retryCountSchema = z.coerce.number().int().min(1);

export const retryDelaySchema = z.coerce.number().int().min(0);

export const watchIntervalSchema = z.coerce.number().int().min(100);

export const booleanFlagSchema = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
    .transform((v) => v === 'true' || v === '1' || v === 'yes' || v === 'on'),
]);

export const extensionListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(',')))
  .transform((list) =>
    list
      .map((ext) => ext.trim().toLowerCase())
      .filter((ext) => ext.length > 0)
      .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
  )
  .pipe(z.array(z.string()).min(1));

export interface RecLedgerConfig {
  ledgerOutputDirectory: string;
  ledgerPath: string;
  delimiter: Delimiter;
  retryCount: number;
  retryDelayMs: number;
  captureMetadata: boolean;
  /** Move each recording into its own folder before hashing. */
  organizeIntoFolder: boolean;
  watchExtensions: string[];
  watchIntervalMs: number;
  obsWebsocketUrl: string;
  obsWebsocketPassword: string;
}

export function defaultConfig(): RecLedgerConfig {
  return {
    ledgerOutputDirectory: '',
    ledgerPath: '',
    delimiter: ',',
    retryCount: DEFAULT_RETRY_COUNT,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    captureMetadata: false,
    organizeIntoFolder: false,
    watchExtensions: [...DEFAULT_WATCH_EXTENSIONS],
    watchIntervalMs: DEFAULT_WATCH_INTERVAL_MS,
    obsWebsocketUrl: DEFAULT_OBS_WEBSOCKET_URL,
    obsWebsocketPassword: '',
  };
}
