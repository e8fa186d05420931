export type LogLevel = 'silent' | 'error' | 'info' | 'debug';

export interface SafetensorsConfig {
  /** Largest header length prefix accepted on decode, in bytes. */
  maxHeaderSize: number;
  logLevel: LogLevel;
}

export const DEFAULT_MAX_HEADER_SIZE = 100 * 1024 * 1024; // 100 MB DoS guard

export const DEFAULT_CONFIG: Readonly<SafetensorsConfig> = {
  maxHeaderSize: DEFAULT_MAX_HEADER_SIZE,
  logLevel: 'error',
};

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['silent', 'error', 'info', 'debug']);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Read configuration from the environment. Unset or unparseable variables
 * fall back to the defaults.
 *
 * - `SAFETENSORS_MAX_HEADER_SIZE`: positive integer byte count
 * - `SAFETENSORS_LOG_LEVEL`: `silent`, `error`, `info` or `debug`
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SafetensorsConfig {
  const config: SafetensorsConfig = { ...DEFAULT_CONFIG };

  const rawMax = env.SAFETENSORS_MAX_HEADER_SIZE?.trim();
  if (rawMax && /^\d+$/.test(rawMax)) {
    const parsed = Number(rawMax);
    if (Number.isSafeInteger(parsed) && parsed > 0) {
      config.maxHeaderSize = parsed;
    }
  }

  const rawLevel = env.SAFETENSORS_LOG_LEVEL?.trim().toLowerCase();
  if (rawLevel && isLogLevel(rawLevel)) {
    config.logLevel = rawLevel;
  }

  return config;
}
