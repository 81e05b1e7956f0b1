/**
 * Process-wide defaults, read once from the environment.
 *
 * - SLOTLIST_RANGE_CHECKS: `0` or `false` turns index/count validation off
 *   for lists that do not set `rangeChecks` themselves
 * - SLOTLIST_LOG_LEVEL: `error`, `warn`, `info`, `debug` or `silent`
 */

export type LogLevelSetting = 'error' | 'warn' | 'info' | 'debug' | 'silent';

export interface SlotlistConfig {
  rangeChecks: boolean;
  logLevel: LogLevelSetting;
}

const LOG_LEVEL_SETTINGS: readonly LogLevelSetting[] = ['error', 'warn', 'info', 'debug', 'silent'];

export const DEFAULT_CONFIG: Readonly<SlotlistConfig> = {
  rangeChecks: true,
  logLevel: 'silent',
};

let current: SlotlistConfig | undefined;

function isLogLevelSetting(value: string): value is LogLevelSetting {
  return LOG_LEVEL_SETTINGS.some(level => level === value);
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false;
    default:
      throw new Error(`Invalid ${name} "${raw}": expected a boolean`);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SlotlistConfig {
  const config: SlotlistConfig = { ...DEFAULT_CONFIG };

  const rangeChecks = env.SLOTLIST_RANGE_CHECKS;
  if (rangeChecks !== undefined && rangeChecks !== '') {
    config.rangeChecks = parseBoolean('SLOTLIST_RANGE_CHECKS', rangeChecks);
  }

  const logLevel = env.SLOTLIST_LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== '') {
    const level = logLevel.trim().toLowerCase();
    if (!isLogLevelSetting(level)) {
      throw new Error(`Invalid SLOTLIST_LOG_LEVEL "${logLevel}": expected one of ${LOG_LEVEL_SETTINGS.join(', ')}`);
    }
    config.logLevel = level;
  }

  return config;
}

export function getConfig(): SlotlistConfig {
  if (!current) current = loadConfig();
  return current;
}

export function setConfig(overrides: Partial<SlotlistConfig>): SlotlistConfig {
  current = { ...getConfig(), ...overrides };
  return current;
}

// Drops overrides; the environment is read again on next access
export function resetConfig(): void {
  current = undefined;
}
