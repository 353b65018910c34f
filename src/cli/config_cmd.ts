import { ConfigRepo } from '../db/repo.js';

export const KNOWN_KEYS = ['max_retries', 'backoff_base_seconds'] as const;

export function getConfigAll(config: ConfigRepo) {
  const res: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(config.all())) {
    const num = Number(value);
    res[key] = value.trim() === '' || isNaN(num) ? value : num;
  }
  return res;
}

export function printConfigValue(config: ConfigRepo, key: string) {
  const value = config.get(key);
  if (value === undefined) {
    console.error(`Error: Config key '${key}' not found.`);
    process.exitCode = 1;
    return;
  }
  console.log(`${key} = ${value}`);
}

export function setConfigKV(config: ConfigRepo, key: string, value: string) {
  if (!KNOWN_KEYS.some((k) => k === key)) {
    console.warn(`Warning: '${key}' is not a recognized setting.`);
  }
  config.set(key, value);
  console.log(`Config updated: ${key} = ${value}`);
}
