import {
  configSchema,
  defaultConfig,
  readConfig,
  writeConfig,
  type Config,
  type ConfigKey,
} from '../../config/config.js';

const CONFIG_KEYS = Object.keys(configSchema.shape);

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.includes(key);
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new Error(
      `Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`,
    );
  }
  return key;
}

/** Turns command-line text into the type the key's default has. */
export function coerceConfigValue(key: ConfigKey, value: string): unknown {
  const current = defaultConfig[key];
  if (typeof current === 'number') {
    const n = Number(value);
    if (value.trim() === '' || !Number.isFinite(n)) {
      throw new Error(`Config key "${key}" needs a number, got "${value}"`);
    }
    return n;
  }
  if (typeof current === 'boolean') {
    if (value === 'true' || value === 'yes' || value === 'on') return true;
    if (value === 'false' || value === 'no' || value === 'off') return false;
    throw new Error(`Config key "${key}" needs true or false, got "${value}"`);
  }
  return value;
}

export async function runConfigGet(
  root: string,
  key: string,
): Promise<Config[ConfigKey]> {
  const config = await readConfig(root);
  return config[requireKey(key)];
}

export async function runConfigList(root: string): Promise<Config> {
  return readConfig(root);
}

export async function runConfigSet(
  root: string,
  key: string,
  value: string,
): Promise<Config[ConfigKey]> {
  const k = requireKey(key);
  const config = await readConfig(root);
  const result = configSchema.safeParse({
    ...config,
    [k]: coerceConfigValue(k, value),
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `Invalid value for "${key}": ${issue ? issue.message : 'rejected'}`,
    );
  }
  await writeConfig(root, result.data);
  return result.data[k];
}
