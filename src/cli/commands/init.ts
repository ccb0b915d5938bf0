import fs from 'node:fs';
import {
  configPath,
  defaultConfig,
  writeConfig,
} from '../../config/config.js';

interface InitResult {
  path: string;
  alreadyExists: boolean;
}

export interface InitOptions {
  server?: string;
  token?: string;
}

export async function runInit(
  root: string,
  opts: InitOptions = {},
): Promise<InitResult> {
  const p = configPath(root);
  if (fs.existsSync(p)) {
    return { path: p, alreadyExists: true };
  }
  await writeConfig(root, {
    ...defaultConfig,
    server_address: opts.server ?? '',
    api_token: opts.token ?? '',
  });
  return { path: p, alreadyExists: false };
}
