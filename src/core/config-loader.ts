import fs from 'node:fs';

import { ConfigFileSchema, type SwitcherConfig } from '../config/schema.js';
import { SwitchError } from './errors.js';
import { log } from './logger.js';

export function loadConfig(configPath: string): SwitcherConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      throw new SwitchError('ConfigNotFound', `Configuration file not found: ${configPath}`, { cause: err });
    }
    throw new SwitchError('ConfigParseError', `Unable to read configuration file ${configPath}`, { cause: err });
  }

  let data: unknown;
  try {
    // Editors on Windows like to save JSON with a BOM.
    data = JSON.parse(raw.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new SwitchError('ConfigParseError', `Configuration file is not valid JSON: ${configPath}`, { cause: err });
  }

  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    throw new SwitchError('ConfigParseError', `Configuration file must contain a JSON object: ${configPath}`);
  }

  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new SwitchError('ConfigParseError', `Invalid configuration field ${where}: ${issue?.message ?? 'invalid value'}`, {
      cause: parsed.error
    });
  }

  const baseDirectory = parsed.data.JavaBase?.trim();
  if (!baseDirectory) {
    throw new SwitchError('MissingRequiredField', `Configuration field "JavaBase" is required in ${configPath}`);
  }

  const config: SwitcherConfig = { baseDirectory };
  if (parsed.data.LogPath) config.logDirectory = parsed.data.LogPath;
  if (parsed.data.DefaultVersion) config.defaultVersionName = parsed.data.DefaultVersion;

  log(2, 'config', `loaded ${configPath}`, config);
  return config;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
