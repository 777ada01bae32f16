import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';

import { CONFIG_ENV_VAR, DEFAULT_CONFIG_FILE, PACKAGE_ROOT, resolveConfigPath } from '../../src/config/index.js';

describe('resolveConfigPath', () => {
  it('prefers the explicit path', () => {
    expect(resolveConfigPath('/etc/jswitch.json', { [CONFIG_ENV_VAR]: '/other.json' })).toBe(
      path.resolve('/etc/jswitch.json')
    );
  });

  it('falls back to the environment variable', () => {
    expect(resolveConfigPath(undefined, { [CONFIG_ENV_VAR]: ' /srv/config.json ' })).toBe(
      path.resolve('/srv/config.json')
    );
  });

  it('defaults to config/config.json under the package root', () => {
    expect(resolveConfigPath(undefined, {})).toBe(DEFAULT_CONFIG_FILE);
    expect(DEFAULT_CONFIG_FILE).toBe(path.join(PACKAGE_ROOT, 'config', 'config.json'));
  });

  it('resolves the package root to the directory holding package.json', () => {
    expect(path.basename(path.dirname(DEFAULT_CONFIG_FILE))).toBe('config');
    expect(PACKAGE_ROOT).toBe(path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..'));
  });
});
