import { spawnSync } from 'node:child_process';

import { SwitchError } from './errors.js';
import { log } from './logger.js';

export type EnvironmentScope = 'Machine' | 'User' | 'Process';

/**
 * Persistent environment variable storage. Machine scope survives reboots and
 * is only seen by processes started after the write.
 */
export interface EnvironmentStore {
  getVariable(scope: EnvironmentScope, name: string): string | undefined;
  setVariable(scope: EnvironmentScope, name: string, value: string): void;
}

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export type CommandRunner = (file: string, args: string[]) => CommandResult;

export const runCommand: CommandRunner = (file, args) => {
  const result = spawnSync(file, args, { encoding: 'utf8', windowsHide: true });
  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    error: result.error
  };
};

const PERMISSION_PATTERNS = [
  /UnauthorizedAccess/i,
  /Requested registry access is not allowed/i,
  /Access is denied/i,
  /SecurityException/i
];

/**
 * Quote a value as a single-quoted PowerShell string literal. PowerShell also
 * closes such a literal on the typographic single quotes U+2018-U+201B.
 */
export function psQuote(value: string): string {
  return `'${value.replace(/['\u2018\u2019\u201A\u201B]/g, (q) => q + q)}'`;
}

/**
 * Drives `[Environment]::Get/SetEnvironmentVariable` through powershell.exe.
 * Process scope is served from this process's own environment.
 */
export class PowerShellEnvironmentStore implements EnvironmentStore {
  constructor(
    private readonly run: CommandRunner = runCommand,
    private readonly executable: string = 'powershell.exe'
  ) {}

  getVariable(scope: EnvironmentScope, name: string): string | undefined {
    if (scope === 'Process') {
      return process.env[name];
    }
    const script =
      '[Console]::OutputEncoding = [Text.Encoding]::UTF8; ' +
      `$v = [Environment]::GetEnvironmentVariable(${psQuote(name)}, ${psQuote(scope)}); ` +
      'if ($null -ne $v) { [Console]::Out.Write($v) }';
    const stdout = this.invoke(script, `read ${scope} variable ${name}`);
    return stdout === '' ? undefined : stdout;
  }

  setVariable(scope: EnvironmentScope, name: string, value: string): void {
    if (scope === 'Process') {
      process.env[name] = value;
      return;
    }
    const script = `[Environment]::SetEnvironmentVariable(${psQuote(name)}, ${psQuote(value)}, ${psQuote(scope)})`;
    this.invoke(script, `set ${scope} variable ${name}`);
    log(1, 'env', `set ${scope} ${name}`);
  }

  private invoke(script: string, action: string): string {
    log(3, 'env', `${this.executable} ${script}`);
    const result = this.run(this.executable, ['-NoProfile', '-NonInteractive', '-Command', script]);
    if (result.error) {
      throw new SwitchError('EnvironmentWriteFailed', `Unable to ${action}: ${result.error.message}`, {
        cause: result.error
      });
    }
    if (result.status !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.status ?? 'unknown'}`;
      const kind = PERMISSION_PATTERNS.some((pattern) => pattern.test(result.stderr))
        ? 'EnvironmentWritePermissionDenied'
        : 'EnvironmentWriteFailed';
      const hint = kind === 'EnvironmentWritePermissionDenied' ? ' (run as administrator)' : '';
      throw new SwitchError(kind, `Unable to ${action}${hint}: ${detail}`);
    }
    return result.stdout;
  }
}

export function createEnvironmentStore(platform: NodeJS.Platform = process.platform): EnvironmentStore {
  if (platform !== 'win32') {
    throw new SwitchError(
      'UnsupportedPlatform',
      `Machine-scope environment variables are only supported on Windows (current platform: ${platform})`
    );
  }
  return new PowerShellEnvironmentStore();
}
