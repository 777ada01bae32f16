import { describe, expect, it } from 'vitest';

import { summarizeReport } from '../../src/cli/commands/use.js';
import { SwitchError } from '../../src/core/errors.js';
import type { SwitchReport } from '../../src/core/switcher.js';

const selection = { name: 'jdk-21', path: 'C:\\Java\\jdk-21' };

function report(overrides: Partial<SwitchReport>): SwitchReport {
  return { ok: false, state: 'Init', warnings: [], inconsistent: false, ...overrides };
}

describe('summarizeReport', () => {
  it('confirms a finished switch and mentions new terminals', () => {
    const lines = summarizeReport(
      report({ ok: true, state: 'Done', selection, logFile: 'C:\\Logs\\java-switcher.log' })
    );

    expect(lines.info).toEqual([
      '✓ JAVA_HOME set to C:\\Java\\jdk-21',
      '✓ Path updated (jdk-21 first)',
      '  Logged to C:\\Logs\\java-switcher.log',
      'Open a new terminal to use it; shells that are already running keep the old values.'
    ]);
    expect(lines.warnings).toEqual([]);
    expect(lines.errors).toEqual([]);
  });

  it('reports a log failure as a warning next to a successful switch', () => {
    const lines = summarizeReport(
      report({
        ok: true,
        state: 'Done',
        selection,
        warnings: [new SwitchError('LogWriteFailed', 'Could not write switch log X: EACCES')]
      })
    );

    expect(lines.info[0]).toBe('✓ JAVA_HOME set to C:\\Java\\jdk-21');
    expect(lines.warnings).toEqual(['⚠ Warning: LogWriteFailed: Could not write switch log X: EACCES']);
    expect(lines.errors).toEqual([]);
  });

  it('prints the error and the last step reached', () => {
    const lines = summarizeReport(
      report({ state: 'Listed', error: new SwitchError('InvalidSelection', 'Invalid selection "9": enter a number (1-3)') })
    );

    expect(lines.info).toEqual([]);
    expect(lines.errors).toEqual([
      '✗ InvalidSelection: Invalid selection "9": enter a number (1-3)',
      '  Stopped after step: Listed'
    ]);
  });

  it('spells out an inconsistent environment', () => {
    const lines = summarizeReport(
      report({
        state: 'HomeSet',
        selection,
        inconsistent: true,
        error: new SwitchError('EnvironmentWritePermissionDenied', 'Unable to set Machine variable Path')
      })
    );

    expect(lines.errors).toEqual([
      '✗ EnvironmentWritePermissionDenied: Unable to set Machine variable Path',
      '✗ Inconsistent environment: JAVA_HOME now points to C:\\Java\\jdk-21 but Path was not updated.',
      '  Stopped after step: HomeSet'
    ]);
  });

  it('describes a successful restore', () => {
    const lines = summarizeReport(
      report({
        state: 'HomeSet',
        selection,
        error: new SwitchError('EnvironmentWriteFailed', 'boom'),
        restore: { restored: true }
      })
    );

    expect(lines.errors).toEqual([
      '✗ EnvironmentWriteFailed: boom',
      '  JAVA_HOME restored to (unset); Path was not changed.',
      '  Stopped after step: HomeSet'
    ]);
  });

  it('describes a failed restore', () => {
    const lines = summarizeReport(
      report({
        state: 'HomeSet',
        selection,
        inconsistent: true,
        error: new SwitchError('EnvironmentWriteFailed', 'boom'),
        restore: {
          restored: false,
          previousValue: 'C:\\Java\\jdk-17',
          error: new SwitchError('EnvironmentWritePermissionDenied', 'denied')
        }
      })
    );

    expect(lines.errors).toEqual([
      '✗ EnvironmentWriteFailed: boom',
      '  Could not restore JAVA_HOME: EnvironmentWritePermissionDenied: denied',
      '✗ Inconsistent environment: JAVA_HOME now points to C:\\Java\\jdk-21 but Path was not updated.',
      '  Stopped after step: HomeSet'
    ]);
  });
});
