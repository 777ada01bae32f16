import path from 'node:path';

import { HOME_VARIABLE, PATH_VARIABLE } from '../config/index.js';
import type { SwitcherConfig } from '../config/schema.js';
import { loadConfig } from './config-loader.js';
import { discoverInstallations, type Installation } from './discovery.js';
import type { EnvironmentStore } from './environment.js';
import { SwitchError, asError, isSwitchError, type SwitchErrorKind } from './errors.js';
import { log } from './logger.js';
import { rewritePathValue, type PathFlavor } from './path-rewrite.js';
import { resolveSelection, type PromptFn } from './selector.js';
import { appendSwitchLog } from './switch-log.js';
import { formatVersionList } from './version-list.js';

export type SwitchState = 'Init' | 'Loaded' | 'Listed' | 'Selected' | 'HomeSet' | 'PathUpdated' | 'Logged' | 'Done';

export interface SwitchOptions {
  configPath: string;
  store: EnvironmentStore;
  prompt: PromptFn;
  write: (line: string) => void;
  /** Restore the previous JAVA_HOME when the Path write fails. */
  rollback?: boolean;
  now?: () => Date;
  pathFlavor?: PathFlavor;
}

export interface RestoreOutcome {
  restored: boolean;
  previousValue?: string;
  error?: SwitchError;
}

export interface SwitchReport {
  ok: boolean;
  /** Last state the run reached. */
  state: SwitchState;
  config?: SwitcherConfig;
  selection?: Installation;
  pathValue?: string;
  logFile?: string;
  error?: SwitchError;
  warnings: SwitchError[];
  /** JAVA_HOME was written but Path was not. */
  inconsistent: boolean;
  restore?: RestoreOutcome;
}

function toSwitchError(err: unknown, fallback: SwitchErrorKind): SwitchError {
  if (isSwitchError(err)) return err;
  const e = asError(err);
  return new SwitchError(fallback, e.message, { cause: e });
}

/**
 * Run one switch: load config, list, read a selection, write JAVA_HOME, then
 * Path, then the switch log. Stops at the first fatal error without undoing
 * earlier writes unless `rollback` is set.
 */
export async function runSwitch(options: SwitchOptions): Promise<SwitchReport> {
  const { store, prompt, write } = options;
  const flavor = options.pathFlavor ?? path;
  const now = options.now ?? (() => new Date());
  const report: SwitchReport = { ok: false, state: 'Init', warnings: [], inconsistent: false };

  const advance = (state: SwitchState) => {
    report.state = state;
    log(2, 'switch', `state -> ${state}`);
  };

  const fail = (err: unknown, fallback: SwitchErrorKind): SwitchReport => {
    report.error = toSwitchError(err, fallback);
    log(1, 'switch', `aborted after ${report.state}: ${report.error.kind}`);
    return report;
  };

  let config: SwitcherConfig;
  try {
    config = loadConfig(options.configPath);
  } catch (err) {
    return fail(err, 'ConfigParseError');
  }
  report.config = config;
  advance('Loaded');

  let installations: Installation[];
  try {
    installations = discoverInstallations(config.baseDirectory);
  } catch (err) {
    return fail(err, 'BaseDirectoryNotFound');
  }
  write('Installed Java versions:');
  for (const line of formatVersionList(installations, config.defaultVersionName)) {
    write(`  ${line}`);
  }
  advance('Listed');

  const hint = config.defaultVersionName ? `, Enter for ${config.defaultVersionName}` : '';
  const answer = await prompt(`Select a version (1-${installations.length}${hint}): `);
  let selection: Installation;
  try {
    selection = resolveSelection(answer, installations, config.defaultVersionName);
  } catch (err) {
    return fail(err, 'InvalidSelection');
  }
  report.selection = selection;
  advance('Selected');

  let previousHome: string | undefined;
  try {
    if (options.rollback) {
      previousHome = store.getVariable('Machine', HOME_VARIABLE);
    }
    store.setVariable('Machine', HOME_VARIABLE, selection.path);
  } catch (err) {
    return fail(err, 'EnvironmentWriteFailed');
  }
  advance('HomeSet');

  try {
    const current = store.getVariable('Machine', PATH_VARIABLE) ?? '';
    const next = rewritePathValue(current, selection.path, config.baseDirectory, flavor);
    store.setVariable('Machine', PATH_VARIABLE, next);
    report.pathValue = next;
  } catch (err) {
    report.inconsistent = true;
    fail(err, 'EnvironmentWriteFailed');
    if (options.rollback) {
      report.restore = restoreHome(store, previousHome);
      report.inconsistent = !report.restore.restored;
    }
    return report;
  }
  advance('PathUpdated');

  if (config.logDirectory) {
    try {
      report.logFile = appendSwitchLog(config.logDirectory, selection.path, now());
    } catch (err) {
      report.warnings.push(toSwitchError(err, 'LogWriteFailed'));
    }
  }
  advance('Logged');

  report.ok = true;
  advance('Done');
  return report;
}

function restoreHome(store: EnvironmentStore, previousValue: string | undefined): RestoreOutcome {
  try {
    // An empty value removes the variable, matching a previously unset JAVA_HOME.
    store.setVariable('Machine', HOME_VARIABLE, previousValue ?? '');
    return { restored: true, previousValue };
  } catch (err) {
    return { restored: false, previousValue, error: toSwitchError(err, 'EnvironmentWriteFailed') };
  }
}
