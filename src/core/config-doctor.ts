import fs from 'node:fs';

import type { SwitcherConfig } from '../config/schema.js';
import { loadConfig } from './config-loader.js';
import { discoverInstallations, type Installation } from './discovery.js';
import { describeError, isSwitchError, type SwitchErrorKind } from './errors.js';

export interface ConfigIssue {
  source: 'config' | 'filesystem' | 'platform';
  severity: 'error' | 'warning';
  kind?: SwitchErrorKind;
  field?: string;
  message: string;
}

export interface DoctorReport {
  ok: boolean;
  configPath: string;
  config?: SwitcherConfig;
  installations: Installation[];
  issues: ConfigIssue[];
}

export function diagnose(configPath: string, platform: NodeJS.Platform = process.platform): DoctorReport {
  const report: DoctorReport = { ok: true, configPath, installations: [], issues: [] };
  const add = (issue: ConfigIssue) => {
    report.issues.push(issue);
    if (issue.severity === 'error') report.ok = false;
  };

  if (platform !== 'win32') {
    add({
      source: 'platform',
      severity: 'error',
      kind: 'UnsupportedPlatform',
      message: `machine-scope environment variables cannot be written on ${platform}`
    });
  }

  let config: SwitcherConfig;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    add({
      source: 'config',
      severity: 'error',
      kind: isSwitchError(err) ? err.kind : undefined,
      message: describeError(err)
    });
    return report;
  }
  report.config = config;

  try {
    report.installations = discoverInstallations(config.baseDirectory);
  } catch (err) {
    add({
      source: 'filesystem',
      severity: 'error',
      kind: isSwitchError(err) ? err.kind : undefined,
      field: 'JavaBase',
      message: describeError(err)
    });
  }

  const defaultName = config.defaultVersionName;
  if (defaultName && report.installations.length > 0 && !report.installations.some((i) => i.name === defaultName)) {
    add({
      source: 'config',
      severity: 'warning',
      field: 'DefaultVersion',
      message: `"${defaultName}" is not installed under ${config.baseDirectory}; an empty answer will be rejected`
    });
  }

  if (config.logDirectory) {
    const issue = checkLogDirectory(config.logDirectory);
    if (issue) add(issue);
  }

  return report;
}

function checkLogDirectory(dir: string): ConfigIssue | undefined {
  let stat: fs.Stats | undefined;
  try {
    stat = fs.statSync(dir);
  } catch {
    // Created on first switch.
    return undefined;
  }
  if (!stat.isDirectory()) {
    return {
      source: 'filesystem',
      severity: 'warning',
      kind: 'LogWriteFailed',
      field: 'LogPath',
      message: `${dir} exists but is not a directory`
    };
  }
  try {
    fs.accessSync(dir, fs.constants.W_OK);
  } catch {
    return {
      source: 'filesystem',
      severity: 'warning',
      kind: 'LogWriteFailed',
      field: 'LogPath',
      message: `${dir} is not writable`
    };
  }
  return undefined;
}
