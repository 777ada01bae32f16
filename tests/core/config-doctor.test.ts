import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { diagnose } from '../../src/core/config-doctor.js';

describe('diagnose', () => {
  let tempDir: string;
  let baseDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jswitch-doctor-'));
    baseDir = path.join(tempDir, 'java');
    fs.mkdirSync(path.join(baseDir, 'jdk-17'), { recursive: true });
    fs.mkdirSync(path.join(baseDir, 'jdk-21'));
    configPath = path.join(tempDir, 'config.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(config: Record<string, string>) {
    fs.writeFileSync(configPath, JSON.stringify(config), 'utf8');
  }

  it('passes a valid setup on Windows', () => {
    writeConfig({ JavaBase: baseDir, DefaultVersion: 'jdk-21', LogPath: path.join(tempDir, 'logs') });

    const report = diagnose(configPath, 'win32');

    expect(report.ok).toBe(true);
    expect(report.issues).toEqual([]);
    expect(report.installations.map((i) => i.name)).toEqual(['jdk-17', 'jdk-21']);
  });

  it('flags a platform without a machine-scope store', () => {
    writeConfig({ JavaBase: baseDir });

    const report = diagnose(configPath, 'linux');

    expect(report.ok).toBe(false);
    expect(report.issues.map((i) => i.kind)).toEqual(['UnsupportedPlatform']);
    expect(report.installations).toHaveLength(2);
  });

  it('stops at a missing config file', () => {
    const report = diagnose(configPath, 'win32');

    expect(report.ok).toBe(false);
    expect(report.config).toBeUndefined();
    expect(report.issues).toHaveLength(1);
    expect(report.issues[0]).toMatchObject({ source: 'config', severity: 'error', kind: 'ConfigNotFound' });
  });

  it('reports a missing base directory against JavaBase', () => {
    writeConfig({ JavaBase: path.join(tempDir, 'nowhere') });

    const report = diagnose(configPath, 'win32');

    expect(report.ok).toBe(false);
    expect(report.issues[0]).toMatchObject({ field: 'JavaBase', kind: 'BaseDirectoryNotFound' });
  });

  it('warns when the default version is not installed', () => {
    writeConfig({ JavaBase: baseDir, DefaultVersion: 'jdk-11' });

    const report = diagnose(configPath, 'win32');

    expect(report.ok).toBe(true);
    expect(report.issues).toHaveLength(1);
    expect(report.issues[0]).toMatchObject({ severity: 'warning', field: 'DefaultVersion' });
  });

  it('warns when LogPath is a file', () => {
    const logFile = path.join(tempDir, 'logs.txt');
    fs.writeFileSync(logFile, '');
    writeConfig({ JavaBase: baseDir, LogPath: logFile });

    const report = diagnose(configPath, 'win32');

    expect(report.ok).toBe(true);
    expect(report.issues[0]).toMatchObject({ field: 'LogPath', kind: 'LogWriteFailed', severity: 'warning' });
  });
});
