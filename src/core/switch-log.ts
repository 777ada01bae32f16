import fs from 'node:fs';
import path from 'node:path';

import { HOME_VARIABLE, SWITCH_LOG_FILE } from '../config/index.js';
import { SwitchError } from './errors.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as `yyyy-MM-dd HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatSwitchLogLine(selectionPath: string, date: Date): string {
  return `${formatTimestamp(date)} | ${HOME_VARIABLE} set to ${selectionPath}`;
}

/**
 * Append one line to `<logDirectory>/java-switcher.log`, creating the
 * directory first. Returns the log file path.
 */
export function appendSwitchLog(logDirectory: string, selectionPath: string, now: Date = new Date()): string {
  const file = path.join(logDirectory, SWITCH_LOG_FILE);
  try {
    fs.mkdirSync(logDirectory, { recursive: true });
    fs.appendFileSync(file, formatSwitchLogLine(selectionPath, now) + '\n', 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SwitchError('LogWriteFailed', `Could not write switch log ${file}: ${reason}`, { cause: err });
  }
  return file;
}
