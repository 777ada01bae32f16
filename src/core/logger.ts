import fs from 'node:fs';
import path from 'node:path';

let level = parseLevel(process.env.JAVA_SWITCHER_VERBOSE);

let logFilePath: string | undefined = process.env.JAVA_SWITCHER_LOG_FILE || undefined;
let wroteHeader = false;

function parseLevel(raw: string | undefined): number {
  const n = parseInt(raw || '', 10);
  return Number.isFinite(n) ? Math.max(0, Math.min(3, n)) : 0;
}

export function setLevel(n: number) {
  level = Math.max(0, Math.min(3, Math.floor(n)));
}

export function setLogFile(filePath: string | undefined) {
  logFilePath = filePath;
  wroteHeader = false;
}

function ts(): string {
  return new Date().toISOString();
}

export function log(lvl: number, tag: string, msg: string, extra?: unknown) {
  if (level < lvl) return;
  const line = formatLine(`[${ts()}] [${tag}]`, msg, extra);
  console.error(line);
  writeToFile(line);
}

export function warn(tag: string, msg: string, extra?: unknown) {
  const line = formatLine(`[${ts()}] [${tag}]`, msg, extra);
  console.warn(line);
  writeToFile(line);
}

export function error(tag: string, msg: string, extra?: unknown) {
  const line = formatLine(`[${ts()}] [${tag}]`, msg, extra);
  console.error(line);
  writeToFile(line);
}

export function safeStringify(obj: unknown, maxBytes: number = 2048): string {
  const json = typeof obj === 'string' ? obj : JSON.stringify(obj, null, 2) ?? String(obj);
  if (Buffer.byteLength(json, 'utf8') <= maxBytes) return json;
  const slice = Buffer.from(json, 'utf8').subarray(0, maxBytes).toString('utf8');
  return slice + '\n…(truncated)…';
}

export function formatLine(prefix: string, msg: string, extra?: unknown): string {
  if (extra === undefined) return `${prefix} ${msg}`;
  let serialized: string;
  try {
    serialized = safeStringify(extra);
  } catch {
    serialized = String(extra);
  }
  return serialized ? `${prefix} ${msg} ${serialized}` : `${prefix} ${msg}`;
}

function writeToFile(line: string) {
  if (!logFilePath) return;
  try {
    const dir = path.dirname(logFilePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    if (!wroteHeader) {
      const header = `# java-switcher verbose log\n# started: ${new Date().toISOString()}\n`;
      fs.appendFileSync(logFilePath, header, 'utf8');
      wroteHeader = true;
    }
    fs.appendFileSync(logFilePath, line + '\n', 'utf8');
  } catch (err) {
    // Stop mirroring to a file that cannot be written; console output continues.
    const failedPath = logFilePath;
    logFilePath = undefined;
    console.error(`[${ts()}] [logger] disabled log file ${failedPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
