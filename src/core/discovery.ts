import fs from 'node:fs';
import path from 'node:path';

import { SwitchError } from './errors.js';
import { log } from './logger.js';

export interface Installation {
  /** Directory name, shown to the user as the version label. */
  name: string;
  path: string;
}

/**
 * Ordinal comparison on UTF-16 code units, so "17" < "21" < "8".
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function discoverInstallations(baseDirectory: string): Installation[] {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(baseDirectory);
  } catch (err) {
    throw new SwitchError('BaseDirectoryNotFound', `Base directory not found: ${baseDirectory}`, { cause: err });
  }
  if (!stat.isDirectory()) {
    throw new SwitchError('BaseDirectoryNotFound', `Base directory is not a directory: ${baseDirectory}`);
  }

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(baseDirectory, { withFileTypes: true });
  } catch (err) {
    throw new SwitchError('BaseDirectoryNotFound', `Base directory is not readable: ${baseDirectory}`, { cause: err });
  }

  const installations = entries
    .filter(
      (entry) =>
        entry.isDirectory() || (entry.isSymbolicLink() && linksToDirectory(path.join(baseDirectory, entry.name)))
    )
    .map((entry) => ({ name: entry.name, path: path.join(baseDirectory, entry.name) }))
    .sort((a, b) => compareNames(a.name, b.name));

  if (installations.length === 0) {
    throw new SwitchError('NoInstallationsFound', `No installations found under ${baseDirectory}`);
  }

  log(2, 'discover', `found ${installations.length} installation(s) under ${baseDirectory}`);
  return installations;
}

// Symlinks and junctions count when their target is a directory; broken links are skipped.
function linksToDirectory(linkPath: string): boolean {
  try {
    return fs.statSync(linkPath).isDirectory();
  } catch (err) {
    log(2, 'discover', `skipping unresolvable link ${linkPath}: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}
