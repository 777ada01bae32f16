import path from 'node:path';

export type PathFlavor = Pick<path.PlatformPath, 'sep' | 'delimiter'>;

function isWindowsFlavor(flavor: PathFlavor): boolean {
  return flavor.sep === '\\';
}

function normalize(value: string, flavor: PathFlavor): string {
  if (!isWindowsFlavor(flavor)) return value;
  // Windows accepts quoted Path entries such as "C:\Program Files\Java\jdk-17\bin".
  const unquoted = value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
  return unquoted.replace(/\//g, '\\').toLowerCase();
}

function stripTrailingSeparators(value: string, flavor: PathFlavor): string {
  let out = value;
  while (out.length > 1 && out.endsWith(flavor.sep)) {
    out = out.slice(0, -1);
  }
  return out;
}

/**
 * True for `<base><sep><anything><sep>bin`, with or without a trailing
 * separator. Windows paths compare case-insensitively and accept `/`.
 */
export function isInstallationBinSegment(segment: string, baseDirectory: string, flavor: PathFlavor = path): boolean {
  const base = stripTrailingSeparators(normalize(baseDirectory.trim(), flavor), flavor);
  const core = stripTrailingSeparators(normalize(segment.trim(), flavor), flavor);
  const prefix = base + flavor.sep;
  const suffix = flavor.sep + 'bin';
  if (!core.startsWith(prefix) || !core.endsWith(suffix)) {
    return false;
  }
  return core.length - prefix.length - suffix.length > 0;
}

export function installationBinSegments(pathValue: string, baseDirectory: string, flavor: PathFlavor = path): string[] {
  return pathValue
    .split(flavor.delimiter)
    .filter((segment) => segment !== '' && isInstallationBinSegment(segment, baseDirectory, flavor));
}

/**
 * Drop every `<base>\…\bin` entry from a search-path value and put the
 * selected installation's bin directory first. Applying it twice with the
 * same selection yields the same value as applying it once.
 */
export function rewritePathValue(
  pathValue: string,
  selectionPath: string,
  baseDirectory: string,
  flavor: PathFlavor = path
): string {
  const remaining = pathValue
    .split(flavor.delimiter)
    .filter((segment) => !isInstallationBinSegment(segment, baseDirectory, flavor))
    .join(flavor.delimiter);
  const bin = stripTrailingSeparators(selectionPath, flavor) + flavor.sep + 'bin';
  return `${bin}${flavor.delimiter}${remaining}`;
}
