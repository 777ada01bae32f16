import type { Installation } from './discovery.js';

export const DEFAULT_MARKER = '(default)';

export function formatVersionList(installations: Installation[], defaultVersionName?: string): string[] {
  return installations.map((installation, index) => {
    const suffix = installation.name === defaultVersionName ? ` ${DEFAULT_MARKER}` : '';
    return `${index + 1}. ${installation.name}${suffix}`;
  });
}
