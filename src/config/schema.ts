import { z } from 'zod';

const optionalPath = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

// Key names match the JSON file users already keep next to the program.
export const ConfigFileSchema = z.object({
  JavaBase: z.string().optional(),
  LogPath: optionalPath,
  DefaultVersion: optionalPath
});

export interface SwitcherConfig {
  /** Directory whose immediate subdirectories are the installed runtimes. */
  baseDirectory: string;
  /** Where `java-switcher.log` is appended; absent disables the switch log. */
  logDirectory?: string;
  /** Candidate name chosen when the user submits an empty line. */
  defaultVersionName?: string;
}
