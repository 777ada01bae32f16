import { HOME_VARIABLE, PATH_VARIABLE } from '../../config/index.js';
import { createEnvironmentStore, type EnvironmentStore } from '../../core/environment.js';
import { describeError } from '../../core/errors.js';
import { warn } from '../../core/logger.js';
import { askLine, type PromptFn } from '../../core/selector.js';
import { runSwitch, type SwitchReport } from '../../core/switcher.js';

export interface UseCommandOptions {
  configPath: string;
  rollback?: boolean;
  store?: EnvironmentStore;
  prompt?: PromptFn;
}

export interface ReportLines {
  info: string[];
  warnings: string[];
  errors: string[];
}

export function summarizeReport(report: SwitchReport): ReportLines {
  const lines: ReportLines = { info: [], warnings: [], errors: [] };

  for (const warning of report.warnings) {
    lines.warnings.push(`⚠ Warning: ${describeError(warning)}`);
  }

  if (report.ok && report.selection) {
    lines.info.push(`✓ ${HOME_VARIABLE} set to ${report.selection.path}`);
    lines.info.push(`✓ ${PATH_VARIABLE} updated (${report.selection.name} first)`);
    if (report.logFile) {
      lines.info.push(`  Logged to ${report.logFile}`);
    }
    lines.info.push('Open a new terminal to use it; shells that are already running keep the old values.');
    return lines;
  }

  if (report.error) {
    lines.errors.push(`✗ ${describeError(report.error)}`);
  }
  if (report.restore) {
    if (report.restore.restored) {
      const previous = report.restore.previousValue ?? '(unset)';
      lines.errors.push(`  ${HOME_VARIABLE} restored to ${previous}; ${PATH_VARIABLE} was not changed.`);
    } else if (report.restore.error) {
      lines.errors.push(`  Could not restore ${HOME_VARIABLE}: ${describeError(report.restore.error)}`);
    }
  }
  if (report.inconsistent && report.selection) {
    lines.errors.push(
      `✗ Inconsistent environment: ${HOME_VARIABLE} now points to ${report.selection.path} ` +
        `but ${PATH_VARIABLE} was not updated.`
    );
  }
  lines.errors.push(`  Stopped after step: ${report.state}`);
  return lines;
}

export async function runUseCommand(options: UseCommandOptions): Promise<SwitchReport> {
  const store = options.store ?? createEnvironmentStore();
  const report = await runSwitch({
    configPath: options.configPath,
    store,
    rollback: options.rollback,
    prompt: options.prompt ?? ((question) => askLine(question)),
    write: (line) => console.log(line)
  });

  const lines = summarizeReport(report);
  lines.info.forEach((line) => console.log(line));
  lines.warnings.forEach((line) => warn('switch', line));
  lines.errors.forEach((line) => console.log(line));
  return report;
}
