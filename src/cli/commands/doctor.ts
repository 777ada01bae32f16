import { diagnose, type ConfigIssue } from '../../core/config-doctor.js';
import { formatVersionList } from '../../core/version-list.js';

interface DoctorOptions {
  configPath: string;
  json?: boolean;
}

export function runDoctorCommand(options: DoctorOptions): boolean {
  const report = diagnose(options.configPath);

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(`Configuration file: ${report.configPath}`);
    if (report.issues.length === 0) {
      console.log('✓ Configuration is valid');
    } else {
      console.log(report.ok ? '⚠ Configuration has warnings:' : '✗ Configuration issues detected:');
      report.issues.forEach((issue) => printIssue(issue));
    }

    if (report.config) {
      console.log('\nEffective configuration:');
      console.log(JSON.stringify(report.config, null, 2));
    }
    if (report.installations.length > 0) {
      console.log('\nInstallations:');
      formatVersionList(report.installations, report.config?.defaultVersionName).forEach((line) =>
        console.log(`  ${line}`)
      );
    }
  }

  return report.ok;
}

function printIssue(issue: ConfigIssue): void {
  const location = issue.field ?? '*';
  const marker = issue.severity === 'error' ? '✗' : '⚠';
  console.log(` ${marker} [${issue.source}] ${location}: ${issue.message}`);
}
