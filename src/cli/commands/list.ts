import { loadConfig } from '../../core/config-loader.js';
import { discoverInstallations } from '../../core/discovery.js';
import { formatVersionList } from '../../core/version-list.js';

interface ListOptions {
  configPath: string;
  json?: boolean;
}

export function listVersions(options: ListOptions): void {
  const config = loadConfig(options.configPath);
  const installations = discoverInstallations(config.baseDirectory);

  if (options.json) {
    const output = {
      baseDirectory: config.baseDirectory,
      defaultVersion: config.defaultVersionName ?? null,
      installations: installations.map((installation, index) => ({
        index: index + 1,
        name: installation.name,
        path: installation.path,
        default: installation.name === config.defaultVersionName
      }))
    };
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  console.log(`\nInstalled Java versions (${config.baseDirectory})`);
  console.log('========================\n');
  formatVersionList(installations, config.defaultVersionName).forEach((line) => console.log(`  ${line}`));
  console.log();
}
