import { HOME_VARIABLE, PATH_VARIABLE } from '../../config/index.js';
import { loadConfig } from '../../core/config-loader.js';
import { createEnvironmentStore, type EnvironmentStore } from '../../core/environment.js';
import { installationBinSegments } from '../../core/path-rewrite.js';

interface CurrentOptions {
  configPath: string;
  json?: boolean;
  store?: EnvironmentStore;
}

export interface CurrentState {
  home: string | null;
  binSegments: string[];
}

export function readCurrentState(store: EnvironmentStore, baseDirectory: string): CurrentState {
  const home = store.getVariable('Machine', HOME_VARIABLE) ?? null;
  const pathValue = store.getVariable('Machine', PATH_VARIABLE) ?? '';
  return { home, binSegments: installationBinSegments(pathValue, baseDirectory) };
}

export function showCurrent(options: CurrentOptions): void {
  const config = loadConfig(options.configPath);
  const store = options.store ?? createEnvironmentStore();
  const state = readCurrentState(store, config.baseDirectory);

  if (options.json) {
    console.log(JSON.stringify(state, null, 2));
    return;
  }

  console.log(`${HOME_VARIABLE}: ${state.home ?? '(not set)'}`);
  if (state.binSegments.length === 0) {
    console.log(`${PATH_VARIABLE}: no entries under ${config.baseDirectory}`);
    return;
  }
  console.log(`${PATH_VARIABLE} entries under ${config.baseDirectory}:`);
  state.binSegments.forEach((segment, index) => {
    const marker = index === 0 ? '▶ ' : '  ';
    console.log(`  ${marker}${segment}`);
  });
  if (state.binSegments.length > 1) {
    console.log(`⚠ ${PATH_VARIABLE} lists ${state.binSegments.length} Java bin directories; the first one wins.`);
  }
}
