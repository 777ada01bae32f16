import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';

import { PACKAGE_ROOT, resolveConfigPath } from '../config/index.js';
import { createEnvironmentStore, type EnvironmentStore } from '../core/environment.js';
import { describeError } from '../core/errors.js';
import { error, setLevel, setLogFile, warn } from '../core/logger.js';
import { askLine, type PromptFn } from '../core/selector.js';
import { showCurrent } from './commands/current.js';
import { runDoctorCommand } from './commands/doctor.js';
import { listVersions } from './commands/list.js';
import { runUseCommand } from './commands/use.js';

/**
 * Process hooks the command tree reaches through, so the whole tree can be
 * driven in process.
 */
export interface CliHost {
  createStore: () => EnvironmentStore;
  prompt: PromptFn;
  setExitCode: (code: number) => void;
  /** Called for usage errors; the real process exits here. */
  exit: (code: number) => void;
}

const defaultHost: CliHost = {
  createStore: () => createEnvironmentStore(),
  prompt: (question) => askLine(question),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  exit: (code) => process.exit(code)
};

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function readPackageVersion(): string | undefined {
  try {
    const raw = fs.readFileSync(path.join(PACKAGE_ROOT, 'package.json'), 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (err) {
    warn('cli', `Unable to read package version: ${describeError(err)}`);
  }
  return undefined;
}

function normalizeVerbose(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  return Math.max(0, Math.min(3, Math.floor(value)));
}

export function createCli(argv: string[], overrides: Partial<CliHost> = {}) {
  const host: CliHost = { ...defaultHost, ...overrides };

  const handleCommandError = (err: unknown) => {
    console.log(`✗ ${describeError(err)}`);
    host.setExitCode(EXIT_FAILURE);
  };

  const parser = yargs(argv)
    .scriptName('jswitch')
    .usage('Usage: $0 [command] [options]')
    .wrap(Math.min(100, process.stdout.columns || 100))
    .help('help')
    .alias('help', 'h')
    .strict()
    .fail((msg, err, yargsInstance) => {
      if (err) {
        error('cli', err.message);
      } else if (msg) {
        error('cli', msg);
      }
      yargsInstance.showHelp();
      host.exit(EXIT_USAGE);
    })
    .option('config', {
      alias: 'c',
      type: 'string',
      description: 'Path to config.json (defaults to JAVA_SWITCHER_CONFIG, then config/config.json)',
      global: true
    })
    .option('json', {
      type: 'boolean',
      description: 'Output JSON where supported',
      global: true
    })
    .option('verbose', {
      type: 'number',
      description: 'Verbose output level (0-3)',
      global: true,
      coerce: (value: unknown) => normalizeVerbose(value)
    })
    .option('log-file', {
      type: 'string',
      description: 'Mirror diagnostic output to this file',
      global: true
    })
    .middleware((args) => {
      const verbose = normalizeVerbose(args.verbose);
      if (typeof verbose === 'number') {
        setLevel(verbose);
      }
      if (typeof args.logFile === 'string' && args.logFile) {
        setLogFile(path.resolve(args.logFile));
      }
    }, true)
    .command(
      ['use', '$0'],
      'Pick an installed Java version and point JAVA_HOME and Path at it',
      (y) =>
        y.option('rollback', {
          type: 'boolean',
          default: false,
          description: 'Restore the previous JAVA_HOME if Path cannot be updated'
        }),
      async (args) => {
        try {
          const report = await runUseCommand({
            configPath: resolveConfigPath(args.config),
            rollback: args.rollback,
            store: host.createStore(),
            prompt: host.prompt
          });
          if (!report.ok) {
            host.setExitCode(EXIT_FAILURE);
          }
        } catch (err) {
          handleCommandError(err);
        }
      }
    )
    .command(
      'list',
      'List installed Java versions',
      (y) => y,
      (args) => {
        try {
          listVersions({ configPath: resolveConfigPath(args.config), json: !!args.json });
        } catch (err) {
          handleCommandError(err);
        }
      }
    )
    .command(
      'current',
      'Show the machine-wide JAVA_HOME and Java entries on Path',
      (y) => y,
      (args) => {
        try {
          showCurrent({ configPath: resolveConfigPath(args.config), json: !!args.json, store: host.createStore() });
        } catch (err) {
          handleCommandError(err);
        }
      }
    )
    .command(
      'doctor',
      'Validate the configuration and the installation directory',
      (y) => y,
      (args) => {
        try {
          if (!runDoctorCommand({ configPath: resolveConfigPath(args.config), json: !!args.json })) {
            host.setExitCode(EXIT_FAILURE);
          }
        } catch (err) {
          handleCommandError(err);
        }
      }
    );

  return parser.version(readPackageVersion() ?? '0.0.0').alias('version', 'v');
}
