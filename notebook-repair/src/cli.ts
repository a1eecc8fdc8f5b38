import { ConfigError, loadRepairConfig, type RepairConfig } from '../../repair.config.js';
import { RepairLogger, type LogSink } from './logger.js';
import { NotebookRepairer, type RepairerOptions } from './repairer.js';

export const PROGRAM_NAME = 'fix-notebook';

export const USAGE = `usage: ${PROGRAM_NAME} [-h] notebook_path`;

export const HELP_TEXT = `${USAGE}

Fix Jupyter notebook widget metadata for proper GitHub rendering

positional arguments:
  notebook_path  Path to the Jupyter notebook (.ipynb file) to fix

options:
  -h, --help     show this help message and exit

Examples:
  ${PROGRAM_NAME} notebook.ipynb
  ${PROGRAM_NAME} path/to/analysis.ipynb`;

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'repair'; notebookPath: string }
  | { kind: 'usage-error'; message: string };

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  sink: LogSink;
  repairer: Partial<Pick<RepairerOptions, 'fileSystem' | 'clock'>>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  let optionsEnded = false;

  for (const arg of argv) {
    if (!optionsEnded && arg === '--') {
      optionsEnded = true;
    } else if (!optionsEnded && (arg === '-h' || arg === '--help')) {
      return { kind: 'help' };
    } else if (!optionsEnded && arg.startsWith('-') && arg !== '-') {
      return { kind: 'usage-error', message: `unrecognized arguments: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  if (positional.length === 0) {
    return { kind: 'usage-error', message: 'the following arguments are required: notebook_path' };
  }
  if (positional.length > 1) {
    return { kind: 'usage-error', message: `unrecognized arguments: ${positional.slice(1).join(' ')}` };
  }
  return { kind: 'repair', notebookPath: positional[0] };
}

/**
 * Run the command line and resolve to the process exit code.
 */
export async function runCli(argv: string[], deps: Partial<CliDependencies> = {}): Promise<number> {
  const sink: LogSink = deps.sink ?? (line => console.log(line));
  const args = parseArgs(argv);

  if (args.kind === 'help') {
    sink(HELP_TEXT);
    return 0;
  }
  if (args.kind === 'usage-error') {
    sink(USAGE);
    sink(`${PROGRAM_NAME}: error: ${args.message}`);
    return 1;
  }

  let config: RepairConfig;
  try {
    config = loadRepairConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      sink(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = new RepairLogger({ level: config.logLevel, format: config.logFormat, sink });
  const repairer = new NotebookRepairer({
    ...deps.repairer,
    logger,
    maxFileSize: config.maxFileSize,
    validateStructure: config.validateStructure,
    backupCollisionLimit: config.backupCollisionLimit
  });

  const result = await repairer.repair(args.notebookPath);
  return result.success ? 0 : 1;
}
