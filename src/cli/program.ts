import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { exitCodeFor, ProcPeekError } from '../utils/errors.js';
import { UIHelper } from '../utils/ui.js';
import { defaultContext, type CliContext } from './context.js';
import { setupListCommand } from './list-command.js';
import { runMonitor, setupMonitorCommand } from './monitor-command.js';

function readVersion(): string {
  try {
    const packagePath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch {
    // Fall through to the placeholder version
  }
  return '0.0.0';
}

export function createProgram(context: CliContext = defaultContext): Command {
  const program = new Command();

  program
    .name('proc-peek')
    .description('Mini process monitor. Run without a command to launch the dashboard.')
    .version(readVersion())
    .option('-r, --refresh <seconds>', 'Dashboard refresh interval in seconds (default: 1)')
    .option('-t, --timeout <seconds>', 'Skip a refresh when sampling takes longer than this (default: 2)')
    .option('--source <name>', 'Process data source: auto, ps, systeminformation (default: auto)')
    .option('--debug', 'Enable the dashboard debug log (F12)')
    .option('--no-color', 'Disable colored output')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      outputError: (message, write) => write(chalk.red(message))
    })
    .action(async () => {
      await runMonitor(context, resolveConfig(program.opts(), context.env));
    });

  setupListCommand(program, context);
  setupMonitorCommand(program, context);

  return program;
}

/** Parses `argv` and runs the chosen mode; resolves to the exit status. */
export async function runCli(argv: string[], context: CliContext = defaultContext): Promise<number> {
  const program = createProgram(context);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof ProcPeekError) {
      UIHelper.showError(error.message);
      return exitCodeFor(error);
    }
    throw error;
  }
}
