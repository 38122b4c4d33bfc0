import { Command } from 'commander';
import { ListCommand, parseListOptions, type RawListOptions } from '../commands/list.js';
import { resolveConfig } from '../utils/config.js';
import type { CliContext } from './context.js';

export function setupListCommand(program: Command, context: CliContext): void {
  const list = program
    .command('list')
    .alias('ls')
    .description('List top processes once (no interactive UI)')
    .option('-s, --sort <key>', 'Sort by: cpu, memory, name, pid (default: cpu)')
    .option('-n, --count <number>', 'Number of processes to show (default: 10)')
    .action(async (options: RawListOptions, command: Command) => {
      const config = resolveConfig(command.optsWithGlobals(), context.env);
      const listOptions = parseListOptions(options, { sort: config.defaultSort, count: config.defaultCount });
      await new ListCommand(context.createSampler(config)).execute(listOptions);
    });

  list.addHelpText('after', `
Examples:
  $ proc-peek list                    # Top 10 by CPU
  $ proc-peek list -s memory -n 15    # Top 15 by resident memory
  $ proc-peek ls --sort name          # Alphabetical
`);
}
