import { Command } from 'commander';
import type { ProcPeekConfig } from '../types/config.js';
import { resolveConfig } from '../utils/config.js';
import type { CliContext } from './context.js';

export async function runMonitor(context: CliContext, config: ProcPeekConfig): Promise<void> {
  // Loaded lazily so listing mode never pulls in blessed
  const { MonitorCommand } = await import('../commands/monitor/index.js');
  await new MonitorCommand({ config, sampler: context.createSampler(config) }).execute();
}

export function setupMonitorCommand(program: Command, context: CliContext): void {
  const monitor = program
    .command('monitor')
    .alias('m')
    .description('Real-time process dashboard (same as running without a command)')
    .action(async (_options: unknown, command: Command) => {
      await runMonitor(context, resolveConfig(command.optsWithGlobals(), context.env));
    });

  monitor.addHelpText('after', `
Keyboard Controls:
  q / Ctrl-C   - Quit
  ?            - Help
  ↑/↓, j/k     - Navigate processes
  Enter        - View process details
  c m n p      - Sort by CPU, memory, name, PID
  s            - Cycle the sort key
  r            - Refresh now
`);
}
