/**
 * Builds the commander program. Parse errors and --help throw a
 * CommanderError instead of exiting, so the caller decides the exit code.
 */

import { Command } from 'commander';
import { registerExportCommand } from './commands/export';
import { registerReportCommand } from './commands/report';
import type { CliContext } from './context';

export const CLI_VERSION = '0.1.0';

export function createProgram(ctx: CliContext): Command {
  const program = new Command('artist-pulse')
    .description('Streaming analytics for an artist, from sample or platform data')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.write(text),
      writeErr: (text) => ctx.writeError(text),
    });

  registerReportCommand(program, ctx);
  registerExportCommand(program, ctx);

  return program;
}
