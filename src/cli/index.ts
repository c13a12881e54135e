/**
 * CLI Entry Point for Artist Pulse
 *
 * Available Commands:
 * - `report` - Print the dashboard report for a period
 * - `export` - Export a dashboard view as JSON or CSV
 *
 * Usage:
 * ```bash
 * npm run cli -- report --days 90 --granularity monthly --seed 42
 * npm run cli -- export --format csv --view streams --output streams.csv
 * npm run cli -- --help
 * ```
 *
 * Environment Variables:
 *   DEFAULT_DAYS - Period length when --days is absent (default: 30)
 *   SAMPLE_SEED - Seed when --seed is absent (default: random)
 *   ARTIST_NAME - Artist shown in the report
 */

import { CommanderError } from 'commander';
import { config } from '../config';
import { createDefaultContext } from './context';
import { createProgram } from './program';
import { dim, red } from './utils/terminal';

async function main(): Promise<void> {
  const program = createProgram(createDefaultContext(config));
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  // Commander has already printed its own message (or the help text)
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }

  const message = error instanceof Error ? error.message : String(error);
  console.error(red('\nFatal error:'));
  console.error(dim(message));

  // Show stack trace in debug mode
  if (process.env.DEBUG && error instanceof Error) {
    console.error(dim(error.stack ?? ''));
  }

  process.exit(1);
});
