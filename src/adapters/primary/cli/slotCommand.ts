import { Command, InvalidArgumentError } from 'commander';
import { DateTime } from 'luxon';

/**
 * Options of one slot run, as given on the command line
 */
export interface CliOptions {
  slot: number;
  configPath: string;
  testMode: boolean;
  dryRun: boolean;
  force: boolean;
  noDelay: boolean;
  /** Target date (YYYY-MM-DD); null means today */
  date: string | null;
}

interface RawCliOptions {
  slot: number;
  config: string;
  test?: boolean;
  dryRun?: boolean;
  force?: boolean;
  delay: boolean;
  date?: string;
}

export function parseSlot(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Slot must be an integer >= 1.');
  }
  return Number(value);
}

export function parseDate(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || !DateTime.fromISO(value).isValid) {
    throw new InvalidArgumentError('Date must be a calendar date in YYYY-MM-DD format.');
  }
  return value;
}

/**
 * CLI definition using Commander.js
 */
export function createProgram(): Command {
  return new Command()
    .name('memory-slot-notifier')
    .description('Send the memory or person photo notification of one slot to every configured user')
    .requiredOption('-s, --slot <number>', 'slot number, starting at 1', parseSlot)
    .option('-c, --config <path>', 'path to the YAML configuration file', 'config.yaml')
    .option('--test', 'test mode: [TEST] titles, 1-5s delay, slot state ignored and not recorded')
    .option('--dry-run', 'select and render notifications but do not send them or save state')
    .option('--force', 'send even if the slot was already sent today')
    .option('--no-delay', 'send immediately instead of waiting inside the notification window')
    .option('--date <YYYY-MM-DD>', 'target date instead of today', parseDate);
}

/**
 * Parses user arguments (without the node and script entries)
 *
 * Invalid input makes commander print the error and exit with code 1, unless
 * the program was configured with exitOverride().
 */
export function parseCliArgs(args: readonly string[], program: Command = createProgram()): CliOptions {
  program.parse([...args], { from: 'user' });
  const raw = program.opts<RawCliOptions>();

  return {
    slot: raw.slot,
    configPath: raw.config,
    testMode: raw.test === true,
    dryRun: raw.dryRun === true,
    force: raw.force === true,
    noDelay: !raw.delay,
    date: raw.date ?? null,
  };
}
