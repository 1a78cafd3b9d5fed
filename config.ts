import { parseArgs } from 'node:util';
import { Command, SessionEntry } from './types.js';
import { SessionContext, runCommands } from './services/commands.js';
import { InputError, parseCidr, parseHostCounts } from './utils.js';

export const USAGE = [
  'Usage:',
  '  subnet-calc                                       interactive shell',
  '  subnet-calc <ip>/<prefix>                         network details',
  '  subnet-calc <ip>/<prefix> --hosts 50,20,10        VLSM plan',
  '        [--export plan.xlsx]                        and save it as a spreadsheet',
].join('\n');

export type CliMode =
  | { kind: 'interactive' }
  | { kind: 'usage' }
  | { kind: 'once'; commands: Command[] };

const parseCliArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        hosts: { type: 'string', short: 'H' },
        export: { type: 'string', short: 'o' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (e) {
    throw new InputError('InvalidFormat', e instanceof Error ? e.message : 'Invalid arguments.');
  }
};

export const resolveCliMode = (argv: string[]): CliMode => {
  const { values, positionals } = parseCliArgs(argv);

  if (values.help) {
    return { kind: 'usage' };
  }
  if (positionals.length === 0) {
    if (values.hosts !== undefined || values.export !== undefined) {
      throw new InputError('InvalidFormat', 'A base network <ip>/<prefix> is required.');
    }
    return { kind: 'interactive' };
  }
  if (positionals.length > 1) {
    throw new InputError('InvalidFormat', `Expected one <ip>/<prefix>, got ${positionals.length} arguments.`);
  }

  const { ip, prefix } = parseCidr(positionals[0]);
  if (values.hosts === undefined) {
    if (values.export !== undefined) {
      throw new InputError('InvalidFormat', '--export requires --hosts.');
    }
    return { kind: 'once', commands: [{ kind: 'network', ip, prefix }] };
  }

  const commands: Command[] = [{ kind: 'vlsm', ip, prefix, hostCounts: parseHostCounts(values.hosts) }];
  if (values.export !== undefined) {
    commands.push({ kind: 'export', path: values.export });
  }
  return { kind: 'once', commands };
};

export type CliRun =
  | { kind: 'interactive' }
  | { kind: 'print'; entries: SessionEntry[]; exitCode: number };

/** Decides what the binary does for `argv`; non-interactive runs carry their exit code. */
export const planCliRun = (argv: string[], exportPlan: SessionContext['exportPlan']): CliRun => {
  let mode: CliMode;
  try {
    mode = resolveCliMode(argv);
  } catch (e) {
    const message = e instanceof Error ? e.message : 'An unknown error occurred.';
    return { kind: 'print', entries: [{ kind: 'error', message }, { kind: 'info', message: USAGE }], exitCode: 1 };
  }

  switch (mode.kind) {
    case 'interactive':
      return { kind: 'interactive' };
    case 'usage':
      return { kind: 'print', entries: [{ kind: 'info', message: USAGE }], exitCode: 0 };
    case 'once': {
      const entries = runCommands(mode.commands, exportPlan);
      return { kind: 'print', entries, exitCode: entries.some((entry) => entry.kind === 'error') ? 1 : 0 };
    }
  }
};
