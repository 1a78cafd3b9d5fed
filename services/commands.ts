import { AllocationError, Command, SessionEntry, VlsmPlan } from '../types.js';
import { InputError, parseCidr, parseHostCounts } from '../utils.js';
import { singleNetworkReport } from './subnetCalculator.js';
import { calculateVlsmPlan } from './vlsmPlan.js';

export const HELP_TEXT = [
  'Commands:',
  '  <ip>/<prefix>                     network details, e.g. 192.168.1.10/24',
  '  vlsm <ip>/<prefix> <hosts...>     VLSM plan, e.g. vlsm 192.168.1.0/24 50,20,10',
  '  export [file.xlsx]                save the last VLSM plan as a spreadsheet',
  '  help                              show this message',
  '  exit                              quit',
].join('\n');

export const parseCommand = (line: string): Command => {
  const trimmed = line.trim();
  const [keyword = '', ...rest] = trimmed.split(/\s+/);
  const lowered = keyword.toLowerCase();

  if (lowered === 'exit' || lowered === 'quit') {
    return { kind: 'exit' };
  }
  if (lowered === 'help') {
    return { kind: 'help' };
  }
  if (lowered === 'export') {
    const path = trimmed.slice(keyword.length).trim();
    return { kind: 'export', path: path.length > 0 ? path : null };
  }
  if (lowered === 'vlsm') {
    const [cidr, ...hosts] = rest;
    if (cidr === undefined) {
      throw new InputError('InvalidFormat', 'Usage: vlsm <ip>/<prefix> <hosts...>');
    }
    const { ip, prefix } = parseCidr(cidr);
    return { kind: 'vlsm', ip, prefix, hostCounts: parseHostCounts(hosts.join(' ')) };
  }

  const { ip, prefix } = parseCidr(trimmed);
  return { kind: 'network', ip, prefix };
};

export const describeAllocationError = (error: AllocationError): string => {
  switch (error.kind) {
    case 'PrefixTooSmall':
      return `Subnet ${error.demandIndex} needs a /${error.computedPrefix} block, which is larger than the /${error.basePrefix} base network.`;
    case 'DoesNotFit':
      return `Subnet ${error.demandIndex} does not fit in the remaining address space of the base network.`;
  }
};

export interface SessionContext {
  lastPlan: VlsmPlan | null;
  exportPlan: (plan: VlsmPlan, path?: string) => string;
}

/** Runs a parsed command. `exit` is left to the caller. */
export const executeCommand = (command: Command, context: SessionContext): SessionEntry => {
  switch (command.kind) {
    case 'exit':
      return { kind: 'info', message: 'Exiting...' };
    case 'help':
      return { kind: 'info', message: HELP_TEXT };
    case 'network':
      return { kind: 'network', report: singleNetworkReport(command.ip, command.prefix) };
    case 'vlsm': {
      const result = calculateVlsmPlan(command.ip, command.prefix, command.hostCounts);
      return result.ok
        ? { kind: 'vlsm', plan: result.value }
        : { kind: 'error', message: describeAllocationError(result.error) };
    }
    case 'export': {
      if (!context.lastPlan) {
        return { kind: 'error', message: 'Nothing to export yet. Calculate a VLSM plan first.' };
      }
      try {
        const written = context.exportPlan(context.lastPlan, command.path ?? undefined);
        return { kind: 'info', message: `Plan saved to ${written}` };
      } catch (e) {
        return { kind: 'error', message: e instanceof Error ? `Export failed: ${e.message}` : 'An unknown error occurred.' };
      }
    }
  }
};

/** Parses and runs one shell line, turning input errors into error entries. */
export const runLine = (line: string, context: SessionContext): { command: Command | null; entry: SessionEntry } => {
  let command: Command;
  try {
    command = parseCommand(line);
  } catch (e) {
    const message = e instanceof Error ? e.message : 'An unknown error occurred.';
    return { command: null, entry: { kind: 'error', message } };
  }
  return { command, entry: executeCommand(command, context) };
};

/** Runs commands in order against a shared context, stopping after the first error. */
export const runCommands = (
  commands: readonly Command[],
  exportPlan: SessionContext['exportPlan'],
): SessionEntry[] => {
  const entries: SessionEntry[] = [];
  let lastPlan: VlsmPlan | null = null;
  for (const command of commands) {
    const entry = executeCommand(command, { lastPlan, exportPlan });
    entries.push(entry);
    if (entry.kind === 'error') break;
    if (entry.kind === 'vlsm') lastPlan = entry.plan;
  }
  return entries;
};
