import { describe, it, expect, vi } from 'vitest';
import {
  HELP_TEXT,
  describeAllocationError,
  executeCommand,
  parseCommand,
  runCommands,
  runLine,
  SessionContext,
} from '../services/commands.js';
import { InputError } from '../utils.js';
import { Command, VlsmPlan } from '../types.js';

const contextWith = (lastPlan: VlsmPlan | null = null): SessionContext => ({
  lastPlan,
  exportPlan: vi.fn((_plan: VlsmPlan, path?: string) => path ?? 'default.xlsx'),
});

const planOf = (command: Command): VlsmPlan => {
  const entry = executeCommand(command, contextWith());
  if (entry.kind !== 'vlsm') throw new Error(`expected a plan, got ${entry.kind}`);
  return entry.plan;
};

describe('parseCommand', () => {
  it('recognises exit and help in any case', () => {
    expect(parseCommand('exit')).toEqual({ kind: 'exit' });
    expect(parseCommand('  EXIT ')).toEqual({ kind: 'exit' });
    expect(parseCommand('quit')).toEqual({ kind: 'exit' });
    expect(parseCommand('Help')).toEqual({ kind: 'help' });
  });

  it('parses a network', () => {
    expect(parseCommand(' 10.0.0.1/8 ')).toEqual({ kind: 'network', ip: '10.0.0.1', prefix: 8 });
  });

  it('parses a vlsm request', () => {
    expect(parseCommand('vlsm 192.168.1.0/24 50,20,10')).toEqual({
      kind: 'vlsm',
      ip: '192.168.1.0',
      prefix: 24,
      hostCounts: [50, 20, 10],
    });
    expect(parseCommand('VLSM 192.168.1.0/24 50 20')).toMatchObject({ hostCounts: [50, 20] });
  });

  it('parses export with and without a path', () => {
    expect(parseCommand('export')).toEqual({ kind: 'export', path: null });
    expect(parseCommand('export my plan.xlsx')).toEqual({ kind: 'export', path: 'my plan.xlsx' });
    expect(parseCommand('  export  my   plan.xlsx ')).toEqual({ kind: 'export', path: 'my   plan.xlsx' });
  });

  it('throws input errors for incomplete vlsm requests', () => {
    expect(() => parseCommand('vlsm')).toThrow('Usage: vlsm <ip>/<prefix> <hosts...>');
    expect(() => parseCommand('vlsm 192.168.1.0/24')).toThrow(InputError);
  });
});

describe('describeAllocationError', () => {
  it('names the demand and both prefixes', () => {
    expect(describeAllocationError({ kind: 'PrefixTooSmall', demandIndex: 1, computedPrefix: 28, basePrefix: 30 })).toBe(
      'Subnet 1 needs a /28 block, which is larger than the /30 base network.',
    );
  });

  it('names the demand that did not fit', () => {
    expect(describeAllocationError({ kind: 'DoesNotFit', demandIndex: 3 })).toBe(
      'Subnet 3 does not fit in the remaining address space of the base network.',
    );
  });
});

describe('executeCommand', () => {
  it('reports a single network', () => {
    const entry = executeCommand({ kind: 'network', ip: '192.168.1.10', prefix: 24 }, contextWith());
    expect(entry.kind === 'network' && entry.report.broadcast).toBe('192.168.1.255');
  });

  it('returns the help text', () => {
    expect(executeCommand({ kind: 'help' }, contextWith())).toEqual({ kind: 'info', message: HELP_TEXT });
  });

  it('turns allocation failures into error entries', () => {
    const entry = executeCommand({ kind: 'vlsm', ip: '10.0.0.0', prefix: 30, hostCounts: [10] }, contextWith());
    expect(entry).toEqual({
      kind: 'error',
      message: 'Subnet 1 needs a /28 block, which is larger than the /30 base network.',
    });
  });

  it('refuses to export before a plan exists', () => {
    expect(executeCommand({ kind: 'export', path: null }, contextWith())).toEqual({
      kind: 'error',
      message: 'Nothing to export yet. Calculate a VLSM plan first.',
    });
  });

  it('exports the last plan', () => {
    const plan = planOf({ kind: 'vlsm', ip: '192.168.1.0', prefix: 24, hostCounts: [50] });
    const context = contextWith(plan);

    expect(executeCommand({ kind: 'export', path: null }, context)).toEqual({
      kind: 'info',
      message: 'Plan saved to default.xlsx',
    });
    expect(context.exportPlan).toHaveBeenCalledWith(plan, undefined);

    expect(executeCommand({ kind: 'export', path: 'out.xlsx' }, context)).toEqual({
      kind: 'info',
      message: 'Plan saved to out.xlsx',
    });
  });

  it('reports export failures', () => {
    const plan = planOf({ kind: 'vlsm', ip: '192.168.1.0', prefix: 24, hostCounts: [50] });
    const context: SessionContext = {
      lastPlan: plan,
      exportPlan: () => {
        throw new Error('disk full');
      },
    };
    expect(executeCommand({ kind: 'export', path: 'out.xlsx' }, context)).toEqual({
      kind: 'error',
      message: 'Export failed: disk full',
    });
  });
});

describe('runLine', () => {
  it('turns parse failures into error entries', () => {
    expect(runLine('bogus', contextWith())).toEqual({
      command: null,
      entry: { kind: 'error', message: 'Invalid format: "bogus". Use IP/prefix like 192.168.1.10/24.' },
    });
  });

  it('returns the parsed command with its entry', () => {
    expect(runLine('exit', contextWith())).toEqual({
      command: { kind: 'exit' },
      entry: { kind: 'info', message: 'Exiting...' },
    });
  });
});

describe('runCommands', () => {
  it('exports the plan calculated by an earlier command', () => {
    const exporter = vi.fn((_plan: VlsmPlan, path?: string) => path ?? 'default.xlsx');
    const entries = runCommands(
      [
        { kind: 'vlsm', ip: '192.168.1.0', prefix: 24, hostCounts: [50, 20, 10] },
        { kind: 'export', path: 'plan.xlsx' },
      ],
      exporter,
    );

    expect(entries.map((entry) => entry.kind)).toEqual(['vlsm', 'info']);
    expect(exporter).toHaveBeenCalledTimes(1);
    expect(exporter.mock.calls[0][0].baseNetwork).toBe('192.168.1.0/24');
  });

  it('stops after the first error', () => {
    const exporter = vi.fn((_plan: VlsmPlan, path?: string) => path ?? 'default.xlsx');
    const entries = runCommands(
      [
        { kind: 'vlsm', ip: '192.168.1.0', prefix: 24, hostCounts: [100, 100, 100] },
        { kind: 'export', path: 'plan.xlsx' },
      ],
      exporter,
    );

    expect(entries).toEqual([
      { kind: 'error', message: 'Subnet 3 does not fit in the remaining address space of the base network.' },
    ]);
    expect(exporter).not.toHaveBeenCalled();
  });
});
