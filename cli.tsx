#!/usr/bin/env node
import React, { useEffect } from 'react';
import { Box, render, useApp } from 'ink';
import App from './App.js';
import { planCliRun } from './config.js';
import { exportPlan } from './services/planExport.js';
import { SessionEntry } from './types.js';
import SessionEntryView from './components/SessionEntryView.js';

const OneShot: React.FC<{ entries: SessionEntry[] }> = ({ entries }) => {
  const { exit } = useApp();

  useEffect(() => {
    exit();
  }, [exit]);

  return (
    <Box flexDirection="column">
      {entries.map((entry, i) => <SessionEntryView key={i} entry={entry} />)}
    </Box>
  );
};

const main = async (argv: string[]): Promise<void> => {
  const run = planCliRun(argv, exportPlan);

  if (run.kind === 'interactive') {
    await render(<App />).waitUntilExit();
    return;
  }

  process.exitCode = run.exitCode;
  await render(<OneShot entries={run.entries} />).waitUntilExit();
};

main(process.argv.slice(2)).catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
