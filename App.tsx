import React, { useState, useCallback, useEffect } from 'react';
import { Box, Static, Text, useApp } from 'ink';
import { SessionEntry, VlsmPlan } from './types.js';
import { runLine } from './services/commands.js';
import { exportPlan } from './services/planExport.js';
import CommandPrompt from './components/CommandPrompt.js';
import SessionEntryView from './components/SessionEntryView.js';

interface HistoryItem {
  id: number;
  input: string | null;
  entry: SessionEntry;
}

interface AppProps {
  onExport?: (plan: VlsmPlan, path?: string) => string;
}

const WELCOME: HistoryItem = {
  id: 0,
  input: null,
  entry: { kind: 'info', message: "Enter IP/prefix (e.g., 192.168.1.10/24), 'vlsm 192.168.1.0/24 50,20,10', 'help' or 'exit' to quit." },
};

const App: React.FC<AppProps> = ({ onExport = exportPlan }) => {
  const { exit } = useApp();
  const [history, setHistory] = useState<HistoryItem[]>([WELCOME]);
  const [lastPlan, setLastPlan] = useState<VlsmPlan | null>(null);
  const [exiting, setExiting] = useState(false);

  useEffect(() => {
    if (!exiting) return;
    // Let <Static> write the farewell entry before Ink unmounts.
    const timer = setTimeout(() => exit(), 0);
    return () => clearTimeout(timer);
  }, [exiting, exit]);

  const handleSubmit = useCallback((line: string) => {
    if (!line.trim()) return;

    const { command, entry } = runLine(line, { lastPlan, exportPlan: onExport });
    setHistory((items) => [...items, { id: items.length, input: line, entry }]);
    if (entry.kind === 'vlsm') setLastPlan(entry.plan);
    if (command?.kind === 'exit') setExiting(true);
  }, [lastPlan, onExport]);

  return (
    <Box flexDirection="column">
      <Static items={history}>
        {(item) => (
          <Box key={item.id} flexDirection="column">
            {item.input === null
              ? <Text bold color="cyanBright">IPv4 Subnet Calculator</Text>
              : <Text color="blue">{`> ${item.input}`}</Text>}
            <SessionEntryView entry={item.entry} />
          </Box>
        )}
      </Static>
      {!exiting && <CommandPrompt onSubmit={handleSubmit} />}
    </Box>
  );
};

export default App;
