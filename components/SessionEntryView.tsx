import React from 'react';
import { Text } from 'ink';
import { SessionEntry } from '../types.js';
import NetworkReport from './NetworkReport.js';
import VlsmResults from './VlsmResults.js';

const SessionEntryView: React.FC<{ entry: SessionEntry }> = ({ entry }) => {
  switch (entry.kind) {
    case 'network':
      return <NetworkReport report={entry.report} />;
    case 'vlsm':
      return <VlsmResults plan={entry.plan} />;
    case 'info':
      return <Text color="yellowBright">{entry.message}</Text>;
    case 'error':
      return <Text color="redBright">{entry.message}</Text>;
  }
};

export default SessionEntryView;
