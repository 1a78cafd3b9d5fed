import React from 'react';
import { Box, Text } from 'ink';
import { NetworkReport as NetworkReportData } from '../types.js';

interface NetworkReportProps {
  report: NetworkReportData;
}

const Row: React.FC<{ label: string; value: string }> = ({ label, value }) => (
  <Box>
    <Box width={20}>
      <Text color="cyan">{label}</Text>
    </Box>
    <Text color="green">{value}</Text>
  </Box>
);

const NetworkReport: React.FC<NetworkReportProps> = ({ report }) => {
  const usableRange = report.firstUsable !== null && report.lastUsable !== null
    ? `${report.firstUsable} - ${report.lastUsable}`
    : 'N/A';

  return (
    <Box flexDirection="column" marginY={1}>
      <Text bold color="cyanBright">Results:</Text>
      <Row label="IP Address" value={report.ip} />
      <Row label="IP Class" value={report.ipClass} />
      <Row label="Subnet Mask" value={`${report.mask} /${report.prefix}`} />
      <Row label="Network Address" value={report.network} />
      <Row label="Broadcast Address" value={report.broadcast} />
      <Row label="Usable Range" value={usableRange} />
      <Row label="Usable Hosts" value={report.totalHosts.toLocaleString('en-US')} />
    </Box>
  );
};

export default NetworkReport;
