import React from 'react';
import { Box, Text } from 'ink';
import { SubnetAllocation } from '../types.js';

interface ResultsTableProps {
  subnets: SubnetAllocation[];
}

const COLUMNS = [
  { title: '#', width: 3 },
  { title: 'Hosts', width: 7 },
  { title: 'Usable', width: 7 },
  { title: 'Network', width: 19 },
  { title: 'Mask', width: 16 },
  { title: 'First Usable', width: 16 },
  { title: 'Last Usable', width: 16 },
  { title: 'Broadcast', width: 15 },
];

const Cell: React.FC<{ width: number; children: string; bold?: boolean }> = ({ width, children, bold }) => (
  <Box width={width}>
    <Text bold={bold} color={bold ? 'cyan' : undefined}>{children}</Text>
  </Box>
);

const ResultsTable: React.FC<ResultsTableProps> = ({ subnets }) => {
  return (
    <Box flexDirection="column">
      <Box>
        {COLUMNS.map((column) => (
          <Cell key={column.title} width={column.width} bold>{column.title}</Cell>
        ))}
      </Box>
      {subnets.map((subnet) => {
        const cells = [
          String(subnet.index),
          String(subnet.requestedHosts),
          String(subnet.totalHosts),
          `${subnet.network}/${subnet.prefix}`,
          subnet.mask,
          subnet.firstUsable ?? 'N/A',
          subnet.lastUsable ?? 'N/A',
          subnet.broadcast,
        ];
        return (
          <Box key={subnet.network}>
            {cells.map((value, i) => (
              <Cell key={COLUMNS[i].title} width={COLUMNS[i].width}>{value}</Cell>
            ))}
          </Box>
        );
      })}
    </Box>
  );
};

export default ResultsTable;
