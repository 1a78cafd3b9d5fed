import React from 'react';
import { Box, Text } from 'ink';
import { VlsmPlan } from '../types.js';
import ResultsTable from './ResultsTable.js';

interface VlsmResultsProps {
  plan: VlsmPlan;
}

const Stat: React.FC<{ label: string; value: string }> = ({ label, value }) => (
  <Box marginRight={3}>
    <Text color="gray">{label}: </Text>
    <Text>{value}</Text>
  </Box>
);

const VlsmResults: React.FC<VlsmResultsProps> = ({ plan }) => {
  return (
    <Box flexDirection="column" marginY={1}>
      {/* Summary */}
      <Box flexWrap="wrap">
        <Stat label="Base Network" value={plan.baseNetwork} />
        <Stat label="Total Addresses" value={plan.totalAddresses.toLocaleString('en-US')} />
        <Stat label="Required Hosts" value={plan.totalRequiredHosts.toLocaleString('en-US')} />
        <Stat label="Allocated Hosts" value={plan.totalAllocatedHosts.toLocaleString('en-US')} />
      </Box>
      <Box>
        <Text color="gray">Efficiency: </Text>
        <Text color="green">{`${plan.efficiency.toFixed(2)}%`}</Text>
      </Box>

      {/* Allocated Subnets Table */}
      <Box flexDirection="column" marginTop={1}>
        <Text bold>Allocated Subnets</Text>
        <ResultsTable subnets={plan.allocations} />
      </Box>

      {/* Unallocated Ranges */}
      {plan.unallocatedRanges.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text bold>Unallocated Address Space</Text>
          {plan.unallocatedRanges.map((range) => (
            <Text key={range.start}>{`${range.start} - ${range.end} (${range.size.toLocaleString('en-US')} addresses)`}</Text>
          ))}
        </Box>
      )}
    </Box>
  );
};

export default VlsmResults;
