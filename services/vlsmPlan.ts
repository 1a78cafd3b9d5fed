import { AllocationError, Result, SubnetAllocation, UnallocatedRange, VlsmPlan, err, ok } from '../types.js';
import { bigIntToIp, blockSize, broadcastAddress, ipToBigInt, maskForPrefix, networkAddress } from './addressArithmetic.js';
import { vlsmAllocate } from './vlsmAllocator.js';

const findUnallocatedRanges = (
  baseNetworkInt: bigint,
  baseBroadcastInt: bigint,
  allocations: readonly SubnetAllocation[],
): UnallocatedRange[] => {
  const ranges: UnallocatedRange[] = [];
  const pushRange = (start: bigint, end: bigint) => {
    if (start <= end) {
      ranges.push({ start: bigIntToIp(start), end: bigIntToIp(end), size: Number(end - start + 1n) });
    }
  };

  // allocations arrive in address order
  let next = baseNetworkInt;
  for (const allocation of allocations) {
    const networkInt = ipToBigInt(allocation.network);
    pushRange(next, networkInt - 1n);
    next = ipToBigInt(allocation.broadcast) + 1n;
  }
  pushRange(next, baseBroadcastInt);
  return ranges;
};

export const calculateVlsmPlan = (
  baseIp: string,
  basePrefix: number,
  hostCounts: readonly number[],
): Result<VlsmPlan, AllocationError> => {
  const allocated = vlsmAllocate(baseIp, basePrefix, hostCounts);
  if (!allocated.ok) {
    return err(allocated.error);
  }
  const allocations = allocated.value;

  const baseMask = maskForPrefix(basePrefix);
  const baseNetworkInt = networkAddress(ipToBigInt(baseIp), baseMask);
  const baseBroadcastInt = broadcastAddress(baseNetworkInt, baseMask);

  const totalRequiredHosts = hostCounts.reduce((sum, hosts) => sum + hosts, 0);
  const totalAllocatedHosts = allocations.reduce((sum, s) => sum + s.totalHosts, 0);

  return ok({
    baseNetwork: `${bigIntToIp(baseNetworkInt)}/${basePrefix}`,
    basePrefix,
    allocations,
    totalAddresses: Number(blockSize(basePrefix)),
    totalRequiredHosts,
    totalAllocatedHosts,
    efficiency: totalAllocatedHosts > 0 ? (totalRequiredHosts / totalAllocatedHosts) * 100 : 0,
    unallocatedRanges: findUnallocatedRanges(baseNetworkInt, baseBroadcastInt, allocations),
  });
};
