import { AllocationError, Demand, Network, Result, SubnetAllocation, err, ok } from '../types.js';
import {
  bigIntToIp,
  broadcastAddress,
  ipToBigInt,
  maskForPrefix,
  networkAddress,
  usableHostCount,
  usableRange,
} from './addressArithmetic.js';

/**
 * Smallest prefix whose block holds `hosts` usable addresses plus the network
 * and broadcast addresses. Host counts beyond the IPv4 space yield a negative
 * prefix, which `allocate` reports as `PrefixTooSmall`.
 */
export const requiredPrefix = (hosts: number): number => {
  const hostBits = Math.ceil(Math.log2(hosts + 2));
  return 32 - hostBits;
};

/**
 * Packs the demands largest-first from the start of the base network and
 * returns the sub-networks in address order. The first demand that cannot be
 * placed aborts the whole allocation.
 */
export const allocate = (base: Network, demands: readonly Demand[]): Result<SubnetAllocation[], AllocationError> => {
  const baseMask = maskForPrefix(base.prefix);
  const baseNetworkInt = networkAddress(ipToBigInt(base.ip), baseMask);
  const baseBroadcastInt = broadcastAddress(baseNetworkInt, baseMask);

  // Array.prototype.sort is stable, so equal demands keep their input order.
  const bySizeDescending = [...demands].sort((a, b) => b.hosts - a.hosts);

  let cursor = baseNetworkInt;
  const placed: { networkInt: bigint; allocation: SubnetAllocation }[] = [];

  for (const demand of bySizeDescending) {
    const prefix = requiredPrefix(demand.hosts);
    if (prefix < base.prefix) {
      return err<AllocationError>({ kind: 'PrefixTooSmall', demandIndex: demand.index, computedPrefix: prefix, basePrefix: base.prefix });
    }

    // Past the end of the base network the cursor may no longer fit in 32 bits.
    if (cursor > baseBroadcastInt) {
      return err<AllocationError>({ kind: 'DoesNotFit', demandIndex: demand.index });
    }

    const mask = maskForPrefix(prefix);
    const networkInt = networkAddress(cursor, mask);
    const broadcastInt = broadcastAddress(networkInt, mask);
    if (broadcastInt > baseBroadcastInt) {
      return err<AllocationError>({ kind: 'DoesNotFit', demandIndex: demand.index });
    }

    const range = usableRange(networkInt, broadcastInt, prefix);
    placed.push({
      networkInt,
      allocation: {
        index: demand.index,
        requestedHosts: demand.hosts,
        prefix,
        network: bigIntToIp(networkInt),
        mask: bigIntToIp(mask),
        broadcast: bigIntToIp(broadcastInt),
        firstUsable: range ? bigIntToIp(range.first) : null,
        lastUsable: range ? bigIntToIp(range.last) : null,
        totalHosts: usableHostCount(prefix),
      },
    });

    cursor = broadcastInt + 1n;
  }

  placed.sort((a, b) => (a.networkInt < b.networkInt ? -1 : a.networkInt > b.networkInt ? 1 : 0));
  return ok(placed.map((p) => p.allocation));
};

export const vlsmAllocate = (
  baseIp: string,
  basePrefix: number,
  hostCounts: readonly number[],
): Result<SubnetAllocation[], AllocationError> => {
  const demands: Demand[] = hostCounts.map((hosts, i) => ({ index: i + 1, hosts }));
  return allocate({ ip: baseIp, prefix: basePrefix }, demands);
};
