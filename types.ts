export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export type IpClass = 'A' | 'B' | 'C' | 'D' | 'E';

export interface Network {
  ip: string;
  prefix: number;
}

export interface NetworkReport {
  ip: string;
  prefix: number;
  mask: string;
  network: string;
  broadcast: string;
  firstUsable: string | null;
  lastUsable: string | null;
  totalHosts: number;
  ipClass: IpClass;
}


// VLSM Types
export interface Demand {
  /** 1-based position of the demand in the caller's list. */
  index: number;
  hosts: number;
}

export interface SubnetAllocation {
  index: number;
  requestedHosts: number;
  prefix: number;
  network: string;
  mask: string;
  broadcast: string;
  firstUsable: string | null;
  lastUsable: string | null;
  totalHosts: number;
}

export type AllocationError =
  | { kind: 'PrefixTooSmall'; demandIndex: number; computedPrefix: number; basePrefix: number }
  | { kind: 'DoesNotFit'; demandIndex: number };

export interface UnallocatedRange {
  start: string;
  end: string;
  size: number;
}

export interface VlsmPlan {
  baseNetwork: string;
  basePrefix: number;
  allocations: SubnetAllocation[];
  totalAddresses: number;
  totalRequiredHosts: number;
  totalAllocatedHosts: number;
  efficiency: number;
  unallocatedRanges: UnallocatedRange[];
}


// Shell Types
export type Command =
  | { kind: 'exit' }
  | { kind: 'help' }
  | { kind: 'network'; ip: string; prefix: number }
  | { kind: 'vlsm'; ip: string; prefix: number; hostCounts: number[] }
  | { kind: 'export'; path: string | null };

export type SessionEntry =
  | { kind: 'network'; report: NetworkReport }
  | { kind: 'vlsm'; plan: VlsmPlan }
  | { kind: 'info'; message: string }
  | { kind: 'error'; message: string };
