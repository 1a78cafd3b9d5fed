export const MAX_IPV4 = 0xffffffffn;

export const ipToBigInt = (ip: string): bigint => {
  return ip.split('.').reduce((acc, octet) => (acc << 8n) + BigInt(parseInt(octet, 10)), 0n);
};

export const bigIntToIp = (ipInt: bigint): string => {
  return Array.from({ length: 4 }, (_, i) => (ipInt >> BigInt(8 * (3 - i))) & 255n).join('.');
};

export const maskForPrefix = (prefix: number): bigint => {
  if (prefix === 0) {
    return 0n;
  }
  return (MAX_IPV4 << BigInt(32 - prefix)) & MAX_IPV4;
};

export const maskToPrefix = (mask: bigint): number => {
  const binaryString = mask.toString(2).padStart(32, '0');
  if (binaryString.includes('01')) {
    throw new Error(`Invalid subnet mask: ${bigIntToIp(mask)}. Must have contiguous 1s followed by 0s.`);
  }
  const prefix = binaryString.indexOf('0');
  return prefix === -1 ? 32 : prefix;
};

export const networkAddress = (ipInt: bigint, mask: bigint): bigint => ipInt & mask;

export const broadcastAddress = (network: bigint, mask: bigint): bigint => network | (~mask & MAX_IPV4);

export const blockSize = (prefix: number): bigint => 1n << BigInt(32 - prefix);

/** /31 and /32 have no usable range. */
export const usableRange = (
  network: bigint,
  broadcast: bigint,
  prefix: number,
): { first: bigint; last: bigint } | null => {
  if (prefix >= 31) {
    return null;
  }
  return { first: network + 1n, last: broadcast - 1n };
};

export const usableHostCount = (prefix: number): number => {
  return prefix >= 31 ? 0 : Math.pow(2, 32 - prefix) - 2;
};
