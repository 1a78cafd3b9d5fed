import { NetworkReport } from '../types.js';
import { getIpClassInfo } from '../utils.js';
import {
  bigIntToIp,
  broadcastAddress,
  ipToBigInt,
  maskForPrefix,
  networkAddress,
  usableHostCount,
  usableRange,
} from './addressArithmetic.js';

export const singleNetworkReport = (ip: string, prefix: number): NetworkReport => {
  const maskInt = maskForPrefix(prefix);
  const networkInt = networkAddress(ipToBigInt(ip), maskInt);
  const broadcastInt = broadcastAddress(networkInt, maskInt);
  const range = usableRange(networkInt, broadcastInt, prefix);

  return {
    ip,
    prefix,
    mask: bigIntToIp(maskInt),
    network: bigIntToIp(networkInt),
    broadcast: bigIntToIp(broadcastInt),
    firstUsable: range ? bigIntToIp(range.first) : null,
    lastUsable: range ? bigIntToIp(range.last) : null,
    totalHosts: usableHostCount(prefix),
    ipClass: getIpClassInfo(ip).class,
  };
};
