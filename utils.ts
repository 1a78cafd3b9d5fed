import { IpClass } from './types.js';
import { ipToBigInt, maskToPrefix } from './services/addressArithmetic.js';

export type InputErrorKind = 'InvalidAddress' | 'InvalidPrefix' | 'InvalidMask' | 'InvalidFormat' | 'InvalidHostCount';

export class InputError extends Error {
  constructor(readonly kind: InputErrorKind, message: string) {
    super(message);
    this.name = 'InputError';
  }
}

// Helper functions for validation
export const validateIpFormat = (ip: string): string | null => {
    const octets = ip.split('.');
    if (octets.length !== 4) {
        return "Invalid IPv4 format. Must have 4 octets separated by dots.";
    }
    for (const octet of octets) {
        const num = parseInt(octet, 10);
        // Disallow non-numeric, values not matching parsed int (e.g. "01"), or out of range
        if (!/^\d+$/.test(octet) || String(num) !== octet || num < 0 || num > 255) {
            return "Invalid IPv4 format. Octets must be numbers between 0 and 255 without leading zeros.";
        }
    }
    return null;
};

export const getIpClassInfo = (ip: string): { class: IpClass; defaultMaskBits: number } => {
  const firstOctet = parseInt(ip.split('.')[0], 10);
  if (firstOctet >= 0 && firstOctet <= 127) return { class: 'A', defaultMaskBits: 8 };
  if (firstOctet >= 128 && firstOctet <= 191) return { class: 'B', defaultMaskBits: 16 };
  if (firstOctet >= 192 && firstOctet <= 223) return { class: 'C', defaultMaskBits: 24 };
  if (firstOctet >= 224 && firstOctet <= 239) return { class: 'D', defaultMaskBits: 0 }; // Multicast
  return { class: 'E', defaultMaskBits: 0 }; // Reserved
};

export const parseMask = (maskValue: string): number => {
    let cleanMaskValue = maskValue.trim();
    if (cleanMaskValue.startsWith('/')) {
      cleanMaskValue = cleanMaskValue.substring(1);
    }
    if (/^\d+$/.test(cleanMaskValue)) {
        const prefix = parseInt(cleanMaskValue, 10);
        if (prefix < 0 || prefix > 32) {
            throw new InputError('InvalidPrefix', `Invalid prefix: /${prefix}. Must be between 0 and 32.`);
        }
        return prefix;
    } else if (cleanMaskValue.includes('.')) {
        if (validateIpFormat(cleanMaskValue)) {
            throw new InputError('InvalidMask', `Invalid subnet mask format: ${cleanMaskValue}.`);
        }
        try {
            return maskToPrefix(ipToBigInt(cleanMaskValue));
        } catch (e) {
            throw new InputError('InvalidMask', e instanceof Error ? e.message : `Invalid subnet mask: ${cleanMaskValue}.`);
        }
    }
    throw new InputError('InvalidPrefix', `Invalid prefix: ${maskValue}. Use a number between 0 and 32.`);
};

/** Parses `IP/prefix`, where the part after the slash may also be a dotted mask. */
export const parseCidr = (text: string): { ip: string; prefix: number } => {
    const parts = text.trim().split('/');
    if (parts.length !== 2) {
        throw new InputError('InvalidFormat', `Invalid format: "${text.trim()}". Use IP/prefix like 192.168.1.10/24.`);
    }
    const [ip, mask] = parts;
    const ipError = validateIpFormat(ip);
    if (ipError) {
        throw new InputError('InvalidAddress', ipError);
    }
    return { ip, prefix: parseMask(mask) };
};

export const parseHostCounts = (text: string): number[] => {
    const tokens = text.split(/[\s,]+/).filter((token) => token.length > 0);
    if (tokens.length === 0) {
        throw new InputError('InvalidHostCount', 'Enter at least one host count.');
    }
    return tokens.map((token, i) => {
        const hosts = Number(token);
        if (!/^\d+$/.test(token) || !Number.isSafeInteger(hosts) || hosts <= 0) {
            throw new InputError('InvalidHostCount', `Invalid host count for subnet ${i + 1}: "${token}". Must be a positive whole number.`);
        }
        return hosts;
    });
};
