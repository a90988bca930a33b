import { promises as dns } from 'node:dns';
import net from 'node:net';

import { ClientNotFoundError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { ClientStore } from '../storage/types.js';
import type { ClientId } from './client-id.js';

export type IpStatus = 'UNKNOWN' | 'INTERNAL' | 'EXTERNAL';

export interface IpInfo {
    status: IpStatus;
    info: string;
}

export interface LastClientIp extends IpInfo {
    /** Empty when the client never reported a usable address. */
    ip: string;
}

export type ReverseLookup = (ip: string) => Promise<string[]>;

const PRIVATE_IPV4_RANGES: ReadonlyArray<readonly [number, number]> = [
    [0x0a000000, 8],  // 10.0.0.0/8
    [0xac100000, 12], // 172.16.0.0/12
    [0xc0a80000, 16], // 192.168.0.0/16
    [0x7f000000, 8],  // 127.0.0.0/8
    [0xa9fe0000, 16]  // 169.254.0.0/16
];

function ipv4ToNumber(ip: string): number {
    return ip.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

export function isPrivateIpv4(ip: string): boolean {
    const value = ipv4ToNumber(ip);
    return PRIVATE_IPV4_RANGES.some(([base, bits]) => {
        const size = 2 ** (32 - bits);
        return value >= base && value < base + size;
    });
}

/** Classifies an address; only public IPv4 addresses go to reverse DNS. */
export class IpResolver {
    constructor(private readonly reverse: ReverseLookup = ip => dns.reverse(ip)) { }

    async retrieveIpInfo(ip: string | undefined): Promise<IpInfo> {
        const address = ip?.trim() ?? '';
        const family = net.isIP(address);
        if (family === 0) {
            return { status: 'UNKNOWN', info: 'No ip information.' };
        }
        if (family === 6) {
            return { status: 'INTERNAL', info: 'Internal IP6 address.' };
        }
        if (isPrivateIpv4(address)) {
            return { status: 'INTERNAL', info: 'Internal IP address.' };
        }

        try {
            const [hostname] = await this.reverse(address);
            return { status: 'EXTERNAL', info: hostname ?? 'Unknown IP address.' };
        } catch (error) {
            logger.debug(`[ip-resolver] reverse lookup failed for ${address}: ${error instanceof Error ? error.message : String(error)}`);
            return { status: 'EXTERNAL', info: 'Unknown IP address.' };
        }
    }
}

export class ClientAddressService {
    constructor(
        private readonly clients: ClientStore,
        private readonly resolver: IpResolver = new IpResolver()
    ) { }

    async getLastClientIp(clientId: ClientId): Promise<LastClientIp> {
        const info = await this.clients.readClientFullInfo(clientId);
        if (!info) {
            throw new ClientNotFoundError(clientId.toString());
        }
        const candidate = info.metadata.lastIp?.trim() ?? '';
        const ip = net.isIP(candidate) === 0 ? '' : candidate;
        const resolved = await this.resolver.retrieveIpInfo(ip);
        return { ip, ...resolved };
    }
}
