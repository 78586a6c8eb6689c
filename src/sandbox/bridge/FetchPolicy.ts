import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';
import type { FetchPolicyConfig } from '../../utils/SandboxConfig.js';
import { FetchPolicyViolationError, FetchTransportError, errorMessage } from '../../execution/ErrorHandling.js';

export type HostResolver = (hostname: string) => Promise<string[]>;

export const resolveWithDns: HostResolver = async (hostname) => {
  const records = await lookup(hostname, { all: true });
  return records.map((record) => record.address);
};

function ipToLong(ip: string): number {
  const parts = ip.split('.').map((part) => Number.parseInt(part, 10));
  if (parts.length !== 4 || parts.some((part) => Number.isNaN(part) || part < 0 || part > 255)) {
    return -1;
  }
  return ((parts[0] << 24) >>> 0) + (parts[1] << 16) + (parts[2] << 8) + parts[3];
}

const PRIVATE_IPV4_RANGES: Array<[number, number]> = [
  [ipToLong('0.0.0.0'), ipToLong('0.255.255.255')],
  [ipToLong('10.0.0.0'), ipToLong('10.255.255.255')],
  [ipToLong('100.64.0.0'), ipToLong('100.127.255.255')],
  [ipToLong('127.0.0.0'), ipToLong('127.255.255.255')],
  [ipToLong('169.254.0.0'), ipToLong('169.254.255.255')],
  [ipToLong('172.16.0.0'), ipToLong('172.31.255.255')],
  [ipToLong('192.0.0.0'), ipToLong('192.0.0.255')],
  [ipToLong('192.168.0.0'), ipToLong('192.168.255.255')],
  [ipToLong('198.18.0.0'), ipToLong('198.19.255.255')],
  // multicast, reserved and broadcast
  [ipToLong('224.0.0.0'), ipToLong('255.255.255.255')],
];

function isPrivateIpv4(ip: string): boolean {
  const n = ipToLong(ip);
  if (n < 0) {
    return false;
  }
  return PRIVATE_IPV4_RANGES.some(([start, end]) => n >= start && n <= end);
}

/**
 * Eight 16-bit groups of a valid IPv6 address, with `::` expanded and a
 * dotted IPv4 tail folded into the last two groups.
 */
function ipv6Groups(ip: string): number[] {
  let address = ip.replace(/%.*$/, '');
  const dotted = /(\d+\.\d+\.\d+\.\d+)$/.exec(address);
  if (dotted) {
    const n = ipToLong(dotted[1]);
    address = `${address.slice(0, dotted.index)}${(n >>> 16).toString(16)}:${(n & 0xffff).toString(16)}`;
  }

  const parse = (part: string | undefined): number[] =>
    part ? part.split(':').map((group) => Number.parseInt(group, 16)) : [];
  const [head, tail] = address.split('::');
  const left = parse(head);
  if (tail === undefined) {
    return left;
  }
  const right = parse(tail);
  return [...left, ...new Array<number>(8 - left.length - right.length).fill(0), ...right];
}

function embeddedIpv4(high: number, low: number): string {
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}

function isPrivateIpv6(ip: string): boolean {
  const groups = ipv6Groups(ip);
  const zeros = (count: number): boolean => groups.slice(0, count).every((group) => group === 0);
  const [first, second] = groups;
  const tailIpv4 = (): boolean => isPrivateIpv4(embeddedIpv4(groups[6], groups[7]));

  if (zeros(8) || (zeros(7) && groups[7] === 1)) {
    return true;
  }
  // IPv4-mapped (::ffff:a.b.c.d), IPv4-translated (::ffff:0:a.b.c.d) and IPv4-compatible (::a.b.c.d)
  if ((zeros(5) && groups[5] === 0xffff) || (zeros(4) && groups[4] === 0xffff && groups[5] === 0) || zeros(6)) {
    return tailIpv4();
  }
  // NAT64 well-known prefix 64:ff9b::/96 and local-use 64:ff9b:1::/48
  if (first === 0x64 && second === 0xff9b) {
    return groups[2] === 1 || (groups.slice(2, 6).every((group) => group === 0) && tailIpv4());
  }
  // 6to4 carries the IPv4 address in the second and third groups
  if (first === 0x2002) {
    return isPrivateIpv4(embeddedIpv4(groups[1], groups[2]));
  }
  return (
    (first & 0xfe00) === 0xfc00 || // unique local
    (first & 0xffc0) === 0xfe80 || // link-local
    (first & 0xffc0) === 0xfec0 || // site-local
    (first & 0xff00) === 0xff00 // multicast
  );
}

/**
 * Loopback, link-local, unspecified, private and reserved addresses,
 * including IPv4 addresses carried inside IPv6 ones.
 */
export function isPrivateAddress(address: string): boolean {
  const ip = address.toLowerCase();
  switch (isIP(ip)) {
    case 4:
      return isPrivateIpv4(ip);
    case 6:
      return isPrivateIpv6(ip);
    default:
      return false;
  }
}

/**
 * True when `hostname` equals an allowed domain or is a subdomain of one.
 * An empty allow-list admits every host.
 */
export function isHostAllowed(hostname: string, allowedDomains: readonly string[]): boolean {
  if (allowedDomains.length === 0) {
    return true;
  }
  const host = hostname.toLowerCase().replace(/\.$/, '');
  return allowedDomains.some((entry) => {
    const domain = entry.toLowerCase().replace(/^\*?\./, '').replace(/\.$/, '');
    return host === domain || host.endsWith(`.${domain}`);
  });
}

function bareHostname(url: URL): string {
  // IPv6 literals keep their brackets in URL.hostname
  return url.hostname.replace(/^\[(.*)\]$/, '$1');
}

/**
 * Egress rules for guest fetch. Checks that need no I/O run first so a
 * rejected URL never reaches DNS or the network.
 */
export class FetchPolicy {
  constructor(
    private readonly config: FetchPolicyConfig,
    private readonly resolveHost: HostResolver = resolveWithDns,
  ) {}

  get maxRequestBodyBytes(): number {
    return this.config.maxRequestBodyBytes;
  }

  get maxResponseBodyBytes(): number {
    return this.config.maxResponseBodyBytes;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /**
   * Parse and check the target URL against protocol and allow-list rules.
   */
  public checkUrl(rawUrl: string): URL {
    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch {
      throw new FetchPolicyViolationError(`Invalid fetch URL: ${rawUrl}`, { url: rawUrl });
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new FetchPolicyViolationError(`URL protocol not allowed: ${url.protocol}`, {
        url: rawUrl,
      });
    }

    const hostname = bareHostname(url);
    if (!hostname) {
      throw new FetchPolicyViolationError('URL hostname missing', { url: rawUrl });
    }

    if (!isHostAllowed(hostname, this.config.allowedDomains)) {
      throw new FetchPolicyViolationError(`Host not in allow-list: ${hostname}`, {
        url: rawUrl,
        host: hostname,
        allowedDomains: [...this.config.allowedDomains],
      });
    }

    return url;
  }

  public checkRequestBody(body: string | undefined): void {
    if (body === undefined) {
      return;
    }
    const size = Buffer.byteLength(body, 'utf-8');
    if (size > this.config.maxRequestBodyBytes) {
      throw new FetchPolicyViolationError(
        `Request body of ${size} bytes exceeds limit of ${this.config.maxRequestBodyBytes} bytes`,
        { size, limit: this.config.maxRequestBodyBytes },
      );
    }
  }

  /**
   * Resolve the host and refuse internal addresses unless private networking
   * is allowed. Returns the checked address the connection must be pinned to,
   * or `undefined` when any destination is acceptable.
   */
  public async checkDestination(url: URL, signal?: AbortSignal): Promise<string | undefined> {
    if (this.config.allowPrivateNetwork) {
      return undefined;
    }

    const hostname = bareHostname(url);
    let addresses: string[];
    if (isIP(hostname) !== 0) {
      addresses = [hostname];
    } else {
      try {
        addresses = await this.resolve(hostname, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        throw new FetchTransportError(`Failed to resolve ${hostname}: ${errorMessage(error)}`, {
          host: hostname,
        });
      }
    }

    const blocked = addresses.find((address) => isPrivateAddress(address));
    if (blocked) {
      throw new FetchPolicyViolationError(`Fetch to internal address blocked: ${blocked}`, {
        host: hostname,
        address: blocked,
      });
    }
    if (addresses.length === 0) {
      throw new FetchTransportError(`Failed to resolve ${hostname}: no addresses`, { host: hostname });
    }
    return addresses[0];
  }

  private resolve(hostname: string, signal?: AbortSignal): Promise<string[]> {
    if (!signal) {
      return this.resolveHost(hostname);
    }
    if (signal.aborted) {
      return Promise.reject(signal.reason);
    }
    return new Promise((resolve, reject) => {
      const onAbort = (): void => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
      this.resolveHost(hostname).then(
        (addresses) => {
          signal.removeEventListener('abort', onAbort);
          resolve(addresses);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }
}
