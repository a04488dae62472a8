import { isIP } from 'net';

type HeaderSource = Pick<Headers, 'get'>;

/**
 * Caller address for audit and login records. Proxies append to
 * X-Forwarded-For, so only the last valid entry was written by our own proxy;
 * earlier entries come from the client. Falls back to X-Real-IP.
 */
export function clientIp(headers: HeaderSource): string | null {
  const forwarded = headers.get('x-forwarded-for');
  if (forwarded) {
    const entries = forwarded.split(',').map((entry) => entry.trim());
    for (let i = entries.length - 1; i >= 0; i--) {
      if (isIP(entries[i])) return entries[i];
    }
  }

  const realIp = headers.get('x-real-ip')?.trim();
  return realIp && isIP(realIp) ? realIp : null;
}

function expandIpv6(ip: string): number[] {
  const [head, tail] = ip.includes('::') ? ip.split('::') : [ip, undefined];
  const toGroups = (part: string | undefined): number[] =>
    part
      ? part.split(':').flatMap((group) => {
          // IPv4-mapped tail, e.g. ::ffff:192.0.2.1
          if (group.includes('.')) {
            const [a, b, c, d] = group.split('.').map(Number);
            return [(a << 8) | b, (c << 8) | d];
          }
          return [parseInt(group, 16)];
        })
      : [];

  const headGroups = toGroups(head);
  const tailGroups = toGroups(tail);
  const zeros = new Array<number>(8 - headGroups.length - tailGroups.length).fill(0);
  return [...headGroups, ...zeros, ...tailGroups];
}

function formatIpv6(groups: number[]): string {
  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestLength < 2) return hex.join(':');
  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}

/** IPv4 with the last octet zeroed, IPv6 cut to its /48 prefix; null for anything else. */
export function anonymizeIp(ip: string | null | undefined): string | null {
  if (!ip) return null;
  const address = ip.split('%')[0];

  switch (isIP(address)) {
    case 4: {
      const octets = address.split('.');
      octets[3] = '0';
      return octets.join('.');
    }
    case 6: {
      const groups = expandIpv6(address);
      return formatIpv6([...groups.slice(0, 3), 0, 0, 0, 0, 0]);
    }
    default:
      return null;
  }
}
