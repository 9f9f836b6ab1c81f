import net from 'net';
import { InvalidTargetError } from './errors';

// [network, prefix length]
const BLOCKED_V4: Array<[string, number]> = [
	['0.0.0.0', 8],
	['10.0.0.0', 8],
	['127.0.0.0', 8],
	['169.254.0.0', 16],
	['172.16.0.0', 12],
	['192.168.0.0', 16],
];

function ipv4ToInt(ip: string): number {
	return ip.split('.').reduce((acc, octet) => ((acc << 8) | Number(octet)) >>> 0, 0);
}

function isBlockedIPv4(ip: string): boolean {
	const value = ipv4ToInt(ip);
	return BLOCKED_V4.some(([network, bits]) => {
		const mask = bits === 0 ? 0 : (~0 << (32 - bits)) >>> 0;
		return (value & mask) >>> 0 === (ipv4ToInt(network) & mask) >>> 0;
	});
}

/** Expands an IPv6 literal into its eight 16-bit groups. */
function ipv6Groups(ip: string): number[] {
	let text = ip;
	const tail: number[] = [];
	const v4 = text.match(/(\d+\.\d+\.\d+\.\d+)$/);
	if (v4) {
		const n = ipv4ToInt(v4[1]);
		tail.push(n >>> 16, n & 0xffff);
		text = text.slice(0, -v4[1].length).replace(/:$/, '') || ':';
		if (text.endsWith(':') && !text.endsWith('::')) text += ':';
	}
	const [head, rest] = text.split('::');
	const parse = (part: string | undefined) => (part ? part.split(':').filter(Boolean).map((g) => parseInt(g, 16)) : []);
	const left = parse(head);
	const right = [...parse(rest), ...tail];
	const fill = rest === undefined ? [] : new Array<number>(8 - left.length - right.length).fill(0);
	return [...left, ...fill, ...right];
}

function isBlockedIPv6(ip: string): boolean {
	const groups = ipv6Groups(ip);
	if (groups.length !== 8) return true;
	const [g0, g1, g2, g3, g4, g5, g6, g7] = groups;
	const leadingZero = g0 === 0 && g1 === 0 && g2 === 0 && g3 === 0 && g4 === 0;
	// :: and ::1
	if (leadingZero && g5 === 0 && g6 === 0 && (g7 === 0 || g7 === 1)) return true;
	// ::ffff:a.b.c.d
	if (leadingZero && g5 === 0xffff) {
		return isBlockedIPv4([g6 >>> 8, g6 & 0xff, g7 >>> 8, g7 & 0xff].join('.'));
	}
	// fe80::/10 link-local, fc00::/7 unique local
	return (g0 & 0xffc0) === 0xfe80 || (g0 & 0xfe00) === 0xfc00;
}

export function isForbiddenHost(hostname: string): boolean {
	const host = hostname.toLowerCase().replace(/^\[|\]$/g, '').replace(/\.$/, '');
	if (host === 'localhost' || host.endsWith('.localhost')) return true;
	switch (net.isIP(host)) {
		case 4:
			return isBlockedIPv4(host);
		case 6:
			return isBlockedIPv6(host);
		default:
			return false;
	}
}

/**
 * Turns a path-embedded target (`/https://example.com/a?b=1`) into an absolute
 * URL. Hostnames are checked literally; no DNS lookup is made.
 */
export function parseTarget(rawPath: string): URL {
	const raw = rawPath.startsWith('/') ? rawPath.slice(1) : rawPath;

	if (!/^https?:\/\//i.test(raw)) {
		throw new InvalidTargetError('Invalid URL. Format: http://proxy-host:port/http://target-url', 'unsupported_scheme', raw);
	}

	let url: URL;
	try {
		url = new URL(raw);
	} catch {
		throw new InvalidTargetError('Invalid URL format', 'malformed', raw);
	}
	if (!url.hostname) {
		throw new InvalidTargetError('Target URL has no host', 'malformed', raw);
	}
	if (isForbiddenHost(url.hostname)) {
		throw new InvalidTargetError('Access to internal networks is forbidden', 'forbidden_host', raw);
	}
	return url;
}
