import { isIP } from "node:net";

export interface InetSocketAddress {
	readonly kind: "inet";
	/** Numeric IP literal or a host name */
	readonly host: string;
	readonly port: number;
}

/** An endpoint without an IP, such as a local socket path */
export interface NamedSocketAddress {
	readonly kind: "named";
	readonly name: string;
}

export type SocketAddress = InetSocketAddress | NamedSocketAddress;

export function inetAddress(host: string, port: number): InetSocketAddress {
	return { kind: "inet", host, port };
}

export function namedAddress(name: string): NamedSocketAddress {
	return { kind: "named", name };
}

export function numericHost(address: SocketAddress): string | undefined {
	if (address.kind === "inet" && isIP(address.host) !== 0) {
		return address.host;
	}
	return undefined;
}

/**
 * Canonical string form used for record keys: `203.0.113.5:514`,
 * `[2001:db8::1]:514`, or the name of a named address.
 */
export function formatSocketAddress(address: SocketAddress): string {
	if (address.kind === "named") {
		return address.name;
	}
	if (isIP(address.host) === 6) {
		return `[${address.host}]:${address.port}`;
	}
	return `${address.host}:${address.port}`;
}
