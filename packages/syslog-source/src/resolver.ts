import { Resolver } from "node:dns/promises";
import { type SocketAddress, formatSocketAddress, numericHost } from "./address.js";
import { ResolutionError } from "./errors.js";

export interface ResolvedAddress {
	readonly address: SocketAddress;
	readonly hostname: string;
}

export interface HostnameResolver {
	/** One attempt, no retries. Rejects with ResolutionError on any failure. */
	resolve(address: SocketAddress): Promise<ResolvedAddress>;
}

export interface DnsHostnameResolverOptions {
	timeoutMs: number;
	/** DNS servers to ask instead of the system ones */
	servers?: readonly string[];
}

/**
 * Reverse DNS through Node's resolver. The timeout is enforced here as
 * well as passed to c-ares, so a hung lookup cannot outlive it.
 */
export class DnsHostnameResolver implements HostnameResolver {
	private readonly timeoutMs: number;
	private readonly servers: readonly string[] | undefined;

	constructor(options: DnsHostnameResolverOptions) {
		this.timeoutMs = options.timeoutMs;
		this.servers = options.servers;
	}

	async resolve(address: SocketAddress): Promise<ResolvedAddress> {
		if (address.kind === "named") {
			throw new ResolutionError(`Cannot reverse-resolve named address ${address.name}`);
		}

		const ip = numericHost(address);
		if (ip === undefined) {
			return { address, hostname: address.host };
		}

		const hostnames = await this.reverse(ip);
		const hostname = hostnames[0];
		if (!hostname) {
			throw new ResolutionError(`No PTR record for ${formatSocketAddress(address)}`);
		}
		return { address, hostname };
	}

	private reverse(ip: string): Promise<string[]> {
		const resolver = new Resolver({ timeout: this.timeoutMs, tries: 1 });
		if (this.servers) {
			resolver.setServers([...this.servers]);
		}

		return new Promise((resolve, reject) => {
			const timer = setTimeout(() => {
				resolver.cancel();
				reject(
					new ResolutionError(
						`Reverse lookup of ${ip} timed out after ${this.timeoutMs}ms`,
						"RESOLUTION_TIMEOUT",
					),
				);
			}, this.timeoutMs);

			resolver.reverse(ip).then(
				(hostnames) => {
					clearTimeout(timer);
					resolve(hostnames);
				},
				(error: unknown) => {
					clearTimeout(timer);
					const reason = error instanceof Error ? error.message : String(error);
					reject(
						new ResolutionError(`Reverse lookup of ${ip} failed: ${reason}`, "RESOLUTION_FAILED", {
							cause: error,
						}),
					);
				},
			);
		});
	}
}
