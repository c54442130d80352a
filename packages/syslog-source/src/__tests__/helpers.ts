import type { Logger } from "@sysbridge/core-telemetry";
import { type Mock, vi } from "vitest";
import type { SocketAddress } from "../address.js";
import type { HostnameResolver, ResolvedAddress } from "../resolver.js";

export interface TestLogger extends Logger {
	debug: Mock<Logger["debug"]>;
	info: Mock<Logger["info"]>;
	warn: Mock<Logger["warn"]>;
	error: Mock<Logger["error"]>;
}

/** Logger whose children are itself, so every call lands on one set of mocks */
export function createTestLogger(): TestLogger {
	const logger: TestLogger = {
		debug: vi.fn<Logger["debug"]>(),
		info: vi.fn<Logger["info"]>(),
		warn: vi.fn<Logger["warn"]>(),
		error: vi.fn<Logger["error"]>(),
		child: () => logger,
	};
	return logger;
}

/** Resolver double that records every address it is asked about */
export class FakeResolver implements HostnameResolver {
	readonly calls: SocketAddress[] = [];

	constructor(private readonly answer: (address: SocketAddress) => Promise<string>) {}

	async resolve(address: SocketAddress): Promise<ResolvedAddress> {
		this.calls.push(address);
		return { address, hostname: await this.answer(address) };
	}
}

/** A promise plus the function that settles it */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>((settle) => {
		resolve = settle;
	});
	return { promise, resolve };
}

export function nextTick(): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, 0));
}
