import {
	type BeforeApplicationShutdown,
	Injectable,
	type OnApplicationShutdown,
} from "@nestjs/common";
import { type Logger, errorContext } from "@sysbridge/core-telemetry";

type ShutdownCallback = () => Promise<void>;

/** Process-level hooks a lifecycle service installs; swapped out in tests */
export interface ProcessHooks {
	on(event: "uncaughtException" | "unhandledRejection", listener: (reason: unknown) => void): unknown;
	off(event: "uncaughtException" | "unhandledRejection", listener: (reason: unknown) => void): unknown;
	exit(code: number): void;
}

export const EXIT_DELAY_MS = 1000;

@Injectable()
export class LifecycleService implements BeforeApplicationShutdown, OnApplicationShutdown {
	private shutdownCallbacks: ShutdownCallback[] = [];
	private isShuttingDown = false;
	private shutdownStartTime: number | undefined;
	private readonly onFatal = (reason: unknown) => this.handleFatal(reason);

	constructor(
		private readonly logger: Logger,
		private readonly hooks: ProcessHooks = process,
	) {
		this.hooks.on("uncaughtException", this.onFatal);
		this.hooks.on("unhandledRejection", this.onFatal);
	}

	/**
	 * Register a callback to be executed during shutdown. Callbacks run in
	 * reverse registration order.
	 */
	onShutdown(callback: ShutdownCallback): void {
		this.shutdownCallbacks.push(callback);
	}

	isShutdownInProgress(): boolean {
		return this.isShuttingDown;
	}

	beforeApplicationShutdown(signal?: string): void {
		this.isShuttingDown = true;
		this.shutdownStartTime = Date.now();
		this.logger.info("Shutdown initiated", signal ? { signal } : {});
	}

	async onApplicationShutdown(): Promise<void> {
		this.isShuttingDown = true;
		const callbacks = [...this.shutdownCallbacks].reverse();
		this.shutdownCallbacks = [];

		for (const callback of callbacks) {
			try {
				await callback();
			} catch (error) {
				this.logger.error("Shutdown callback failed", errorContext(error));
			}
		}

		this.hooks.off("uncaughtException", this.onFatal);
		this.hooks.off("unhandledRejection", this.onFatal);

		this.logger.info("Shutdown completed", {
			duration_ms: this.shutdownStartTime === undefined ? 0 : Date.now() - this.shutdownStartTime,
		});
	}

	private handleFatal(reason: unknown): void {
		this.logger.error("Unhandled failure, exiting", errorContext(reason));

		// Give time for logs to flush, then exit
		setTimeout(() => {
			this.hooks.exit(1);
		}, EXIT_DELAY_MS);
	}
}
