import type { SyslogSourceConfig } from "@sysbridge/core-config";
import type { SyslogSourceRecord } from "@sysbridge/core-contracts";
import type { Logger } from "@sysbridge/core-telemetry";
import { SyslogSourceError } from "./errors.js";
import { type Listener, type ListenerFactory, createSyslogListener } from "./listener.js";
import { HandoffQueue } from "./queue.js";
import { DnsHostnameResolver, type HostnameResolver } from "./resolver.js";
import { SyslogEventTranslator } from "./translator.js";
import { CONNECTOR_VERSION } from "./version.js";

export interface SourceTaskDependencies {
	logger: Logger;
	/** Defaults to reverse DNS with the configured timeout */
	resolver?: HostnameResolver;
	createListener?: ListenerFactory;
}

interface RunningTask {
	config: SyslogSourceConfig;
	logger: Logger;
	queue: HandoffQueue<SyslogSourceRecord>;
	translator: SyslogEventTranslator;
	listener: Listener;
}

/**
 * Pull side of the source: owns the listener, translator and queue, and
 * hands out records in batches.
 */
export class SyslogSourceTask {
	private readonly deps: SourceTaskDependencies;
	private task: RunningTask | undefined;
	private stopping: Promise<void> | undefined;

	constructor(deps: SourceTaskDependencies) {
		this.deps = deps;
	}

	version(): string {
		return CONNECTOR_VERSION;
	}

	get running(): boolean {
		return this.task !== undefined && this.stopping === undefined;
	}

	get queueDepth(): number {
		return this.task?.queue.size ?? 0;
	}

	async start(config: SyslogSourceConfig): Promise<void> {
		if (this.task) {
			throw new SyslogSourceError("Task already started", "TASK_ALREADY_STARTED");
		}

		const logger = this.deps.logger.child({ component: "syslog-task", topic: config.topic });
		const queue = new HandoffQueue<SyslogSourceRecord>();
		const translator = new SyslogEventTranslator({
			queue,
			topic: config.topic,
			reverseDns: config.reverseDns,
			resolver:
				this.deps.resolver ?? new DnsHostnameResolver({ timeoutMs: config.reverseDnsTimeoutMs }),
			logger,
		});
		const createListener = this.deps.createListener ?? createSyslogListener;
		const listener = createListener(
			{
				protocol: config.protocol,
				host: config.host,
				port: config.port,
				charset: config.charset,
				maxMessageSize: config.maxMessageSize,
				logger,
			},
			translator,
		);

		this.task = { config, logger, queue, translator, listener };
		try {
			await listener.start();
		} catch (error) {
			this.task = undefined;
			throw error;
		}
		logger.info("Syslog source task started", {
			protocol: config.protocol,
			port: config.port,
			reverse_dns: config.reverseDns,
		});
	}

	/**
	 * Wait up to the poll interval for records, then return at most one
	 * batch. Once stopped, returns what is left without waiting.
	 */
	async poll(): Promise<SyslogSourceRecord[]> {
		const task = this.task;
		if (!task) {
			throw new SyslogSourceError("Task not started", "TASK_NOT_STARTED");
		}
		if (!task.queue.closed) {
			await task.queue.waitForItems(task.config.pollIntervalMs);
		}
		return task.queue.drain(task.config.batchSize);
	}

	/** Stop the listener, let in-flight events land, then close the queue. */
	stop(): Promise<void> {
		if (!this.task) return Promise.resolve();
		this.stopping ??= this.shutdown(this.task);
		return this.stopping;
	}

	private async shutdown(task: RunningTask): Promise<void> {
		try {
			await task.listener.stop();
		} finally {
			await task.translator.close();
			task.queue.close();
		}
		task.logger.info("Syslog source task stopped", { remaining: task.queue.size });
	}
}
