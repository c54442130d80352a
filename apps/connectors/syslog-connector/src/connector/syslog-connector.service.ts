import { setTimeout as delay } from "node:timers/promises";
import { Injectable, type OnApplicationBootstrap } from "@nestjs/common";
import type { ConnectorConfig, LifecycleService, SourceStatus } from "@sysbridge/connector-base";
import type { SyslogSourceRecord } from "@sysbridge/core-contracts";
import { type RecordProducer, isRetryable } from "@sysbridge/core-kafka";
import { type Logger, errorContext } from "@sysbridge/core-telemetry";
import type {
	SourceTaskDependencies,
	SyslogSourceConnector,
	SyslogSourceTask,
} from "@sysbridge/syslog-source";

export type TaskOverrides = Omit<SourceTaskDependencies, "logger">;

/**
 * Drives one syslog source task: polls it for batches and hands them to
 * the Kafka producer until shutdown, then forwards whatever is left.
 */
@Injectable()
export class SyslogConnectorService implements OnApplicationBootstrap, SourceStatus {
	private readonly logger: Logger;
	private task: SyslogSourceTask | undefined;
	private loop: Promise<void> | undefined;
	private stopRequested = false;
	private forwarded = 0;
	private dropped = 0;

	constructor(
		private readonly connector: SyslogSourceConnector,
		private readonly producer: RecordProducer,
		private readonly lifecycle: LifecycleService,
		logger: Logger,
		private readonly config: ConnectorConfig,
		private readonly overrides: TaskOverrides = {},
	) {
		this.logger = logger.child({ component: "syslog-connector" });
	}

	isRunning(): boolean {
		return this.task !== undefined && this.task.running && !this.stopRequested;
	}

	queueDepth(): number {
		return this.task?.queueDepth ?? 0;
	}

	async onApplicationBootstrap(): Promise<void> {
		await this.producer.connect();
		// Shutdown callbacks run last-registered first: drain, then disconnect
		this.lifecycle.onShutdown(() => this.producer.disconnect());

		const task = this.connector.createTask({ ...this.overrides, logger: this.logger });
		await task.start(this.config.syslog);
		this.task = task;
		this.lifecycle.onShutdown(() => this.shutdown());

		this.loop = this.run(task).catch((error: unknown) => {
			this.stopRequested = true;
			this.logger.error("Poll loop failed", errorContext(error));
		});

		this.logger.info("Syslog connector started", {
			topic: this.config.syslog.topic,
			version: task.version(),
		});
	}

	private async run(task: SyslogSourceTask): Promise<void> {
		while (!this.stopRequested) {
			const records = await task.poll();
			if (records.length > 0) {
				await this.forward(records, true);
			}
		}
	}

	/**
	 * Send one batch. Retryable failures are retried after a poll interval
	 * until shutdown begins; any other failure drops the batch.
	 */
	private async forward(records: SyslogSourceRecord[], retry: boolean): Promise<void> {
		for (let attempt = 1; ; attempt++) {
			try {
				await this.producer.sendRecords(records);
				this.forwarded += records.length;
				return;
			} catch (error) {
				if (!isRetryable(error) || !retry || this.stopRequested) {
					this.dropped += records.length;
					this.logger.error("Dropping batch that could not be sent", {
						record_count: records.length,
						attempt,
						...errorContext(error),
					});
					return;
				}
				this.logger.warn("Batch send failed, retrying", {
					record_count: records.length,
					attempt,
					...errorContext(error),
				});
				await delay(this.config.syslog.pollIntervalMs);
			}
		}
	}

	private async shutdown(): Promise<void> {
		const task = this.task;
		if (!task) return;
		this.stopRequested = true;

		await task.stop();
		await this.loop;

		// Final drain: one attempt per batch
		for (;;) {
			const records = await task.poll();
			if (records.length === 0) break;
			await this.forward(records, false);
		}

		this.logger.info("Syslog connector stopped", {
			records_forwarded: this.forwarded,
			records_dropped: this.dropped,
		});
	}
}
