import { Injectable } from "@nestjs/common";
import type { RecordProducer } from "@sysbridge/core-kafka";

export type CheckStatus = "ok" | "unhealthy";

export interface HealthCheck {
	status: CheckStatus;
	message?: string;
}

export interface HealthResponse {
	status: "ok" | "degraded" | "unhealthy";
	timestamp: string;
	checks: {
		kafka: HealthCheck;
		source?: HealthCheck & { queueDepth: number };
	};
}

/** Implemented by whatever feeds the producer, to report on itself */
export interface SourceStatus {
	isRunning(): boolean;
	queueDepth(): number;
}

export const SOURCE_STATUS = "SOURCE_STATUS";
export const HEALTH_SERVICE = "HEALTH_SERVICE";

@Injectable()
export class HealthService {
	constructor(
		private readonly producer: Pick<RecordProducer, "isConnected">,
		private readonly source?: SourceStatus,
	) {}

	check(): HealthResponse {
		const checks: HealthResponse["checks"] = {
			kafka: this.producer.isConnected()
				? { status: "ok" }
				: { status: "unhealthy", message: "Kafka producer not connected" },
		};

		if (this.source) {
			const queueDepth = this.source.queueDepth();
			checks.source = this.source.isRunning()
				? { status: "ok", queueDepth }
				: { status: "unhealthy", message: "Source task not running", queueDepth };
		}

		const statuses = [checks.kafka.status, ...(checks.source ? [checks.source.status] : [])];
		const healthy = statuses.filter((s) => s === "ok").length;

		return {
			status: healthy === statuses.length ? "ok" : healthy === 0 ? "unhealthy" : "degraded",
			timestamp: new Date().toISOString(),
			checks,
		};
	}
}
