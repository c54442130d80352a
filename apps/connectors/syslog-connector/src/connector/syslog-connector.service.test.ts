import { LifecycleService, type ProcessHooks } from "@sysbridge/connector-base";
import { loadConfig } from "@sysbridge/core-config";
import { NonRetryableError, type RecordProducer, RetryableError } from "@sysbridge/core-kafka";
import type { Logger } from "@sysbridge/core-telemetry";
import {
	type ListenerFactory,
	type SyslogEventHandler,
	SyslogSourceConnector,
	inetAddress,
} from "@sysbridge/syslog-source";
import { type Mock, describe, expect, it, vi } from "vitest";
import { SyslogConnectorService } from "./syslog-connector.service.js";

const sender = inetAddress("192.0.2.10", 514);

function createLogger() {
	const logger = {
		debug: vi.fn<Logger["debug"]>(),
		info: vi.fn<Logger["info"]>(),
		warn: vi.fn<Logger["warn"]>(),
		error: vi.fn<Logger["error"]>(),
		child: (): Logger => logger,
	};
	return logger;
}

function createProducer() {
	let connected = false;
	return {
		connect: vi.fn(async () => {
			connected = true;
		}),
		disconnect: vi.fn(async () => {
			connected = false;
		}),
		isConnected: () => connected,
		sendRecords: vi.fn<RecordProducer["sendRecords"]>(async () => []),
	};
}

const hooks: ProcessHooks = { on: () => undefined, off: () => undefined, exit: () => undefined };

function setup() {
	const logger = createLogger();
	const producer = createProducer();
	const lifecycle = new LifecycleService(logger, hooks);
	const config = loadConfig({
		env: {
			KAFKA_BOOTSTRAP_SERVERS: "localhost:9092",
			SYSLOG_TOPIC: "syslog",
			SYSLOG_POLL_INTERVAL_MS: "20",
			SYSLOG_BATCH_SIZE: "10",
		},
	});

	let handler: SyslogEventHandler | undefined;
	const createListener: ListenerFactory = (_options, eventHandler) => {
		handler = eventHandler;
		return {
			start: async () => {
				await eventHandler.initialize?.();
			},
			stop: async () => {
				await eventHandler.destroy?.();
			},
		};
	};

	const service = new SyslogConnectorService(
		new SyslogSourceConnector(),
		producer,
		lifecycle,
		logger,
		config,
		{ createListener },
	);

	const send = (message: string) => {
		if (!handler) throw new Error("listener not started");
		handler.onEvent(sender, { message, host: "web1" });
	};

	return { service, producer, lifecycle, logger, send };
}

function sentMessages(sendRecords: Mock<RecordProducer["sendRecords"]>): unknown[] {
	return sendRecords.mock.calls.flatMap(([records]) =>
		records.map((record) => Reflect.get(record.value, "message")),
	);
}

describe("SyslogConnectorService", () => {
	it("should report not running before bootstrap", () => {
		const { service } = setup();

		expect(service.isRunning()).toBe(false);
		expect(service.queueDepth()).toBe(0);
	});

	it("should forward translated records to the producer", async () => {
		const { service, producer, lifecycle, send } = setup();
		await service.onApplicationBootstrap();

		expect(producer.connect).toHaveBeenCalledOnce();
		expect(service.isRunning()).toBe(true);

		send("hello");
		await vi.waitFor(() => expect(producer.sendRecords).toHaveBeenCalled());

		const [records] = producer.sendRecords.mock.calls[0] ?? [[]];
		expect(records).toHaveLength(1);
		expect(records[0]?.topic).toBe("syslog");
		expect(records[0]?.key).toEqual({ remote_address: "192.0.2.10:514" });
		expect(records[0]?.sourcePartition).toEqual({ host: "web1" });

		await lifecycle.onApplicationShutdown();
	});

	it("should retry a batch after a retryable failure", async () => {
		const { service, producer, lifecycle, logger, send } = setup();
		producer.sendRecords
			.mockRejectedValueOnce(new RetryableError("broker unavailable", "KAFKA_SEND_FAILED"))
			.mockResolvedValue([]);
		await service.onApplicationBootstrap();

		send("retry me");
		await vi.waitFor(() => expect(producer.sendRecords).toHaveBeenCalledTimes(2));

		expect(sentMessages(producer.sendRecords)).toEqual(["retry me", "retry me"]);
		expect(logger.warn).toHaveBeenCalledWith(
			"Batch send failed, retrying",
			expect.objectContaining({ attempt: 1, error_code: "KAFKA_SEND_FAILED" }),
		);

		await lifecycle.onApplicationShutdown();
	});

	it("should drop a batch after a non-retryable failure", async () => {
		const { service, producer, lifecycle, logger, send } = setup();
		producer.sendRecords
			.mockRejectedValueOnce(new NonRetryableError("record too large", "KAFKA_SEND_FAILED"))
			.mockResolvedValue([]);
		await service.onApplicationBootstrap();

		send("too big");
		await vi.waitFor(() =>
			expect(logger.error).toHaveBeenCalledWith(
				"Dropping batch that could not be sent",
				expect.objectContaining({ record_count: 1, attempt: 1 }),
			),
		);
		send("next");
		await vi.waitFor(() => expect(producer.sendRecords).toHaveBeenCalledTimes(2));

		expect(sentMessages(producer.sendRecords)).toEqual(["too big", "next"]);

		await lifecycle.onApplicationShutdown();
	});

	it("should forward every pending record before disconnecting on shutdown", async () => {
		const { service, producer, lifecycle, send } = setup();
		await service.onApplicationBootstrap();

		const expected = Array.from({ length: 25 }, (_, i) => `m${i}`);
		for (const message of expected) {
			send(message);
		}
		await lifecycle.onApplicationShutdown();

		expect(sentMessages(producer.sendRecords)).toEqual(expected);
		expect(producer.disconnect).toHaveBeenCalledOnce();
		const lastSend = Math.max(...producer.sendRecords.mock.invocationCallOrder);
		const [disconnectOrder] = producer.disconnect.mock.invocationCallOrder;
		expect(disconnectOrder).toBeGreaterThan(lastSend);
		expect(service.isRunning()).toBe(false);
	});

	it("should give up on failing batches once shutdown begins", async () => {
		const { service, producer, lifecycle, logger, send } = setup();
		producer.sendRecords.mockRejectedValue(new RetryableError("broker unavailable", "KAFKA_SEND_FAILED"));
		await service.onApplicationBootstrap();

		send("lost");
		await lifecycle.onApplicationShutdown();

		expect(logger.error).toHaveBeenCalledWith(
			"Dropping batch that could not be sent",
			expect.objectContaining({ record_count: 1 }),
		);
		expect(logger.info).toHaveBeenCalledWith("Syslog connector stopped", {
			records_forwarded: 0,
			records_dropped: 1,
		});
		expect(producer.disconnect).toHaveBeenCalledOnce();
	});
});
