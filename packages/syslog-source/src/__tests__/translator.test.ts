import type { SyslogSourceRecord } from "@sysbridge/core-contracts";
import { describe, expect, it } from "vitest";
import { inetAddress, namedAddress } from "../address.js";
import { ResolutionError, TranslationError } from "../errors.js";
import type { SyslogEvent } from "../event.js";
import { HandoffQueue } from "../queue.js";
import type { HostnameResolver } from "../resolver.js";
import { SyslogEventTranslator } from "../translator.js";
import { FakeResolver, createTestLogger, deferred, nextTick } from "./helpers.js";

const sender = inetAddress("203.0.113.5", 514);
const event: SyslogEvent = { facility: 4, level: 2, message: "test", host: "web1" };

function setup(reverseDns: boolean, resolver: HostnameResolver = new FakeResolver(async () => "unused")) {
	const queue = new HandoffQueue<SyslogSourceRecord>();
	const logger = createTestLogger();
	const translator = new SyslogEventTranslator({
		queue,
		topic: "syslog",
		reverseDns,
		resolver,
		logger,
	});
	return { queue, logger, translator };
}

function messages(records: SyslogSourceRecord[]): (string | undefined)[] {
	return records.map((record) => record.value.message);
}

describe("SyslogEventTranslator", () => {
	describe("literal hostnames", () => {
		it("should copy the IP literal without calling the resolver", async () => {
			const resolver = new FakeResolver(async () => "web1.example.com");
			const { queue, translator } = setup(false, resolver);

			translator.onEvent(sender, event);
			await translator.flush();

			const record = queue.poll();
			expect(record?.key).toEqual({ remote_address: "203.0.113.5:514" });
			expect(record?.value).toEqual({
				facility: 4,
				level: 2,
				message: "test",
				host: "web1",
				remote_address: "203.0.113.5:514",
				hostname: "203.0.113.5",
			});
			expect(resolver.calls).toHaveLength(0);
		});

		it("should fill in partition, offset and topic", async () => {
			const { translator } = setup(false);
			const record = await translator.translate(sender, event);

			expect(record.sourcePartition).toEqual({ host: "web1" });
			expect(record.sourceOffset).toEqual({});
			expect(record.topic).toBe("syslog");
			expect(record.kafkaPartition).toBeNull();
			expect(record.keySchema.name).toBe("sysbridge.syslog.SyslogKey");
			expect(record.valueSchema.name).toBe("sysbridge.syslog.SyslogValue");
		});

		it("should use the whole address when it carries no IP", async () => {
			const { translator } = setup(false);
			const record = await translator.translate(namedAddress("/dev/log"), { message: "local" });

			expect(record.key).toEqual({ remote_address: "/dev/log" });
			expect(record.value.hostname).toBe("/dev/log");
		});

		it("should bracket IPv6 keys but keep the bare literal as hostname", async () => {
			const { translator } = setup(false);
			const record = await translator.translate(inetAddress("2001:db8::1", 514), { message: "v6" });

			expect(record.key).toEqual({ remote_address: "[2001:db8::1]:514" });
			expect(record.value.hostname).toBe("2001:db8::1");
		});
	});

	describe("absent fields", () => {
		it("should leave fields the event lacks absent", async () => {
			const { translator } = setup(false);
			const record = await translator.translate(sender, { message: "only a message" });

			expect(record.value).toEqual({
				message: "only a message",
				remote_address: "203.0.113.5:514",
				hostname: "203.0.113.5",
			});
			expect(record.sourcePartition).toEqual({ host: null });
		});

		it("should treat null fields as absent", async () => {
			const { translator } = setup(false);
			const record = await translator.translate(sender, {
				message: "",
				facility: null,
				host: null,
				date: null,
			});

			expect(record.value).toEqual({
				message: "",
				remote_address: "203.0.113.5:514",
				hostname: "203.0.113.5",
			});
		});

		it("should copy date and charset when present", async () => {
			const { translator } = setup(false);
			const date = new Date(1_700_000_000_000);
			const record = await translator.translate(sender, { message: "m", date, charset: "utf-8" });

			expect(record.value.date).toEqual(date);
			expect(record.value.charset).toBe("utf-8");
		});
	});

	describe("reverse DNS", () => {
		it("should use the resolved hostname", async () => {
			const resolver = new FakeResolver(async () => "web1.example.com");
			const { queue, translator } = setup(true, resolver);

			translator.onEvent(sender, event);
			await translator.flush();

			expect(queue.poll()?.value.hostname).toBe("web1.example.com");
			expect(resolver.calls).toEqual([sender]);
		});

		it("should still enqueue the record when resolution times out", async () => {
			const resolver = new FakeResolver(async () => {
				throw new ResolutionError("Reverse lookup of 203.0.113.5 timed out after 2000ms", "RESOLUTION_TIMEOUT");
			});
			const { queue, logger, translator } = setup(true, resolver);

			translator.onEvent(sender, event);
			await translator.flush();

			expect(queue.size).toBe(1);
			const record = queue.poll();
			expect(record?.value).not.toHaveProperty("hostname");
			expect(record?.value.message).toBe("test");
			expect(logger.warn).toHaveBeenCalledWith(
				"Hostname resolution failed; hostname omitted",
				expect.objectContaining({
					remote_address: "203.0.113.5:514",
					error_code: "RESOLUTION_TIMEOUT",
				}),
			);
		});

		it("should keep the sender-reported host as partition, not the resolved name", async () => {
			const { translator } = setup(true, new FakeResolver(async () => "web1.example.com"));
			const record = await translator.translate(sender, event);

			expect(record.sourcePartition).toEqual({ host: "web1" });
			expect(record.value.hostname).toBe("web1.example.com");
		});
	});

	describe("malformed events", () => {
		it("should drop an event with a null message and log an error", async () => {
			const { queue, logger, translator } = setup(false);
			queue.offer(await translator.translate(sender, event));

			translator.onEvent(sender, { ...event, message: null });
			await translator.flush();

			expect(queue.size).toBe(1);
			expect(logger.error).toHaveBeenCalledWith(
				"Dropping syslog event that could not be translated",
				expect.objectContaining({
					remote_address: "203.0.113.5:514",
					error_code: "TRANSLATION_FAILED",
				}),
			);
		});

		it.each<[string, SyslogEvent]>([
			["missing message", { facility: 1 }],
			["facility out of range", { message: "m", facility: 24 }],
			["fractional level", { message: "m", level: 2.5 }],
			["level out of range", { message: "m", level: 8 }],
			["invalid date", { message: "m", date: new Date(Number.NaN) }],
		])("should reject %s", async (_, malformed) => {
			const { translator } = setup(false);
			await expect(translator.translate(sender, malformed)).rejects.toBeInstanceOf(TranslationError);
		});

		it("should not call the resolver for a malformed event", async () => {
			const resolver = new FakeResolver(async () => "web1.example.com");
			const { translator } = setup(true, resolver);

			translator.onEvent(sender, { message: null });
			await translator.flush();

			expect(resolver.calls).toHaveLength(0);
		});
	});

	describe("ordering", () => {
		it("should enqueue events from one sender in arrival order", async () => {
			const { queue, translator } = setup(false);
			for (let i = 0; i < 100; i++) {
				translator.onEvent(sender, { message: `m${i}` });
			}
			await translator.flush();

			expect(messages(queue.drain())).toEqual(Array.from({ length: 100 }, (_, i) => `m${i}`));
		});

		it("should hold a later record until an earlier lookup for the same sender finishes", async () => {
			const lookups = [deferred<string>(), deferred<string>()];
			let call = 0;
			const resolver = new FakeResolver(() => {
				const lookup = lookups[call++];
				if (!lookup) throw new Error("unexpected lookup");
				return lookup.promise;
			});
			const { queue, translator } = setup(true, resolver);

			translator.onEvent(sender, { message: "first" });
			translator.onEvent(sender, { message: "second" });
			expect(translator.pending).toBe(2);

			lookups[1]?.resolve("second.example.com");
			await nextTick();
			expect(queue.size).toBe(0);

			lookups[0]?.resolve("first.example.com");
			await translator.flush();

			const records = queue.drain();
			expect(messages(records)).toEqual(["first", "second"]);
			expect(records.map((r) => r.value.hostname)).toEqual([
				"first.example.com",
				"second.example.com",
			]);
			expect(translator.pending).toBe(0);
		});

		it("should not make one sender wait on another", async () => {
			const slow = deferred<string>();
			const resolver = new FakeResolver((address) =>
				address.kind === "inet" && address.host === "203.0.113.5"
					? slow.promise
					: Promise.resolve("fast.example.com"),
			);
			const { queue, translator } = setup(true, resolver);

			translator.onEvent(sender, { message: "slow" });
			translator.onEvent(inetAddress("198.51.100.7", 514), { message: "fast" });
			await nextTick();

			expect(messages(queue.drain())).toEqual(["fast"]);

			slow.resolve("slow.example.com");
			await translator.flush();
			expect(messages(queue.drain())).toEqual(["slow"]);
		});

		it("should deliver exactly N x M records from concurrent senders", async () => {
			const senders = 8;
			const perSender = 50;
			const resolver = new FakeResolver(
				() => new Promise((resolve) => setTimeout(() => resolve("host.example.com"), Math.floor(Math.random() * 3))),
			);
			const { queue, translator } = setup(true, resolver);

			for (let seq = 0; seq < perSender; seq++) {
				for (let s = 0; s < senders; s++) {
					translator.onEvent(inetAddress(`192.0.2.${s + 1}`, 514), { message: `${s}:${seq}` });
				}
			}
			await translator.flush();

			const records = queue.drain();
			expect(records).toHaveLength(senders * perSender);
			expect(new Set(messages(records)).size).toBe(senders * perSender);
			for (let s = 0; s < senders; s++) {
				const own = records.filter((r) => r.key.remote_address === `192.0.2.${s + 1}:514`);
				expect(messages(own)).toEqual(Array.from({ length: perSender }, (_, seq) => `${s}:${seq}`));
			}
		});
	});

	describe("shutdown", () => {
		it("should finish in-flight translations on close and drop later events", async () => {
			const lookup = deferred<string>();
			const { queue, logger, translator } = setup(true, new FakeResolver(() => lookup.promise));

			translator.onEvent(sender, event);
			const closed = translator.close();
			translator.onEvent(sender, { message: "late" });
			lookup.resolve("web1.example.com");
			await closed;

			expect(messages(queue.drain())).toEqual(["test"]);
			expect(logger.warn).toHaveBeenCalledWith("Dropping syslog event received after close", {
				remote_address: "203.0.113.5:514",
			});
		});

		it("should log instead of throwing when the queue is already closed", async () => {
			const { queue, logger, translator } = setup(false);
			queue.close();

			translator.onEvent(sender, event);
			await translator.flush();

			expect(queue.size).toBe(0);
			expect(logger.error).toHaveBeenCalledWith(
				"Dropping translated record",
				expect.objectContaining({ error_code: "QUEUE_CLOSED" }),
			);
		});
	});

	describe("transport errors", () => {
		it("should log transport errors at error level", () => {
			const { logger, translator } = setup(false);

			expect(() => translator.onError(sender, new Error("read ECONNRESET"))).not.toThrow();
			expect(logger.error).toHaveBeenCalledWith(
				"Syslog transport error",
				expect.objectContaining({
					remote_address: "203.0.113.5:514",
					error: "read ECONNRESET",
					error_code: "TRANSPORT_ERROR",
				}),
			);
		});
	});
});
