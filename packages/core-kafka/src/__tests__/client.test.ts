import type { KafkaConfig } from "@sysbridge/core-config";
import { describe, expect, it } from "vitest";
import { saslOptions } from "../client.js";

const base: KafkaConfig = {
	bootstrapServers: "localhost:9092",
	securityProtocol: "PLAINTEXT",
	saslMechanism: "PLAIN",
	clientId: "syslog-connector",
	maxRetries: 5,
	retryBackoffMs: 100,
};

describe("saslOptions", () => {
	it("should be undefined without SASL", () => {
		expect(saslOptions(base)).toBeUndefined();
		expect(saslOptions({ ...base, securityProtocol: "SSL" })).toBeUndefined();
	});

	it("should map the configured mechanism", () => {
		expect(
			saslOptions({
				...base,
				securityProtocol: "SASL_SSL",
				saslMechanism: "SCRAM-SHA-512",
				saslUsername: "connector",
				saslPassword: "test-secret",
			}),
		).toEqual({ mechanism: "scram-sha-512", username: "connector", password: "test-secret" });
	});

	it("should default missing credentials to empty strings", () => {
		expect(saslOptions({ ...base, securityProtocol: "SASL_SSL" })).toEqual({
			mechanism: "plain",
			username: "",
			password: "",
		});
	});
});
