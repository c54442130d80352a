import { describe, expect, it } from "vitest";
import {
	REQUIRED_TAGS,
	createServiceTags,
	sanitizeTagValue,
	validateTags,
} from "../tags.js";

describe("tags", () => {
	it("should require env, service and version", () => {
		expect([...REQUIRED_TAGS]).toEqual(["env", "service", "version"]);
	});

	describe("validateTags", () => {
		it("should pass when all required tags are present", () => {
			const tags = { env: "dev", service: "syslog-connector", version: "1.0.0" };
			expect(() => validateTags(tags, "test")).not.toThrow();
		});

		it("should name the missing tag", () => {
			const tags = { service: "syslog-connector", version: "1.0.0" };
			expect(() => validateTags(tags, "test")).toThrow(
				"Missing required tags in test: env",
			);
		});

		it("should list every missing tag", () => {
			expect(() => validateTags({ service: "x" }, "logger")).toThrow(
				"Missing required tags in logger: env, version",
			);
		});

		it("should treat empty values as missing", () => {
			expect(() =>
				validateTags({ env: "dev", service: "", version: "1" }, "test"),
			).toThrow(/service/);
		});
	});

	describe("sanitizeTagValue", () => {
		it("should lowercase values", () => {
			expect(sanitizeTagValue("SyslogConnector")).toBe("syslogconnector");
		});

		it("should collapse special chars into one underscore", () => {
			expect(sanitizeTagValue("syslog  source!")).toBe("syslog_source_");
		});

		it("should allow hyphens, dots and slashes", () => {
			expect(sanitizeTagValue("syslog-source.v1/udp")).toBe("syslog-source.v1/udp");
		});

		it("should truncate to 200 chars", () => {
			expect(sanitizeTagValue("a".repeat(250)).length).toBe(200);
		});
	});

	describe("createServiceTags", () => {
		const identity = {
			name: "Syslog Connector",
			version: "0.3.0",
			team: "platform",
			region: "eu-west-1",
			domain: "syslog",
		};

		it("should sanitize identity values but keep the version verbatim", () => {
			expect(createServiceTags(identity, "dev")).toEqual({
				env: "dev",
				service: "syslog_connector",
				version: "0.3.0",
				team: "platform",
				region: "eu-west-1",
				domain: "syslog",
			});
		});

		it("should add the stage only when given", () => {
			expect(createServiceTags(identity, "prod", "Ingest").stage).toBe("ingest");
			expect(createServiceTags(identity, "prod")).not.toHaveProperty("stage");
		});
	});
});
