import type { Logger } from "@sysbridge/core-telemetry";
import { type Mock, vi } from "vitest";

export interface TestLogger extends Logger {
	debug: Mock<Logger["debug"]>;
	info: Mock<Logger["info"]>;
	warn: Mock<Logger["warn"]>;
	error: Mock<Logger["error"]>;
}

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
