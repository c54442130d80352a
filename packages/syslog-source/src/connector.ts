import {
	type SyslogSourceConfig,
	type ValidationIssue,
	parseSyslogProperties,
	validateSyslogProperties,
} from "@sysbridge/core-config";
import { SyslogSourceError } from "./errors.js";
import { type SourceTaskDependencies, SyslogSourceTask } from "./task.js";
import { CONNECTOR_VERSION } from "./version.js";

export type ConnectorProperties = Readonly<Record<string, string>>;

/**
 * Configuration front for syslog source tasks. A single listener owns the
 * port, so there is never more than one task.
 */
export class SyslogSourceConnector {
	private props: ConnectorProperties | undefined;

	version(): string {
		return CONNECTOR_VERSION;
	}

	validate(props: ConnectorProperties): ValidationIssue[] {
		return validateSyslogProperties(props);
	}

	/** Throws ValidationError when the properties are invalid. */
	start(props: ConnectorProperties): SyslogSourceConfig {
		const config = parseSyslogProperties(props);
		this.props = Object.freeze({ ...props });
		return config;
	}

	taskConfigs(maxTasks: number): ConnectorProperties[] {
		if (!this.props) {
			throw new SyslogSourceError("Connector not started", "CONNECTOR_NOT_STARTED");
		}
		if (maxTasks < 1) {
			return [];
		}
		return [{ ...this.props }];
	}

	stop(): void {
		this.props = undefined;
	}

	createTask(deps: SourceTaskDependencies): SyslogSourceTask {
		return new SyslogSourceTask(deps);
	}
}
