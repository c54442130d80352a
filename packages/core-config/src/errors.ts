export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class MissingEnvVarError extends ConfigError {
	constructor(
		public readonly variableName: string,
		public readonly description?: string,
	) {
		super(
			`Missing required environment variable: ${variableName}${
				description ? ` (${description})` : ""
			}`,
		);
		this.name = "MissingEnvVarError";
	}
}

export interface ValidationIssue {
	path: string;
	message: string;
}

export class ValidationError extends ConfigError {
	constructor(
		message: string,
		public readonly errors: ValidationIssue[],
	) {
		super(
			errors.length > 0
				? `${message}: ${errors.map((e) => `${e.path || "<root>"} ${e.message}`).join("; ")}`
				: message,
		);
		this.name = "ValidationError";
	}
}
