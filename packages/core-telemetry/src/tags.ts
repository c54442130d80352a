import type { ServiceIdentity } from "@sysbridge/core-config";

/**
 * Required tags for every log line
 */
export const REQUIRED_TAGS = ["env", "service", "version"] as const;

export type RequiredTag = (typeof REQUIRED_TAGS)[number];

export interface ServiceTags {
	env: string;
	service: string;
	version: string;
	team?: string;
	region?: string;
	domain?: string;
	stage?: string;
}

/**
 * Sanitize a tag value
 * - Lowercase
 * - Replace spaces/special chars with underscores
 * - Truncate to 200 chars
 */
export function sanitizeTagValue(value: string): string {
	return value
		.toLowerCase()
		.replace(/[^a-z0-9_\-./]/g, "_")
		.replace(/_+/g, "_")
		.slice(0, 200);
}

/**
 * Validate that required tags are present
 */
export function validateTags(
	tags: { readonly [K in RequiredTag]?: string | undefined },
	context: string,
): void {
	const missing = REQUIRED_TAGS.filter((tag) => !tags[tag]);
	if (missing.length > 0) {
		throw new Error(
			`Missing required tags in ${context}: ${missing.join(", ")}`,
		);
	}
}

export function createServiceTags(
	identity: ServiceIdentity,
	env: string,
	stage?: string,
): ServiceTags {
	const tags: ServiceTags = {
		env: sanitizeTagValue(env),
		service: sanitizeTagValue(identity.name),
		version: identity.version,
		team: sanitizeTagValue(identity.team),
		region: sanitizeTagValue(identity.region),
		domain: sanitizeTagValue(identity.domain),
	};
	if (stage) tags.stage = sanitizeTagValue(stage);
	return tags;
}
