import { NonRetryableError } from "./errors.js";

const MAX_TOPIC_LENGTH = 249;
const LEGAL_TOPIC = /^[a-zA-Z0-9._-]+$/;

/**
 * Kafka's own topic name rules. Returns the reason a name is illegal, or
 * null when it is fine.
 */
export function checkTopicName(topic: string): string | null {
	if (topic.length === 0) {
		return "topic name is empty";
	}
	if (topic === "." || topic === "..") {
		return `topic name cannot be "${topic}"`;
	}
	if (topic.length > MAX_TOPIC_LENGTH) {
		return `topic name is longer than ${MAX_TOPIC_LENGTH} characters`;
	}
	if (!LEGAL_TOPIC.test(topic)) {
		return `topic name "${topic}" contains characters other than ASCII alphanumerics, '.', '_' and '-'`;
	}
	return null;
}

export function assertTopicName(topic: string): void {
	const problem = checkTopicName(topic);
	if (problem) {
		throw new NonRetryableError(problem, "INVALID_TOPIC");
	}
}
