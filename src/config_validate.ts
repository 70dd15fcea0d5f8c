import config, { IConfig } from "./config";

function isNonEmpty(s?: string): boolean {
	return !!(s && String(s).trim().length > 0);
}

function assert(cond: boolean, msg: string): void {
	if (!cond) throw new Error(msg);
}

function isPositive(n: number): boolean {
	return Number.isInteger(n) && n > 0;
}

export function validateConfig(cfg: IConfig = config): void {
	// Collaborators
	assert(isNonEmpty(cfg.chatApiUrl), "CHAT_API_URL is required");
	assert(/^https?:\/\//i.test(cfg.chatApiUrl), "CHAT_API_URL must be an http(s) URL");
	assert(isNonEmpty(cfg.chatBrokerUrl), "CHAT_BROKER_URL is required");
	assert(/^amqps?:\/\//i.test(cfg.chatBrokerUrl), "CHAT_BROKER_URL must be an amqp(s) URL");

	// Numbers
	assert(isPositive(cfg.realtimeSendTimeoutMs), "REALTIME_SEND_TIMEOUT_MS must be a positive integer");
	assert(isPositive(cfg.markReadTimeoutMs), "MARK_READ_TIMEOUT_MS must be a positive integer");
	assert(isPositive(cfg.failedEvictionMs), "FAILED_EVICTION_MS must be a positive integer");
	assert(cfg.heuristicMatchWindowMs >= 0, "HEURISTIC_MATCH_WINDOW_MS must not be negative");
	assert(isPositive(cfg.apiTimeoutMs), "API_TIMEOUT_MS must be a positive integer");
	assert(isPositive(cfg.initialPageSize), "INITIAL_PAGE_SIZE must be a positive integer");
	assert(isPositive(cfg.pageSize), "PAGE_SIZE must be a positive integer");

	// Formats
	if (isNonEmpty(cfg.currentUserId)) {
		assert(/^\d+$/.test(String(cfg.currentUserId).trim()), "CHAT_USER_ID must be a numeric user id");
	}
}

export default validateConfig;
