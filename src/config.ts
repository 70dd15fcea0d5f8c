import * as process from "process";
import * as dotenv from "dotenv";
dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
	const parsed = parseInt(value || "", 10);
	return Number.isNaN(parsed) ? fallback : parsed;
}

// Config Interface
export interface IConfig {
	appName: string;
	logLevel: string; // silent|error|warn|info|debug

	// Collaborators
	chatApiUrl: string; // request/response API base URL
	chatApiToken?: string; // bearer token for the API
	chatBrokerUrl: string; // AMQP URL of the real-time broker
	currentUserId?: string; // raw CHAT_USER_ID; "0" or missing means unauthenticated
	startupChatId?: string; // chat opened by the runner at startup

	// Delivery tuning (ms unless noted)
	realtimeSendTimeoutMs: number;
	markReadTimeoutMs: number;
	failedEvictionMs: number;
	heuristicMatchWindowMs: number;
	apiTimeoutMs: number;
	initialPageSize: number; // messages
	pageSize: number; // messages
}

// Config
export const config: IConfig = Object.freeze({
	appName: process.env.APP_NAME || "Chat Delivery Reconciler",
	logLevel: process.env.LOG_LEVEL || "info",

	chatApiUrl: process.env.CHAT_API_URL || "",
	chatApiToken: process.env.CHAT_API_TOKEN,
	chatBrokerUrl: process.env.CHAT_BROKER_URL || "",
	currentUserId: process.env.CHAT_USER_ID,
	startupChatId: process.env.CHAT_ID,

	realtimeSendTimeoutMs: intFromEnv(process.env.REALTIME_SEND_TIMEOUT_MS, 3000),
	markReadTimeoutMs: intFromEnv(process.env.MARK_READ_TIMEOUT_MS, 2000),
	failedEvictionMs: intFromEnv(process.env.FAILED_EVICTION_MS, 5000),
	heuristicMatchWindowMs: intFromEnv(process.env.HEURISTIC_MATCH_WINDOW_MS, 10000),
	apiTimeoutMs: intFromEnv(process.env.API_TIMEOUT_MS, 10000),
	initialPageSize: intFromEnv(process.env.INITIAL_PAGE_SIZE, 50),
	pageSize: intFromEnv(process.env.PAGE_SIZE, 30)
});

export default config;
