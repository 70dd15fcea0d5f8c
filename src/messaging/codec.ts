import { MalformedPayloadError } from "../errors";
import { parseStatus } from "../handlers/status";
import { ChatSummary, IncomingMessage, MessageStatus } from "../types/message";

// Wire shape of a server message (API responses and real-time pushes).
export interface ServerMessageDto {
	id: number;
	chatId: string;
	senderId: number;
	senderName?: string;
	content: string;
	sentAt: string | number;
	isRead?: boolean;
	readAt?: string | number | null;
	status?: string | number;
	correlationId?: string | null;
}

// Wire shape of one entry of the chat list.
export interface ChatSummaryDto {
	id: string;
	lastMessage?: string | null;
	lastMessageTime?: string | number | null;
	unreadCount?: number;
}

export type RealtimeEnvelope =
	| { type: "message_received"; message: IncomingMessage }
	| { type: "status_updated"; chatId: string; serverId: number; status: MessageStatus }
	| { type: "correlation_confirmed"; correlationToken: string; serverId: number; chatId: string | null }
	| { type: "user_typing"; chatId: string; userId: number; isTyping: boolean };

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(obj: Json, key: string): string {
	const value = obj[key];
	if (typeof value !== "string" || value.length === 0) throw new MalformedPayloadError(`'${key}' must be a non-empty string`);
	return value;
}

function requireId(obj: Json, key: string): number {
	const value = obj[key];
	const n = typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value;
	if (typeof n !== "number" || !Number.isSafeInteger(n) || n <= 0) throw new MalformedPayloadError(`'${key}' must be a positive integer`);
	return n;
}

export function parseTimestamp(value: unknown, key = "timestamp"): number {
	if (typeof value === "number" && Number.isFinite(value)) return value;
	if (typeof value === "string") {
		const ms = Date.parse(value);
		if (!Number.isNaN(ms)) return ms;
	}
	throw new MalformedPayloadError(`'${key}' must be an ISO date or epoch milliseconds`);
}

/**
 * Server message → store input. An explicit `status` wins; otherwise a read
 * message is Read and anything else the server holds is at least Sent.
 */
export function decodeServerMessage(raw: unknown): IncomingMessage {
	if (!isObject(raw)) throw new MalformedPayloadError("message must be an object");
	const readAt = raw.readAt === null || raw.readAt === undefined ? null : parseTimestamp(raw.readAt, "readAt");
	const isRead = raw.isRead === true || readAt !== null;
	const explicit = raw.status === undefined ? null : parseStatus(raw.status);
	if (raw.status !== undefined && explicit === null) throw new MalformedPayloadError(`unknown status '${String(raw.status)}'`);
	const content = raw.content;
	if (typeof content !== "string") throw new MalformedPayloadError("'content' must be a string");

	return {
		serverId: requireId(raw, "id"),
		chatId: requireString(raw, "chatId").toLowerCase(),
		senderId: requireId(raw, "senderId"),
		senderName: typeof raw.senderName === "string" ? raw.senderName : "",
		content,
		sentAt: parseTimestamp(raw.sentAt, "sentAt"),
		status: explicit ?? (isRead ? MessageStatus.Read : MessageStatus.Sent),
		isRead,
		readAt,
		correlationToken: typeof raw.correlationId === "string" ? raw.correlationId : ""
	};
}

export function decodeServerMessages(raw: unknown): IncomingMessage[] {
	if (!Array.isArray(raw)) throw new MalformedPayloadError("expected an array of messages");
	return raw.map(decodeServerMessage);
}

export function decodeChatSummary(raw: unknown): ChatSummary {
	if (!isObject(raw)) throw new MalformedPayloadError("chat must be an object");
	const unreadCount = raw.unreadCount ?? 0;
	if (typeof unreadCount !== "number" || !Number.isSafeInteger(unreadCount) || unreadCount < 0) {
		throw new MalformedPayloadError("'unreadCount' must be a non-negative integer");
	}
	return {
		chatId: requireString(raw, "id").toLowerCase(),
		lastMessage: typeof raw.lastMessage === "string" ? raw.lastMessage : null,
		lastMessageTime:
			raw.lastMessageTime === null || raw.lastMessageTime === undefined
				? null
				: parseTimestamp(raw.lastMessageTime, "lastMessageTime"),
		unreadCount
	};
}

export function decodeChatSummaries(raw: unknown): ChatSummary[] {
	if (!Array.isArray(raw)) throw new MalformedPayloadError("expected an array of chats");
	return raw.map(decodeChatSummary);
}

export function decodeRealtimeEnvelope(raw: unknown): RealtimeEnvelope {
	if (!isObject(raw)) throw new MalformedPayloadError("envelope must be an object");
	switch (raw.type) {
		case "message_received":
			return { type: "message_received", message: decodeServerMessage(raw.message) };
		case "status_updated": {
			const status = parseStatus(raw.status);
			if (status === null) throw new MalformedPayloadError(`unknown status '${String(raw.status)}'`);
			return {
				type: "status_updated",
				chatId: requireString(raw, "chatId").toLowerCase(),
				serverId: requireId(raw, "messageId"),
				status
			};
		}
		case "correlation_confirmed":
			return {
				type: "correlation_confirmed",
				correlationToken: requireString(raw, "correlationId"),
				serverId: requireId(raw, "messageId"),
				chatId: typeof raw.chatId === "string" ? raw.chatId.toLowerCase() : null
			};
		case "user_typing":
			if (typeof raw.isTyping !== "boolean") throw new MalformedPayloadError("'isTyping' must be a boolean");
			return {
				type: "user_typing",
				chatId: requireString(raw, "chatId").toLowerCase(),
				userId: requireId(raw, "userId"),
				isTyping: raw.isTyping
			};
		default:
			throw new MalformedPayloadError(`unknown envelope type '${String(raw.type)}'`);
	}
}
