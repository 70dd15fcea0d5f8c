import type { DeliveryPath, DispatchOutcome } from "../handlers/dispatcher";
import type { ReconcilerError } from "../errors";
import { ChatMessage, IncomingMessage, MessageStatus } from "./message";

// Everything that can change a session, as one discriminated union.
export type ReconcileEvent =
	| { type: "UserSubmit"; content: string }
	| { type: "DispatchSucceeded"; correlationToken: string; serverMessage: IncomingMessage | null }
	| { type: "DispatchFailed"; correlationToken: string; error?: ReconcilerError }
	| { type: "RealtimeMessageReceived"; message: IncomingMessage }
	| { type: "RealtimeStatusUpdated"; chatId: string; serverId: number; status: MessageStatus }
	| { type: "RealtimeCorrelationConfirmed"; correlationToken: string; serverId: number; chatId?: string | null }
	| { type: "RealtimeConnectionChanged"; isConnected: boolean }
	| { type: "RealtimeUserTyping"; chatId: string; userId: number; isTyping: boolean }
	| { type: "LoadOlderMessages"; pageSize?: number; beforeCount?: number }
	| { type: "MarkVisibleAsRead"; messageIds: number[] };

export type SessionChange =
	| { type: "reset"; chatId: string | null }
	| { type: "inserted"; message: ChatMessage }
	| { type: "updated"; message: ChatMessage; previousStatus: MessageStatus | null }
	| { type: "removed"; correlationToken: string }
	| { type: "page"; messages: ChatMessage[]; added: number; canLoadMore: boolean }
	| { type: "loading"; isLoadingOlder: boolean }
	| { type: "connection"; isConnected: boolean }
	| { type: "typing"; userIds: number[] }
	| { type: "identity"; currentUserId: number | null };

export type SessionListener = (change: SessionChange) => void;

export interface SessionState {
	chatId: string | null;
	messages: ChatMessage[];
	canLoadMore: boolean;
	isLoadingOlder: boolean;
	isConnected: boolean;
	typingUserIds: number[];
	currentUserId: number | null;
}

export type OpenChatResult =
	| { ok: true; chatId: string; loaded: number }
	| { ok: false; chatId: string | null; error: ReconcilerError };

export type SendResult =
	| { ok: true; message: ChatMessage; delivery: Promise<DispatchOutcome> }
	| { ok: false; error: ReconcilerError };

export type LoadOlderResult =
	| { ok: true; added: number; canLoadMore: boolean }
	| { ok: false; error: ReconcilerError };

export interface MarkReadOutcome {
	serverId: number;
	ok: boolean;
	via: DeliveryPath | null;
}

export type MarkReadResult =
	| { ok: true; outcomes: MarkReadOutcome[] }
	| { ok: false; error: ReconcilerError };
