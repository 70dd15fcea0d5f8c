import type { ChatApi } from "../api/chat-api";
import * as cli from "../cli/ui";
import { Subscription, SubscriptionRegistry } from "../messaging/subscriptions";
import { ChatMessage, ChatSummary, MessageStatus } from "../types/message";

type SummaryInput = Pick<
	ChatMessage,
	"chatId" | "serverId" | "correlationToken" | "content" | "sentAt" | "status" | "isOwnMessage" | "isRead"
>;

interface SummaryState extends ChatSummary {
	seen: Set<string>;
	unread: Set<string>;
}

// Same identity classes as the store: one key per logical message.
function keysOf(message: Pick<SummaryInput, "serverId" | "correlationToken">): string[] {
	const keys: string[] = [];
	if (message.serverId > 0) keys.push(`id:${message.serverId}`);
	if (message.correlationToken) keys.push(`ct:${message.correlationToken}`);
	return keys;
}

/**
 * Last message, last activity and unread count per chat.
 *
 * Fed both by open sessions and by real-time traffic for chats without a
 * session, so every record call is idempotent per logical message.
 */
export class ChatSummaryTracker {
	private readonly chats = new Map<string, SummaryState>();

	/** Replaces the summary of a chat with server-provided values. */
	seed(summary: ChatSummary): void {
		this.chats.set(summary.chatId, { ...summary, seen: new Set(), unread: new Set() });
	}

	/** Seeds every chat the server lists. Transport errors propagate. */
	async load(api: Pick<ChatApi, "getChats">): Promise<number> {
		const chats = await api.getChats();
		chats.forEach((summary) => this.seed(summary));
		cli.printLog(`◇ Loaded ${chats.length} chat summaries`);
		return chats.length;
	}

	get(chatId: string): ChatSummary | null {
		const state = this.chats.get(chatId);
		return state ? this.toSummary(state) : null;
	}

	/** Most recent activity first. */
	list(): ChatSummary[] {
		return [...this.chats.values()]
			.map((s) => this.toSummary(s))
			.sort((a, b) => (b.lastMessageTime ?? -Infinity) - (a.lastMessageTime ?? -Infinity));
	}

	/** A message of `chatId` was inserted somewhere. Returns false when already counted. */
	recordInserted(message: SummaryInput): boolean {
		const state = this.stateFor(message.chatId);
		const keys = keysOf(message);
		if (keys.length === 0 || keys.some((k) => state.seen.has(k))) {
			keys.forEach((k) => state.seen.add(k));
			return false;
		}
		keys.forEach((k) => state.seen.add(k));

		if (state.lastMessageTime === null || message.sentAt >= state.lastMessageTime) {
			state.lastMessage = message.content;
			state.lastMessageTime = message.sentAt;
		}
		if (!message.isOwnMessage && !message.isRead && message.status !== MessageStatus.Read) {
			keys.forEach((k) => state.unread.add(k));
			state.unreadCount++;
		}
		return true;
	}

	/** A message moved to (or through) Read. */
	recordRead(message: SummaryInput): boolean {
		const state = this.chats.get(message.chatId);
		if (!state) return false;
		const keys = keysOf(message).filter((k) => state.unread.has(k));
		if (keys.length === 0) return false;
		// Drop every key of this message, including ones learned after insertion.
		keysOf(message).forEach((k) => state.unread.delete(k));
		state.unreadCount = Math.max(0, state.unreadCount - 1);
		return true;
	}

	/** A confirmation attached a server id to a locally-originated message. */
	recordIdentity(chatId: string, correlationToken: string, serverId: number): void {
		const state = this.chats.get(chatId);
		if (!state || !correlationToken || serverId <= 0) return;
		if (state.seen.has(`ct:${correlationToken}`)) state.seen.add(`id:${serverId}`);
		if (state.unread.has(`ct:${correlationToken}`)) state.unread.add(`id:${serverId}`);
	}

	/** Keeps summaries of every chat current from real-time traffic, open or not. */
	follow(events: SubscriptionRegistry, currentUserId: number | null): Subscription {
		return events.subscribe(null, {
			onMessageReceived: (message) => {
				this.recordInserted({
					chatId: message.chatId,
					serverId: message.serverId ?? 0,
					correlationToken: message.correlationToken ?? "",
					content: message.content,
					sentAt: message.sentAt,
					status: message.status,
					isOwnMessage: currentUserId !== null && message.senderId === currentUserId,
					isRead: message.isRead ?? false
				});
			},
			onCorrelationConfirmed: (token, serverId, chatId) => {
				if (chatId) this.recordIdentity(chatId, token, serverId);
			}
		});
	}

	/** The user opened the chat; nothing in it is unread any more. */
	markChatRead(chatId: string): void {
		const state = this.chats.get(chatId);
		if (!state) return;
		state.unread.clear();
		if (state.unreadCount !== 0) cli.printLog(`◇ Chat ${chatId} unread ${state.unreadCount}→0`);
		state.unreadCount = 0;
	}

	private stateFor(chatId: string): SummaryState {
		let state = this.chats.get(chatId);
		if (!state) {
			state = { chatId, lastMessage: null, lastMessageTime: null, unreadCount: 0, seen: new Set(), unread: new Set() };
			this.chats.set(chatId, state);
		}
		return state;
	}

	private toSummary(state: SummaryState): ChatSummary {
		return {
			chatId: state.chatId,
			lastMessage: state.lastMessage,
			lastMessageTime: state.lastMessageTime,
			unreadCount: state.unreadCount
		};
	}
}
