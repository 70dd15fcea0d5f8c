import * as cli from "../cli/ui";
import { describeError } from "../errors";
import { IncomingMessage, MessageStatus } from "../types/message";

export interface RealtimeHandlers {
	onMessageReceived?: (message: IncomingMessage) => void;
	onStatusUpdated?: (chatId: string, serverId: number, status: MessageStatus) => void;
	onCorrelationConfirmed?: (correlationToken: string, serverId: number, chatId: string | null) => void;
	onConnectionStateChanged?: (isConnected: boolean) => void;
	onUserTyping?: (chatId: string, userId: number, isTyping: boolean) => void;
}

export interface Subscription {
	readonly chatId: string | null;
	readonly active: boolean;
	/** Idempotent; returns false when already unsubscribed. */
	unsubscribe(): boolean;
}

interface Entry {
	id: number;
	chatId: string | null; // null = every chat
	handlers: RealtimeHandlers;
}

/**
 * Registry of sessions listening to one shared real-time channel.
 *
 * The channel publishes into it; each session holds the `Subscription` it got
 * back and releases it at teardown.
 */
export class SubscriptionRegistry {
	private readonly entries = new Map<number, Entry>();
	private nextId = 1;

	get size(): number {
		return this.entries.size;
	}

	subscribe(chatId: string | null, handlers: RealtimeHandlers): Subscription {
		const id = this.nextId++;
		this.entries.set(id, { id, chatId, handlers });
		cli.printLog(`◇ Subscribed #${id} to ${chatId ?? "all chats"}`);

		const entries = this.entries;
		return {
			chatId,
			get active() {
				return entries.has(id);
			},
			unsubscribe: () => {
				if (!this.entries.delete(id)) return false;
				cli.printLog(`◇ Unsubscribed #${id} from ${chatId ?? "all chats"}`);
				return true;
			}
		};
	}

	emitMessageReceived(message: IncomingMessage): void {
		this.dispatch(message.chatId, "message_received", (h) => h.onMessageReceived?.(message));
	}

	emitStatusUpdated(chatId: string, serverId: number, status: MessageStatus): void {
		this.dispatch(chatId, "status_updated", (h) => h.onStatusUpdated?.(chatId, serverId, status));
	}

	emitCorrelationConfirmed(correlationToken: string, serverId: number, chatId: string | null): void {
		this.dispatch(chatId, "correlation_confirmed", (h) => h.onCorrelationConfirmed?.(correlationToken, serverId, chatId));
	}

	emitConnectionStateChanged(isConnected: boolean): void {
		this.dispatch(null, "connection_state", (h) => h.onConnectionStateChanged?.(isConnected));
	}

	emitUserTyping(chatId: string, userId: number, isTyping: boolean): void {
		this.dispatch(chatId, "user_typing", (h) => h.onUserTyping?.(chatId, userId, isTyping));
	}

	// A null chatId reaches every subscriber.
	private dispatch(chatId: string | null, event: string, call: (handlers: RealtimeHandlers) => void): void {
		// Snapshot: handlers may unsubscribe while being called.
		for (const entry of [...this.entries.values()]) {
			if (chatId !== null && entry.chatId !== null && entry.chatId !== chatId) continue;
			if (!this.entries.has(entry.id)) continue;
			try {
				call(entry.handlers);
			} catch (error) {
				cli.printError(`Subscriber #${entry.id} failed handling ${event}: ${describeError(error)}`);
			}
		}
	}
}
