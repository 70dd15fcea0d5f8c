import { OutgoingMessage } from "../types/message";
import { SubscriptionRegistry } from "./subscriptions";

/**
 * Low-latency, process-wide channel shared by every chat session.
 * Inbound events are published into `events`.
 */
export interface RealtimeChannel {
	readonly isConnected: boolean;
	readonly events: SubscriptionRegistry;
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	/** Resolves true when the channel accepted the message. */
	send(message: OutgoingMessage): Promise<boolean>;
	markAsRead(chatId: string, serverId: number): Promise<boolean>;
	sendTyping(chatId: string, isTyping: boolean): Promise<void>;
}
