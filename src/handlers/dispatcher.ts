import { v4 as uuidv4 } from "uuid";
import * as cli from "../cli/ui";
import { ChatApi } from "../api/chat-api";
import { ReconcilerError, TransportError, describeError } from "../errors";
import { RealtimeChannel } from "../messaging/realtime-channel";
import { ChatMessage, IncomingMessage, MessageStatus, OutgoingMessage } from "../types/message";
import { withTimeout } from "../utils";

export type DeliveryPath = "realtime" | "api";

export type DispatchOutcome =
	| {
			ok: true;
			correlationToken: string;
			via: DeliveryPath;
			// Server copy when the path returns one; the real-time path confirms later by event.
			confirmed: IncomingMessage | null;
	  }
	| {
			ok: false;
			correlationToken: string;
			error: ReconcilerError;
	  };

export interface DeliveryDispatcherOptions {
	realtimeTimeoutMs: number;
	now?: () => number;
	newCorrelationToken?: () => string;
}

/**
 * Real-time first, request/response second. Each dispatch is an independent
 * promise, so one message's timeout never holds up another's.
 */
export class DeliveryDispatcher {
	private readonly realtimeTimeoutMs: number;
	private readonly now: () => number;
	private readonly newCorrelationToken: () => string;

	constructor(
		private readonly channel: RealtimeChannel,
		private readonly api: ChatApi,
		options: DeliveryDispatcherOptions
	) {
		this.realtimeTimeoutMs = options.realtimeTimeoutMs;
		this.now = options.now ?? Date.now;
		this.newCorrelationToken = options.newCorrelationToken ?? uuidv4;
	}

	/** Immediate: the placeholder shown before any I/O happens. */
	createOptimistic(chatId: string, senderId: number, content: string): ChatMessage {
		return {
			correlationToken: this.newCorrelationToken(),
			serverId: 0,
			chatId,
			senderId,
			senderName: "",
			content,
			sentAt: this.now(),
			status: MessageStatus.Sending,
			isRead: false,
			readAt: null,
			isOwnMessage: true
		};
	}

	send(chatId: string, senderId: number, content: string): { message: ChatMessage; outcome: Promise<DispatchOutcome> } {
		const message = this.createOptimistic(chatId, senderId, content);
		return { message, outcome: this.dispatch(message) };
	}

	/** Never rejects; failures come back as `ok: false`. */
	async dispatch(message: Pick<ChatMessage, "correlationToken" | "chatId" | "senderId" | "content" | "sentAt">): Promise<DispatchOutcome> {
		const { correlationToken, chatId } = message;

		if (await this.tryRealtime(message)) {
			return { ok: true, correlationToken, via: "realtime", confirmed: null };
		}

		try {
			const confirmed = await this.api.sendMessage(chatId, message.content, correlationToken);
			if (!confirmed) {
				return { ok: false, correlationToken, error: new TransportError(`Server refused message ${correlationToken}`) };
			}
			cli.printLog(`◇ Sent ${correlationToken} via API → serverId=${confirmed.serverId}`);
			return { ok: true, correlationToken, via: "api", confirmed: { ...confirmed, correlationToken } };
		} catch (error) {
			cli.printError(`Send ${correlationToken} to chat ${chatId} failed on both paths: ${describeError(error)}`);
			return {
				ok: false,
				correlationToken,
				error: error instanceof ReconcilerError ? error : new TransportError(describeError(error), error)
			};
		}
	}

	private async tryRealtime(message: Pick<ChatMessage, "correlationToken" | "chatId" | "senderId" | "content" | "sentAt">): Promise<boolean> {
		if (!this.channel.isConnected) {
			cli.printLog(`◇ Real-time channel down, sending ${message.correlationToken} via API`);
			return false;
		}
		const outgoing: OutgoingMessage = {
			correlationToken: message.correlationToken,
			chatId: message.chatId,
			senderId: message.senderId,
			content: message.content,
			sentAt: message.sentAt
		};
		try {
			const accepted = await withTimeout(this.channel.send(outgoing), this.realtimeTimeoutMs, `Real-time send ${message.correlationToken}`);
			if (!accepted) cli.printWarning(`Real-time channel rejected ${message.correlationToken}, falling back to API`);
			else cli.printLog(`◇ Sent ${message.correlationToken} via real-time channel`);
			return accepted;
		} catch (error) {
			cli.printWarning(`Real-time send of ${message.correlationToken} failed (${describeError(error)}), falling back to API`);
			return false;
		}
	}
}
