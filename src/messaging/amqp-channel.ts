import * as cli from "../cli/ui";
import config from "../config";
import constants from "../constants";
import { TransportError, describeError } from "../errors";
import { IncomingMessage, OutgoingMessage } from "../types/message";
import { RealtimeEnvelope, decodeRealtimeEnvelope } from "./codec";
import RabbitMQPublisher, { EgressPublisher } from "./publisher";
import { RealtimeChannel } from "./realtime-channel";
import RabbitMQSubscriber, { IngressSubscriber } from "./subscriber";
import { SubscriptionRegistry } from "./subscriptions";

const PROCESSED_KEY_LIMIT = 5000;

function safeQueueSuffix(value: string): string {
	return value.replace(/[^A-Za-z0-9._-]/g, "_");
}

/**
 * Real-time channel over a topic-exchange broker.
 *
 * Outgoing actions go to the egress exchange as `chat.<chatId>.<action>`;
 * server events arrive on a durable per-user queue bound to the ingress
 * exchange and are fanned out through `events`.
 */
export class AmqpRealtimeChannel implements RealtimeChannel {
	readonly events = new SubscriptionRegistry();

	private connected = false;
	private connecting: Promise<void> | null = null;
	private readonly processed = new Set<string>();

	constructor(
		private readonly publisher: EgressPublisher,
		private readonly subscriber: IngressSubscriber,
		private readonly queueName: string
	) {
		publisher.onDisconnect(() => this.setConnected(false));
		subscriber.onDisconnect(() => this.setConnected(false));
	}

	static fromConfig(userId: string | undefined = config.currentUserId): AmqpRealtimeChannel {
		const queueName = `${constants.ingressQueuePrefix}.${safeQueueSuffix(userId || "anonymous")}`;
		return new AmqpRealtimeChannel(
			new RabbitMQPublisher(config.chatBrokerUrl),
			new RabbitMQSubscriber(config.chatBrokerUrl),
			queueName
		);
	}

	get isConnected(): boolean {
		return this.connected;
	}

	connect(): Promise<void> {
		if (this.connected) return Promise.resolve();
		if (!this.connecting) {
			this.connecting = this.open().finally(() => {
				this.connecting = null;
			});
		}
		return this.connecting;
	}

	async disconnect(): Promise<void> {
		try {
			await this.publisher.close();
			await this.subscriber.close();
		} finally {
			this.setConnected(false);
		}
	}

	async send(message: OutgoingMessage): Promise<boolean> {
		return this.publish(message.chatId, "send", {
			type: "send_message",
			chatId: message.chatId,
			senderId: message.senderId,
			content: message.content,
			correlationId: message.correlationToken,
			sentAt: new Date(message.sentAt).toISOString()
		});
	}

	async markAsRead(chatId: string, serverId: number): Promise<boolean> {
		return this.publish(chatId, "read", { type: "mark_read", chatId, messageId: serverId });
	}

	async sendTyping(chatId: string, isTyping: boolean): Promise<void> {
		await this.publish(chatId, "typing", { type: "typing", chatId, isTyping });
	}

	/** Forgets which deliveries were already seen; call when switching chats. */
	clearProcessed(): void {
		cli.printLog(`◇ Cleared ${this.processed.size} processed message keys`);
		this.processed.clear();
	}

	/** Decodes one broker delivery and publishes it to subscribers. */
	handleDelivery(content: Buffer): void {
		let raw: unknown;
		try {
			raw = JSON.parse(content.toString("utf-8"));
		} catch (error) {
			cli.printWarning(`Dropping undecodable real-time delivery: ${describeError(error)}`);
			return;
		}

		let envelope: RealtimeEnvelope;
		try {
			envelope = decodeRealtimeEnvelope(raw);
		} catch (error) {
			cli.printWarning(`Dropping malformed real-time envelope: ${describeError(error)}`);
			return;
		}

		switch (envelope.type) {
			case "message_received":
				if (this.seen(envelope.message)) {
					cli.printLog(`◇ Duplicate delivery of message ${envelope.message.serverId} ignored`);
					return;
				}
				this.events.emitMessageReceived(envelope.message);
				return;
			case "status_updated":
				this.events.emitStatusUpdated(envelope.chatId, envelope.serverId, envelope.status);
				return;
			case "correlation_confirmed":
				this.events.emitCorrelationConfirmed(envelope.correlationToken, envelope.serverId, envelope.chatId);
				return;
			case "user_typing":
				this.events.emitUserTyping(envelope.chatId, envelope.userId, envelope.isTyping);
				return;
		}
	}

	private async open(): Promise<void> {
		try {
			await this.publisher.connect();
			await this.subscriber.connect();
			const queue = await this.subscriber.bindTopic(constants.ingressExchange, constants.ingressBinding, this.queueName);
			await this.subscriber.consume(queue, (content) => this.handleDelivery(content));
		} catch (error) {
			await this.closeQuietly();
			throw new TransportError(`Real-time connect failed: ${describeError(error)}`, error);
		}
		cli.print(`Real-time channel connected (queue ${this.queueName})`);
		this.setConnected(true);
	}

	private async closeQuietly(): Promise<void> {
		for (const half of [this.publisher, this.subscriber]) {
			try {
				await half.close();
			} catch (error) {
				cli.printLog(`◇ Ignoring close error after failed connect: ${describeError(error)}`);
			}
		}
	}

	private async publish(chatId: string, action: "send" | "read" | "typing", body: object): Promise<boolean> {
		if (!this.connected) throw new TransportError("Real-time channel is not connected");
		return this.publisher.publishTopic(constants.egressExchange, `chat.${chatId}.${action}`, body);
	}

	private seen(message: IncomingMessage): boolean {
		const key = `${message.chatId}:${message.serverId ?? 0}`;
		if (this.processed.has(key)) return true;
		this.processed.add(key);
		if (this.processed.size > PROCESSED_KEY_LIMIT) {
			const oldest = this.processed.values().next();
			if (!oldest.done) this.processed.delete(oldest.value);
		}
		return false;
	}

	private setConnected(isConnected: boolean): void {
		if (this.connected === isConnected) return;
		this.connected = isConnected;
		this.events.emitConnectionStateChanged(isConnected);
	}
}
