import { connect, ChannelModel, Channel, ConsumeMessage } from "amqplib";
import * as cli from "../cli/ui";
import constants from "../constants";
import { describeError } from "../errors";

/** Incoming half of the broker connection. */
export interface IngressSubscriber {
	readonly isConnected: boolean;
	connect(): Promise<void>;
	bindTopic(exchange: string, bindingKey: string, queueName: string): Promise<string>;
	/** A handler that throws dead-letters the delivery; returning acks it. */
	consume(queueName: string, handler: (content: Buffer) => Promise<void> | void): Promise<void>;
	close(): Promise<void>;
	onDisconnect(listener: () => void): void;
}

class RabbitMQSubscriber implements IngressSubscriber {
	private connection: ChannelModel | null = null;
	private channel: Channel | null = null;
	private readonly disconnectListeners: Array<() => void> = [];

	constructor(private uri: string) {}

	get isConnected(): boolean {
		return this.channel !== null;
	}

	onDisconnect(listener: () => void): void {
		this.disconnectListeners.push(listener);
	}

	public async connect(): Promise<void> {
		const connection = await connect(this.uri);
		connection.on("error", (error: unknown) => cli.printError(`Subscriber connection error: ${describeError(error)}`));
		connection.on("close", () => this.handleClose());
		this.connection = connection;
		this.channel = await connection.createChannel();
		// give the consumer some headroom
		await this.channel.prefetch(constants.prefetch);
	}

	// Bind to a topic exchange with a binding key on a durable named queue
	public async bindTopic(exchange: string, bindingKey: string, queueName: string): Promise<string> {
		const channel = this.requireChannel("bind topic");
		await channel.assertExchange(exchange, "topic", { durable: true });
		const q = await channel.assertQueue(queueName, { durable: true, autoDelete: false });
		await channel.bindQueue(q.queue, exchange, bindingKey);
		cli.printLog(`◇ Bound ${q.queue} to ${exchange} (${bindingKey})`);
		return q.queue;
	}

	public async consume(queueName: string, handler: (content: Buffer) => Promise<void> | void): Promise<void> {
		const channel = this.requireChannel("consume");
		await channel.consume(
			queueName,
			async (message: ConsumeMessage | null) => {
				if (!message) return; // consumer cancelled by the broker
				try {
					await handler(message.content);
					channel.ack(message);
				} catch (error) {
					cli.printError(`Dead-lettering delivery from ${queueName}: ${describeError(error)}`);
					// Dead-letter by not requeueing
					channel.nack(message, false, false);
				}
			},
			{ noAck: false }
		);
	}

	public async close(): Promise<void> {
		const { channel, connection } = this;
		this.channel = null;
		this.connection = null;
		if (channel) {
			await channel.close();
		}
		if (connection) {
			await connection.close();
		}
	}

	private requireChannel(action: string): Channel {
		if (!this.channel) {
			throw new Error(`Cannot ${action}, channel is not initialized.`);
		}
		return this.channel;
	}

	private handleClose(): void {
		if (!this.connection) return;
		this.connection = null;
		this.channel = null;
		cli.printWarning("Subscriber connection closed");
		this.disconnectListeners.forEach((listener) => listener());
	}
}

export default RabbitMQSubscriber;
