// src/messaging/publisher.ts
import { connect, Options } from "amqplib";
import * as cli from "../cli/ui";
import { describeError } from "../errors";

/** Outgoing half of the broker connection. */
export interface EgressPublisher {
	readonly isConnected: boolean;
	connect(): Promise<void>;
	/** Resolves true once the broker confirmed the message. */
	publishTopic(exchange: string, routingKey: string, body: object): Promise<boolean>;
	close(): Promise<void>;
	onDisconnect(listener: () => void): void;
}

// The parts of an amqplib confirm channel and connection the publisher uses.
export interface ConfirmPublishChannel {
	assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
	publish(exchange: string, routingKey: string, content: Buffer, options: Options.Publish, callback: (error: unknown) => void): boolean;
	once(event: "drain", listener: () => void): unknown;
	close(): Promise<void>;
}

export interface BrokerConnection {
	on(event: "error" | "close", listener: (error?: unknown) => void): unknown;
	createConfirmChannel(): Promise<ConfirmPublishChannel>;
	close(): Promise<void>;
}

export type BrokerConnector = (uri: string) => Promise<BrokerConnection>;

class RabbitMQPublisher implements EgressPublisher {
	private connection: BrokerConnection | null = null;
	private channel: ConfirmPublishChannel | null = null;
	private drain: { promise: Promise<void>; release: () => void } | null = null;
	private readonly exchanges = new Set<string>();
	private readonly disconnectListeners: Array<() => void> = [];

	constructor(private uri: string, private readonly openConnection: BrokerConnector = connect) {}

	get isConnected(): boolean {
		return this.channel !== null;
	}

	onDisconnect(listener: () => void): void {
		this.disconnectListeners.push(listener);
	}

	async connect(): Promise<void> {
		const connection = await this.openConnection(this.uri);
		connection.on("error", (error) => cli.printError(`Publisher connection error: ${describeError(error)}`));
		connection.on("close", () => this.handleClose());
		this.connection = connection;
		// confirm channel: a publish settles only once the broker has it
		this.channel = await connection.createConfirmChannel();
		this.exchanges.clear();
	}

	async publishTopic(exchange: string, routingKey: string, body: object): Promise<boolean> {
		const channel = this.channel;
		if (!channel) throw new Error("Cannot publish, channel is not initialized.");
		if (!this.exchanges.has(exchange)) {
			await channel.assertExchange(exchange, "topic", { durable: true });
			this.exchanges.add(exchange);
		}
		if (this.drain) {
			await this.drain.promise;
			if (this.channel !== channel) throw new Error("Cannot publish, channel closed while waiting for drain.");
		}
		const buffer = Buffer.from(JSON.stringify(body));
		return new Promise<boolean>((resolve) => {
			const written = channel.publish(exchange, routingKey, buffer, { persistent: true, contentType: "application/json" }, (error) => {
				if (error) cli.printWarning(`Broker nacked ${routingKey}: ${describeError(error)}`);
				resolve(!error);
			});
			if (!written) {
				cli.printWarning(`Egress buffer full after ${routingKey}, holding publishes until drain`);
				this.holdUntilDrain(channel);
			}
		});
	}

	async close(): Promise<void> {
		const { channel, connection } = this;
		this.channel = null;
		this.connection = null;
		this.drain?.release();
		if (channel) await channel.close();
		if (connection) await connection.close();
	}

	private holdUntilDrain(channel: ConfirmPublishChannel): void {
		if (this.drain) return;
		let resolve: () => void = () => undefined;
		const promise = new Promise<void>((r) => {
			resolve = r;
		});
		const drain = {
			promise,
			release: () => {
				if (this.drain === drain) this.drain = null;
				resolve();
			}
		};
		this.drain = drain;
		channel.once("drain", drain.release);
	}

	private handleClose(): void {
		if (!this.connection) return;
		this.connection = null;
		this.channel = null;
		this.drain?.release();
		cli.printWarning("Publisher connection closed");
		this.disconnectListeners.forEach((listener) => listener());
	}
}

export default RabbitMQPublisher;
