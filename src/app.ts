import { HttpChatApi } from "./api/chat-api";
import { EnvCurrentUserProvider } from "./auth/current-user";
import { ChatSummaryTracker } from "./handlers/chat-summary";
import { CliNotifier } from "./handlers/notifier";
import { ReconciliationEngine } from "./handlers/reconciler";
import { statusToString } from "./handlers/status";
import { AmqpRealtimeChannel } from "./messaging/amqp-channel";
import { Subscription } from "./messaging/subscriptions";
import { ChatMessage } from "./types/message";
import { SessionChange } from "./types/reconcile";
import { formatDate, parseUserId } from "./utils";
import { describeError } from "./errors";
import * as cli from "./cli/ui";
import config from "./config";
import validateConfig from "./config_validate";

export type LineResult = "continue" | "quit";

function renderMessage(message: ChatMessage): string {
	const who = message.isOwnMessage ? "me" : message.senderName || `user ${message.senderId}`;
	const id = message.serverId > 0 ? `#${message.serverId}` : message.correlationToken.substring(0, 8);
	return `${formatDate(message.sentAt)} ${who}: ${message.content} [${statusToString(message.status)} ${id}]`;
}

/**
 * Terminal front end: wires the broker channel, the HTTP API and the engine,
 * prints session changes and maps typed lines to engine operations.
 */
export class ChatReconcilerApp {
	readonly summaries = new ChatSummaryTracker();
	private channel: AmqpRealtimeChannel | null = null;
	private engine: ReconciliationEngine | null = null;
	private summaryFeed: Subscription | null = null;
	private shuttingDown = false;

	/**
	 * Start the application
	 */
	async start(): Promise<void> {
		cli.printIntro();
		validateConfig();
		cli.printLog(`Chat API URL: ${config.chatApiUrl}`);
		cli.printLog(`Chat Broker URL: ${config.chatBrokerUrl}`);
		cli.printLog(`Chat User: ${config.currentUserId ?? "(none)"}`);

		const channel = AmqpRealtimeChannel.fromConfig();
		const api = HttpChatApi.fromConfig();
		const engine = new ReconciliationEngine({
			channel,
			api,
			users: new EnvCurrentUserProvider(),
			notifier: new CliNotifier(),
			summaries: this.summaries
		});
		engine.onChange((change) => this.render(change));
		this.channel = channel;
		this.engine = engine;

		try {
			await channel.connect();
		} catch (error) {
			cli.printWarning(`Starting without real-time updates: ${describeError(error)}`);
		}
		this.summaryFeed = this.summaries.follow(channel.events, parseUserId(config.currentUserId));
		try {
			const count = await this.summaries.load(api);
			cli.print(`Loaded ${count} chats`);
		} catch (error) {
			cli.printWarning(`Chat list unavailable: ${describeError(error)}`);
		}

		if (config.startupChatId) await this.open(config.startupChatId);

		cli.printOutro();
		cli.printUsage();
	}

	/**
	 * Handle one line typed by the user
	 */
	async handleLine(line: string): Promise<LineResult> {
		const engine = this.engine;
		if (!engine) {
			cli.printError("Application is not started");
			return "continue";
		}
		const text = line.trim();
		if (!text) return "continue";
		if (!text.startsWith("/")) {
			const sent = engine.sendMessage(text);
			if (!sent.ok) cli.printWarning(sent.error.message);
			return "continue";
		}

		const [command, ...args] = text.split(/\s+/);
		switch (command.toLowerCase()) {
			case "/open":
				await this.open(args[0] ?? "");
				break;
			case "/more": {
				const result = await engine.loadOlderMessages();
				if (result.ok) cli.print(`Loaded ${result.added} older messages${result.canLoadMore ? "" : " (start of chat)"}`);
				break;
			}
			case "/read":
				await engine.markAllAsRead();
				break;
			case "/retry": {
				const result = engine.retryFailed(args[0] ?? "");
				if (!result.ok) cli.printWarning(result.error.message);
				break;
			}
			case "/chats":
				for (const summary of this.summaries.list()) {
					cli.print(`${summary.chatId} (${summary.unreadCount} unread) ${summary.lastMessage ?? ""}`);
				}
				break;
			case "/quit":
				return "quit";
			default:
				cli.printUsage();
		}
		return "continue";
	}

	private async open(rawChatId: string): Promise<void> {
		const engine = this.engine;
		if (!engine) return;
		if (engine.chatId && engine.chatId !== rawChatId.toLowerCase()) this.channel?.clearProcessed();
		const result = await engine.openChat(rawChatId);
		if (result.ok) {
			for (const message of engine.snapshot().messages) cli.print(renderMessage(message));
		}
	}

	private render(change: SessionChange): void {
		switch (change.type) {
			case "inserted":
				cli.print(renderMessage(change.message));
				break;
			case "updated":
				cli.printLog(`◇ ${renderMessage(change.message)}`);
				break;
			case "removed":
				cli.printLog(`◇ Removed failed message ${change.correlationToken}`);
				break;
			case "connection":
				cli.print(change.isConnected ? "Real-time updates on" : "Real-time updates off, sending over the API");
				break;
			case "typing":
				if (change.userIds.length > 0) cli.print(`Typing: ${change.userIds.map((id) => `user ${id}`).join(", ")}`);
				break;
			default:
				break;
		}
	}

	/**
	 * Gracefully shutdown the application
	 */
	async shutdown(): Promise<void> {
		if (this.shuttingDown) return;
		this.shuttingDown = true;

		if (this.engine) {
			this.engine.close();
			await this.engine.idle();
		}
		this.summaryFeed?.unsubscribe();
		if (this.channel) {
			try {
				await this.channel.disconnect();
			} catch (error) {
				cli.printWarning(`Broker disconnect failed: ${describeError(error)}`);
			}
		}
	}
}
