import * as cli from "../cli/ui";
import config from "../config";
import { ChatApi } from "../api/chat-api";
import { CurrentUserProvider } from "../auth/current-user";
import {
	AuthUnavailableError,
	CancelledError,
	InvalidChatIdError,
	ReconcilerError,
	TransportError,
	describeError
} from "../errors";
import { RealtimeChannel } from "../messaging/realtime-channel";
import { Subscription } from "../messaging/subscriptions";
import { ChatMessage, IncomingMessage, MessageStatus } from "../types/message";
import {
	LoadOlderResult,
	MarkReadOutcome,
	MarkReadResult,
	OpenChatResult,
	ReconcileEvent,
	SendResult,
	SessionChange,
	SessionListener,
	SessionState
} from "../types/reconcile";
import { parseChatId, withTimeout } from "../utils";
import { ChatSummaryTracker } from "./chat-summary";
import { DeliveryDispatcher, DispatchOutcome } from "./dispatcher";
import { MessageIdentityResolver } from "./identity";
import { MessageStore, UpsertResult } from "./message-store";
import { Notifier } from "./notifier";
import { canFail } from "./status";

export interface ReconcilerOptions {
	realtimeSendTimeoutMs: number;
	markReadTimeoutMs: number;
	failedEvictionMs: number;
	heuristicMatchWindowMs: number;
	initialPageSize: number;
	pageSize: number;
}

export interface ReconciliationEngineDeps {
	channel: RealtimeChannel;
	api: ChatApi;
	users: CurrentUserProvider;
	notifier: Notifier;
	summaries?: ChatSummaryTracker;
	options?: Partial<ReconcilerOptions>;
	now?: () => number;
	newCorrelationToken?: () => string;
}

interface Session {
	chatId: string;
	generation: number;
	store: MessageStore;
	subscription: Subscription;
	loaded: boolean;
}

function defaultOptions(): ReconcilerOptions {
	return {
		realtimeSendTimeoutMs: config.realtimeSendTimeoutMs,
		markReadTimeoutMs: config.markReadTimeoutMs,
		failedEvictionMs: config.failedEvictionMs,
		heuristicMatchWindowMs: config.heuristicMatchWindowMs,
		initialPageSize: config.initialPageSize,
		pageSize: config.pageSize
	};
}

function asReconcilerError(error: unknown): ReconcilerError {
	return error instanceof ReconcilerError ? error : new TransportError(describeError(error), error);
}

/**
 * Owns the message store of the open chat and turns every user action,
 * dispatch outcome and real-time event into store mutations.
 *
 * Nothing thrown by a collaborator escapes a public method: failures come
 * back in result objects and as notifications.
 */
export class ReconciliationEngine {
	private readonly channel: RealtimeChannel;
	private readonly api: ChatApi;
	private readonly users: CurrentUserProvider;
	private readonly notifier: Notifier;
	private readonly summaries: ChatSummaryTracker | null;
	private readonly options: ReconcilerOptions;
	private readonly now: () => number;
	private readonly resolver: MessageIdentityResolver;
	private readonly dispatcher: DeliveryDispatcher;

	private session: Session | null = null;
	private generation = 0;
	private currentUserId: number | null = null;
	private isConnected = false;
	private canLoadMore = true;
	private localTyping = false;
	private readonly typing = new Set<number>();

	private opening: { chatId: string; promise: Promise<OpenChatResult> } | null = null;
	// Bumped by close(); an open queued before it never starts.
	private closes = 0;
	private loadingOlder: Promise<LoadOlderResult> | null = null;
	private olderAbort: AbortController | null = null;

	private readonly evictions = new Map<string, NodeJS.Timeout>();
	private readonly pending = new Set<Promise<void>>();
	private readonly listeners = new Set<SessionListener>();

	constructor(deps: ReconciliationEngineDeps) {
		this.channel = deps.channel;
		this.api = deps.api;
		this.users = deps.users;
		this.notifier = deps.notifier;
		this.summaries = deps.summaries ?? null;
		this.options = { ...defaultOptions(), ...deps.options };
		this.now = deps.now ?? Date.now;
		this.resolver = new MessageIdentityResolver(this.options.heuristicMatchWindowMs);
		this.dispatcher = new DeliveryDispatcher(this.channel, this.api, {
			realtimeTimeoutMs: this.options.realtimeSendTimeoutMs,
			now: this.now,
			newCorrelationToken: deps.newCorrelationToken
		});
		this.isConnected = this.channel.isConnected;
	}

	get chatId(): string | null {
		return this.session?.chatId ?? null;
	}

	onChange(listener: SessionListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	snapshot(): SessionState {
		return {
			chatId: this.chatId,
			messages: this.session ? this.session.store.snapshot() : [],
			canLoadMore: this.canLoadMore,
			isLoadingOlder: this.loadingOlder !== null,
			isConnected: this.isConnected,
			typingUserIds: [...this.typing].sort((a, b) => a - b),
			currentUserId: this.currentUserId
		};
	}

	/** Resolves once every background dispatch and read receipt has settled. */
	async idle(): Promise<void> {
		while (this.pending.size > 0) {
			await Promise.all([...this.pending]);
		}
	}

	async apply(event: ReconcileEvent): Promise<void> {
		switch (event.type) {
			case "UserSubmit":
				this.sendMessage(event.content);
				return;
			case "DispatchSucceeded":
				this.handleDispatchSucceeded(event.correlationToken, event.serverMessage);
				return;
			case "DispatchFailed":
				this.handleDispatchFailed(event.correlationToken, event.error ?? new TransportError("Dispatch failed"));
				return;
			case "RealtimeMessageReceived":
				this.handleMessageReceived(event.message);
				return;
			case "RealtimeStatusUpdated":
				this.handleStatusUpdated(event.chatId, event.serverId, event.status);
				return;
			case "RealtimeCorrelationConfirmed":
				this.handleCorrelationConfirmed(event.correlationToken, event.serverId, event.chatId ?? null);
				return;
			case "RealtimeConnectionChanged":
				this.handleConnectionChanged(event.isConnected);
				return;
			case "RealtimeUserTyping":
				this.handleUserTyping(event.chatId, event.userId, event.isTyping);
				return;
			case "LoadOlderMessages":
				await this.loadOlderMessages(event.pageSize, event.beforeCount);
				return;
			case "MarkVisibleAsRead":
				await this.markVisibleAsRead(event.messageIds);
				return;
		}
	}

	// ── Session lifecycle ───────────────────────────────────────────────

	/**
	 * Opens `rawChatId`, replacing any open chat. Concurrent opens of the same
	 * chat share one load; an open of another chat waits for it to settle.
	 */
	async openChat(rawChatId: string): Promise<OpenChatResult> {
		const chatId = parseChatId(rawChatId);
		if (!chatId) {
			const error = new InvalidChatIdError(rawChatId);
			cli.printError(error.message);
			this.notify("error", "Invalid chat reference", null);
			return { ok: false, chatId: null, error };
		}

		if (this.opening && this.opening.chatId === chatId) return this.opening.promise;
		if (!this.opening && this.session && this.session.chatId === chatId && this.session.loaded) {
			return { ok: true, chatId, loaded: 0 };
		}

		const previous: Promise<unknown> = this.opening ? this.opening.promise : Promise.resolve();
		const closes = this.closes;
		const entry: { chatId: string; promise: Promise<OpenChatResult> } = {
			chatId,
			promise: previous
				.then(() => (closes === this.closes ? this.initialize(chatId) : this.superseded(chatId, "Opening chat")))
				.finally(() => {
					if (this.opening === entry) this.opening = null;
				})
		};
		this.opening = entry;
		return entry.promise;
	}

	/** Tears the open chat down. Idempotent. */
	close(): void {
		if (!this.session && !this.opening && this.evictions.size === 0) return;
		this.closes++;
		this.opening = null;
		this.resetSession(null);
	}

	private async initialize(chatId: string): Promise<OpenChatResult> {
		const session = this.resetSession(chatId);
		const generation = session.generation;
		cli.print(`Opening chat ${chatId}`);

		try {
			await this.refreshCurrentUser();
			if (this.isStale(generation)) return this.superseded(chatId, "Opening chat");
			if (this.currentUserId === null) {
				this.notify("warning", "Not signed in: chat is read-only", chatId);
			}

			if (!this.channel.isConnected) {
				try {
					await this.channel.connect();
				} catch (error) {
					cli.printWarning(`Real-time channel unavailable, continuing over the API: ${describeError(error)}`);
				}
				if (this.isStale(generation)) return this.superseded(chatId, "Opening chat");
			}
			this.handleConnectionChanged(this.channel.isConnected);

			const abort = new AbortController();
			this.olderAbort = abort;
			const page = await this.api.getMessages(chatId, 0, this.options.initialPageSize, abort.signal);
			if (this.olderAbort === abort) this.olderAbort = null;
			if (this.isStale(generation)) return this.superseded(chatId, "Opening chat");

			const added = this.applyPage(session, page, this.options.initialPageSize);
			session.loaded = true;
			this.summaries?.markChatRead(chatId);
			cli.print(`Chat ${chatId}: loaded ${page.length} messages`);

			if (this.currentUserId !== null) this.track(this.markAllAsRead().then(() => undefined));
			return { ok: true, chatId, loaded: added };
		} catch (error) {
			if (this.isStale(generation)) return this.superseded(chatId, "Opening chat");
			const failure = asReconcilerError(error);
			cli.printError(`Failed to open chat ${chatId}: ${failure.message}`);
			this.notify("error", "Failed to load messages", chatId);
			return { ok: false, chatId, error: failure };
		}
	}

	private resetSession(chatId: string): Session;
	private resetSession(chatId: null): null;
	private resetSession(chatId: string | null): Session | null {
		const old = this.session;
		if (old) {
			old.subscription.unsubscribe();
			cli.printLog(`◇ Closed session for chat ${old.chatId}`);
		}
		this.olderAbort?.abort();
		this.olderAbort = null;
		this.loadingOlder = null;
		for (const timer of this.evictions.values()) clearTimeout(timer);
		this.evictions.clear();
		this.typing.clear();
		this.localTyping = false;
		this.canLoadMore = true;

		const generation = ++this.generation;
		this.session = chatId
			? {
					chatId,
					generation,
					loaded: false,
					store: new MessageStore({ chatId, currentUserId: this.currentUserId, resolver: this.resolver, now: this.now }),
					subscription: this.subscribe(chatId, generation)
			  }
			: null;
		this.emit({ type: "reset", chatId });
		return this.session;
	}

	private subscribe(chatId: string, generation: number): Subscription {
		const live = () => generation === this.generation;
		return this.channel.events.subscribe(chatId, {
			onMessageReceived: (message) => {
				if (live()) this.handleMessageReceived(message);
			},
			onStatusUpdated: (id, serverId, status) => {
				if (live()) this.handleStatusUpdated(id, serverId, status);
			},
			onCorrelationConfirmed: (token, serverId, id) => {
				if (live()) this.handleCorrelationConfirmed(token, serverId, id);
			},
			onConnectionStateChanged: (connected) => {
				if (live()) this.handleConnectionChanged(connected);
			},
			onUserTyping: (id, userId, isTyping) => {
				if (live()) this.handleUserTyping(id, userId, isTyping);
			}
		});
	}

	private isStale(generation: number): boolean {
		return !this.session || this.session.generation !== generation;
	}

	private superseded(chatId: string, operation: string): OpenChatResult {
		cli.printLog(`◇ ${operation} ${chatId} superseded`);
		return { ok: false, chatId, error: new CancelledError(operation) };
	}

	// ── Sending ─────────────────────────────────────────────────────────

	/**
	 * Shows the message immediately as Sending and dispatches it in the
	 * background. `delivery` resolves once the outcome has been applied.
	 */
	sendMessage(content: string): SendResult {
		const session = this.session;
		if (!session) {
			return { ok: false, error: new ReconcilerError("no_session", "No chat is open") };
		}
		const text = content.trim();
		if (!text) {
			return { ok: false, error: new ReconcilerError("invalid_input", "Message is empty") };
		}
		const senderId = this.currentUserId;
		if (senderId === null) {
			const error = new AuthUnavailableError("send a message");
			cli.printWarning(error.message);
			this.notify("error", "You are not signed in", session.chatId);
			this.track(this.refreshCurrentUser().then(() => undefined));
			return { ok: false, error };
		}

		const optimistic = this.dispatcher.createOptimistic(session.chatId, senderId, text);
		const inserted = session.store.upsert(optimistic);
		this.emitUpsert(inserted);
		if (inserted.message) this.summaries?.recordInserted(inserted.message);

		const generation = session.generation;
		const delivery = this.dispatcher.dispatch(optimistic).then((outcome) => {
			if (!this.isStale(generation)) this.applyOutcome(outcome);
			return outcome;
		});
		this.track(delivery.then(() => undefined));
		return { ok: true, message: inserted.message ?? optimistic, delivery };
	}

	/** Sends a Failed message again as a new logical message; the Failed entry goes away now. */
	retryFailed(correlationToken: string): SendResult {
		const session = this.session;
		const failed = session ? session.store.findByCorrelation(correlationToken) : null;
		if (!session || !failed || failed.status !== MessageStatus.Failed) {
			return {
				ok: false,
				error: new ReconcilerError("invalid_input", `No failed message with correlation ${correlationToken}`)
			};
		}
		// Refused without a user; the Failed entry stays until its eviction.
		if (this.currentUserId === null) return this.sendMessage(failed.content);

		this.cancelEviction(correlationToken);
		if (session.store.removeByCorrelation(correlationToken)) {
			this.emit({ type: "removed", correlationToken });
		}
		return this.sendMessage(failed.content);
	}

	private applyOutcome(outcome: DispatchOutcome): void {
		if (outcome.ok) this.handleDispatchSucceeded(outcome.correlationToken, outcome.confirmed);
		else this.handleDispatchFailed(outcome.correlationToken, outcome.error);
	}

	private handleDispatchSucceeded(correlationToken: string, serverMessage: IncomingMessage | null): void {
		const session = this.session;
		if (!session) return;
		const result = serverMessage
			? session.store.upsert({ ...serverMessage, correlationToken })
			: session.store.applyStatusByCorrelation(correlationToken, MessageStatus.Sent);
		if (!result) {
			cli.printLog(`◇ Dispatch of ${correlationToken} succeeded but the entry is gone`);
			return;
		}
		this.emitUpsert(result);
		if (result.message && serverMessage) {
			this.summaries?.recordIdentity(session.chatId, correlationToken, result.message.serverId);
		}
	}

	private handleDispatchFailed(correlationToken: string, error: ReconcilerError): void {
		const session = this.session;
		const entry = session ? session.store.findByCorrelation(correlationToken) : null;
		if (!session || !entry) return;
		// A confirmation may have raced ahead of the failure.
		if (!canFail(entry.status) || entry.serverId > 0) {
			cli.printLog(`◇ Ignoring late failure of ${correlationToken}: already confirmed`);
			return;
		}
		const result = session.store.applyStatusByCorrelation(correlationToken, MessageStatus.Failed);
		if (result) this.emitUpsert(result);
		cli.printError(`Message ${correlationToken} failed: ${error.message}`);
		this.notify("error", "Failed to send message", session.chatId);
		this.scheduleEviction(session, correlationToken);
	}

	private scheduleEviction(session: Session, correlationToken: string): void {
		this.cancelEviction(correlationToken);
		const timer = setTimeout(() => {
			this.evictions.delete(correlationToken);
			if (this.isStale(session.generation)) return;
			const entry = session.store.findByCorrelation(correlationToken);
			if (entry && entry.status === MessageStatus.Failed && session.store.removeByCorrelation(correlationToken)) {
				this.emit({ type: "removed", correlationToken });
			}
		}, this.options.failedEvictionMs);
		this.evictions.set(correlationToken, timer);
	}

	private cancelEviction(correlationToken: string): void {
		const timer = this.evictions.get(correlationToken);
		if (timer) clearTimeout(timer);
		this.evictions.delete(correlationToken);
	}

	// ── Inbound real-time events ────────────────────────────────────────

	private handleMessageReceived(message: IncomingMessage): void {
		const session = this.session;
		if (!session || message.chatId !== session.chatId) return;
		const result = session.store.upsert(message);
		this.emitUpsert(result);
		const stored = result.message;
		if (!stored) return;
		this.summaries?.recordInserted(stored);
		if (result.kind === "inserted" && !stored.isOwnMessage && !stored.isRead && stored.serverId > 0) {
			this.track(this.markVisibleAsRead([stored.serverId]).then(() => undefined));
		}
	}

	private handleStatusUpdated(chatId: string, serverId: number, status: MessageStatus): void {
		const session = this.session;
		if (!session || chatId !== session.chatId) return;
		const result = session.store.applyStatusByServerId(serverId, status);
		if (!result) {
			cli.printLog(`◇ Status update for unknown message ${serverId} in chat ${chatId}`);
			return;
		}
		this.emitUpsert(result);
		if (result.message && result.message.isRead) this.summaries?.recordRead(result.message);
	}

	private handleCorrelationConfirmed(correlationToken: string, serverId: number, chatId: string | null): void {
		const session = this.session;
		if (!session || (chatId !== null && chatId !== session.chatId)) return;
		const result = session.store.attachServerId(correlationToken, serverId);
		if (!result) {
			cli.printLog(`◇ Confirmation for unknown correlation ${correlationToken}`);
			return;
		}
		this.emitUpsert(result);
		this.summaries?.recordIdentity(session.chatId, correlationToken, serverId);
	}

	private handleConnectionChanged(isConnected: boolean): void {
		if (this.isConnected === isConnected) return;
		this.isConnected = isConnected;
		cli.printLog(`◇ Real-time channel ${isConnected ? "connected" : "disconnected"}`);
		this.emit({ type: "connection", isConnected });
	}

	private handleUserTyping(chatId: string, userId: number, isTyping: boolean): void {
		if (!this.session || chatId !== this.session.chatId || userId === this.currentUserId) return;
		const changed = isTyping ? !this.typing.has(userId) : this.typing.has(userId);
		if (!changed) return;
		if (isTyping) this.typing.add(userId);
		else this.typing.delete(userId);
		this.emit({ type: "typing", userIds: [...this.typing].sort((a, b) => a - b) });
	}

	async setTyping(isTyping: boolean): Promise<void> {
		const session = this.session;
		if (!session || this.localTyping === isTyping) return;
		this.localTyping = isTyping;
		if (!this.channel.isConnected) return;
		try {
			await this.channel.sendTyping(session.chatId, isTyping);
		} catch (error) {
			cli.printWarning(`Typing indicator for chat ${session.chatId} not sent: ${describeError(error)}`);
		}
	}

	// ── Pagination ──────────────────────────────────────────────────────

	/**
	 * Fetches the page before everything already confirmed. Concurrent calls
	 * share one fetch; a chat change aborts it and discards its result.
	 */
	loadOlderMessages(pageSize: number = this.options.pageSize, beforeCount?: number): Promise<LoadOlderResult> {
		const session = this.session;
		if (!session || !session.loaded) {
			return Promise.resolve({ ok: false, error: new ReconcilerError("no_session", "No chat is loaded") });
		}
		if (this.loadingOlder) return this.loadingOlder;
		if (!this.canLoadMore) return Promise.resolve({ ok: true, added: 0, canLoadMore: false });

		const abort = new AbortController();
		this.olderAbort = abort;
		const offset = beforeCount ?? session.store.confirmedCount();
		const task: Promise<LoadOlderResult> = this.fetchOlder(session, offset, pageSize, abort.signal).finally(() => {
			if (this.loadingOlder !== task) return;
			this.loadingOlder = null;
			this.olderAbort = null;
			this.emit({ type: "loading", isLoadingOlder: false });
		});
		this.loadingOlder = task;
		this.emit({ type: "loading", isLoadingOlder: true });
		return task;
	}

	private async fetchOlder(session: Session, offset: number, pageSize: number, signal: AbortSignal): Promise<LoadOlderResult> {
		try {
			const page = await this.api.getMessages(session.chatId, offset, pageSize, signal);
			if (this.isStale(session.generation)) return { ok: false, error: new CancelledError("Loading older messages") };
			const added = this.applyPage(session, page, pageSize);
			cli.printLog(`◇ Older page chat=${session.chatId} offset=${offset} → ${page.length} (${added} new)`);
			return { ok: true, added, canLoadMore: this.canLoadMore };
		} catch (error) {
			if (this.isStale(session.generation)) return { ok: false, error: new CancelledError("Loading older messages") };
			const failure = asReconcilerError(error);
			cli.printError(`Failed to load older messages for chat ${session.chatId}: ${failure.message}`);
			this.notify("warning", "Could not load older messages", session.chatId);
			return { ok: false, error: failure };
		}
	}

	// One synchronous batch; listeners see a single page change.
	private applyPage(session: Session, page: IncomingMessage[], pageSize: number): number {
		const results = session.store.prepend(page);
		const touched: ChatMessage[] = [];
		let added = 0;
		for (const result of results) {
			if (!result.message) continue;
			if (result.kind === "inserted") {
				added++;
				this.summaries?.recordInserted(result.message);
			}
			if (result.kind === "inserted" || result.kind === "merged") touched.push(result.message);
		}
		this.canLoadMore = page.length === pageSize;
		this.emit({ type: "page", messages: touched, added, canLoadMore: this.canLoadMore });
		return added;
	}

	// ── Read receipts ───────────────────────────────────────────────────

	/**
	 * Marks incoming messages Read locally, then tells the server. Server
	 * failures are logged and never roll the local state back.
	 */
	async markVisibleAsRead(messageIds: number[]): Promise<MarkReadResult> {
		const session = this.session;
		if (!session) return { ok: false, error: new ReconcilerError("no_session", "No chat is open") };

		await this.refreshCurrentUser();
		if (this.isStale(session.generation)) return { ok: false, error: new CancelledError("Marking messages read") };
		if (this.currentUserId === null) {
			const error = new AuthUnavailableError("mark messages read");
			cli.printWarning(error.message);
			this.notify("warning", "You are not signed in", session.chatId);
			return { ok: false, error };
		}

		const targets: number[] = [];
		for (const serverId of new Set(messageIds)) {
			const entry = session.store.findByServerId(serverId);
			if (!entry || entry.isOwnMessage || entry.isRead) continue;
			const result = session.store.applyStatusByServerId(serverId, MessageStatus.Read);
			if (!result) continue;
			this.emitUpsert(result);
			if (result.message) this.summaries?.recordRead(result.message);
			targets.push(serverId);
		}
		if (targets.length === 0) return { ok: true, outcomes: [] };

		const outcomes = await Promise.all(targets.map((serverId) => this.sendReadReceipt(session.chatId, serverId)));
		if (outcomes.some((o) => !o.ok)) {
			this.notify("warning", "Some read receipts could not be delivered", session.chatId);
		}
		return { ok: true, outcomes };
	}

	async markAllAsRead(): Promise<MarkReadResult> {
		const session = this.session;
		if (!session) return { ok: false, error: new ReconcilerError("no_session", "No chat is open") };
		const unread = session.store
			.snapshot()
			.filter((m) => !m.isOwnMessage && !m.isRead && m.serverId > 0)
			.map((m) => m.serverId);
		return this.markVisibleAsRead(unread);
	}

	private async sendReadReceipt(chatId: string, serverId: number): Promise<MarkReadOutcome> {
		if (this.channel.isConnected) {
			try {
				const accepted = await withTimeout(
					this.channel.markAsRead(chatId, serverId),
					this.options.markReadTimeoutMs,
					`Real-time mark-read ${serverId}`
				);
				if (accepted) return { serverId, ok: true, via: "realtime" };
				cli.printWarning(`Real-time channel rejected read receipt for ${serverId}, falling back to API`);
			} catch (error) {
				cli.printWarning(`Real-time read receipt for ${serverId} failed (${describeError(error)}), falling back to API`);
			}
		}
		try {
			await this.api.markAsRead(chatId, [serverId]);
			return { serverId, ok: true, via: "api" };
		} catch (error) {
			cli.printError(`Read receipt for ${serverId} in chat ${chatId} not delivered: ${describeError(error)}`);
			return { serverId, ok: false, via: null };
		}
	}

	// ── Helpers ─────────────────────────────────────────────────────────

	private async refreshCurrentUser(): Promise<number | null> {
		let userId: number | null;
		try {
			userId = await this.users.getCurrentUserId();
		} catch (error) {
			cli.printWarning(`Current user unavailable: ${describeError(error)}`);
			userId = null;
		}
		if (userId !== this.currentUserId) {
			this.currentUserId = userId;
			this.session?.store.recomputeOwnership(userId);
			if (userId !== null) this.typing.delete(userId);
			this.emit({ type: "identity", currentUserId: userId });
		}
		return userId;
	}

	private emitUpsert(result: UpsertResult): void {
		if (!result.message) return;
		if (result.kind === "inserted") this.emit({ type: "inserted", message: result.message });
		else if (result.kind === "merged") {
			this.emit({ type: "updated", message: result.message, previousStatus: result.previousStatus });
		}
	}

	private emit(change: SessionChange): void {
		for (const listener of [...this.listeners]) {
			try {
				listener(change);
			} catch (error) {
				cli.printError(`Session listener failed on ${change.type}: ${describeError(error)}`);
			}
		}
	}

	private notify(kind: "error" | "warning" | "info", text: string, chatId: string | null): void {
		try {
			this.notifier.notify({ kind, text, chatId });
		} catch (error) {
			cli.printError(`Notifier failed: ${describeError(error)}`);
		}
	}

	private track(work: Promise<void>): void {
		const tracked = work.catch((error: unknown) => {
			cli.printError(`Background task failed: ${describeError(error)}`);
		});
		this.pending.add(tracked);
		void tracked.finally(() => this.pending.delete(tracked));
	}
}
