import * as cli from "../cli/ui";
import { ChatMessage, IncomingMessage, MessageStatus } from "../types/message";
import { IdentityIndex, MatchRule, MessageIdentityResolver } from "./identity";
import { advanceStatus, statusToString } from "./status";

export type UpsertKind = "inserted" | "merged" | "unchanged" | "conflict" | "ignored";

export interface UpsertResult {
	kind: UpsertKind;
	message: ChatMessage | null; // snapshot after the operation; null when ignored
	previousStatus: MessageStatus | null; // null when inserted or ignored
	rule: MatchRule | null;
}

export interface MessageStoreOptions {
	chatId: string;
	currentUserId: number | null;
	resolver: MessageIdentityResolver;
	now?: () => number;
}

function copy(message: ChatMessage): ChatMessage {
	return { ...message };
}

/**
 * Ordered, deduplicated messages of one chat.
 *
 * Entries are kept sorted by `sentAt` ascending, ties by insertion order. No
 * two entries share a non-empty correlation token or a positive server id.
 * Every method is synchronous, so a call is applied as one atomic step.
 */
export class MessageStore {
	readonly chatId: string;

	private readonly resolver: MessageIdentityResolver;
	private readonly now: () => number;
	private currentUserId: number | null;

	private entries: ChatMessage[] = [];
	private readonly seqOf = new Map<ChatMessage, number>();
	private readonly byToken = new Map<string, ChatMessage>();
	private readonly byId = new Map<number, ChatMessage>();
	private nextSeq = 0;

	private readonly index: IdentityIndex = {
		byCorrelation: (token) => this.byToken.get(token),
		byServerId: (serverId) => this.byId.get(serverId),
		all: () => this.entries
	};

	constructor(options: MessageStoreOptions) {
		this.chatId = options.chatId;
		this.resolver = options.resolver;
		this.currentUserId = options.currentUserId;
		this.now = options.now ?? Date.now;
	}

	get size(): number {
		return this.entries.length;
	}

	/** Number of entries the server has confirmed; the offset for the next older page. */
	confirmedCount(): number {
		return this.byId.size;
	}

	snapshot(): ChatMessage[] {
		return this.entries.map(copy);
	}

	findByCorrelation(token: string): ChatMessage | null {
		const found = token ? this.byToken.get(token) : undefined;
		return found ? copy(found) : null;
	}

	findByServerId(serverId: number): ChatMessage | null {
		const found = serverId > 0 ? this.byId.get(serverId) : undefined;
		return found ? copy(found) : null;
	}

	upsert(incoming: IncomingMessage): UpsertResult {
		if (incoming.chatId !== this.chatId) {
			cli.printWarning(`Store ${this.chatId}: ignoring message for chat ${incoming.chatId}`);
			return { kind: "ignored", message: null, previousStatus: null, rule: null };
		}

		const match = this.resolver.resolve(this.index, incoming);
		if (!match) {
			const inserted = this.insert(incoming);
			cli.printLog(`◇ Insert ${this.describe(inserted)} status=${statusToString(inserted.status)}`);
			return { kind: "inserted", message: copy(inserted), previousStatus: null, rule: null };
		}

		let existing = match.message;
		const incomingId = incoming.serverId ?? 0;

		// Token matched an optimistic entry while the server id already belongs to
		// another entry: both are the same logical message. A token entry that is
		// already confirmed is never folded; that case is a conflict.
		const confirmed = incomingId > 0 ? this.byId.get(incomingId) : undefined;
		const folded = confirmed !== undefined && confirmed !== existing && existing.serverId <= 0;
		if (confirmed && folded) {
			existing = this.fold(existing, confirmed);
		}

		const previousStatus = existing.status;
		if (this.isConflict(existing, incoming)) {
			cli.printWarning(
				`Identity conflict on ${this.describe(existing)}: keeping first-seen payload, ignoring serverId=${incomingId} content="${incoming.content.substring(0, 50)}"`
			);
			return { kind: "conflict", message: copy(existing), previousStatus, rule: match.rule };
		}

		const changed = this.merge(existing, incoming) || folded;
		if (changed) {
			cli.printLog(
				`◇ Merge (${match.rule}) ${this.describe(existing)} status=${statusToString(previousStatus)}→${statusToString(existing.status)}`
			);
		}
		return { kind: changed ? "merged" : "unchanged", message: copy(existing), previousStatus, rule: match.rule };
	}

	/** Merges a page of older messages in one step. */
	prepend(olderMessages: IncomingMessage[]): UpsertResult[] {
		return olderMessages.map((m) => this.upsert(m));
	}

	removeByCorrelation(token: string): boolean {
		const entry = token ? this.byToken.get(token) : undefined;
		if (!entry) return false;
		this.remove(entry);
		cli.printLog(`◇ Removed ${this.describe(entry)}`);
		return true;
	}

	/** Applies a status to the entry with `serverId`; null when there is none. */
	applyStatusByServerId(serverId: number, status: MessageStatus, at?: number): UpsertResult | null {
		const entry = serverId > 0 ? this.byId.get(serverId) : undefined;
		return entry ? this.applyStatusTo(entry, status, at) : null;
	}

	applyStatusByCorrelation(token: string, status: MessageStatus, at?: number): UpsertResult | null {
		const entry = token ? this.byToken.get(token) : undefined;
		return entry ? this.applyStatusTo(entry, status, at) : null;
	}

	/** Correlation confirmation: attach the server id and advance to at least Sent. */
	attachServerId(token: string, serverId: number): UpsertResult | null {
		const entry = token ? this.byToken.get(token) : undefined;
		if (!entry || serverId <= 0) return null;
		return this.upsert({ ...entry, correlationToken: token, serverId, status: MessageStatus.Sent, readAt: entry.readAt });
	}

	recomputeOwnership(currentUserId: number | null): number {
		this.currentUserId = currentUserId;
		let changed = 0;
		for (const entry of this.entries) {
			const own = currentUserId !== null && entry.senderId === currentUserId;
			if (entry.isOwnMessage !== own) {
				entry.isOwnMessage = own;
				changed++;
			}
		}
		return changed;
	}

	clear(): void {
		this.entries = [];
		this.seqOf.clear();
		this.byToken.clear();
		this.byId.clear();
	}

	private applyStatusTo(entry: ChatMessage, status: MessageStatus, at?: number): UpsertResult {
		const previousStatus = entry.status;
		const changed = advanceStatus(entry, status, at ?? this.now());
		if (changed) {
			cli.printLog(`◇ Status ${this.describe(entry)} ${statusToString(previousStatus)}→${statusToString(entry.status)}`);
		}
		return { kind: changed ? "merged" : "unchanged", message: copy(entry), previousStatus, rule: null };
	}

	private insert(incoming: IncomingMessage): ChatMessage {
		const message: ChatMessage = {
			correlationToken: incoming.correlationToken ?? "",
			serverId: incoming.serverId && incoming.serverId > 0 ? incoming.serverId : 0,
			chatId: incoming.chatId,
			senderId: incoming.senderId,
			senderName: incoming.senderName ?? "",
			content: incoming.content,
			sentAt: incoming.sentAt,
			status: incoming.status,
			isRead: false,
			readAt: null,
			isOwnMessage: this.currentUserId !== null && incoming.senderId === this.currentUserId
		};
		if (message.status === MessageStatus.Read) {
			message.isRead = true;
			message.readAt = incoming.readAt ?? this.now();
		}
		this.seqOf.set(message, this.nextSeq++);
		this.place(message);
		if (message.correlationToken) this.byToken.set(message.correlationToken, message);
		if (message.serverId > 0) this.byId.set(message.serverId, message);
		return message;
	}

	private merge(existing: ChatMessage, incoming: IncomingMessage): boolean {
		let changed = false;
		const wasOptimistic = existing.serverId <= 0;

		if (incoming.serverId && incoming.serverId > 0 && wasOptimistic) {
			existing.serverId = incoming.serverId;
			this.byId.set(existing.serverId, existing);
			changed = true;
		}
		if (incoming.correlationToken && !existing.correlationToken && !this.byToken.has(incoming.correlationToken)) {
			existing.correlationToken = incoming.correlationToken;
			this.byToken.set(existing.correlationToken, existing);
			changed = true;
		}
		if (incoming.senderName && !existing.senderName) {
			existing.senderName = incoming.senderName;
			changed = true;
		}
		if (wasOptimistic) {
			if (incoming.content !== existing.content) {
				existing.content = incoming.content;
				changed = true;
			}
			// Clamped: a confirmation never moves a rendered message backward.
			if (incoming.sentAt > existing.sentAt) {
				existing.sentAt = incoming.sentAt;
				this.reposition(existing);
				changed = true;
			}
		}

		const readStamp = incoming.readAt ?? this.now();
		if (advanceStatus(existing, incoming.status, readStamp)) changed = true;
		return changed;
	}

	/** Moves everything known about `optimistic` onto `confirmed` and drops `optimistic`. */
	private fold(optimistic: ChatMessage, confirmed: ChatMessage): ChatMessage {
		const token = optimistic.correlationToken;
		this.remove(optimistic);
		if (token && !confirmed.correlationToken) {
			confirmed.correlationToken = token;
			this.byToken.set(token, confirmed);
		}
		if (optimistic.status !== MessageStatus.Failed) {
			advanceStatus(confirmed, optimistic.status, optimistic.readAt ?? this.now());
		}
		cli.printLog(`◇ Folded optimistic token=${token || "-"} into ${this.describe(confirmed)}`);
		return confirmed;
	}

	private isConflict(existing: ChatMessage, incoming: IncomingMessage): boolean {
		if (existing.serverId <= 0) return false;
		const incomingId = incoming.serverId ?? 0;
		if (incomingId > 0 && incomingId !== existing.serverId) return true;
		return incoming.content !== existing.content;
	}

	private remove(entry: ChatMessage): void {
		const at = this.entries.indexOf(entry);
		if (at >= 0) this.entries.splice(at, 1);
		if (entry.correlationToken && this.byToken.get(entry.correlationToken) === entry) {
			this.byToken.delete(entry.correlationToken);
		}
		if (entry.serverId > 0 && this.byId.get(entry.serverId) === entry) {
			this.byId.delete(entry.serverId);
		}
		this.seqOf.delete(entry);
	}

	private reposition(entry: ChatMessage): void {
		const at = this.entries.indexOf(entry);
		if (at >= 0) this.entries.splice(at, 1);
		this.place(entry);
	}

	// Binary search for the first entry that sorts after `message`.
	private place(message: ChatMessage): void {
		const seq = this.seqOf.get(message) ?? 0;
		let lo = 0;
		let hi = this.entries.length;
		while (lo < hi) {
			const mid = (lo + hi) >>> 1;
			const other = this.entries[mid];
			const otherSeq = this.seqOf.get(other) ?? 0;
			if (other.sentAt < message.sentAt || (other.sentAt === message.sentAt && otherSeq < seq)) {
				lo = mid + 1;
			} else {
				hi = mid;
			}
		}
		this.entries.splice(lo, 0, message);
	}

	private describe(message: ChatMessage): string {
		return `message serverId=${message.serverId || "-"} token=${message.correlationToken || "-"} chat=${message.chatId}`;
	}
}
