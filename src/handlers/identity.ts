import { ChatMessage, MessageStatus } from "../types/message";

export type MatchRule = "correlation" | "serverId" | "heuristic";

export interface IdentityMatch {
	rule: MatchRule;
	message: ChatMessage;
}

/** Read-only lookups the resolver needs from whatever holds the messages. */
export interface IdentityIndex {
	byCorrelation(token: string): ChatMessage | undefined;
	byServerId(serverId: number): ChatMessage | undefined;
	all(): Iterable<ChatMessage>;
}

export interface IdentityProbe {
	correlationToken?: string;
	serverId?: number;
	chatId: string;
	senderId: number;
	content: string;
	sentAt: number;
}

/**
 * Finds the store entry an incoming record refers to. Pure lookup.
 *
 * Rules, in order: correlation token, server id, then a content heuristic
 * for records that carry no correlation token, matched only against
 * optimistic entries (no server id, not Failed) of the same chat and sender
 * whose `sentAt` lies within `windowMs`.
 */
export class MessageIdentityResolver {
	constructor(private readonly windowMs: number) {}

	resolve(index: IdentityIndex, probe: IdentityProbe): IdentityMatch | null {
		const token = probe.correlationToken;
		if (token) {
			const byToken = index.byCorrelation(token);
			if (byToken) return { rule: "correlation", message: byToken };
		}

		if (probe.serverId && probe.serverId > 0) {
			const byId = index.byServerId(probe.serverId);
			if (byId) return { rule: "serverId", message: byId };
		}

		if (token) return null;

		let best: ChatMessage | null = null;
		let bestDelta = Infinity;
		for (const candidate of index.all()) {
			if (!this.isHeuristicCandidate(candidate, probe)) continue;
			const delta = Math.abs(candidate.sentAt - probe.sentAt);
			if (delta <= this.windowMs && delta < bestDelta) {
				best = candidate;
				bestDelta = delta;
			}
		}
		return best ? { rule: "heuristic", message: best } : null;
	}

	private isHeuristicCandidate(candidate: ChatMessage, probe: IdentityProbe): boolean {
		return (
			candidate.serverId <= 0 &&
			candidate.status !== MessageStatus.Failed &&
			candidate.chatId === probe.chatId &&
			candidate.senderId === probe.senderId &&
			candidate.content === probe.content
		);
	}
}
