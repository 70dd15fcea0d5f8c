import { ChatMessage, MessageStatus } from "../types/message";

const NAMES: Record<MessageStatus, string> = {
	[MessageStatus.Sending]: "Sending",
	[MessageStatus.Sent]: "Sent",
	[MessageStatus.Delivered]: "Delivered",
	[MessageStatus.Read]: "Read",
	[MessageStatus.Failed]: "Failed"
};

const WIRE_NAMES: Record<string, MessageStatus> = {
	sending: MessageStatus.Sending,
	sent: MessageStatus.Sent,
	delivered: MessageStatus.Delivered,
	read: MessageStatus.Read,
	seen: MessageStatus.Read,
	failed: MessageStatus.Failed
};

export function statusToString(status: number): string {
	return isMessageStatus(status) ? NAMES[status] : `Unknown(${status})`;
}

export function isMessageStatus(value: unknown): value is MessageStatus {
	return typeof value === "number" && Number.isInteger(value) && value >= MessageStatus.Sending && value <= MessageStatus.Failed;
}

/** Accepts the numeric codes and the lowercase names used on the wire. */
export function parseStatus(value: unknown): MessageStatus | null {
	if (isMessageStatus(value)) return value;
	if (typeof value === "string") {
		const trimmed = value.trim();
		if (/^\d+$/.test(trimmed)) {
			const n = Number(trimmed);
			return isMessageStatus(n) ? n : null;
		}
		return WIRE_NAMES[trimmed.toLowerCase()] ?? null;
	}
	return null;
}

export function isTerminal(status: MessageStatus): boolean {
	return status === MessageStatus.Failed;
}

/** Failed is only entered while the message is still in flight. */
export function canFail(status: MessageStatus): boolean {
	return status === MessageStatus.Sending || status === MessageStatus.Sent;
}

/**
 * Failed is terminal; an incoming Failed always wins; everything else moves
 * to the maximum of the two.
 */
export function applyStatus(current: MessageStatus, incoming: MessageStatus): MessageStatus {
	if (isTerminal(current)) return current;
	if (incoming === MessageStatus.Failed) return MessageStatus.Failed;
	return incoming > current ? incoming : current;
}

/**
 * Moves `message` to the lattice result of `incoming` in place and stamps the
 * read fields when Read is reached. Returns whether anything changed.
 */
export function advanceStatus(
	message: Pick<ChatMessage, "status" | "isRead" | "readAt">,
	incoming: MessageStatus,
	now: number
): boolean {
	const next = applyStatus(message.status, incoming);
	let changed = next !== message.status;
	message.status = next;
	if (next === MessageStatus.Read) {
		if (!message.isRead) {
			message.isRead = true;
			changed = true;
		}
		if (message.readAt === null) {
			message.readAt = now;
			changed = true;
		}
	}
	return changed;
}
