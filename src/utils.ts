import { validate as isUuid } from "uuid";
import { TimeoutError } from "./errors";

function formatDate(timestamp: number | Date): string {
	const now = new Date();
	const date = new Date(timestamp);

	const isToday = now.toDateString() === date.toDateString();
	const isYesterday = new Date(now.setDate(now.getDate() - 1)).toDateString() === date.toDateString();

	const timeString = date.toLocaleTimeString(undefined, {
		hour: "2-digit",
		minute: "2-digit",
		hour12: false
	});

	if (isToday) {
		return `today at ${timeString}`;
	} else if (isYesterday) {
		return `yesterday at ${timeString}`;
	} else {
		return `${date.toLocaleDateString()} at ${timeString}`;
	}
}

/** Chat ids are UUID strings; anything else is a malformed reference. */
function parseChatId(raw: string | null | undefined): string | null {
	const trimmed = String(raw ?? "").trim();
	return isUuid(trimmed) ? trimmed.toLowerCase() : null;
}

/** Positive integer user id, or null for missing / "0" / garbage. */
function parseUserId(raw: string | number | null | undefined): number | null {
	if (raw === null || raw === undefined) return null;
	const n = typeof raw === "number" ? raw : Number(String(raw).trim());
	return Number.isSafeInteger(n) && n > 0 ? n : null;
}

/**
 * Races `work` against a timer. The timer is always cleared so a settled race
 * leaves nothing scheduled.
 */
async function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
	});
	try {
		return await Promise.race([work, timeout]);
	} finally {
		clearTimeout(timer);
	}
}

export { formatDate, parseChatId, parseUserId, withTimeout };
