export type ReconcilerErrorCode =
	| "invalid_chat_id"
	| "auth_unavailable"
	| "transport"
	| "timeout"
	| "malformed_payload"
	| "cancelled"
	| "invalid_input"
	| "no_session";

export class ReconcilerError extends Error {
	readonly code: ReconcilerErrorCode;

	constructor(code: ReconcilerErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

export class InvalidChatIdError extends ReconcilerError {
	constructor(readonly rawChatId: string) {
		super("invalid_chat_id", `Invalid chat id: '${rawChatId}'`);
	}
}

export class AuthUnavailableError extends ReconcilerError {
	constructor(action: string) {
		super("auth_unavailable", `Cannot ${action}: current user is not authenticated`);
	}
}

export class TransportError extends ReconcilerError {
	constructor(message: string, cause?: unknown) {
		super("transport", message, { cause });
	}
}

export class TimeoutError extends ReconcilerError {
	constructor(readonly operation: string, readonly timeoutMs: number) {
		super("timeout", `${operation} timed out after ${timeoutMs}ms`);
	}
}

export class MalformedPayloadError extends ReconcilerError {
	constructor(message: string) {
		super("malformed_payload", message);
	}
}

/** The session that started an operation was reset or closed before it finished. */
export class CancelledError extends ReconcilerError {
	constructor(operation: string) {
		super("cancelled", `${operation} cancelled: chat session changed`);
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
