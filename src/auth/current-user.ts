import config from "../config";
import { parseUserId } from "../utils";

export interface CurrentUserProvider {
	/** null while nobody is signed in. */
	getCurrentUserId(): Promise<number | null>;
}

/** Reads CHAT_USER_ID. Session management lives outside this package. */
export class EnvCurrentUserProvider implements CurrentUserProvider {
	constructor(private readonly raw: string | undefined = config.currentUserId) {}

	async getCurrentUserId(): Promise<number | null> {
		return parseUserId(this.raw);
	}
}

/** Holds an id set by whatever signs the user in. */
export class StaticCurrentUserProvider implements CurrentUserProvider {
	constructor(private userId: number | null = null) {}

	set(userId: number | null): void {
		this.userId = userId;
	}

	async getCurrentUserId(): Promise<number | null> {
		return this.userId;
	}
}
