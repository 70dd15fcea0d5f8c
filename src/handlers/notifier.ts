import * as cli from "../cli/ui";

export type NotificationKind = "error" | "warning" | "info";

export interface Notification {
	kind: NotificationKind;
	text: string;
	chatId: string | null;
}

/** One-shot, user-visible transient notifications. */
export interface Notifier {
	notify(notification: Notification): void;
}

/** Prints notifications on the terminal. */
export class CliNotifier implements Notifier {
	notify({ kind, text, chatId }: Notification): void {
		const line = chatId ? `[${chatId}] ${text}` : text;
		if (kind === "error") cli.printError(line);
		else if (kind === "warning") cli.printWarning(line);
		else cli.print(line);
	}
}
