import type { LineResult } from "../app";
import { describeError } from "../errors";
import * as cli from "./ui";

export interface ConsoleApp {
	handleLine(line: string): Promise<LineResult>;
	shutdown(): Promise<void>;
}

// The slice of a readline interface the console needs.
export interface LineSource {
	on(event: "line", listener: (line: string) => void): unknown;
	on(event: "close", listener: () => void): unknown;
	close(): void;
}

export interface ConsoleSession {
	shutdown(): Promise<void>;
	/** Settles once every line received so far has been handled. */
	drained(): Promise<void>;
}

/**
 * Hands typed lines to the app one at a time, in order. `/quit`, end of
 * input and `shutdown()` all end in one graceful shutdown and `exit(0)`.
 */
export function attachConsole(app: ConsoleApp, lines: LineSource, exit: (code: number) => void): ConsoleSession {
	let shuttingDown = false;
	let queue: Promise<void> = Promise.resolve();

	const shutdown = async (): Promise<void> => {
		if (shuttingDown) return;
		shuttingDown = true;
		cli.print("Shutting down gracefully...");
		lines.close();
		try {
			await app.shutdown();
		} catch (error) {
			cli.printError(`Shutdown failed: ${describeError(error)}`);
		}
		exit(0);
	};

	const enqueue = (work: () => Promise<void>): void => {
		queue = queue.then(work).catch((error: unknown) => {
			cli.printError(`Command failed: ${describeError(error)}`);
		});
	};

	lines.on("line", (line) => {
		enqueue(async () => {
			if (shuttingDown) return;
			const result = await app.handleLine(line);
			if (result === "quit") await shutdown();
		});
	});

	// End of input (Ctrl-D, closed pipe) shuts down after the lines already typed.
	lines.on("close", () => enqueue(shutdown));

	return { shutdown, drained: () => queue };
}
