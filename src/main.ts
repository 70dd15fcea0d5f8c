import * as readline from "readline";
import { ChatReconcilerApp } from "./app";
import { attachConsole } from "./cli/console";
import { describeError } from "./errors";
import * as cli from "./cli/ui";

// Create and start the application
const app = new ChatReconcilerApp();
const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
const session = attachConsole(app, rl, (code) => process.exit(code));

// Graceful shutdown handling
process.once("SIGINT", session.shutdown);
process.once("SIGTERM", session.shutdown);

app.start().catch((error: unknown) => {
	cli.printError(`Failed to start application: ${describeError(error)}`);
	process.exit(1);
});
