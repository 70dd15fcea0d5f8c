import color from "picocolors";
import config from "../config";

const ANSI_RE = /\x1B\[[0-9;]*m/g;

// Callers sometimes pass pre-formatted "◇ ..." lines; avoid printing two markers.
function stripVisibleDiamond(s: string): string {
	const visible = String(s || "").replace(ANSI_RE, "");
	return /^\s*◇/.test(visible) ? visible.replace(/^\s*◇\s*/, "") : s;
}

// Log level gating
const LEVELS = { silent: 0, error: 10, warn: 20, info: 30, debug: 40 } as const;
export type Level = keyof typeof LEVELS;

function isLevel(value: string): value is Level {
	return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

let override: Level | null = null;

export function setLogLevel(level: Level | null): void {
	override = level;
}

export function currentLogLevel(): Level {
	if (override) return override;
	const configured = (config.logLevel || "info").toLowerCase();
	return isLevel(configured) ? configured : "info";
}

function isEnabled(level: Level): boolean {
	return LEVELS[level] <= LEVELS[currentLogLevel()];
}

export const print = (text: string) => {
	if (!isEnabled("info")) return;
	console.log(color.green("◇") + "  " + stripVisibleDiamond(text));
};

export const printLog = (text: string) => {
	if (!isEnabled("debug")) return;
	console.log(color.blue("◇") + "  " + stripVisibleDiamond(text));
};

export const printError = (text: string) => {
	if (!isEnabled("error")) return;
	console.log(color.red("◇") + "  " + stripVisibleDiamond(text));
};

export const printWarning = (text: string) => {
	if (!isEnabled("warn")) return;
	console.log(color.yellow("◇") + "  " + stripVisibleDiamond(text));
};

export const printIntro = () => {
	if (!isEnabled("info")) return;
	console.log("");
	console.log(color.bgCyan(color.white(` ${config.appName} `)));
	console.log("|----------------------------------------------------------------------------|");
	console.log("|  Optimistic sends, real-time/API fallback and delivery status for one chat. |");
	console.log("|----------------------------------------------------------------------------|");
};

export const printUsage = () => {
	if (!isEnabled("info")) return;
	console.log(color.green("◇") + "  " + "Type a line to send it. Commands: /open <chatId>, /more, /read, /retry <token>, /chats, /quit");
};

export const printOutro = () => {
	if (!isEnabled("info")) return;
	console.log(color.green("◇") + "  " + `${config.appName} is ready.`);
};
