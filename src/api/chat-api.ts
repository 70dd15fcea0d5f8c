import axios, { AxiosInstance, AxiosRequestConfig } from "axios";
import * as cli from "../cli/ui";
import config from "../config";
import constants from "../constants";
import { TransportError, describeError } from "../errors";
import { decodeChatSummaries, decodeServerMessage, decodeServerMessages } from "../messaging/codec";
import { ChatSummary, IncomingMessage } from "../types/message";

/** Request/response channel to the chat server. */
export interface ChatApi {
	/** Every chat of the current user with its server-side unread count. */
	getChats(): Promise<ChatSummary[]>;
	getMessages(chatId: string, offset: number, limit: number, signal?: AbortSignal): Promise<IncomingMessage[]>;
	/** The confirmed message, or null when the server refused it. */
	sendMessage(chatId: string, content: string, correlationToken: string): Promise<IncomingMessage | null>;
	markAsRead(chatId: string, serverIds: number[]): Promise<void>;
}

export interface HttpChatApiOptions {
	baseURL: string;
	token?: string;
	timeoutMs?: number;
	adapter?: AxiosRequestConfig["adapter"]; // transport override, used by tests
}

export class HttpChatApi implements ChatApi {
	private readonly http: AxiosInstance;

	constructor(options: HttpChatApiOptions) {
		this.http = axios.create({
			baseURL: options.baseURL,
			timeout: options.timeoutMs ?? config.apiTimeoutMs,
			headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
			...(options.adapter ? { adapter: options.adapter } : {})
		});
	}

	static fromConfig(): HttpChatApi {
		return new HttpChatApi({ baseURL: config.chatApiUrl, token: config.chatApiToken, timeoutMs: config.apiTimeoutMs });
	}

	async getChats(): Promise<ChatSummary[]> {
		try {
			const response = await this.http.get<unknown>(constants.endpoints.chats);
			const chats = decodeChatSummaries(response.data);
			cli.printLog(`◇ GET chats → ${chats.length}`);
			return chats;
		} catch (error) {
			throw this.wrap("Failed to load chats", error);
		}
	}

	async getMessages(chatId: string, offset: number, limit: number, signal?: AbortSignal): Promise<IncomingMessage[]> {
		try {
			const response = await this.http.get<unknown>(constants.endpoints.messages(chatId), {
				params: { skip: offset, take: limit },
				signal
			});
			const messages = decodeServerMessages(response.data);
			cli.printLog(`◇ GET messages chat=${chatId} skip=${offset} take=${limit} → ${messages.length}`);
			return messages;
		} catch (error) {
			throw this.wrap(`Failed to load messages for chat ${chatId}`, error);
		}
	}

	async sendMessage(chatId: string, content: string, correlationToken: string): Promise<IncomingMessage | null> {
		try {
			const response = await this.http.post<unknown>(constants.endpoints.sendMessage, {
				chatId,
				content,
				correlationId: correlationToken
			});
			if (response.data === null || response.data === undefined || response.data === "") {
				cli.printWarning(`Send to chat ${chatId} returned no message (correlation ${correlationToken})`);
				return null;
			}
			const message = decodeServerMessage(response.data);
			// Servers that do not echo the correlation id still confirm this send.
			return { ...message, correlationToken: message.correlationToken || correlationToken };
		} catch (error) {
			throw this.wrap(`Failed to send message to chat ${chatId}`, error);
		}
	}

	async markAsRead(chatId: string, serverIds: number[]): Promise<void> {
		if (serverIds.length === 0) return;
		try {
			await this.http.post(constants.endpoints.markRead(chatId), serverIds);
			cli.printLog(`◇ POST mark-read chat=${chatId} ids=${serverIds.join(",")}`);
		} catch (error) {
			throw this.wrap(`Failed to mark messages read in chat ${chatId}`, error);
		}
	}

	private wrap(message: string, error: unknown): TransportError {
		if (error instanceof TransportError) return error;
		const status = axios.isAxiosError(error) && error.response ? ` (HTTP ${error.response.status})` : "";
		return new TransportError(`${message}${status}: ${describeError(error)}`, error);
	}
}
