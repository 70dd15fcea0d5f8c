interface IConstants {
	// Topic exchanges on the real-time broker
	ingressExchange: string;
	egressExchange: string;
	// Binding for every chat event on the ingress exchange
	ingressBinding: string;
	// Prefix of the per-user durable ingress queue
	ingressQueuePrefix: string;
	// Consumer prefetch on the ingress channel
	prefetch: number;
	// HTTP endpoints (relative to CHAT_API_URL)
	endpoints: {
		chats: string;
		messages: (chatId: string) => string;
		sendMessage: string;
		markRead: (chatId: string) => string;
	};
}

const constants: IConstants = {
	ingressExchange: "chat.realtime.ingress",
	egressExchange: "chat.realtime.egress",
	ingressBinding: "chat.#",
	ingressQueuePrefix: "chat.ingress",
	prefetch: 16,
	endpoints: {
		chats: "chat",
		messages: (chatId) => `chat/${encodeURIComponent(chatId)}/messages`,
		sendMessage: "chat/send-message",
		markRead: (chatId) => `chat/${encodeURIComponent(chatId)}/mark-read`
	}
};

export default constants;
