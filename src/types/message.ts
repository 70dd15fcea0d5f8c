// Delivery states. Numeric order is the lattice order; Failed sits outside it.
export enum MessageStatus {
	Sending = 0,
	Sent = 1,
	Delivered = 2,
	Read = 3,
	Failed = 4
}

export interface ChatMessage {
	correlationToken: string; // "" when the client never originated the message
	serverId: number; // 0 until the server assigns one
	chatId: string;
	senderId: number;
	senderName: string;
	content: string;
	sentAt: number; // ms epoch
	status: MessageStatus;
	isRead: boolean;
	readAt: number | null; // ms epoch
	isOwnMessage: boolean;
}

/**
 * A message as seen by a delivery path before it reaches a store. Only the
 * fields a path actually knows are required; the store fills in the rest.
 */
export interface IncomingMessage {
	correlationToken?: string;
	serverId?: number;
	chatId: string;
	senderId: number;
	senderName?: string;
	content: string;
	sentAt: number;
	status: MessageStatus;
	isRead?: boolean;
	readAt?: number | null;
}

export interface ChatSummary {
	chatId: string;
	lastMessage: string | null;
	lastMessageTime: number | null; // ms epoch
	unreadCount: number;
}

/** Payload handed to the real-time channel for an outgoing message. */
export interface OutgoingMessage {
	correlationToken: string;
	chatId: string;
	senderId: number;
	content: string;
	sentAt: number;
}
