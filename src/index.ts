export * from "./types/message";
export * from "./types/reconcile";
export * from "./errors";
export * from "./handlers/status";
export * from "./handlers/identity";
export * from "./handlers/message-store";
export * from "./handlers/dispatcher";
export * from "./handlers/chat-summary";
export * from "./handlers/notifier";
export * from "./handlers/reconciler";
export * from "./messaging/subscriptions";
export * from "./messaging/realtime-channel";
export * from "./messaging/codec";
export { AmqpRealtimeChannel } from "./messaging/amqp-channel";
export { default as RabbitMQPublisher } from "./messaging/publisher";
export type { EgressPublisher } from "./messaging/publisher";
export { default as RabbitMQSubscriber } from "./messaging/subscriber";
export type { IngressSubscriber } from "./messaging/subscriber";
export * from "./api/chat-api";
export * from "./auth/current-user";
export { config } from "./config";
export type { IConfig } from "./config";
export { validateConfig } from "./config_validate";
export { parseChatId, parseUserId, withTimeout } from "./utils";
