export * from "./services/tickets/types";
export * from "./services/tickets/errors";
export * from "./services/tickets/transitions";
export { KeyedMutex } from "./services/tickets/KeyedMutex";
export type { TicketStore, TicketTransaction } from "./services/tickets/TicketStore";
export { InMemoryTicketStore } from "./services/tickets/InMemoryTicketStore";
export * from "./services/shared/logger";
export type { DeliveryResult, MessagingPlatform, Recipient } from "./services/messaging/MessagingPlatform";
export * from "./services/notifications/NotificationDispatcher";
export * from "./services/routing/ThreadRegistry";
export * from "./services/routing/formatting";
export * from "./services/routing/MessageRouter";
export * from "./services/escalation/EscalationMonitor";
export * from "./services/feedback/FeedbackService";
export * from "./services/metrics/SupportMetrics";
