/**
 * Support error taxonomy
 *
 * Every failure the router surfaces is a SupportError with a stable code.
 * All of them are scoped to the single call that produced them.
 */

import type { ThreadHandle, TicketId, UserId } from "./types";

export type SupportErrorCode =
  | "INVALID_CONTENT"
  | "USER_BLOCKED"
  | "UNKNOWN_THREAD"
  | "TICKET_ALREADY_CLOSED"
  | "TICKET_NOT_FOUND"
  | "OPEN_TICKET_EXISTS"
  | "STORE_UNAVAILABLE"
  | "DELIVERY_FAILED"
  | "SERVICE_SHUTTING_DOWN";

export class SupportError extends Error {
  readonly code: SupportErrorCode;

  constructor(code: SupportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SupportError";
    this.code = code;
  }
}

/** Empty or malformed inbound payload. No state change. */
export class InvalidContentError extends SupportError {
  constructor(reason: string) {
    super("INVALID_CONTENT", `Invalid message content: ${reason}`);
    this.name = "InvalidContentError";
  }
}

export class UserBlockedError extends SupportError {
  readonly userId: UserId;

  constructor(userId: UserId) {
    super("USER_BLOCKED", `User ${userId} is blocked`);
    this.name = "UserBlockedError";
    this.userId = userId;
  }
}

/** Staff reply into a thread that no ticket maps to, even after a registry rebuild */
export class UnknownThreadError extends SupportError {
  readonly threadHandle: ThreadHandle;

  constructor(threadHandle: ThreadHandle) {
    super("UNKNOWN_THREAD", `No ticket is mapped to thread ${threadHandle}`);
    this.name = "UnknownThreadError";
    this.threadHandle = threadHandle;
  }
}

export class TicketAlreadyClosedError extends SupportError {
  readonly ticketId: TicketId;

  constructor(ticketId: TicketId) {
    super("TICKET_ALREADY_CLOSED", `Ticket #${ticketId} is closed`);
    this.name = "TicketAlreadyClosedError";
    this.ticketId = ticketId;
  }
}

export class TicketNotFoundError extends SupportError {
  readonly ticketId: TicketId;

  constructor(ticketId: TicketId) {
    super("TICKET_NOT_FOUND", `Ticket #${ticketId} not found`);
    this.name = "TicketNotFoundError";
    this.ticketId = ticketId;
  }
}

export class OpenTicketExistsError extends SupportError {
  readonly ticketId: TicketId;
  readonly openTicketId: TicketId;

  constructor(ticketId: TicketId, openTicketId: TicketId) {
    super(
      "OPEN_TICKET_EXISTS",
      `Cannot reopen ticket #${ticketId}: user already has open ticket #${openTicketId}`
    );
    this.name = "OpenTicketExistsError";
    this.ticketId = ticketId;
    this.openTicketId = openTicketId;
  }
}

/** Transactional backend unreachable. Callers retry; nothing was written. */
export class StoreUnavailableError extends SupportError {
  constructor(message: string, cause?: unknown) {
    super("STORE_UNAVAILABLE", message, { cause });
    this.name = "StoreUnavailableError";
  }
}

/** Outbound send failed after the state change was persisted */
export class DeliveryFailedError extends SupportError {
  readonly ticketId: TicketId | null;

  constructor(ticketId: TicketId | null, reason: string, cause?: unknown) {
    super(
      "DELIVERY_FAILED",
      ticketId === null ? `Delivery failed: ${reason}` : `Delivery failed for ticket #${ticketId}: ${reason}`,
      { cause }
    );
    this.name = "DeliveryFailedError";
    this.ticketId = ticketId;
  }
}

export class ServiceShuttingDownError extends SupportError {
  constructor() {
    super("SERVICE_SHUTTING_DOWN", "Support router is shutting down");
    this.name = "ServiceShuttingDownError";
  }
}

export function isSupportError(error: unknown): error is SupportError {
  return error instanceof SupportError;
}

/** Error -> message string, for logs and delivery results */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
