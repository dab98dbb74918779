/**
 * Support runtime
 *
 * Builds the router, registry, monitor, dispatcher and services once per
 * process and caches them on globalThis so Next.js dev reloads reuse them.
 * Without DATABASE_URL the in-memory store is used.
 */

import {
  EscalationMonitor,
  FeedbackService,
  InMemoryTicketStore,
  MessageRouter,
  NotificationDispatcher,
  SupportMetrics,
  ThreadRegistry,
  describeError,
  type MessagingPlatform,
  type NotificationChannel,
  type TicketStore,
} from "@support-desk/core";
import { config } from "@/lib/config";
import { logSystem, supportLogger } from "@/lib/logger";
import { closePool, createDatabase } from "@/lib/db/client";
import { PostgresTicketStore } from "@/lib/db/ticket-store";
import { EmailNotificationChannel, createTransport } from "@/lib/email";
import { FeedbackChannel, StaffAlertChannel } from "@/lib/notifications/staff-alert";
import { TelegramClient } from "@/lib/telegram/client";
import { TelegramMessenger } from "@/lib/telegram/messenger";
import { ContactBook } from "./contacts";
import { SuppressionList } from "./suppression";
import { startAutoClose } from "./auto-close";

export interface SupportRuntime {
  store: TicketStore;
  platform: MessagingPlatform;
  registry: ThreadRegistry;
  dispatcher: NotificationDispatcher;
  router: MessageRouter;
  monitor: EscalationMonitor;
  feedback: FeedbackService;
  metrics: SupportMetrics;
  suppression: SuppressionList;
  contacts: ContactBook;
  storeKind: "postgres" | "memory";
  startedAt: Date;
}

export interface RuntimeOverrides {
  store?: TicketStore;
  platform?: MessagingPlatform;
  channels?: NotificationChannel[];
}

const globalForSupport = globalThis as unknown as {
  supportRuntime: SupportRuntime | undefined;
  supportStopJobs: (() => void) | undefined;
};

function buildChannels(platform: MessagingPlatform): NotificationChannel[] {
  const channels: NotificationChannel[] = [new StaffAlertChannel(platform)];
  if (config.telegram.feedbackChannelId !== null) {
    channels.push(new FeedbackChannel(platform));
  }
  const supportEmail = config.email.supportEmail;
  if (config.email.isConfigured && supportEmail) {
    channels.push(new EmailNotificationChannel(createTransport(), supportEmail));
  }
  return channels;
}

export function createRuntime(overrides: RuntimeOverrides = {}): SupportRuntime {
  const storeKind = overrides.store || !config.database.isConfigured ? "memory" : "postgres";
  const store =
    overrides.store ??
    (storeKind === "postgres" ? new PostgresTicketStore(createDatabase()) : new InMemoryTicketStore());

  const platform =
    overrides.platform ??
    new TelegramMessenger(new TelegramClient(), {
      supportGroupId: config.telegram.supportGroupId,
      feedbackChannelId: config.telegram.feedbackChannelId,
    });

  const dispatcher = new NotificationDispatcher(overrides.channels ?? buildChannels(platform), {
    capacity: config.support.notificationQueueSize,
    logger: supportLogger,
  });
  const registry = new ThreadRegistry(store, { logger: supportLogger });
  const suppression = new SuppressionList();

  const router = new MessageRouter({
    store,
    registry,
    platform,
    dispatcher,
    policy: suppression,
    allowReplyToClosed: config.support.allowReplyToClosed,
    maxMessageLength: config.support.maxMessageLength,
    logger: supportLogger,
  });

  const monitor = new EscalationMonitor(store, dispatcher, {
    intervalMs: config.support.escalationIntervalMs,
    urgentThresholdMs: config.support.urgentThresholdMs,
    cooldownMs: config.support.escalationCooldownMs,
    logger: supportLogger,
  });

  return {
    store,
    platform,
    registry,
    dispatcher,
    router,
    monitor,
    feedback: new FeedbackService(store, dispatcher, { logger: supportLogger }),
    metrics: new SupportMetrics({ store, monitor, dispatcher }),
    suppression,
    contacts: new ContactBook(),
    storeKind,
    startedAt: new Date(),
  };
}

export function getRuntime(): SupportRuntime {
  if (!globalForSupport.supportRuntime) {
    globalForSupport.supportRuntime = createRuntime();
    logSystem("runtime.created", { message: `Support runtime ready (${globalForSupport.supportRuntime.storeKind} store)` });
  }
  return globalForSupport.supportRuntime;
}

/** Start the escalation monitor and the idle auto-close job. Idempotent. */
export function startBackgroundJobs(runtime: SupportRuntime = getRuntime()): void {
  if (globalForSupport.supportStopJobs) return;

  runtime.monitor.start();
  const stopAutoClose = startAutoClose(
    { store: runtime.store, router: runtime.router },
    config.support.autoCloseDays,
    config.support.escalationIntervalMs,
  );
  globalForSupport.supportStopJobs = stopAutoClose;
  logSystem("runtime.jobs_started", { autoCloseDays: config.support.autoCloseDays });
}

/**
 * Graceful shutdown: refuse new routing calls, drain in-flight ones, stop
 * timers, drain notifications and release the pool.
 */
export async function shutdownRuntime(): Promise<void> {
  const runtime = globalForSupport.supportRuntime;
  if (!runtime) return;

  globalForSupport.supportStopJobs?.();
  globalForSupport.supportStopJobs = undefined;

  try {
    await runtime.router.shutdown();
    await runtime.monitor.stop();
    await runtime.dispatcher.close();
    if (runtime.storeKind === "postgres") await closePool();
    logSystem("runtime.shutdown", { message: "Support runtime stopped" });
  } catch (error) {
    logSystem("runtime.shutdown_failed", { level: "error", message: describeError(error) });
    throw error;
  } finally {
    globalForSupport.supportRuntime = undefined;
  }
}

/** Visible for testing: install a runtime built with overrides */
export function _setRuntimeForTesting(runtime: SupportRuntime | undefined): void {
  globalForSupport.supportRuntime = runtime;
}
