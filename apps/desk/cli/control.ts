#!/usr/bin/env node
/**
 * Support Desk Control CLI
 *
 * Operational commands for the ticket router.
 *
 * Usage:
 *   npx tsx cli/control.ts <command> [options]
 *   npm run ctl <command> [options]
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import * as path from 'path';
import { describeError, type ClosedBy } from '@support-desk/core';
import { config, getConfigSummary, validateConfig } from '@/lib/config';
import { closePool, getPool } from '@/lib/db/client';
import { TelegramClient } from '@/lib/telegram/client';
import { getRuntime, shutdownRuntime } from '@/lib/support/runtime';
import { closeIdleTickets } from '@/lib/support/auto-close';
import { ticketSearchQuerySchema } from '@/lib/validation/schemas';

const program = new Command();

const DESK_ROOT = path.resolve(__dirname, '..');

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

function log(message: string, color = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

function success(message: string) {
  log(`✅ ${message}`, colors.green);
}

function error(message: string) {
  log(`❌ ${message}`, colors.red);
}

function info(message: string) {
  log(`ℹ️  ${message}`, colors.blue);
}

function warn(message: string) {
  log(`⚠️  ${message}`, colors.yellow);
}

function parseTicketId(raw: string): number {
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new Error(`Invalid ticket id: ${raw}`);
  }
  return id;
}

function parseClosedBy(raw: string | undefined): ClosedBy {
  if (raw === undefined || raw === 'system') return 'system';
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new Error(`Invalid user id: ${raw}`);
  }
  return id;
}

function pad(value: number): string {
  return String(value).padStart(6);
}

function truncate(text: string, max: number): string {
  const line = text.replace(/\s+/g, ' ');
  return line.length > max ? `${line.slice(0, max - 1)}…` : line;
}

/** Run a command body, report failures, always release the runtime */
async function run(body: () => Promise<void>) {
  try {
    await body();
  } catch (e) {
    error(describeError(e));
    process.exitCode = 1;
  } finally {
    await shutdownRuntime();
  }
}

// ============================================================================
// DATABASE
// ============================================================================

program
  .command('migrate')
  .description('Apply db/init.sql to DATABASE_URL')
  .action(async () => {
    log('\n🔄 Database Migration\n', colors.bright);
    if (!config.database.isConfigured) {
      error('DATABASE_URL is not set');
      process.exitCode = 1;
      return;
    }

    const sql = readFileSync(path.join(DESK_ROOT, 'db', 'init.sql'), 'utf-8');
    try {
      info('Applying db/init.sql...');
      await getPool().query(sql);
      success('Schema is up to date');
    } catch (e) {
      error(`Migration failed: ${describeError(e)}`);
      process.exitCode = 1;
    } finally {
      await closePool();
    }
  });

// ============================================================================
// TICKETS
// ============================================================================

program
  .command('stats')
  .description('Print support counters (runs one escalation sweep first)')
  .action(() =>
    run(async () => {
      const support = getRuntime();
      await support.monitor.sweep();
      const stats = await support.metrics.snapshot();

      log('\n📊 Support Stats\n', colors.bright);
      log(`  Open tickets:        ${stats.openTickets}`);
      log(`  Urgent tickets:      ${stats.urgentTickets}`);
      log(`  Users:               ${stats.totalUsers}`);
      log(`  Feedback (24h):      ${stats.feedbackLast24h}`);
      log(`  Dropped alerts:      ${stats.droppedNotifications}`);

      const statistics = await support.metrics.statistics();
      const { created } = statistics.tickets;
      const { fromUsers, fromStaff } = statistics.messages;
      log('\n  Window               24h     7d    30d', colors.bright);
      log(`  Tickets created   ${pad(created.last24h)} ${pad(created.last7d)} ${pad(created.last30d)}`);
      log(`  User messages     ${pad(fromUsers.last24h)} ${pad(fromUsers.last7d)} ${pad(fromUsers.last30d)}`);
      log(`  Staff replies     ${pad(fromStaff.last24h)} ${pad(fromStaff.last7d)} ${pad(fromStaff.last30d)}`);
      log(`\n  Tickets total:       ${statistics.tickets.total} (${statistics.tickets.closed} closed)`);
      const firstReply = statistics.averageFirstReplyMinutes;
      log(`  First reply (7d):    ${firstReply === null ? 'n/a' : `${firstReply} min`}`);
      for (const staff of statistics.staffActivity) {
        log(`  ${staff.role} ${staff.authorId}: ${staff.replies} repl${staff.replies === 1 ? 'y' : 'ies'} (7d)`);
      }
    })
  );

program
  .command('tickets')
  .description('Search tickets, newest first')
  .option('-q, --query <text>', 'Substring of the opening message, name, username or email')
  .option('--user <userId>', 'Only this user')
  .option('--status <status>', 'open | closed')
  .option('--limit <n>', 'Max tickets (default 50)')
  .action((options: { query?: string; user?: string; status?: string; limit?: string }) =>
    run(async () => {
      const parsed = ticketSearchQuerySchema.safeParse({
        q: options.query,
        userId: options.user,
        status: options.status,
        limit: options.limit,
      });
      if (!parsed.success) {
        throw new Error(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '));
      }

      const { q, ...filters } = parsed.data;
      const hits = await getRuntime().store.searchTickets({ query: q, ...filters });
      if (hits.length === 0) {
        info('No tickets found');
        return;
      }

      log(`\n🎫 ${hits.length} ticket(s)\n`, colors.bright);
      for (const hit of hits) {
        const who = hit.username ? `@${hit.username}` : hit.displayName ?? `user ${hit.ticket.userId}`;
        const status = hit.ticket.status === 'open' ? colors.green : colors.reset;
        log(`  #${hit.ticket.id} [${hit.ticket.status}] ${who} ${hit.ticket.createdAt.toISOString()}`, status);
        if (hit.firstMessage) log(`      ${truncate(hit.firstMessage, 80)}`);
      }
    })
  );

program
  .command('sweep')
  .description('Run one escalation sweep and the idle auto-close, then exit')
  .option('--no-auto-close', 'Skip closing idle tickets')
  .action((options: { autoClose: boolean }) =>
    run(async () => {
      const support = getRuntime();
      const result = await support.monitor.sweep();
      info(`Checked ${result.checked} open ticket(s), ${result.urgent} urgent, ${result.escalated} escalated`);

      for (const ticket of support.monitor.urgentTickets()) {
        const hours = (ticket.waitingDurationMs / 3600000).toFixed(1);
        warn(`#${ticket.ticketId} (user ${ticket.userId}) waiting ${hours}h`);
      }

      if (options.autoClose) {
        const closed = await closeIdleTickets(
          { store: support.store, router: support.router },
          config.support.autoCloseDays,
        );
        info(`Auto-closed ${closed.length} idle ticket(s)`);
      }

      await support.dispatcher.flush();
      success('Sweep complete');
    })
  );

program
  .command('close')
  .description('Close a ticket')
  .argument('<ticketId>', 'Ticket id')
  .option('--by <userId>', 'Staff user id (default: system)')
  .action((rawId: string, options: { by?: string }) =>
    run(async () => {
      const ticketId = parseTicketId(rawId);
      const support = getRuntime();
      const closed = await support.router.closeTicket(ticketId, parseClosedBy(options.by));
      await support.dispatcher.flush();
      if (closed) {
        success(`Ticket #${ticketId} closed`);
      } else {
        info(`Ticket #${ticketId} was already closed`);
      }
    })
  );

program
  .command('reopen')
  .description('Reopen a closed ticket')
  .argument('<ticketId>', 'Ticket id')
  .requiredOption('--by <userId>', 'Staff user id')
  .action((rawId: string, options: { by: string }) =>
    run(async () => {
      const ticketId = parseTicketId(rawId);
      const by = parseClosedBy(options.by);
      if (by === 'system') throw new Error('--by must be a user id');
      await getRuntime().router.reopenTicket(ticketId, by);
      success(`Ticket #${ticketId} reopened`);
    })
  );

// ============================================================================
// SETUP
// ============================================================================

program
  .command('set-webhook')
  .description('Point the Telegram bot at this deployment')
  .argument('<url>', 'Public base URL, e.g. https://support.example.org')
  .action(async (url: string) => {
    try {
      const target = `${url.replace(/\/+$/, '')}/api/telegram/webhook`;
      await new TelegramClient().setWebhook(target, config.telegram.webhookSecret);
      success(`Webhook set to ${target}`);
    } catch (e) {
      error(describeError(e));
      process.exitCode = 1;
    }
  });

program
  .command('config')
  .description('Validate and print the current configuration (no secrets)')
  .action(() => {
    log(JSON.stringify(getConfigSummary(), null, 2));
    try {
      validateConfig();
      success('Configuration is valid');
    } catch (e) {
      error(describeError(e));
      process.exitCode = 1;
    }
  });

// ============================================================================
// MAIN
// ============================================================================

program
  .name('support-desk')
  .description('Event Support Desk Control CLI')
  .version('1.0.0');

program.parseAsync(process.argv).catch((e: unknown) => {
  error(describeError(e));
  process.exit(1);
});
