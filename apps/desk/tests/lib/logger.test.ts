import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { getLogFilePath, log, logAPI, supportLogger } from "@/lib/logger";

function entries(): Array<Record<string, unknown>> {
  return readFileSync(getLogFilePath(), "utf-8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
}

describe("lib/logger", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "desk-logs-"));
    vi.stubEnv("LOG_DIR", dir);
    vi.stubEnv("LOGGING_ENABLED", "true");
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per entry", () => {
    log("routing", "ticket.created", { ticketId: 12 });
    log("escalation", "sweep", { message: "2 urgent", durationMs: 5 });

    const [first, second] = entries();
    expect(first).toMatchObject({ type: "routing", level: "info", stage: "ticket.created", metadata: { ticketId: 12 } });
    expect(second).toMatchObject({ type: "escalation", stage: "sweep", message: "2 urgent", durationMs: 5 });
  });

  it("echoes warnings to the console", () => {
    log("routing", "suppression.block", { level: "warn", message: "User 9 blocked" });
    expect(console.warn).toHaveBeenCalledWith("[WARN] [suppression.block] User 9 blocked", {
      level: "warn",
      message: "User 9 blocked",
    });
  });

  it("logs API 5xx responses as errors", () => {
    logAPI("support.stats", { method: "GET", status: 503 });
    expect(entries()[0]).toMatchObject({ type: "api", level: "error", stage: "support.stats" });
  });

  it("maps core stages onto log types", () => {
    supportLogger.info("registry", "Rebuilt thread registry", { threads: 2 });
    supportLogger.warn("notify", "Channel failed");
    supportLogger.error("shutdown", "Drain failed");

    expect(entries().map((e) => [e.type, e.stage, e.level])).toEqual([
      ["routing", "registry", "info"],
      ["notify", "notify", "warn"],
      ["system", "shutdown", "error"],
    ]);
  });

  it("writes nothing when disabled", () => {
    vi.stubEnv("LOGGING_ENABLED", "false");
    log("system", "startup");
    expect(existsSync(getLogFilePath())).toBe(false);
  });

  it("honours enabledTypes in logging-config.json", () => {
    writeFileSync(join(dir, "logging-config.json"), JSON.stringify({ enabled: true, enabledTypes: ["api"] }));
    log("routing", "ticket.created");
    logAPI("support.urgent", { status: 200 });

    expect(entries().map((e) => e.stage)).toEqual(["support.urgent"]);
  });
});
