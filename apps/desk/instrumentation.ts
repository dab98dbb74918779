/**
 * Next.js instrumentation hook: runs once when the server starts.
 * Validates config, starts the escalation monitor and the idle auto-close
 * job, and drains the runtime on SIGTERM/SIGINT.
 */

export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const { config, validateConfig } = await import("@/lib/config");
  const { logSystem } = await import("@/lib/logger");
  const { getRuntime, shutdownRuntime, startBackgroundJobs } = await import("@/lib/support/runtime");

  validateConfig();
  const support = getRuntime();
  if (config.app.backgroundJobsEnabled) {
    startBackgroundJobs(support);
  }

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logSystem("runtime.signal", { message: `${signal} received, draining support runtime` });
    shutdownRuntime()
      .catch((error: unknown) => {
        console.error("[instrumentation] Shutdown failed:", error);
        process.exitCode = 1;
      })
      .finally(() => process.exit());
  };
  process.once("SIGTERM", () => stop("SIGTERM"));
  process.once("SIGINT", () => stop("SIGINT"));
}
