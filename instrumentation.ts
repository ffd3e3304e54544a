/**
 * Next.js Instrumentation -- runs once when the server starts.
 *
 * Validates the model credential up front so a missing key shows in the
 * server log at boot, not only when the page is opened.
 */

export async function onRequestError() {
  // Required export -- Next.js uses this for error reporting instrumentation.
}

export async function register() {
  if (process.env.NEXT_RUNTIME === "nodejs") {
    const { getConfigurationProblem } = await import("@/lib/llm/config");
    const { scopedLogger } = await import("@/lib/logger");
    const log = scopedLogger("startup");

    const problem = getConfigurationProblem();
    if (problem) {
      log.error("Configuration incomplete", { problem });
    } else {
      log.info("Environment variables validated.");
    }
  }
}
