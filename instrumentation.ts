/**
 * Next.js instrumentation hook. Runs once on server startup.
 * Loads .env into process.env and runs first-run setup.
 */

export async function register() {
  if (process.env.NEXT_RUNTIME === "nodejs") {
    const { loadEnvFile, getSettings } = await import("@/lib/config/settings");
    loadEnvFile();
    // Throws ConfigurationError for a bad environment before serving anything.
    getSettings();

    const { ensureFirstRunComplete } = await import("@/lib/config/first-run");
    await ensureFirstRunComplete();
  }
}
