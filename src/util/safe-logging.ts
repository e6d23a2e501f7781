/**
 * Utility functions for safe logging that prevents accidental exposure of secrets
 *
 * Never log user input, environment variables, or provider credentials.
 * Only log explicitly whitelisted, known-safe values.
 */

/**
 * Safely log environment info without exposing secrets
 * Only logs explicitly whitelisted, non-sensitive environment variables
 */
export function logSafeEnvironmentInfo() {
  const safeEnvVars = {
    NODE_ENV: process.env.NODE_ENV,
    WORLDSMITH_WEB_API_PORT: process.env.WORLDSMITH_WEB_API_PORT,
    WORLDSMITH_WEB_API_HOST: process.env.WORLDSMITH_WEB_API_HOST,
    WORLDSMITH_OUTPUT_DIR: process.env.WORLDSMITH_OUTPUT_DIR,
    WORLDSMITH_PROVIDER: process.env.WORLDSMITH_PROVIDER,
  };

  console.log("[environment] Safe environment variables:", safeEnvVars);
}

/**
 * Safely log that a secret was found without exposing its value
 * @param secretName - Name of the secret (e.g., "ANTHROPIC_API_KEY")
 */
export function logSecretStatus(secretName: string, value: string | undefined) {
  if (value) {
    console.log(`[security] ${secretName}: ✓ loaded (${value.length} chars)`);
  } else {
    console.warn(`[security] ${secretName}: ✗ not found`);
  }
}

/**
 * Log application events with only safe, known values
 * @param component - Component name (e.g., "web-api", "cli")
 * @param event - Event name (e.g., "started", "generation-complete")
 * @param details - Only known-safe details (numbers, booleans, predefined strings)
 */
export function logApplicationEvent(component: string, event: string, details?: Record<string, string | number | boolean>) {
  const logEntry = {
    component,
    event,
    timestamp: new Date().toISOString(),
    ...details,
  };
  console.log(`[${component}] ${event}`, logEntry);
}
