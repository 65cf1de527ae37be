/**
 * Diagnostics logger.
 *
 * Everything goes to stderr: stdout is owned by the MCP stdio transport.
 * Debug lines are printed only when KEYBOARD_TUNING_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

function isDebugEnabled(): boolean {
  const flag = process.env.KEYBOARD_TUNING_DEBUG;
  return flag !== undefined && flag !== "" && flag !== "0" && flag !== "false";
}

export function log(level: LogLevel, message: string): void {
  if (level === "debug" && !isDebugEnabled()) return;
  console.error(`[${level}] ${message}`);
}

export const logger = {
  debug: (message: string) => log("debug", message),
  info: (message: string) => log("info", message),
  warn: (message: string) => log("warn", message),
  error: (message: string) => log("error", message),
};
