// stdout belongs to command output and the MCP stdio transport; logs go to stderr.
const PREFIX = "loresync:";

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebug(): boolean {
  return debugEnabled;
}

export function logInfo(message: string): void {
  process.stderr.write(`${PREFIX} ${message}\n`);
}

export function logWarn(message: string): void {
  process.stderr.write(`${PREFIX} warning: ${message}\n`);
}

export function logDebug(message: string): void {
  if (!debugEnabled) return;
  process.stderr.write(`${PREFIX} [debug] ${message}\n`);
}
