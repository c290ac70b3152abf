const SHOW_CURSOR = "\x1b[?25h";

function reportRestoreFailure(scope: string, err: unknown, reason?: string): void {
  const suffix = reason ? ` (${reason})` : "";
  process.stderr.write(`[terminal] restore ${scope} failed${suffix}: ${String(err)}\n`);
}

/** Leaves the terminal usable after a prompt session: cooked stdin and a visible cursor. */
export function restoreTerminalState(reason?: string): void {
  const stdin = process.stdin;
  if (stdin.isTTY && typeof stdin.setRawMode === "function") {
    try {
      stdin.setRawMode(false);
    } catch (err) {
      reportRestoreFailure("raw mode", err, reason);
    }
  }
  if (process.stdout.isTTY) {
    try {
      process.stdout.write(SHOW_CURSOR);
    } catch (err) {
      reportRestoreFailure("cursor", err, reason);
    }
  }
}
