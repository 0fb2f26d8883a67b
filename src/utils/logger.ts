/**
 * Line logger for tabrace.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * `debug` lines are printed only when TABRACE_DEBUG is set.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

function debugEnabled(): boolean {
  const flag = process.env['TABRACE_DEBUG'];
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function debug(message: string): void {
  if (!debugEnabled()) return;
  write(`🐛 ${message}`);
}

export function navigated(url: string): void {
  write(`🧭 Navigated to ${url}`);
}

export function raced(index: number, total: number): void {
  write(`🏁 Action ${String(index + 1)}/${String(total)} finished first`);
}
