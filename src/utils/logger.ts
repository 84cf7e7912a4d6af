/**
 * Live execution logger for authprobe.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 */

let verbose = false;

export function configureLogger(options: { verbose: boolean }): void {
  verbose = options.verbose;
}

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function debug(message: string): void {
  if (verbose) {
    write(`🔎 ${message}`);
  }
}

export function scenario(name: string): void {
  write(`\n🎬 Scenario: ${name}`);
}

export function step(index: number, total: number, text: string): void {
  write(`📋 [${String(index + 1)}/${String(total)}] ${text}`);
}

export function stepResult(
  index: number,
  total: number,
  success: boolean,
  text: string,
): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} [${String(index + 1)}/${String(total)}] ${text}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function artifact(kind: string, filePath: string): void {
  write(`📎 ${kind} saved: ${filePath}`);
}

export function session(message: string): void {
  write(`🌐 ${message}`);
}
