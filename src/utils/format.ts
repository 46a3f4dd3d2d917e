/** Tokens that need no quoting in a POSIX shell. */
const SAFE_TOKEN_REGEX = /^[-a-zA-Z0-9_=.+/:,@%]+$/;

function quoteToken(token: string): string {
  if (token === "") return "''";
  if (SAFE_TOKEN_REGEX.test(token)) return token;
  return `'${token.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Display form of a command, quoted the way a shell would need it.
 * Example: ["gcc", "hello world.c"] -> "gcc 'hello world.c'"
 */
export function formatCommand(command: readonly string[]): string {
  return command.map(quoteToken).join(" ");
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}

/**
 * Trim and cap captured output for one-line display.
 */
export function preview(text: string, maxChars: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed;
  return `${trimmed.slice(0, maxChars)}…`;
}
