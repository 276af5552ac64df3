/**
 * Shell-escape a string for use inside double quotes.
 */
export function shellEscape(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\$/g, '\\$')
    .replace(/`/g, '\\`');
}

/** Build an `echo` command that prints `text` verbatim. */
export function echoCommand(text: string): string {
  return `echo "${shellEscape(text)}"`;
}
