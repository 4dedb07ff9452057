/**
 * Ensure a line is present in a text file's content, replacing the last line
 * that matches a pattern or appending when nothing matches.
 */

export interface EnsureLineOptions {
  /** Lines matching this are replaced by `line`. Must not be global or sticky. */
  pattern: RegExp;
  line: string;
}

export interface EnsureLineResult {
  content: string;
  changed: boolean;
}

/** Escape `value` for literal use inside a RegExp */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function ensureLine(content: string, options: EnsureLineOptions): EnsureLineResult {
  const { pattern, line } = options;
  const endsWithNewline = content.endsWith("\n");
  const body = endsWithNewline ? content.slice(0, -1) : content;
  const lines = content === "" ? [] : body.split("\n");

  let lastMatch = -1;
  let hasExactLine = false;
  lines.forEach((current, index) => {
    if (pattern.test(current)) lastMatch = index;
    if (current === line) hasExactLine = true;
  });

  if (lastMatch !== -1) {
    if (lines[lastMatch] === line) return { content, changed: false };
    const next = [...lines];
    next[lastMatch] = line;
    return { content: next.join("\n") + (endsWithNewline ? "\n" : ""), changed: true };
  }

  if (hasExactLine) return { content, changed: false };

  const separator = content === "" || endsWithNewline ? "" : "\n";
  return { content: `${content}${separator}${line}\n`, changed: true };
}
