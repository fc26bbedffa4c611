/**
 * `.env`-style files: KEY=value lines, `#` comments, optional `export `.
 */

export interface ConfigEntry {
  key: string;
  value: string;
}

export interface UpsertResult {
  content: string;
  /** Keys whose existing definition changed (or lost a duplicate) */
  updated: string[];
  /** Keys that had no definition and were added at the end */
  appended: string[];
}

export const ENV_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

const DEFINITION = /^\s*(export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/;

/** The key a line defines, or null for comments, blanks and anything else */
export function parseDefinition(line: string): { key: string; exported: boolean } | null {
  const match = DEFINITION.exec(line);
  if (!match) return null;
  return { key: match[2], exported: Boolean(match[1]) };
}

/** Double-quote values with whitespace, `#`, quotes or backslashes. */
export function formatValue(value: string): string {
  if (!/[\s#"'\\]/.test(value)) return value;
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function formatLine(key: string, value: string, exported = false): string {
  return `${exported ? 'export ' : ''}${key}=${formatValue(value)}`;
}

/**
 * Replace the first definition of each key in place, drop later duplicates
 * and append keys that are missing, in the order given. Other lines are kept
 * as they are. When an entry repeats a key the last value wins.
 */
export function upsertEnv(content: string, entries: ConfigEntry[]): UpsertResult {
  const wanted = new Map<string, string>();
  for (const { key, value } of entries) {
    wanted.set(key, value);
  }

  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const lines = content.length > 0 ? content.split(/\r?\n/) : [];
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const seen = new Set<string>();
  const updated = new Set<string>();
  const output: string[] = [];

  for (const line of lines) {
    const def = parseDefinition(line);
    const value = def ? wanted.get(def.key) : undefined;
    if (!def || value === undefined) {
      output.push(line);
      continue;
    }

    if (seen.has(def.key)) {
      updated.add(def.key);
      continue;
    }
    seen.add(def.key);

    const replacement = formatLine(def.key, value, def.exported);
    if (replacement !== line) {
      updated.add(def.key);
    }
    output.push(replacement);
  }

  const appended: string[] = [];
  for (const [key, value] of wanted) {
    if (seen.has(key)) continue;
    output.push(formatLine(key, value));
    appended.push(key);
  }

  return {
    content: output.length > 0 ? `${output.join(eol)}${eol}` : '',
    updated: [...updated],
    appended,
  };
}
