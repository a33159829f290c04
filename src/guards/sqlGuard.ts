const BANNED = /\b(INSERT|UPDATE|DELETE|MERGE|ALTER|DROP|CREATE|TRUNCATE|COPY|GRANT|REVOKE|VACUUM|EXEC|EXECUTE)\b/i;

// Leftmost match wins, so a quote inside a comment (or `--` inside a literal) is read the way the server reads it.
const LEXEMES = /'(?:[^']|'')*'|"(?:[^"]|"")*"|\$([A-Za-z_]\w*)?\$[\s\S]*?\$\1\$|--[^\n]*|\/\*[\s\S]*?\*\//g;

const TRAILING_LIMIT = /\b(limit\s+(\d+|all))(\s+offset\s+\d+(?:\s+rows?)?)?\s*$/i;
const TRAILING_FETCH = /\b(fetch\s+(?:first|next)\s+(\d+))\s+rows?\s+only\s*$/i;

/**
 * Blanks the contents of string literals, quoted identifiers, dollar-quoted
 * bodies and comments. Offsets are preserved; literals keep their delimiters
 * and comments become whitespace.
 */
export function maskQuoted(sql: string): string {
  return sql.replace(LEXEMES, (m) => {
    if (m.startsWith("--") || m.startsWith("/*")) return m.replace(/[^\n]/g, " ");
    const open = m.startsWith("$") ? m.slice(0, m.indexOf("$", 1) + 1) : m[0];
    return open + m.slice(open.length, m.length - open.length).replace(/[^\n]/g, " ") + open;
  });
}

/** Removes markdown code fences, a leading `sql` language tag, stray backticks and trailing semicolons. */
export function stripSqlDecoration(text: string): string {
  let s = text.trim();
  const fenced = s.match(/```(?:sql)?\s*([\s\S]*?)```/i);
  if (fenced) s = fenced[1];
  s = s.replace(/`/g, "").trim();
  s = s.replace(/^sql\s+(?=(select|with)\b)/i, "");
  return s.replace(/;+\s*$/, "").trim();
}

export function hasWriteKeyword(sql: string): boolean {
  return BANNED.test(maskQuoted(sql));
}

export function isSingleStatement(sql: string): boolean {
  return !maskQuoted(sql).replace(/;+\s*$/, "").includes(";");
}

export function selectsStar(sql: string): boolean {
  return /\bselect\s+(distinct\s+)?\*/i.test(maskQuoted(sql));
}

export function isSafeSelect(sql: string): boolean {
  const s = sql.trim();
  if (!/^(SELECT|WITH)\b/i.test(s)) return false;
  if (!isSingleStatement(s)) return false;
  if (hasWriteKeyword(s)) return false;
  if (/\b(pg_catalog|information_schema)\./i.test(maskQuoted(s))) return false;
  return true;
}

export function limitValue(sql: string): number | undefined {
  const m = TRAILING_LIMIT.exec(maskQuoted(sql.trim()));
  if (!m || m[2].toLowerCase() === "all") return undefined;
  return parseInt(m[2], 10);
}

/**
 * Enforces at most `max` rows: a trailing LIMIT (with or without OFFSET) or
 * FETCH FIRST above `max` is lowered, and a statement with neither gets
 * `LIMIT max` appended.
 */
export function capLimit(sql: string, max: number): string {
  const s = sql.trim();
  const masked = maskQuoted(s);

  const clause = TRAILING_LIMIT.exec(masked) ?? TRAILING_FETCH.exec(masked);
  if (clause) {
    const value = clause[2].toLowerCase() === "all" ? Infinity : parseInt(clause[2], 10);
    if (value <= max) return s;
    const replacement = clause[1].replace(/(\d+|all)$/i, String(max));
    return s.slice(0, clause.index) + replacement + s.slice(clause.index + clause[1].length);
  }

  // A trailing line comment would swallow the clause.
  const separator = masked.trimEnd().length < masked.length ? "\n" : " ";
  return `${s}${separator}LIMIT ${max}`;
}
