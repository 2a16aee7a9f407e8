// Line-oriented model of sshd_config. Every line keeps its raw text, so a document that
// goes through parse -> applyDirectives -> serialize differs from the input only on the
// lines carrying an overridden keyword.

/** One physical line of sshd_config. */
export type SshdLine =
  | { readonly kind: "directive"; readonly keyword: string; readonly value: string; readonly raw: string }
  | { readonly kind: "commented-directive"; readonly keyword: string; readonly raw: string }
  | { readonly kind: "match"; readonly raw: string }
  | { readonly kind: "comment"; readonly raw: string }
  | { readonly kind: "blank"; readonly raw: string };

export interface SshdConfigDocument {
  readonly lines: readonly SshdLine[];
  readonly trailingNewline: boolean;
}

/** Keyword name as it should be written, e.g. "PasswordAuthentication". */
export type DirectiveOverrides = ReadonlyArray<readonly [keyword: string, value: string]>;

/** Password and keyboard-interactive logins off, public keys on. */
export const KEY_ONLY_AUTH: DirectiveOverrides = [
  ["PasswordAuthentication", "no"],
  ["ChallengeResponseAuthentication", "no"],
  ["PubkeyAuthentication", "yes"],
];

const DIRECTIVE_RE = /^\s*([A-Za-z][A-Za-z0-9]*)(?:\s*=\s*|\s+)(.*?)\s*$/;
const BARE_KEYWORD_RE = /^\s*([A-Za-z][A-Za-z0-9]*)\s*$/;
// "#PasswordAuthentication yes" as shipped by distro defaults; "# some prose" stays a comment.
const COMMENTED_DIRECTIVE_RE = /^#([A-Za-z][A-Za-z0-9]*)(?:[\s=]|$)/;

export function parseSshdLine(raw: string): SshdLine {
  const trimmed = raw.trim();
  if (trimmed === "") return { kind: "blank", raw };
  if (trimmed.startsWith("#")) {
    const m = COMMENTED_DIRECTIVE_RE.exec(trimmed);
    return m?.[1] ? { kind: "commented-directive", keyword: m[1], raw } : { kind: "comment", raw };
  }
  const m = DIRECTIVE_RE.exec(raw) ?? BARE_KEYWORD_RE.exec(raw);
  const keyword = m?.[1];
  if (!keyword) return { kind: "comment", raw };
  if (keyword.toLowerCase() === "match") return { kind: "match", raw };
  return { kind: "directive", keyword, value: m?.[2] ?? "", raw };
}

export function parseSshdConfig(text: string): SshdConfigDocument {
  const trailingNewline = text.endsWith("\n");
  const body = trailingNewline ? text.slice(0, -1) : text;
  const lines = body === "" && trailingNewline ? [""] : body === "" ? [] : body.split("\n");
  return { lines: lines.map(parseSshdLine), trailingNewline };
}

export function serializeSshdConfig(doc: SshdConfigDocument): string {
  const text = doc.lines.map((l) => l.raw).join("\n");
  return doc.trailingNewline ? `${text}\n` : text;
}

function directiveLine(keyword: string, value: string, indent = ""): SshdLine {
  return { kind: "directive", keyword, value, raw: `${indent}${keyword} ${value}` };
}

function indentOf(raw: string): string {
  return /^\s*/.exec(raw)?.[0] ?? "";
}

/**
 * Force each keyword to one effective value.
 *
 * Global section (everything before the first Match): the first occurrence, commented
 * or not, becomes `Keyword value` in place and later occurrences are dropped. If there
 * is none, the line goes just before the first Match (or at the end). Inside Match
 * blocks, active occurrences are rewritten to the same value so no block re-enables
 * what the global section turned off. Keywords compare case-insensitively.
 */
export function applyDirectives(doc: SshdConfigDocument, overrides: DirectiveOverrides): SshdConfigDocument {
  let lines: SshdLine[] = [...doc.lines];
  for (const [keyword, value] of overrides) {
    lines = applyOne(lines, keyword, value);
  }
  return { lines, trailingNewline: doc.trailingNewline };
}

function applyOne(lines: readonly SshdLine[], keyword: string, value: string): SshdLine[] {
  const wanted = keyword.toLowerCase();
  const out: SshdLine[] = [];
  let inMatch = false;
  let placed = false;
  let firstMatchIndex = -1;

  for (const line of lines) {
    if (line.kind === "match") {
      if (!inMatch) firstMatchIndex = out.length;
      inMatch = true;
      out.push(line);
      continue;
    }
    const hits = (line.kind === "directive" || line.kind === "commented-directive") && line.keyword.toLowerCase() === wanted;
    if (!hits) {
      out.push(line);
    } else if (inMatch) {
      out.push(line.kind === "directive" ? directiveLine(keyword, value, indentOf(line.raw)) : line);
    } else if (!placed) {
      out.push(directiveLine(keyword, value));
      placed = true;
    }
  }

  if (!placed) {
    if (firstMatchIndex >= 0) out.splice(firstMatchIndex, 0, directiveLine(keyword, value));
    else out.push(directiveLine(keyword, value));
  }
  return out;
}

export function hardenSshdConfig(text: string, overrides: DirectiveOverrides = KEY_ONLY_AUTH): string {
  return serializeSshdConfig(applyDirectives(parseSshdConfig(text), overrides));
}
