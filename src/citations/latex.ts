/**
 * Built-in LaTeX → plain text rendering for bibliography entries.
 *
 * Covers what bibliography styles actually emit: font switches, \url / \doi /
 * \href, accents, escaped specials, ties and dashes. Anything fancier should
 * go through OpenDeTeX (see detexText).
 */

/** Combining marks for the text-mode accent commands */
const ACCENTS: Record<string, string> = {
  "'": "\u0301",
  "`": "\u0300",
  "^": "\u0302",
  '"': "\u0308",
  "~": "\u0303",
  "=": "\u0304",
  ".": "\u0307",
  u: "\u0306",
  v: "\u030C",
  H: "\u030B",
  c: "\u0327",
};

/** Letter-like commands with a direct replacement */
const SYMBOLS: Record<string, string> = {
  ss: "ß",
  o: "ø",
  O: "Ø",
  ae: "æ",
  AE: "Æ",
  oe: "œ",
  OE: "Œ",
  aa: "å",
  AA: "Å",
  l: "ł",
  L: "Ł",
  i: "ı",
};

/** `\'{e}`, `\'e`, `{\'e}`, `\v{s}`, `\c c` */
const ACCENT_COMMAND = /\\(['`^"~=.]|[uvHc](?![a-zA-Z]))\s*(?:\{\s*(\\?[a-zA-Z])\s*\}|(\\?[a-zA-Z]))/g;

const SYMBOL_COMMAND = /\\(ss|ae|AE|oe|OE|aa|AA|[oOlLi])(?![a-zA-Z])\s*(?:\{\})?/g;

function applyAccent(_match: string, accent: string, braced?: string, bare?: string): string {
  const base = (braced ?? bare ?? "").replace(/^\\/, "");
  return `${base}${ACCENTS[accent] ?? ""}`;
}

/**
 * Drop `%` comments: a `%` at the start of a line, after whitespace, or ending
 * a line. `%` inside a token (URL escapes such as "%28") is kept.
 */
function stripComments(latex: string): string {
  return latex
    .split("\n")
    .map((line) => line.replace(/(^|\s)(?<!\\)%.*$/, "$1").replace(/(?<!\\)%\s*$/, ""))
    .join("\n");
}

/**
 * Render a LaTeX fragment as plain text on one line.
 */
export function stripLatex(latex: string): string {
  return stripComments(latex)
    .replace(/\\newblock\b/g, " ")
    .replace(/\\bib(?:info|field)\s*\{[^{}]*\}/g, "")
    .replace(/\\penalty-?\d+/g, "")
    .replace(/\\href\s*\{([^{}]*)\}\s*\{([^{}]*)\}/g, "$2 ($1)")
    .replace(ACCENT_COMMAND, applyAccent)
    .replace(SYMBOL_COMMAND, (_m, name: string) => SYMBOLS[name] ?? name)
    .replace(/\\\\(?:\[[^\]]*\])?/g, " ")
    .replace(/\\[ ,;:!]/g, " ")
    .replace(/\\[a-zA-Z@]+\*?/g, "")
    .replace(/(?<!\\)[{}$]/g, "")
    .replace(/\\([&%_$#{}])/g, "$1")
    .replace(/~/g, " ")
    .replace(/---/g, "—")
    .replace(/--/g, "–")
    .replace(/``/g, "“")
    .replace(/''/g, "”")
    .normalize("NFC")
    .replace(/\s+/g, " ")
    .trim();
}
