export type Substitution = readonly [from: string, to: string];

export const SPECIAL_CHARS: readonly Substitution[] = [
  ["&", "\\&"],
  ["%", "\\%"],
  ["#", "\\#"],
  ["_", "\\_"],
  ["{", "\\{"],
  ["}", "\\}"],
  ["~", "\\textasciitilde{}"],
  ["^", "\\textasciicircum{}"],
  ["\\", "\\textbackslash{}"],
  ["$", "\\$"],
];

export const LOCALE_LETTERS: readonly Substitution[] = [
  ["ą", "\\k{a}"],
  ["ć", "\\'c"],
  ["ę", "\\k{e}"],
  ["ł", "\\l{}"],
  ["ń", "\\'n"],
  ["ó", "\\'o"],
  ["ś", "\\'s"],
  ["ź", "\\'z"],
  ["ż", "\\.z"],
  ["Ą", "\\k{A}"],
  ["Ć", "\\'C"],
  ["Ę", "\\k{E}"],
  ["Ł", "\\L{}"],
  ["Ń", "\\'N"],
  ["Ó", "\\'O"],
  ["Ś", "\\'S"],
  ["Ź", "\\'Z"],
  ["Ż", "\\.Z"],
];

// Greek small mu (U+03BC) only; the micro sign (U+00B5) is handled by the unit rule.
export const SCIENTIFIC_SYMBOLS: readonly Substitution[] = [
  ["μ", "$\\mu$"],
  ["±", "$\\pm$"],
  ["°", "$^{\\circ}$"],
  ["≈", "$\\approx$"],
  ["≥", "$\\geq$"],
  ["≤", "$\\leq$"],
  ["⁻", "$^{-}$"],
  ["¹", "$^{1}$"],
  ["²", "$^{2}$"],
  ["³", "$^{3}$"],
  ["⁴", "$^{4}$"],
  ["⁵", "$^{5}$"],
  ["⁶", "$^{6}$"],
  ["⁷", "$^{7}$"],
  ["⁸", "$^{8}$"],
  ["⁹", "$^{9}$"],
  ["⁰", "$^{0}$"],
  ["₁", "$_{1}$"],
  ["₂", "$_{2}$"],
  ["₃", "$_{3}$"],
  ["₄", "$_{4}$"],
];

const SPECIAL_CHAR_MAP = new Map<string, string>(SPECIAL_CHARS);
const SPECIAL_CHAR_RE = /[&%#_{}~^\\$]/g;

/**
 * Escapes the LaTeX control characters in one pass, so the backslashes it
 * inserts are never escaped again. Running it twice is not a no-op.
 */
export function escapeSpecialChars(text: string): string {
  return text.replace(SPECIAL_CHAR_RE, (c) => SPECIAL_CHAR_MAP.get(c) ?? c);
}

function applySubstitutions(text: string, table: readonly Substitution[]): string {
  let out = text;
  for (const [from, to] of table) {
    out = out.replaceAll(from, () => to);
  }
  return out;
}

export function transliterateLocale(text: string): string {
  return applySubstitutions(text, LOCALE_LETTERS);
}

export function transliterateSymbols(text: string): string {
  return applySubstitutions(text, SCIENTIFIC_SYMBOLS);
}

export function rewriteNumericPatterns(text: string): string {
  return text
    .replaceAll("~70%", "\\textasciitilde{}70\\%")
    .replace(/(\d+)%/g, "$1\\%")
    .replace(/(\d+)\s*[µμ][mM]/g, "$1 $$\\mu$$m")
    .replace(/(\d+)\s*[µμ][aA]/g, "$1 $$\\mu$$A");
}
