/**
 * Reference Rules
 * Context patterns that locate an image filename inside text and swap it
 *
 * Each rule captures (prefix, filename, suffix) so only the filename token
 * changes; directory prefixes and quoting survive untouched.
 * Rules run in declaration order and are all case-insensitive.
 */

import { escapeRegExp } from "./string";

export interface ReferenceRule {
  name: "quoted" | "css-url" | "markdown";
  /**
   * Build a global pattern for one filename. Groups: 1 = everything before
   * the filename, 2 = the filename, 3 = everything after it.
   */
  pattern(filename: string): RegExp;
}

export const REFERENCE_RULES: readonly ReferenceRule[] = [
  {
    // src="images/photo.jpg", 'photo.jpg'
    name: "quoted",
    pattern: (filename) =>
      new RegExp(`(["'][^"']*?)(${escapeRegExp(filename)})(["'])`, "gi"),
  },
  {
    // url(images/bg.png), url( "bg.png" )
    name: "css-url",
    pattern: (filename) =>
      new RegExp(
        `(url\\s*\\(\\s*["']?[^)]*?)(${escapeRegExp(filename)})(["']?\\s*\\))`,
        "gi",
      ),
  },
  {
    // ![alt](images/logo.png)
    name: "markdown",
    pattern: (filename) =>
      new RegExp(
        `(!\\[[^\\]]*\\]\\s*\\([^)]*?)(${escapeRegExp(filename)})(\\))`,
        "gi",
      ),
  },
];

export interface RewriteResult {
  content: string;
  replacements: number;
}

/**
 * Apply one rule for a single old -> new filename pair
 */
export function applyRule(
  rule: ReferenceRule,
  content: string,
  oldName: string,
  newName: string,
): RewriteResult {
  let replacements = 0;
  const next = content.replace(
    rule.pattern(oldName),
    (_match, before: string, _filename: string, after: string) => {
      replacements++;
      return `${before}${newName}${after}`;
    },
  );
  return { content: next, replacements };
}

/**
 * Apply every rule for every mapping entry to a piece of text
 *
 * @example
 * rewriteReferences('<img src="/img/a.jpg">', new Map([["a.jpg", "a.webp"]]))
 * // { content: '<img src="/img/a.webp">', replacements: 1 }
 */
export function rewriteReferences(
  content: string,
  mapping: ReadonlyMap<string, string>,
  rules: readonly ReferenceRule[] = REFERENCE_RULES,
): RewriteResult {
  let current = content;
  let replacements = 0;

  for (const [oldName, newName] of mapping) {
    for (const rule of rules) {
      const result = applyRule(rule, current, oldName, newName);
      current = result.content;
      replacements += result.replacements;
    }
  }

  return { content: current, replacements };
}
