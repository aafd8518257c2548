/**
 * Heuristic naming checks for category titles and item names.
 * Best-effort only: a clean result is not a guarantee of consistency.
 */

import type { AnalysisConfig } from "../config/schema.js";

/** Words that stay lowercase inside a title-cased name. */
const MINOR_WORDS = new Set([
  "a", "an", "and", "as", "at", "by", "for", "from", "in", "of", "on", "or", "per", "the", "to", "via", "with",
]);

function startsWithLetter(word: string): boolean {
  return /^\p{L}/u.test(word);
}

function isCapitalized(word: string): boolean {
  return /^\p{Lu}/u.test(word);
}

function checkTitleCase(words: string[]): string | null {
  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    if (!startsWithLetter(word)) continue;
    const minor = i > 0 && MINOR_WORDS.has(word.toLowerCase());
    if (!minor && !isCapitalized(word)) {
      return `"${word}" should be capitalized (title case)`;
    }
  }
  return null;
}

function checkSentenceCase(words: string[]): string | null {
  const first = words.find(startsWithLetter);
  if (first && !isCapitalized(first)) {
    return `"${first}" should be capitalized (sentence case)`;
  }
  return null;
}

/**
 * Return the naming problems found in `name`, empty when it conforms.
 */
export function namingIssues(name: string, naming: AnalysisConfig["naming"]): string[] {
  const issues: string[] = [];

  if (name !== name.trim()) issues.push("leading or trailing whitespace");
  if (/\s{2,}/.test(name.trim())) issues.push("repeated whitespace");

  const words = name.trim().split(/\s+/).filter(Boolean);

  if (naming.style === "title_case") {
    const issue = checkTitleCase(words);
    if (issue) issues.push(issue);
  } else if (naming.style === "sentence_case") {
    const issue = checkSentenceCase(words);
    if (issue) issues.push(issue);
  }

  const tokens = new Set(name.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean));
  for (const token of naming.disallowedTokens) {
    if (tokens.has(token.toLowerCase())) issues.push(`contains disallowed token "${token}"`);
  }

  return issues;
}
