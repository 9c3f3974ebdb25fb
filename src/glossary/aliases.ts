/**
 * Alias generation for glossary terms.
 *
 * A term such as "Pertussis (Whooping Cough)" is searchable under its full
 * case-folded form and under each half of the parenthetical pair:
 *   "pertussis (whooping cough)", "pertussis", "whooping cough"
 */

import { foldCase } from './fold-case.js';

// Greedy on both sides: <main> runs to the last " (" that still has a ")" after it,
// <alt> runs to the last ")". Nested parentheses inside <alt> stay as they are.
const PARENTHETICAL = /(.+)\s\((.+)\)/;

export function generateAliases(term: string): Set<string> {
  const lower = foldCase(term);
  const aliases = new Set<string>([lower]);

  const match = PARENTHETICAL.exec(lower);
  if (match) {
    for (const part of [match[1], match[2]]) {
      const trimmed = part.trim();
      if (trimmed) aliases.add(trimmed);
    }
  }

  return aliases;
}
