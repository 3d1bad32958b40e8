/**
 * Keyword capability matcher.
 *
 * A capability matches a portion of text when one of its keywords starts a
 * word in it (case-insensitive). Every capability name is also a keyword of
 * itself, so capabilities added by configuration match by name with no
 * table entry.
 */
import type { CapabilityMatcher, KeywordTable } from './types.js';

export const DEFAULT_KEYWORDS: KeywordTable = {
  crm: ['lead', 'customer', 'opportunity', 'crm', 'contact'],
  sales: ['sale', 'order', 'quotation', 'quote'],
  inventory: ['stock', 'inventory', 'warehouse', 'product'],
  accounting: ['account', 'financial', 'invoice', 'payment', 'bill'],
  hr: ['employee', 'hr', 'attendance', 'recruitment', 'payroll'],
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Index of the first word starting with `keyword`, or -1. */
function firstWordPrefix(text: string, keyword: string): number {
  const pattern = new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(keyword)}`, 'iu');
  const found = pattern.exec(text);
  if (!found) return -1;
  // the match may include the leading separator
  return found[0].length > keyword.length ? found.index + 1 : found.index;
}

/**
 * Create a keyword matcher. `keywords` replaces the default entry of each
 * capability it names and leaves the others as they are.
 */
export function createKeywordMatcher(keywords?: KeywordTable): CapabilityMatcher {
  const table: KeywordTable = { ...DEFAULT_KEYWORDS, ...keywords };

  return {
    match(portion: string, capabilities: readonly string[]): string[] {
      const hits: { capability: string; at: number; order: number }[] = [];

      capabilities.forEach((capability, order) => {
        const words = new Set([capability, ...(table[capability] ?? [])]);
        let at = -1;
        for (const word of words) {
          if (word.trim() === '') continue;
          const index = firstWordPrefix(portion, word);
          if (index >= 0 && (at < 0 || index < at)) {
            at = index;
          }
        }
        if (at >= 0) {
          hits.push({ capability, at, order });
        }
      });

      return hits.sort((a, b) => a.at - b.at || a.order - b.order).map((hit) => hit.capability);
    },
  };
}
