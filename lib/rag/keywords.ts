/**
 * Keyword Expansion
 *
 * Query-side synonyms for the keyword scorer. When any trigger appears as a
 * substring of the lower-cased query, the rule's keywords join the query
 * tokens. The default rules target tax and payroll documents; pass your own
 * list to the scorer to replace them.
 */

export interface KeywordExpansionRule {
  triggers: string[];
  keywords: string[];
}

export const DEFAULT_EXPANSION_RULES: readonly KeywordExpansionRule[] = [
  {
    triggers: ["tax", "tds"],
    keywords: ["tax", "tds", "deducted", "deduction", "amount", "challan", "deposited"],
  },
  {
    triggers: ["quarter", "quarterly"],
    keywords: [
      "q1", "q2", "q3", "q4", "quarter", "quarterly",
      "april", "june", "july", "september", "october", "december", "january", "march",
    ],
  },
  {
    triggers: ["salary", "income"],
    keywords: ["salary", "income", "gross", "net", "allowance", "exemption", "section"],
  },
  {
    triggers: ["deduction", "section"],
    keywords: ["deduction", "section", "16", "10", "chapter", "vi-a", "80c", "80d"],
  },
];

export function expandKeywords(
  tokens: Set<string>,
  query: string,
  rules: readonly KeywordExpansionRule[] = DEFAULT_EXPANSION_RULES
): Set<string> {
  const lowerQuery = query.toLowerCase();
  const expanded = new Set(tokens);

  for (const rule of rules) {
    if (rule.triggers.some((trigger) => lowerQuery.includes(trigger))) {
      for (const keyword of rule.keywords) {
        expanded.add(keyword);
      }
    }
  }

  return expanded;
}
