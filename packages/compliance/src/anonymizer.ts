/**
 * ContentAnonymizer: best-effort redaction of identifying substrings.
 *
 * Pattern matching cannot recognize every personal reference; callers
 * present anonymized exports as "reduced", not "safe to publish".
 *
 * @example
 * ```typescript
 * const anonymizer = createAnonymizer({ names: ['Jordan'] });
 * anonymizer.anonymize('Ask Jordan at jordan@example.com').text;
 * // 'Ask [NAME] at [EMAIL]'
 * ```
 */

import type { AnonymizationResult, AnonymizerConfig, RedactionPattern } from './types.js';

/**
 * Built-in rules, applied in order. Earlier rules win because their
 * placeholders are never matched by later ones.
 */
export const DEFAULT_REDACTION_PATTERNS: readonly RedactionPattern[] = [
  { name: 'url', pattern: /\bhttps?:\/\/[^\s]+/gi, replacement: '[URL]' },
  {
    name: 'email',
    pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
    replacement: '[EMAIL]',
  },
  { name: 'phone', pattern: /\+?\d[\d\s().-]{6,}\d/g, replacement: '[PHONE]' },
  { name: 'handle', pattern: /(?<![\w@])@[A-Za-z0-9_]{2,}/g, replacement: '[HANDLE]' },
  // Upper-case acronyms are usually company or project names
  { name: 'organization', pattern: /(?<!\[)\b[A-Z]{2,}\b(?!\])/g, replacement: '[ORG]' },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class ContentAnonymizer {
  private readonly rules: readonly RedactionPattern[];

  constructor(config: AnonymizerConfig = {}) {
    const nameRules: RedactionPattern[] = (config.names ?? [])
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
      .map((name) => ({
        name: 'name',
        pattern: new RegExp(`\\b${escapeRegExp(name)}\\b`, 'gi'),
        replacement: '[NAME]',
      }));

    const base = config.replaceDefaults ? [] : DEFAULT_REDACTION_PATTERNS;
    this.rules = [...base, ...nameRules, ...(config.patterns ?? [])];
  }

  anonymize(text: string): AnonymizationResult {
    let redactions = 0;
    let result = text;

    for (const rule of this.rules) {
      result = result.replace(rule.pattern, () => {
        redactions++;
        return rule.replacement;
      });
    }

    return { text: result, redactions };
  }

  /** Whether any rule would redact part of `text` */
  containsIdentifyingContent(text: string): boolean {
    return this.rules.some((rule) => {
      rule.pattern.lastIndex = 0;
      const found = rule.pattern.test(text);
      rule.pattern.lastIndex = 0;
      return found;
    });
  }

  /** Names of the active rules, in application order */
  get ruleNames(): string[] {
    return this.rules.map((r) => r.name);
  }
}

export function createAnonymizer(config?: AnonymizerConfig): ContentAnonymizer {
  return new ContentAnonymizer(config);
}
