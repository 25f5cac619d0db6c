import type { DescriptionClassifier } from './program.js';

/**
 * Picks the first descendant whose class list carries one of the given
 * substrings (case-insensitive) and returns its trimmed text.
 */
export class ClassTokenClassifier implements DescriptionClassifier {
  private readonly tokens: string[];

  constructor(tokens: readonly string[] = ['desc', 'summary', 'text']) {
    this.tokens = tokens.map((t) => t.toLowerCase());
  }

  classify(node: Element): string | undefined {
    for (const el of Array.from(node.querySelectorAll('[class]'))) {
      if (!this.matches(el)) continue;
      const text = el.textContent?.trim();
      return text ? text : undefined;
    }
    return undefined;
  }

  private matches(el: Element): boolean {
    return Array.from(el.classList).some((cls) => {
      const lower = cls.toLowerCase();
      return this.tokens.some((token) => lower.includes(token));
    });
  }
}
