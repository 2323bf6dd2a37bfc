/**
 * PromptGuard detects prompt-injection attempts in untrusted text
 */

const INJECTION_PATTERNS: RegExp[] = [
  /ignore\s+(all\s+)?(previous|prior)\s+instructions/i,
  /ignore\s+system\s+prompt/i,
  /you\s+are\s+now\s+a/i,
  /override\s+system/i,
  /simulat(e|ing)\s+mode/i,
  /jailbreak/i,
  /DAN\s+mode/i,
  /system\s+override/i
];

export class PromptGuard {
  private readonly patterns: RegExp[];

  constructor(patterns: RegExp[] = INJECTION_PATTERNS) {
    // Patterns carry no 'g' flag so test() stays stateless
    this.patterns = patterns.map(pattern => new RegExp(pattern.source, pattern.flags.replace('g', '')));
  }

  /**
   * Returns true when the text is safe, false when an injection pattern matches.
   * Text is NFKC-normalized first so full-width and compatibility forms
   * cannot slip past the patterns.
   */
  validate(text: string): boolean {
    if (!text) {
      return true;
    }

    const normalized = text.normalize('NFKC');
    return !this.patterns.some(pattern => pattern.test(normalized));
  }
}
