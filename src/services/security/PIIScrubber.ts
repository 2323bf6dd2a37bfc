/**
 * PIIScrubber replaces structured PII with placeholders before text leaves
 * the process, and restores it in the response
 */

import { PIILabel, PIIMapping } from '../../types/models';

interface PIIDetector {
  label: PIILabel;
  pattern: RegExp;
}

const DETECTORS: PIIDetector[] = [
  { label: 'EMAIL', pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g },
  { label: 'PHONE', pattern: /\b(\+\d{1,2}\s?)?(\(?\d{3}\)?[\s.-]?)?\d{3}[\s.-]?\d{4}\b/g },
  { label: 'SSN', pattern: /\b\d{3}-\d{2}-\d{4}\b/g },
  { label: 'IP_ADDRESS', pattern: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g }
];

export interface ScrubResult {
  text: string;
  mapping: PIIMapping;
}

export class PIIScrubber {
  /**
   * Detectors run in fixed order (EMAIL, PHONE, SSN, IP_ADDRESS) over the
   * progressively scrubbed text. Placeholders are numbered per label in
   * order of first appearance; a repeated value reuses its placeholder.
   */
  scrub(text: string): ScrubResult {
    const mapping: PIIMapping = [];
    if (!text) {
      return { text, mapping };
    }

    let scrubbed = text;

    for (const detector of DETECTORS) {
      const byValue = new Map<string, string>();
      const pattern = new RegExp(detector.pattern.source, detector.pattern.flags);

      scrubbed = scrubbed.replace(pattern, (match: string) => {
        const existing = byValue.get(match);
        if (existing) {
          return existing;
        }

        const placeholder = `<${detector.label}_${byValue.size + 1}>`;
        byValue.set(match, placeholder);
        mapping.push({ placeholder, original: match });
        return placeholder;
      });
    }

    return { text: scrubbed, mapping };
  }

  /**
   * Literal replacement of every placeholder with its original value
   */
  restore(text: string, mapping: PIIMapping): string {
    if (!text || mapping.length === 0) {
      return text;
    }

    let restored = text;
    for (const { placeholder, original } of mapping) {
      restored = restored.split(placeholder).join(original);
    }
    return restored;
  }
}
