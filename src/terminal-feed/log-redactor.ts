/**
 * log-redactor.ts
 * Scrubs credentials out of log lines before they are buffered or streamed
 */

const BUILT_IN_REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\b(authorization)\s*:\s*bearer\s+[a-z0-9._\-+\/=]+/gi, '$1: Bearer [REDACTED]'],
  [/\bbearer\s+[a-z0-9._\-+\/=]+/gi, 'Bearer [REDACTED]'],
  [/("?(?:api[-_]?key|token|secret|password|passwd|cookie)"?\s*[:=]\s*)(".*?"|[^,\s;]+)/gi, '$1[REDACTED]'],
];

export const REDACTED = '[REDACTED]';

export class LogRedactor {
  private readonly extraPatterns: RegExp[] = [];
  /** Operator patterns that failed to compile and are ignored */
  readonly invalidPatterns: string[] = [];

  /**
   * @param extraPatterns additional regexes separated by `||`; every match becomes [REDACTED]
   */
  constructor(extraPatterns = '') {
    for (const raw of extraPatterns.split('||')) {
      const pattern = raw.trim();
      if (!pattern) {
        continue;
      }
      try {
        this.extraPatterns.push(new RegExp(pattern, 'g'));
      } catch {
        this.invalidPatterns.push(pattern);
      }
    }
  }

  redact(text: string): string {
    let out = text;
    for (const [pattern, replacement] of BUILT_IN_REPLACEMENTS) {
      out = out.replace(pattern, replacement);
    }
    for (const pattern of this.extraPatterns) {
      out = out.replace(pattern, REDACTED);
    }
    return out;
  }
}
