/**
 * Content scanner for prompt injection and obfuscated content.
 *
 * Idea titles and descriptions go straight into the categorization prompt,
 * so they are scanned before an idea is stored. Comments are scanned too,
 * since they are shown next to AI output.
 *
 * Pattern matching only catches the obvious cases.
 */

export interface ScanResult {
  flagged: boolean;
  reasons: string[];
}

export interface ScanInput {
  title?: string;
  description?: string;
  content?: string;
}

// Titles are one line of plain text; links belong in the description
const URL_SENSITIVE_FIELDS: Array<keyof ScanInput> = ['title'];

const ALL_SCANNABLE_FIELDS: Array<keyof ScanInput> = ['title', 'description', 'content'];

const MAX_ZERO_WIDTH = 5;

export class ContentScanner {
  private injectionPatterns: Array<{ pattern: RegExp; label: string }> = [
    // Direct instruction override
    {
      pattern: /ignore\s+(your\s+)?(previous|prior|all|above)\s+(instructions|directives|rules|prompts)/i,
      label: 'injection: instruction override',
    },
    {
      pattern: /ignore\s+your\s+(instructions|directives|rules|prompts)/i,
      label: 'injection: instruction override',
    },
    {
      pattern: /disregard\s+(your\s+)?(previous|prior|all|above)/i,
      label: 'injection: instruction override',
    },
    {
      pattern: /ignorera\s+(alla\s+)?(tidigare|föregående|dina)\s+(instruktioner|regler)/i,
      label: 'injection: instruction override',
    },

    // System prompt markers
    {
      pattern: /\[SYSTEM\]|\[\[SYSTEM\]\]|<<SYS>>|<\|im_start\|>system/i,
      label: 'injection: system prompt marker',
    },
    {
      pattern: /^SYSTEM:/im,
      label: 'injection: system prompt marker',
    },
    {
      pattern: /new\s+instructions?\s*:/i,
      label: 'injection: instruction injection',
    },

    // Forcing the categorization answer
    {
      pattern: /(respond|answer|reply)\s+(only\s+)?with\s+(category|priority)\b/i,
      label: 'injection: answer steering',
    },
    {
      pattern: /set\s+(the\s+)?(priority|confidence)\s+(to|=)\s*(high|1(\.0)?|100)/i,
      label: 'injection: answer steering',
    },

    // Role reassignment
    {
      pattern: /you\s+are\s+now\s+(a|an)\s/i,
      label: 'injection: role reassignment',
    },
    {
      pattern: /from\s+now\s+on,?\s+you\s+(are|will|should|must)/i,
      label: 'injection: role reassignment',
    },

    // Secret extraction
    {
      pattern: /(output|print|reveal|show|send|share|display|leak)\s+(your|the)\s+(api\s*key|secret|token|password|system\s*prompt|credentials|private\s*key)/i,
      label: 'injection: secret extraction attempt',
    },
  ];

  scan(input: ScanInput): ScanResult {
    const reasons: string[] = [];

    for (const field of ALL_SCANNABLE_FIELDS) {
      const text = input[field];
      if (!text) continue;

      for (const { pattern, label } of this.injectionPatterns) {
        if (pattern.test(text)) {
          reasons.push(`${label} (in ${field})`);
        }
      }
    }

    for (const field of URL_SENSITIVE_FIELDS) {
      const text = input[field];
      if (!text) continue;

      if (/https?:\/\/\S+/i.test(text)) {
        reasons.push(`suspicious url in ${field}`);
      }
    }

    for (const field of ALL_SCANNABLE_FIELDS) {
      const text = input[field];
      if (!text) continue;

      const zeroWidthCount = (text.match(/[\u200b\u200c\u200d\u2060\ufeff]/g) ?? []).length;

      if (zeroWidthCount > MAX_ZERO_WIDTH) {
        reasons.push(`obfuscation: excessive zero-width characters in ${field} (${zeroWidthCount})`);
      }
    }

    // Long runs of the base64 alphabet
    for (const field of ALL_SCANNABLE_FIELDS) {
      const text = input[field];
      if (!text) continue;

      if (/[A-Za-z0-9+/]{40,}={0,2}/.test(text)) {
        reasons.push(`suspicious base64-encoded block in ${field}`);
      }
    }

    return {
      flagged: reasons.length > 0,
      reasons,
    };
  }
}
