/**
 * Masks contact details and card numbers in text bound for log lines.
 * Order matters: card numbers first so the phone pattern does not eat them.
 */
const RULES: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  { pattern: /[\w.%+-]+@[\w.-]+\.[a-z]{2,}/gi, replacement: '[EMAIL_REDACTED]' },
  { pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g, replacement: '[CC_REDACTED]' },
  { pattern: /\+?\d[\d\s\-().]{7,}\d/g, replacement: '[PHONE_REDACTED]' },
];

export function redactPII(input: string): string {
  return RULES.reduce((text, rule) => text.replace(rule.pattern, rule.replacement), input);
}

/**
 * External user ids are phone numbers on WhatsApp. Logs keep the last four
 * characters so a session can still be followed across lines.
 */
export function maskUserId(userId: string): string {
  const bare = userId.startsWith('whatsapp:') ? userId.slice('whatsapp:'.length) : userId;
  if (bare.length <= 4) return '****';
  return '*'.repeat(Math.min(bare.length - 4, 8)) + bare.slice(-4);
}
