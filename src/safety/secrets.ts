/**
 * Secret masking for outbound chat messages.
 *
 * Two passes: exact configured secret values first, then well-known token
 * shapes. Anything that matches is replaced with a fixed marker, so the
 * chat channel only ever receives a human-readable summary.
 */

export const MASK = '***';

/**
 * Token shapes that are masked even when not configured.
 */
const SECRET_PATTERNS: readonly { name: string; pattern: RegExp; replace: string }[] = [
  // Slack bot/user/app tokens
  { name: 'slack_token', pattern: /\bxox[abposr]-[A-Za-z0-9-]{8,}/g, replace: MASK },
  // Slack incoming webhook paths
  { name: 'slack_webhook', pattern: /hooks\.slack\.com\/services\/[A-Za-z0-9/_-]+/g, replace: `hooks.slack.com/services/${MASK}` },
  // Telegram bot tokens: <bot id>:<35 char secret>
  { name: 'telegram_token', pattern: /\b\d{6,12}:[A-Za-z0-9_-]{30,}/g, replace: MASK },
  // Authorization headers
  { name: 'bearer', pattern: /\b(Bearer|Basic)\s+[A-Za-z0-9._~+/=-]{8,}/gi, replace: `$1 ${MASK}` },
  // key=value / key: value credentials
  {
    name: 'credential_pair',
    pattern: /\b(token|api[_-]?key|secret|password|passwd)(\s*[=:]\s*)("?)[^\s"',;]+\3/gi,
    replace: `$1$2$3${MASK}$3`,
  },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Mask configured secret values and recognizable tokens in `text`.
 *
 * @param secrets - Exact values to remove (bot tokens, webhook URLs, keys)
 */
export function maskSecrets(text: string, secrets: readonly string[] = []): string {
  let masked = text;

  // Longest first so a secret containing another is masked whole
  const values = secrets
    .filter((s) => s.length > 0)
    .sort((a, b) => b.length - a.length);

  for (const value of values) {
    masked = masked.replace(new RegExp(escapeRegExp(value), 'g'), MASK);
  }

  for (const { pattern, replace } of SECRET_PATTERNS) {
    masked = masked.replace(pattern, replace);
  }

  return masked;
}
