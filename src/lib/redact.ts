/**
 * Credential redaction for anything that leaves the process: error
 * messages in envelopes, diagnostic text from the cluster API.
 */

export const REDACTED = '[REDACTED]';

// Shapes credential material takes even when the literal value is unknown
const CREDENTIAL_PATTERNS: RegExp[] = [
  /k8s-aws-v1\.[A-Za-z0-9_-]+/g,
  /(Bearer\s+)[^\s"',]+/gi,
  /(X-Amz-(?:Signature|Credential|Security-Token)=)[^&\s"']+/gi,
  /("?token"?\s*[:=]\s*"?)[^\s"',}]+/gi,
];

/**
 * Replace every known secret and every credential-shaped substring.
 */
export function redactSecrets(text: string, secrets: readonly string[] = []): string {
  let cleaned = text;

  for (const secret of secrets) {
    if (secret.length > 0) {
      cleaned = cleaned.split(secret).join(REDACTED);
    }
  }

  for (const pattern of CREDENTIAL_PATTERNS) {
    cleaned = cleaned.replace(pattern, (match: string, prefix?: unknown) =>
      typeof prefix === 'string' && match.startsWith(prefix) ? `${prefix}${REDACTED}` : REDACTED,
    );
  }

  return cleaned;
}
