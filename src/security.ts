const KEY_ID_PATTERN = /\b(?:AKIA|ASIA)[A-Z0-9]{16}\b/g;

export function redactSecrets(input: string): string {
  const patterns = [
    /(aws_secret_access_key\s*[=:]\s*)([^\s]+)/gi,
    /(aws_session_token\s*[=:]\s*)([^\s]+)/gi,
    /(token\s*[=:]\s*)([^\s]+)/gi,
    /(password\s*[=:]\s*)([^\s]+)/gi,
    /(secret\s*[=:]\s*)([^\s]+)/gi,
  ];

  let output = input.replace(KEY_ID_PATTERN, '[REDACTED]');
  for (const pattern of patterns) {
    output = output.replace(pattern, '$1[REDACTED]');
  }

  return output;
}

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') return redactSecrets(value);
  if (Array.isArray(value)) return value.map(redactValue);
  if (typeof value === 'object' && value !== null) return redactRecord(value);
  return value;
}

/** Copy of `data` with every nested string value redacted. */
export function redactRecord(data: object): { [key: string]: unknown } {
  return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, redactValue(value)]));
}
