/**
 * Secret redaction applied to everything that leaves a pipeline run
 */

export const REDACTED = '***';

/**
 * Replace every occurrence of each secret in text
 */
export function redactSecrets(text: string, secrets: ReadonlyArray<string | undefined>): string {
  let result = text;
  for (const secret of secrets) {
    if (!secret) continue;
    result = result.split(secret).join(REDACTED);
  }
  return result;
}
