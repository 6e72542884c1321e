/**
 * Redacts AWS credentials and signatures from text headed for debug output
 */
export function redactSecrets(text: string): string {
  return text
    // Redact the access key id in a SigV4 credential scope
    .replace(/(Credential=)[^/\s",]+/g, '$1***REDACTED***')
    // Redact SigV4 signatures
    .replace(/(Signature=)[0-9a-f]+/gi, '$1***REDACTED***')
    // Redact session tokens in headers, JSON or query strings
    .replace(/(x-amz-security-token"?\s*[:=]\s*"?)[^"\s,&]+/gi, '$1***REDACTED***')
    // Redact tokens in environment variables (TOKEN, SECRET, PASSWORD, KEY, etc)
    .replace(/(\w*(?:TOKEN|SECRET|PASSWORD|KEY|AUTH)\w*)=(\S+)/gi, '$1=***REDACTED***')
    // Redact bare access key ids
    .replace(/\b((?:AKIA|ASIA)[A-Z0-9]{16})\b/g, '***REDACTED***');
}
