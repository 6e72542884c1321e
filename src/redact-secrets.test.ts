import { redactSecrets } from './redact-secrets';

describe('redactSecrets', () => {
  it('should redact the key id and signature in an authorization header', () => {
    const header =
      'AWS4-HMAC-SHA256 Credential=test-access-key/20240102/us-east-1/logs/aws4_request, ' +
      'SignedHeaders=host;x-amz-date, Signature=0123abcdef';

    expect(redactSecrets(header)).toBe(
      'AWS4-HMAC-SHA256 Credential=***REDACTED***/20240102/us-east-1/logs/aws4_request, ' +
        'SignedHeaders=host;x-amz-date, Signature=***REDACTED***'
    );
  });

  it('should redact session tokens in serialized headers', () => {
    const headers = JSON.stringify({ 'x-amz-security-token': 'test-session-token', host: 'example.com' });

    expect(redactSecrets(headers)).toBe('{"x-amz-security-token":"***REDACTED***","host":"example.com"}');
  });

  it('should redact secrets in environment assignments', () => {
    expect(redactSecrets('AWS_SECRET_ACCESS_KEY=test-secret cwtail groups')).toBe(
      'AWS_SECRET_ACCESS_KEY=***REDACTED*** cwtail groups'
    );
  });

  it('should redact bare access key ids', () => {
    expect(redactSecrets('using AKIAEXAMPLEEXAMPLE00 for requests')).toBe('using ***REDACTED*** for requests');
  });

  it('should leave ordinary text alone', () => {
    expect(redactSecrets('log /app/web --start 5m')).toBe('log /app/web --start 5m');
  });
});
