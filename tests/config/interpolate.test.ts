import { describe, it, expect } from 'vitest';
import { expandString, interpolateDocument } from '../../src/config/interpolate.js';

describe('expandString', () => {
  it('should substitute set variables and defaults', () => {
    expect(expandString('${HOST}:${PORT:-8080}', { HOST: 'db' })).toBe('db:8080');
  });

  it('should prefer a set variable over its default, even when empty', () => {
    expect(expandString('${PORT:-8080}', { PORT: '9090' })).toBe('9090');
    expect(expandString('[${PORT:-8080}]', { PORT: '' })).toBe('[]');
  });

  it('should leave an unset variable in place and report it', () => {
    const missing: string[] = [];
    expect(expandString('${TOKEN}/path', {}, missing)).toBe('${TOKEN}/path');
    expect(missing).toEqual(['TOKEN']);
  });

  it('should ignore bare $NAME references', () => {
    expect(expandString('$cluster_name', { cluster_name: 'prod' })).toBe('$cluster_name');
  });
});

describe('interpolateDocument', () => {
  it('should expand strings at every depth', () => {
    const result = interpolateDocument(
      { provider: { host: '${OLLAMA_HOST:-http://localhost:11434}' }, args: ['--ctx', '${CTX}'], port: 1 },
      { CTX: 'prod' }
    );
    expect(result.issues).toEqual([]);
    expect(result.value).toEqual({
      provider: { host: 'http://localhost:11434' },
      args: ['--ctx', 'prod'],
      port: 1,
    });
  });

  it('should report each missing variable by name and path without its value', () => {
    const result = interpolateDocument(
      { provider: { api_key: '${API_KEY}' }, mcp_servers: { wc: { args: ['${KUBECONFIG}'] } } },
      { UNRELATED: 'test-secret' }
    );
    expect(result.issues).toEqual([
      { path: 'provider.api_key', message: 'environment variable ${API_KEY} is not set and has no default' },
      {
        path: 'mcp_servers.wc.args[0]',
        message: 'environment variable ${KUBECONFIG} is not set and has no default',
      },
    ]);
  });
});
