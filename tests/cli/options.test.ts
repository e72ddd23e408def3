import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { collectVariable, parseTimeoutSeconds } from '../../src/cli/options.js';

describe('parseTimeoutSeconds', () => {
  it('should accept whole seconds within the request bound', () => {
    expect(parseTimeoutSeconds('1')).toBe(1);
    expect(parseTimeoutSeconds('120')).toBe(120);
    expect(parseTimeoutSeconds('600')).toBe(600);
  });

  it.each(['0', '-5', '601', '3000000', '2.5', 'soon', ''])('should reject %j', (value) => {
    expect(() => parseTimeoutSeconds(value)).toThrow(InvalidArgumentError);
  });

  it('should name the bound in the message', () => {
    expect(() => parseTimeoutSeconds('-5')).toThrow("Expected whole seconds between 1 and 600, got '-5'");
  });
});

describe('collectVariable', () => {
  it('should accumulate key=value pairs', () => {
    const first = collectVariable('cluster=prod', {});
    expect(collectVariable('query=a=b', first)).toEqual({ cluster: 'prod', query: 'a=b' });
  });

  it('should reject a value without a key', () => {
    expect(() => collectVariable('=prod', {})).toThrow(InvalidArgumentError);
    expect(() => collectVariable('cluster', {})).toThrow("Variables take the form key=value, got 'cluster'");
  });
});
