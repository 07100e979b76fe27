import { describe, test, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseTimeout, toSyncOptions } from '../src/commands/options';

describe('command options', () => {
  test('parseTimeout accepts positive integers', () => {
    expect(parseTimeout('2500')).toBe(2500);
  });

  test.each(['0', '-5', '1.5', 'soon'])('parseTimeout rejects %s', value => {
    expect(() => parseTimeout(value)).toThrow(InvalidArgumentError);
  });

  test('toSyncOptions maps CLI names onto sync settings', () => {
    expect(
      toSyncOptions({ dir: '/data', branch: 'dev', timeout: 100, apiUrl: 'https://api.example.test' })
    ).toEqual({ dataDir: '/data', branch: 'dev', timeoutMs: 100, apiUrl: 'https://api.example.test' });
  });
});
