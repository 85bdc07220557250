/**
 * Unit tests for command-line option parsers.
 */

import { InvalidArgumentError } from 'commander';
import { collectView, parsePositiveInteger } from '../../utils/cli-options.js';

describe('parsePositiveInteger', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInteger('80')).toBe(80);
  });

  it.each(['0', '-3', '1.5', 'wide', ''])('should reject %p', (value) => {
    expect(() => parsePositiveInteger(value)).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInteger(value)).toThrow('Must be a positive integer.');
  });
});

describe('collectView', () => {
  it('should start a list from the first value', () => {
    expect(collectView('connections')).toEqual(['connections']);
  });

  it('should append repeated values in order', () => {
    const views = collectView('remote-addresses', collectView('processes'));
    expect(views).toEqual(['processes', 'remote-addresses']);
  });

  it('should reject unknown views', () => {
    expect(() => collectView('hosts')).toThrow(
      'Must be one of: processes, connections, remote-addresses.'
    );
  });
});
