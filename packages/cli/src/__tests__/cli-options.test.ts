/**
 * CLI options parsing tests
 */

import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions, parseInteger } from '../cli.js';

describe('parseCliOptions', () => {
  describe('string options', () => {
    it('should parse config option', () => {
      const result = parseCliOptions({ config: './my-config.json' });
      expect(result.config).toBe('./my-config.json');
    });

    it('should parse state option', () => {
      expect(parseCliOptions({ state: 'error' }).state).toBe('error');
    });

    it('should ignore values of the wrong type', () => {
      expect(parseCliOptions({ config: 42, percent: '50', debug: 'yes' })).toEqual({});
    });
  });

  describe('numeric options', () => {
    it('should parse watch options', () => {
      const result = parseCliOptions({ interval: 250, timeout: 5000 });
      expect(result.interval).toBe(250);
      expect(result.timeout).toBe(5000);
    });

    it('should parse simulate options', () => {
      const result = parseCliOptions({ total: 1000, chunk: 100, delay: 0 });
      expect(result).toEqual({ total: 1000, chunk: 100, delay: 0 });
    });

    it('should parse percent option', () => {
      expect(parseCliOptions({ percent: 42 }).percent).toBe(42);
    });
  });

  describe('flags', () => {
    it('should parse debug, atomic and showConfig flags', () => {
      expect(parseCliOptions({ debug: true, atomic: true, showConfig: true })).toEqual({
        debug: true,
        atomic: true,
        showConfig: true,
      });
      expect(parseCliOptions({ debug: false }).debug).toBe(false);
    });

    it('should parse noColor when color is false (Commander.js negated flag)', () => {
      // Commander.js converts --no-color to color: false
      const result = parseCliOptions({ color: false });
      expect(result.noColor).toBe(true);
    });

    it('should not set noColor when color is true', () => {
      const result = parseCliOptions({ color: true });
      expect(result.noColor).toBeUndefined();
    });
  });
});

describe('parseInteger', () => {
  it('should accept non-negative integers', () => {
    expect(parseInteger('0')).toBe(0);
    expect(parseInteger('1048576')).toBe(1048576);
  });

  it('should reject other values', () => {
    expect(() => parseInteger('-1')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('abc')).toThrow(InvalidArgumentError);
  });
});

describe('createProgram', () => {
  it('should register every command', () => {
    const program = createProgram();
    expect(program.name()).toBe('depot-progress');
    expect(program.commands.map((command) => command.name())).toEqual([
      'report',
      'simulate',
      'watch',
      'run',
    ]);
  });

  it('should share the common options across commands', () => {
    const program = createProgram();
    for (const command of program.commands) {
      const flags = command.options.map((option) => option.long);
      expect(flags).toEqual(
        expect.arrayContaining(['--config', '--atomic', '--debug', '--show-config', '--no-color']),
      );
    }
  });
});
