import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { parseJsonObject, parsePositiveInteger } from '../../../src/utils/options.js';

describe('parsePositiveInteger', () => {
  it('should accept whole positive numbers', () => {
    expect(parsePositiveInteger('150', 'max-records')).toBe(150);
  });

  it.each(['0', '-3', '0.5', '2.5', 'ten', ''])('should reject "%s"', (value) => {
    expect(() => parsePositiveInteger(value, 'max-records')).toThrow(InvalidArgumentError);
  });

  it('should name the flag in the message', () => {
    expect(() => parsePositiveInteger('0.5', 'max-records')).toThrow(
      'Option --max-records must be a positive whole number, got "0.5".',
    );
  });
});

describe('parseJsonObject', () => {
  it('should parse a JSON object', () => {
    expect(parseJsonObject('{"upload_id":"up-1"}', 'filter')).toEqual({ upload_id: 'up-1' });
  });

  it.each(['[1,2]', 'null', '"text"'])('should reject the non-object %s', (value) => {
    expect(() => parseJsonObject(value, 'filter')).toThrow('Option --filter must be a JSON object.');
  });

  it('should reject invalid JSON', () => {
    expect(() => parseJsonObject('{upload_id', 'filter')).toThrow(InvalidArgumentError);
  });
});
