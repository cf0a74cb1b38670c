import { describe, it, expect } from 'vitest';
import { envBool, envInt, envList, envOptionalString, envString } from '../config/env.js';

describe('env helpers', () => {
  it('reads trimmed strings with a fallback', () => {
    expect(envString('NAME', 'default', { NAME: '  relay ' })).toBe('relay');
    expect(envString('NAME', 'default', { NAME: '   ' })).toBe('default');
    expect(envString('NAME', 'default', {})).toBe('default');
  });

  it('reads optional strings', () => {
    expect(envOptionalString('NAME', { NAME: 'x' })).toBe('x');
    expect(envOptionalString('NAME', { NAME: '' })).toBeUndefined();
  });

  it('parses integers', () => {
    expect(envInt('PORT', 9092, { PORT: '19092' })).toBe(19092);
    expect(envInt('PORT', 9092, { PORT: 'abc' })).toBe(9092);
    expect(envInt('ACKS', 1, { ACKS: '-1' })).toBe(-1);
  });

  it('parses booleans', () => {
    expect(envBool('SSL', false, { SSL: 'True' })).toBe(true);
    expect(envBool('SSL', true, { SSL: 'no' })).toBe(false);
    expect(envBool('SSL', true, {})).toBe(true);
  });

  it('splits lists', () => {
    expect(envList('BROKERS', ['a'], { BROKERS: 'b:1, c:2 ,' })).toEqual(['b:1', 'c:2']);
    expect(envList('BROKERS', ['a'], { BROKERS: ' , ' })).toEqual(['a']);
  });
});
