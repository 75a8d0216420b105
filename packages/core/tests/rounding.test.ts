import { describe, it, expect } from 'vitest';
import { roundHalfEven } from '../src/rounding.js';

describe('roundHalfEven', () => {
  it('sends exact ties to the even digit', () => {
    expect(roundHalfEven(6.25, 1)).toBe(6.2);
    expect(roundHalfEven(31.25, 1)).toBe(31.2);
    expect(roundHalfEven(18.75, 1)).toBe(18.8);
    expect(roundHalfEven(0.5, 0)).toBe(0);
    expect(roundHalfEven(1.5, 0)).toBe(2);
  });

  it('rounds values stored off the tie by their exact digits', () => {
    expect(roundHalfEven(6.35, 1)).toBe(6.3);
    expect(roundHalfEven(2.675, 2)).toBe(2.67);
  });

  it('rounds ordinary values to nearest', () => {
    expect(roundHalfEven((1 / 3) * 100, 1)).toBe(33.3);
    expect(roundHalfEven((2 / 3) * 100, 1)).toBe(66.7);
    expect(roundHalfEven(50, 1)).toBe(50);
  });

  it('keeps the sign', () => {
    expect(roundHalfEven(-6.25, 1)).toBe(-6.2);
  });
});
