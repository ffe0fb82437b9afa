import { describe, it, expect } from 'vitest';
import {
  addNoOverflow,
  mulNoOverflow,
  shiftNoOverflow,
  maxPlus1,
  widthOfLeftShift
} from '../../src/arith/Width.js';

const WIDTHS = [1, 2, 3, 4, 5, 6, 7, 8];

describe('Width helpers', () => {
  it('should compute max(a, b) + 1', () => {
    expect(maxPlus1(3, 5)).toBe(6);
    expect(maxPlus1(5, 3)).toBe(6);
    expect(maxPlus1(2, 2)).toBe(3);
  });

  it('should compute the width of a left shift', () => {
    expect(widthOfLeftShift(16, 2)).toBe(19);
    expect(widthOfLeftShift(8, 3)).toBe(15);
    expect(widthOfLeftShift(4, 1)).toBe(5);
  });
});

describe('Overflow predicates', () => {
  it('should match the addition bound exactly over 1..8', () => {
    for (const w of WIDTHS) {
      for (const a of WIDTHS) {
        for (const b of WIDTHS) {
          expect(addNoOverflow(w, a, b)).toBe(w >= Math.max(a, b) + 1);
        }
      }
    }
  });

  it('should match the multiplication bound exactly over 1..8', () => {
    for (const w of WIDTHS) {
      for (const a of WIDTHS) {
        for (const b of WIDTHS) {
          expect(mulNoOverflow(w, a, b)).toBe(w >= a + b);
        }
      }
    }
  });

  it('should match the left shift bound exactly over 1..8', () => {
    for (const w of WIDTHS) {
      for (const v of WIDTHS) {
        for (const s of WIDTHS) {
          expect(shiftNoOverflow(w, v, s)).toBe(w >= v + (2 ** s - 1));
        }
      }
    }
  });

  it('should accept the minimum width and reject one bit less', () => {
    expect(addNoOverflow(9, 8, 3)).toBe(true);
    expect(addNoOverflow(8, 8, 3)).toBe(false);
    expect(mulNoOverflow(16, 8, 8)).toBe(true);
    expect(mulNoOverflow(15, 8, 8)).toBe(false);
    expect(shiftNoOverflow(19, 16, 2)).toBe(true);
    expect(shiftNoOverflow(18, 16, 2)).toBe(false);
  });
});
