import { applyDeadzone, applyExpo, clamp, normalize, shapeAxis } from './AxisShaper';
import { AxisShape } from './types';

const SHAPE: AxisShape = { scale: 30, deadzone: 0.1, expo: 1.4, invert: false };

describe('AxisShaper', () => {
  describe('clamp', () => {
    it('bounds values to [-1, 1]', () => {
      expect(clamp(1.5)).toBe(1);
      expect(clamp(-7)).toBe(-1);
      expect(clamp(0.25)).toBe(0.25);
    });

    it('maps NaN to 0', () => {
      expect(clamp(NaN)).toBe(0);
    });
  });

  it('normalizes by scale and saturates', () => {
    expect(normalize(15, 30)).toBe(0.5);
    expect(normalize(45, 30)).toBe(1);
    expect(normalize(-90, 30)).toBe(-1);
  });

  describe('deadzone', () => {
    it('zeroes values inside the band', () => {
      expect(applyDeadzone(0.05, 0.1)).toBe(0);
      expect(applyDeadzone(-0.099, 0.1)).toBe(0);
    });

    it('rescales the remaining range so full deflection stays 1', () => {
      expect(applyDeadzone(1, 0.1)).toBeCloseTo(1, 10);
      expect(applyDeadzone(-0.55, 0.1)).toBeCloseTo(-0.5, 10);
    });

    it('is continuous at the boundary', () => {
      const inside = applyDeadzone(0.099, 0.1);
      const outside = applyDeadzone(0.101, 0.1);

      expect(inside).toBe(0);
      expect(outside).toBeGreaterThan(0);
      expect(outside).toBeLessThan(0.01);
    });
  });

  describe('expo', () => {
    it('preserves sign', () => {
      expect(applyExpo(0.5, 2)).toBeCloseTo(0.25, 10);
      expect(applyExpo(-0.5, 2)).toBeCloseTo(-0.25, 10);
    });

    it('never increases magnitude for |v| <= 1', () => {
      for (const expo of [1, 1.2, 1.4, 2, 3.5]) {
        for (let i = -100; i <= 100; i++) {
          const v = i / 100;
          expect(Math.abs(applyExpo(v, expo))).toBeLessThanOrEqual(Math.abs(v) + 1e-12);
        }
      }
    });
  });

  describe('shapeAxis', () => {
    it('returns exactly 0 at centre, with or without inversion', () => {
      expect(shapeAxis(0, SHAPE)).toBe(0);
      expect(shapeAxis(0, { ...SHAPE, invert: true })).toBe(0);
      expect(shapeAxis(0, { scale: 5, deadzone: 0, expo: 3, invert: true })).toBe(0);
    });

    it('is monotonic in magnitude for a fixed sign', () => {
      let previous = 0;
      for (let i = 0; i <= 200; i++) {
        const output = shapeAxis((i / 200) * 45, SHAPE);
        expect(output).toBeGreaterThanOrEqual(previous);
        previous = output;
      }
      expect(previous).toBe(1);
    });

    it('negates the output when inverted', () => {
      const straight = shapeAxis(20, SHAPE);
      expect(straight).toBeGreaterThan(0);
      expect(shapeAxis(20, { ...SHAPE, invert: true })).toBeCloseTo(-straight, 12);
    });

    it('stays within [-1, 1] for extreme input', () => {
      expect(shapeAxis(1e9, SHAPE)).toBe(1);
      expect(shapeAxis(-1e9, SHAPE)).toBe(-1);
    });
  });
});
