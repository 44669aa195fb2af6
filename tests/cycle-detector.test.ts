import { describe, expect, it } from 'vitest';
import { CycleDetector } from '../src/infrastructure/cycle-detector.js';

describe('CycleDetector', () => {
  it('tracks entering and leaving activation', () => {
    const detector = new CycleDetector();
    expect(detector.isActivating('a')).toBe(false);
    detector.enter('a');
    expect(detector.isActivating('a')).toBe(true);
    detector.leave('a');
    expect(detector.isActivating('a')).toBe(false);
  });

  it('reports the chain outermost first', () => {
    const detector = new CycleDetector();
    detector.enter('a');
    detector.enter('b');
    detector.enter('c');
    expect(detector.chain()).toEqual(['a', 'b', 'c']);
    detector.leave('c');
    expect(detector.chain()).toEqual(['a', 'b']);
  });

  it('handles independent activation chains', () => {
    const detector = new CycleDetector();
    detector.enter('a');
    detector.leave('a');
    detector.enter('b');
    expect(detector.isActivating('a')).toBe(false);
    expect(detector.chain()).toEqual(['b']);
    detector.leave('b');
    expect(detector.chain()).toEqual([]);
  });

  it('chain() returns a copy', () => {
    const detector = new CycleDetector();
    detector.enter('a');
    detector.chain().push('x');
    expect(detector.chain()).toEqual(['a']);
  });
});
