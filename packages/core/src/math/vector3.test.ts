import { describe, it, expect } from 'vitest';
import { Vector3 } from './vector3.js';

describe('Vector3', () => {
  it('constructs with default values', () => {
    const v = new Vector3();
    expect(v.toArray()).toEqual([0, 0, 0]);
  });

  it('copies and clones without sharing state', () => {
    const source = new Vector3(1, 2, 3);
    const copy = new Vector3().copy(source);
    const clone = source.clone();

    source.set(7, 8, 9);

    expect(copy.toArray()).toEqual([1, 2, 3]);
    expect(clone.toArray()).toEqual([1, 2, 3]);
  });

  it('compares with an epsilon', () => {
    expect(new Vector3(1, 2, 3).equals(new Vector3(1, 2, 3.0000001))).toBe(true);
    expect(new Vector3(1, 2, 3).equals(new Vector3(1, 2, 3.1))).toBe(false);
  });

  it('reports non-finite components', () => {
    expect(new Vector3(0, 1, 2).isFinite()).toBe(true);
    expect(new Vector3(0, Number.NaN, 2).isFinite()).toBe(false);
  });

  it('round-trips through a tuple', () => {
    expect(Vector3.fromArray([4, 5, 6]).toArray()).toEqual([4, 5, 6]);
  });

  it('exposes a frozen zero vector', () => {
    expect(Object.isFrozen(Vector3.ZERO)).toBe(true);
    expect(Vector3.ZERO.toArray()).toEqual([0, 0, 0]);
  });
});
