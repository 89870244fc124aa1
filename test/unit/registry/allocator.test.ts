import { describe, it, expect } from 'vitest';
import { IdAllocator } from '../../../src/registry/allocator.js';

describe('IdAllocator', () => {
  it('starts at 1 and hands out contiguous blocks', () => {
    const allocator = new IdAllocator();
    expect(allocator.reserve(1)).toBe(1);
    expect(allocator.reserve(3)).toBe(2);
    expect(allocator.reserve(2)).toBe(5);
    expect(allocator.peek()).toBe(7);
  });

  it('can start past previously used ids', () => {
    const allocator = new IdAllocator(42);
    expect(allocator.reserve(1)).toBe(42);
  });

  it('rejects empty or fractional reservations', () => {
    const allocator = new IdAllocator();
    expect(() => allocator.reserve(0)).toThrow(RangeError);
    expect(() => allocator.reserve(1.5)).toThrow('Cannot reserve 1.5 ids');
    expect(allocator.peek()).toBe(1);
  });

  it('rejects a non-positive start', () => {
    expect(() => new IdAllocator(0)).toThrow(RangeError);
  });
});
