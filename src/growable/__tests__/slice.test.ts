import { describe, expect, it } from "vitest";
import { as_element_size, create_address_space } from "type_primitives";
import { BUFFER_ERROR } from "utils/error";
import { unwrap } from "utils/result";
import { BudgetAllocator } from "../allocator";
import { GrowableBuffer, type BufferOptions } from "../growable_buffer";

const ONE = as_element_size(1);

const of = (values: number[], options: BufferOptions = {}): GrowableBuffer =>
  unwrap(GrowableBuffer.from_array(new Uint8Array(values), values.length, ONE, options));

const contents = (buf: GrowableBuffer): number[] => Array.from(buf.view());

const DIGITS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

const sliced = (start: number, stop: number, step?: number): number[] =>
  contents(unwrap(of(DIGITS).slice(start, stop, step)));

describe("slice", () => {
  //=========================================================
  // Forward
  //=========================================================

  it("copies a contiguous range with step 1", () => {
    expect(sliced(2, 5)).toEqual([2, 3, 4]);
    expect(sliced(0, 10)).toEqual(DIGITS);
  });

  it("clamps stop to the length", () => {
    expect(sliced(8, 100)).toEqual([8, 9]);
    expect(sliced(0, 100, 4)).toEqual([0, 4, 8]);
  });

  it("takes every step-th slot", () => {
    expect(sliced(0, 10, 2)).toEqual([0, 2, 4, 6, 8]);
    expect(sliced(0, 10, 3)).toEqual([0, 3, 6, 9]);
    expect(sliced(1, 8, 3)).toEqual([1, 4, 7]);
  });

  //=========================================================
  // Backward
  //=========================================================

  it("walks backward from start, excluding stop", () => {
    expect(sliced(9, 0, -1)).toEqual([9, 8, 7, 6, 5, 4, 3, 2, 1]);
    expect(sliced(9, 0, -3)).toEqual([9, 6, 3]);
    expect(sliced(6, 2, -2)).toEqual([6, 4]);
  });

  it("starts a backward slice from the last slot when start is past the end", () => {
    expect(sliced(10, 0, -1)).toEqual([9, 8, 7, 6, 5, 4, 3, 2, 1, 0]);
    expect(sliced(15, 2, -1)).toEqual([9, 8, 7, 6, 5, 4, 3, 2]);
  });

  //=========================================================
  // Step larger than the range
  //=========================================================

  it("yields only the start slot when |step| exceeds the range", () => {
    expect(sliced(2, 5, 10)).toEqual([2]);
    expect(sliced(7, 2, -10)).toEqual([7]);
  });

  //=========================================================
  // Empty results
  //=========================================================

  it("is empty when start equals stop", () => {
    expect(sliced(3, 3)).toEqual([]);
    expect(sliced(3, 3, -1)).toEqual([]);
  });

  it("is empty when step points away from stop", () => {
    expect(sliced(5, 2)).toEqual([]);
    expect(sliced(2, 5, -1)).toEqual([]);
  });

  it("is empty when the range starts at or past the end", () => {
    expect(sliced(10, 12)).toEqual([]);
    expect(sliced(12, 10, -1)).toEqual([]);
  });

  it("slicing an empty buffer is empty and unallocated", () => {
    const out = unwrap(GrowableBuffer.empty(ONE).slice(0, 5));
    expect(out.length).toBe(0);
    expect(out.capacity).toBe(0);
  });

  //=========================================================
  // Result buffer
  //=========================================================

  it("returns an independent buffer and leaves the source intact", () => {
    const buf = of(DIGITS);
    const out = unwrap(buf.slice(0, 10, 2));
    out.view()[0] = 42;
    expect(contents(buf)).toEqual(DIGITS);
    expect(out.capacity).toBe(9);
  });

  it("shares the allocator and address space but not the length hint", () => {
    const allocator = new BudgetAllocator(1024);
    const address_space = create_address_space(64, 64);
    const buf = of(DIGITS, { allocator, address_space, length_hint: 30 });
    expect(buf.capacity).toBe(10);
    expect(allocator.in_use).toBe(10);

    const out = unwrap(buf.slice(0, 4));
    expect(out.length_hint).toBeUndefined();
    expect(out.capacity).toBe(8);
    expect(allocator.in_use).toBe(18);
  });

  //=========================================================
  // Failures
  //=========================================================

  it("rejects a zero step", () => {
    const result = of(DIGITS).slice(0, 5, 0);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.category).toBe(BUFFER_ERROR.INVALID_ARGUMENT);
  });

  it("rejects negative or fractional bounds", () => {
    const buf = of(DIGITS);
    for (const [start, stop, step] of [
      [-1, 5, 1],
      [0, -2, 1],
      [0.5, 5, 1],
      [0, 5, 1.5],
    ]) {
      const result = buf.slice(start, stop, step);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.category).toBe(BUFFER_ERROR.INVALID_ARGUMENT);
    }
  });

  it("reports a refused allocation for both copy paths", () => {
    const allocator = new BudgetAllocator(15);
    const buf = of(DIGITS, { allocator });
    expect(allocator.in_use).toBe(15);

    for (const step of [1, 2]) {
      const result = buf.slice(0, 10, step);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.category).toBe(BUFFER_ERROR.OUT_OF_MEMORY);
    }
    expect(contents(buf)).toEqual(DIGITS);
  });
});
