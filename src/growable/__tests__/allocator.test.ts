import { describe, expect, it } from "vitest";
import { TypeError } from "type_primitives";
import { BudgetAllocator, heap_allocator } from "../allocator";

describe("allocators", () => {
  //=========================================================
  // heap_allocator
  //=========================================================

  it("heap_allocator returns a zero-filled region of the requested size", () => {
    const region = heap_allocator.allocate(16);
    expect(region).not.toBeNull();
    expect(region?.byteLength).toBe(16);
    expect(region?.every((b) => b === 0)).toBe(true);
  });

  it("heap_allocator returns null when the runtime refuses the length", () => {
    expect(heap_allocator.allocate(Number.MAX_SAFE_INTEGER)).toBeNull();
  });

  //=========================================================
  // BudgetAllocator
  //=========================================================

  it("tracks bytes in use across allocations and releases", () => {
    const allocator = new BudgetAllocator(100);
    const a = allocator.allocate(40);
    const b = allocator.allocate(60);
    expect(allocator.in_use).toBe(100);

    if (a !== null) allocator.release(a);
    expect(allocator.in_use).toBe(60);
    if (b !== null) allocator.release(b);
    expect(allocator.in_use).toBe(0);
  });

  it("refuses allocations past the budget without changing usage", () => {
    const allocator = new BudgetAllocator(100);
    allocator.allocate(70);
    expect(allocator.allocate(31)).toBeNull();
    expect(allocator.in_use).toBe(70);
    expect(allocator.allocate(30)?.byteLength).toBe(30);
  });

  it("delegates to an inner allocator", () => {
    const outer = new BudgetAllocator(50, new BudgetAllocator(10));
    expect(outer.allocate(20)).toBeNull();
    expect(outer.in_use).toBe(0);
    expect(outer.allocate(10)).not.toBeNull();
  });

  it("rejects a budget that is not a non-negative integer", () => {
    expect(() => new BudgetAllocator(-1)).toThrow(TypeError);
    expect(() => new BudgetAllocator(1.5)).toThrow(TypeError);
    expect(new BudgetAllocator(0).allocate(1)).toBeNull();
  });
});
