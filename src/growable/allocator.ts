/***
 * Allocator — Source of backing regions for GrowableBuffer.
 *
 * allocate() hands out a zero-filled Uint8Array of exactly the requested
 * byte length, or null when the region cannot be obtained. It never
 * throws for an allocation the runtime refuses. release() is told about
 * every region a buffer drops (after a reallocation, and on free).
 *
 * heap_allocator is the default. BudgetAllocator caps the total bytes
 * outstanding across every buffer sharing it, which is how an embedding
 * application bounds memory and how the tests make allocation fail.
 *
 ***/

import { validate_and_cast, is_non_negative_integer } from "type_primitives";

export interface Allocator {
  allocate(byte_length: number): Uint8Array | null;
  release(region: Uint8Array): void;
}

export const heap_allocator: Allocator = Object.freeze({
  allocate(byte_length: number): Uint8Array | null {
    try {
      return new Uint8Array(byte_length);
    } catch (e) {
      // "Array buffer allocation failed" / "Invalid typed array length"
      if (e instanceof RangeError) return null;
      throw e;
    }
  },
  release(): void {},
});

export class BudgetAllocator implements Allocator {
  private _in_use = 0;
  private readonly _budget: number;

  constructor(
    budget: number,
    private readonly _inner: Allocator = heap_allocator,
  ) {
    this._budget = validate_and_cast(
      budget,
      is_non_negative_integer,
      "allocator budget must be a non-negative integer",
    );
  }

  /** Bytes currently handed out and not yet released. */
  public get in_use(): number {
    return this._in_use;
  }

  public get budget(): number {
    return this._budget;
  }

  public allocate(byte_length: number): Uint8Array | null {
    if (byte_length > this._budget - this._in_use) return null;
    const region = this._inner.allocate(byte_length);
    if (region !== null) this._in_use += region.byteLength;
    return region;
  }

  public release(region: Uint8Array): void {
    this._in_use -= region.byteLength;
    this._inner.release(region);
  }
}
