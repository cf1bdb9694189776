/***
 * GrowableBuffer — Contiguous, resizable array of fixed-width slots.
 *
 * The buffer owns one Uint8Array region of capacity * element_size
 * bytes. Slots [0, length) are occupied, in insertion order, with no
 * holes. Capacity is derived from the region, so "no region" and
 * "capacity 0" are the same state.
 *
 * Every length change goes through the private resize engine, which
 * asks the capacity planner for a target capacity and reallocates only
 * when the answer changes. Operations that can fail return a Result and
 * leave the buffer exactly as it was; nothing is half-applied.
 *
 * Usage:
 *
 *   const size = as_element_size(4);
 *   const buf = GrowableBuffer.empty(size);
 *   unwrap(buf.append(new Uint8Array([1, 0, 0, 0])));
 *   unwrap(buf.extend(buf));          // self-extension copies
 *   const tail = unwrap(buf.slice(1, buf.length, 1));
 *   GrowableBuffer.free(tail);        // `tail` is unusable from here on
 *
 * Single-threaded: no operation yields, and nothing synchronises.
 *
 ***/

import {
  assert,
  assert_that,
  can_add_within,
  is_non_negative_integer,
  is_valid_slot_count,
  size_to_index,
  DEFAULT_ADDRESS_SPACE,
  type AddressSpace,
  type ElementSize,
} from "type_primitives";
import { plan } from "../capacity/capacity_planner";
import { BUFFER_ERROR } from "../utils/error";
import { child_logger, type Logger } from "../utils/logger";
import { OK, err, ok, unwrap, type Result } from "../utils/result";
import { heap_allocator, type Allocator } from "./allocator";

export interface BufferOptions {
  /** Expected steady-state length; biases capacity decisions. */
  length_hint?: number;
  address_space?: AddressSpace;
  allocator?: Allocator;
  logger?: Logger;
}

/** Three-way comparison of two slots: < 0, 0, > 0. */
export type SlotComparator<C> = (a: Uint8Array, b: Uint8Array, ctx: C) => number;

const log = child_logger("growable_buffer");

const EMPTY_BYTES = new Uint8Array(0);

const is_region = (v: Uint8Array | null): v is Uint8Array => v !== null;

export class GrowableBuffer implements Iterable<Uint8Array> {
  private _items: Uint8Array | null = null;
  private _len = 0;
  private _length_hint: number | undefined;
  private _freed = false;

  private readonly _space: AddressSpace;
  private readonly _allocator: Allocator;
  private readonly _log: Logger;

  private constructor(
    public readonly element_size: ElementSize,
    options: BufferOptions,
  ) {
    this._space = options.address_space ?? DEFAULT_ADDRESS_SPACE;
    this._allocator = options.allocator ?? heap_allocator;
    this._log = options.logger ?? log;
  }

  //=========================================================
  // Construction
  //=========================================================

  /**
   * Empty buffer. Allocates nothing until the first append.
   * Throws BufferError (INVALID_ARGUMENT) when options.length_hint is not
   * a valid slot count; from_array(null, 0, ...) reports the same as a
   * Result.
   */
  public static empty(
    element_size: ElementSize,
    options: BufferOptions = {},
  ): GrowableBuffer {
    const buf = new GrowableBuffer(element_size, options);
    unwrap(buf.set_length_hint(options.length_hint));
    return buf;
  }

  /**
   * Buffer holding a copy of the first source_len slots of `source`.
   * With source_len 0 the source is never read and may be null.
   */
  public static from_array(
    source: Uint8Array | null,
    source_len: number,
    element_size: ElementSize,
    options: BufferOptions = {},
  ): Result<GrowableBuffer> {
    if (!is_non_negative_integer(source_len)) {
      return err(
        BUFFER_ERROR.INVALID_ARGUMENT,
        "source length must be a non-negative integer",
        { source_len },
      );
    }

    const buf = new GrowableBuffer(element_size, options);
    const hinted = buf.set_length_hint(options.length_hint);
    if (!hinted.ok) return hinted;
    if (source_len === 0) return ok(buf);

    if (source === null) {
      return err(BUFFER_ERROR.INVALID_ARGUMENT, "source is null", {
        source_len,
      });
    }
    if (
      buf._is_valid_len(source_len) &&
      source.byteLength < source_len * element_size
    ) {
      return err(BUFFER_ERROR.INVALID_ARGUMENT, "source is too short", {
        source_len,
        source_bytes: source.byteLength,
        element_size,
      });
    }

    const resized = buf._resize(source_len);
    if (!resized.ok) return resized;

    buf._bytes().set(source.subarray(0, source_len * element_size));
    buf._check_invariants();
    return ok(buf);
  }

  /** Independent copy with the same options and length hint. */
  public copy(): Result<GrowableBuffer> {
    this._assert_live();
    return GrowableBuffer.from_array(
      this._items,
      this._len,
      this.element_size,
      { ...this._derived_options(), length_hint: this._length_hint },
    );
  }

  /**
   * Release the region. The buffer is unusable afterwards; the
   * signature narrows the argument to `never` so later uses of the same
   * binding do not type-check.
   */
  public static free(buffer: GrowableBuffer): asserts buffer is never {
    buffer._assert_live();
    if (buffer._items !== null) buffer._allocator.release(buffer._items);
    buffer._items = null;
    buffer._len = 0;
    buffer._freed = true;
  }

  //=========================================================
  // Queries
  //=========================================================

  public get length(): number {
    return this._len;
  }

  public get capacity(): number {
    return this._items === null ? 0 : this._items.byteLength / this.element_size;
  }

  public get length_hint(): number | undefined {
    return this._length_hint;
  }

  public get is_freed(): boolean {
    return this._freed;
  }

  /**
   * Zero-copy view of slot `index`, or undefined when out of range.
   * Invalidated by the next operation that changes capacity.
   */
  public at(index: number): Uint8Array | undefined {
    this._assert_live();
    if (!is_non_negative_integer(index) || index >= this._len) return undefined;
    const size = this.element_size;
    return this._bytes().subarray(index * size, (index + 1) * size);
  }

  /** Zero-copy view of the occupied bytes, slots [0, length). */
  public view(): Uint8Array {
    this._assert_live();
    if (this._items === null) return EMPTY_BYTES;
    return this._items.subarray(0, this._len * this.element_size);
  }

  *[Symbol.iterator](): Iterator<Uint8Array> {
    this._assert_live();
    const size = this.element_size;
    for (let i = 0; i < this._len; i++) {
      yield this._bytes().subarray(i * size, (i + 1) * size);
    }
  }

  /** Index of the smallest slot under `cmp`; leftmost wins on ties. */
  public min<C>(cmp: SlotComparator<C>, ctx: C): number | undefined {
    return this._scan(cmp, ctx, -1);
  }

  /** Index of the largest slot under `cmp`; leftmost wins on ties. */
  public max<C>(cmp: SlotComparator<C>, ctx: C): number | undefined {
    return this._scan(cmp, ctx, 1);
  }

  //=========================================================
  // Mutation
  //=========================================================

  /** Set or clear the hint used by subsequent resizes. */
  public set_length_hint(length_hint: number | undefined): Result<void> {
    this._assert_live();
    if (length_hint !== undefined && !this._is_valid_len(length_hint)) {
      return err(
        BUFFER_ERROR.INVALID_ARGUMENT,
        "length hint must be a valid slot count",
        { length_hint },
      );
    }
    this._length_hint = length_hint;
    return OK;
  }

  /** Copy `object` (exactly element_size bytes) into a new last slot. */
  public append(object: Uint8Array): Result<void> {
    this._assert_live();
    const old_len = this._len;

    if (object.byteLength !== this.element_size) {
      return err(BUFFER_ERROR.INVALID_ARGUMENT, "object size mismatch", {
        expected: this.element_size,
        actual: object.byteLength,
      });
    }
    if (!can_add_within(old_len, 1, this._space.index_max, this._space)) {
      return err(BUFFER_ERROR.OVERFLOW, "length would overflow", {
        length: old_len,
      });
    }

    const resized = this._resize(old_len + 1);
    if (!resized.ok) return resized;

    this._bytes().set(object, old_len * this.element_size);
    this._check_invariants();
    return OK;
  }

  /**
   * Append a copy of every slot of `src`. `src` may be this buffer, in
   * which case the current contents are duplicated.
   */
  public extend(src: GrowableBuffer): Result<void> {
    this._assert_live();
    src._assert_live();

    if (src.element_size !== this.element_size) {
      return err(BUFFER_ERROR.INVALID_ARGUMENT, "element size mismatch", {
        dest: this.element_size,
        src: src.element_size,
      });
    }

    // captured before resizing: when src === this, _len is about to change
    const dest_len = this._len;
    const src_len = src._len;

    if (!can_add_within(dest_len, src_len, this._space.index_max, this._space)) {
      return err(BUFFER_ERROR.OVERFLOW, "length would overflow", {
        dest_len,
        src_len,
      });
    }
    if (src_len === 0) return OK;

    const resized = this._resize(dest_len + src_len);
    if (!resized.ok) return resized;

    // read src after the resize: if it aliases this buffer, its region moved
    const size = this.element_size;
    this._bytes().set(src._bytes().subarray(0, src_len * size), dest_len * size);
    this._check_invariants();
    return OK;
  }

  /**
   * Remove slot `index`, shifting later slots one to the left. May
   * shrink capacity. Negative indices are not supported.
   */
  public remove(index: number): Result<void> {
    this._assert_live();
    const old_len = this._len;

    if (!Number.isSafeInteger(index)) {
      return err(BUFFER_ERROR.INVALID_ARGUMENT, "index must be an integer", {
        index,
      });
    }
    if (index < 0 || index >= old_len) {
      return err(BUFFER_ERROR.NOT_FOUND, "index out of range", {
        index,
        length: old_len,
      });
    }

    const size = this.element_size;
    const bytes = this._bytes();
    const at = index * size;
    const end = old_len * size;
    const removed = bytes.slice(at, at + size);

    bytes.copyWithin(at, at + size, end);

    const resized = this._resize(old_len - 1);
    if (!resized.ok) {
      // put the slot back so the failed call has no visible effect
      bytes.copyWithin(at + size, at, end - size);
      bytes.set(removed, at);
      return resized;
    }

    this._check_invariants();
    return OK;
  }

  /** Shorten to `new_len` slots. new_len must not exceed length. */
  public truncate(new_len: number): Result<void> {
    this._assert_live();
    if (!is_non_negative_integer(new_len) || new_len > this._len) {
      return err(
        BUFFER_ERROR.INVALID_ARGUMENT,
        "truncated length must be between 0 and length",
        { new_len, length: this._len },
      );
    }

    const resized = this._resize(new_len);
    if (!resized.ok) return resized;

    this._check_invariants();
    return OK;
  }

  //=========================================================
  // Derivation
  //=========================================================

  /**
   * New buffer with the slots at start, start + step, ... up to stop
   * (exclusive). step may be negative; it may not be zero.
   *
   * The result is empty when start == stop, when step points away from
   * stop, or when the lower bound is at or past the end. The upper bound
   * is clamped to length, and a backward slice starting past the end
   * starts at the last slot.
   */
  public slice(start: number, stop: number, step = 1): Result<GrowableBuffer> {
    this._assert_live();

    if (
      !is_non_negative_integer(start) ||
      !is_non_negative_integer(stop) ||
      !Number.isSafeInteger(step)
    ) {
      return err(
        BUFFER_ERROR.INVALID_ARGUMENT,
        "slice bounds must be non-negative integers and step an integer",
        { start, stop, step },
      );
    }
    if (step === 0) {
      return err(BUFFER_ERROR.INVALID_ARGUMENT, "slice step must not be zero");
    }

    const len = this._len;
    const size = this.element_size;
    const options = this._derived_options();
    const lo = Math.min(start, stop);
    const hi = Math.min(size_to_index(Math.max(start, stop), this._space), len);

    if (start === stop || (start < stop) !== (step > 0) || lo >= len) {
      return ok(GrowableBuffer.empty(size, options));
    }

    assert_that(lo < hi && hi <= len, "slice bounds out of order", {
      lo,
      hi,
      len,
    });

    const bytes = this._bytes();

    if (step === 1) {
      return GrowableBuffer.from_array(
        bytes.subarray(lo * size, hi * size),
        hi - lo,
        size,
        options,
      );
    }

    const slice_len = 1 + Math.floor((hi - lo - 1) / Math.abs(step));
    const first = Math.min(start, len - 1);

    const out = new GrowableBuffer(size, options);
    const resized = out._resize(slice_len);
    if (!resized.ok) return resized;

    const dest = out._bytes();
    for (let i = 0; i < slice_len; i++) {
      const from = (first + i * step) * size;
      dest.set(bytes.subarray(from, from + size), i * size);
    }

    out._check_invariants();
    return ok(out);
  }

  //=========================================================
  // Resize engine
  //=========================================================

  /**
   * Set the length to new_len, reallocating when the planner asks for
   * a different capacity. The only writer of capacity. On failure
   * nothing changes.
   */
  private _resize(new_len: number): Result<void> {
    const old_len = this._len;
    const old_capacity = this.capacity;

    assert_that(old_len <= old_capacity, "length exceeds capacity", {
      length: old_len,
      capacity: old_capacity,
    });

    if (new_len === old_len) return OK;

    if (!this._is_valid_len(new_len)) {
      return err(BUFFER_ERROR.OUT_OF_MEMORY, "length is not addressable", {
        element_size: this.element_size,
        new_len,
      });
    }

    const new_capacity = plan(
      this.element_size,
      old_capacity,
      new_len,
      this._length_hint,
      this._space,
    );

    assert_that(new_capacity >= new_len, "planned capacity below length", {
      new_capacity,
      new_len,
    });

    if (new_capacity !== old_capacity) {
      const moved = this._reallocate(new_capacity, Math.min(old_len, new_len));
      if (!moved.ok) return moved;
    }

    this._len = new_len;
    return OK;
  }

  /** Swap in a region of new_capacity slots, keeping the first `keep`. */
  private _reallocate(new_capacity: number, keep: number): Result<void> {
    const old = this._items;
    const size = this.element_size;
    let next: Uint8Array | null = null;

    if (new_capacity > 0) {
      const byte_length = new_capacity * size;
      next = this._allocator.allocate(byte_length);
      if (next === null) {
        this._log.warn(
          { element_size: size, capacity: this.capacity, new_capacity },
          "buffer allocation failed",
        );
        return err(BUFFER_ERROR.OUT_OF_MEMORY, "allocation failed", {
          byte_length,
        });
      }
      assert_that(next.byteLength === byte_length, "allocator returned a wrong-sized region", {
        expected: byte_length,
        actual: next.byteLength,
      });
      if (old !== null) next.set(old.subarray(0, keep * size));
    }

    if (this._log.isLevelEnabled("debug")) {
      this._log.debug(
        {
          element_size: size,
          length: this._len,
          capacity: this.capacity,
          new_capacity,
        },
        "buffer reallocated",
      );
    }

    this._items = next;
    if (old !== null) this._allocator.release(old);
    return OK;
  }

  //=========================================================
  // Internals
  //=========================================================

  private _scan<C>(cmp: SlotComparator<C>, ctx: C, sign: 1 | -1): number | undefined {
    this._assert_live();
    if (this._len === 0) return undefined;

    const size = this.element_size;
    const bytes = this._bytes();
    let best = 0;
    let best_view = bytes.subarray(0, size);

    for (let i = 1; i < this._len; i++) {
      const view = bytes.subarray(i * size, (i + 1) * size);
      if (sign * cmp(view, best_view, ctx) > 0) {
        best = i;
        best_view = view;
      }
    }
    return best;
  }

  private _bytes(): Uint8Array {
    const items = this._items;
    assert(items, is_region, "buffer has no region");
    return items;
  }

  private _is_valid_len(n: number): boolean {
    return (
      is_non_negative_integer(n) &&
      is_valid_slot_count(n, this.element_size, this._space)
    );
  }

  private _derived_options(): BufferOptions {
    return {
      address_space: this._space,
      allocator: this._allocator,
      logger: this._log,
    };
  }

  private _assert_live(): void {
    assert_that(!this._freed, "buffer used after free");
  }

  private _check_invariants(): void {
    if (!__DEV__) return;
    const capacity = this.capacity;
    assert_that(this._len <= capacity, "length exceeds capacity", {
      length: this._len,
      capacity,
    });
    assert_that(
      this._items === null || this._items.byteLength > 0,
      "region present with zero capacity",
    );
    assert_that(
      this._is_valid_len(capacity),
      "capacity is not a valid slot count",
      { capacity },
    );
  }
}
