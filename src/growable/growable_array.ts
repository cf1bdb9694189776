/***
 * GrowableArray<T> — Typed view over a GrowableBuffer.
 *
 * Pairs a byte-level GrowableBuffer with an ElementType<T> that encodes
 * one T per slot. Every operation delegates to the buffer, so capacity
 * planning, overflow checks and failure semantics are the buffer's.
 *
 * Named subclasses (GrowableInt32Array etc.) are provided for each
 * numeric tag. ArrayFor maps a tag to its class:
 *
 *   const ids = new ArrayFor.u32();
 *   unwrap(ids.append(7));
 *
 *   const Point = define_struct({ x: "f64", y: "f64" });
 *   const points = new GrowableArray(Point, { length_hint: 256 });
 *   unwrap(points.append({ x: 1, y: 2 }));
 *
 ***/

import {
  ELEMENT_TYPES,
  validate_and_cast,
  type ElementTag,
  type ElementType,
  type ValueForTag,
} from "type_primitives";
import { BUFFER_ERROR } from "../utils/error";
import { OK, err, map_result, ok, type Result } from "../utils/result";
import { GrowableBuffer, type BufferOptions } from "./growable_buffer";

/** Three-way comparison of two values: < 0, 0, > 0. */
export type Comparator<T, C> = (a: T, b: T, ctx: C) => number;

const data_view = (bytes: Uint8Array): DataView =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

export class GrowableArray<T> implements Iterable<T> {
  private readonly _buf: GrowableBuffer;
  // one slot of scratch space for encoding values before they are copied in
  private readonly _scratch: Uint8Array;
  private readonly _scratch_view: DataView;

  /**
   * Empty array of `type`, or a typed view adopting `buffer` (whose
   * element size must match the type's). An invalid options.length_hint
   * throws BufferError; from_values reports it as a Result instead.
   */
  constructor(
    public readonly type: ElementType<T>,
    options: BufferOptions = {},
    buffer?: GrowableBuffer,
  ) {
    this._buf =
      buffer === undefined
        ? GrowableBuffer.empty(type.size, options)
        : validate_and_cast(
            buffer,
            (b) => b.element_size === type.size,
            "adopted buffer element size must match the element type",
          );
    this._scratch = new Uint8Array(type.size);
    this._scratch_view = data_view(this._scratch);
  }

  public static from_values<T>(
    type: ElementType<T>,
    values: Iterable<T>,
    options: BufferOptions = {},
  ): Result<GrowableArray<T>> {
    const created = GrowableBuffer.from_array(null, 0, type.size, options);
    if (!created.ok) return created;
    const arr = new GrowableArray(type, {}, created.value);
    for (const value of values) {
      const appended = arr.append(value);
      if (!appended.ok) {
        GrowableArray.free(arr);
        return appended;
      }
    }
    return ok(arr);
  }

  public static free<T>(array: GrowableArray<T>): asserts array is never {
    GrowableBuffer.free(array._buf);
  }

  /** The underlying byte buffer. */
  public get buffer(): GrowableBuffer {
    return this._buf;
  }

  public get length(): number {
    return this._buf.length;
  }

  public get capacity(): number {
    return this._buf.capacity;
  }

  public get length_hint(): number | undefined {
    return this._buf.length_hint;
  }

  public get(index: number): T | undefined {
    const slot = this._buf.at(index);
    return slot === undefined ? undefined : this._decode(slot);
  }

  public set(index: number, value: T): Result<void> {
    const slot = this._buf.at(index);
    if (slot === undefined) {
      return err(BUFFER_ERROR.NOT_FOUND, "index out of range", {
        index,
        length: this._buf.length,
      });
    }
    this.type.write(data_view(slot), 0, value);
    return OK;
  }

  public append(value: T): Result<void> {
    this.type.write(this._scratch_view, 0, value);
    return this._buf.append(this._scratch);
  }

  /** Append a copy of every value of `src`, which must share the element type. */
  public extend(src: GrowableArray<T>): Result<void> {
    // same width is not enough: i32 and f32 slots are both four bytes
    if (src.type.tag !== this.type.tag) {
      return err(BUFFER_ERROR.INVALID_ARGUMENT, "element type mismatch", {
        dest: this.type.tag,
        src: src.type.tag,
      });
    }
    return this._buf.extend(src._buf);
  }

  public remove(index: number): Result<void> {
    return this._buf.remove(index);
  }

  public truncate(new_len: number): Result<void> {
    return this._buf.truncate(new_len);
  }

  public set_length_hint(length_hint: number | undefined): Result<void> {
    return this._buf.set_length_hint(length_hint);
  }

  public copy(): Result<GrowableArray<T>> {
    return map_result(this._buf.copy(), (buf) => this._wrap(buf));
  }

  public slice(start: number, stop: number, step = 1): Result<GrowableArray<T>> {
    return map_result(this._buf.slice(start, stop, step), (buf) =>
      this._wrap(buf),
    );
  }

  public min_index<C>(cmp: Comparator<T, C>, ctx: C): number | undefined {
    return this._buf.min(
      (a, b, c: C) => cmp(this._decode(a), this._decode(b), c),
      ctx,
    );
  }

  public max_index<C>(cmp: Comparator<T, C>, ctx: C): number | undefined {
    return this._buf.max(
      (a, b, c: C) => cmp(this._decode(a), this._decode(b), c),
      ctx,
    );
  }

  /** Smallest value under `cmp`, or undefined when empty. */
  public min<C>(cmp: Comparator<T, C>, ctx: C): T | undefined {
    const index = this.min_index(cmp, ctx);
    return index === undefined ? undefined : this.get(index);
  }

  /** Largest value under `cmp`, or undefined when empty. */
  public max<C>(cmp: Comparator<T, C>, ctx: C): T | undefined {
    const index = this.max_index(cmp, ctx);
    return index === undefined ? undefined : this.get(index);
  }

  public to_array(): T[] {
    const out: T[] = [];
    for (const value of this) out.push(value);
    return out;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const slot of this._buf) yield this._decode(slot);
  }

  private _decode(slot: Uint8Array): T {
    return this.type.read(data_view(slot), 0);
  }

  private _wrap(buf: GrowableBuffer): GrowableArray<T> {
    return new GrowableArray(this.type, {}, buf);
  }
}

export class GrowableInt8Array extends GrowableArray<number> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.i8, options);
  }
}

export class GrowableUint8Array extends GrowableArray<number> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.u8, options);
  }
}

export class GrowableInt16Array extends GrowableArray<number> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.i16, options);
  }
}

export class GrowableUint16Array extends GrowableArray<number> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.u16, options);
  }
}

export class GrowableInt32Array extends GrowableArray<number> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.i32, options);
  }
}

export class GrowableUint32Array extends GrowableArray<number> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.u32, options);
  }
}

export class GrowableFloat32Array extends GrowableArray<number> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.f32, options);
  }
}

export class GrowableFloat64Array extends GrowableArray<number> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.f64, options);
  }
}

export class GrowableBigInt64Array extends GrowableArray<bigint> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.i64, options);
  }
}

export class GrowableBigUint64Array extends GrowableArray<bigint> {
  constructor(options: BufferOptions = {}) {
    super(ELEMENT_TYPES.u64, options);
  }
}

export const ArrayFor = {
  i8: GrowableInt8Array,
  u8: GrowableUint8Array,
  i16: GrowableInt16Array,
  u16: GrowableUint16Array,
  i32: GrowableInt32Array,
  u32: GrowableUint32Array,
  f32: GrowableFloat32Array,
  f64: GrowableFloat64Array,
  i64: GrowableBigInt64Array,
  u64: GrowableBigUint64Array,
} as const satisfies {
  readonly [K in ElementTag]: new (
    options?: BufferOptions,
  ) => GrowableArray<ValueForTag<K>>;
};
