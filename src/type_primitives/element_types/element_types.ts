/***
 * Element types — Fixed-width codecs for buffer slots.
 *
 * A GrowableBuffer only knows how wide a slot is. An ElementType<T>
 * says how one T is laid out in those bytes, so GrowableArray<T> can
 * offer typed operations over the byte engine without generating a
 * wrapper per type.
 *
 * Numeric tags cover the TypedArray element kinds plus 64-bit integers
 * (as bigint). define_struct packs a record schema such as
 * { x: "f64", y: "f64" } into one slot, fields in declaration order.
 * Integer-like field names ("0", "12") are rejected: objects enumerate
 * them before every other key, which would reorder the layout.
 * All multi-byte values are little-endian.
 *
 ***/

import { validate_and_cast, unsafe_cast } from "../assertions";
import { as_element_size, type ElementSize } from "../checked_math/checked_math";
import { LITTLE_ENDIAN } from "../../utils/constants";

export type NumberTag = "i8" | "u8" | "i16" | "u16" | "i32" | "u32" | "f32" | "f64";
export type BigIntTag = "i64" | "u64";
export type ElementTag = NumberTag | BigIntTag;

export type ValueForTag<K extends ElementTag> = K extends BigIntTag
  ? bigint
  : number;

export interface ElementType<T> {
  readonly tag: string;
  readonly size: ElementSize;
  read(view: DataView, offset: number): T;
  write(view: DataView, offset: number, value: T): void;
}

function element_type<T>(
  tag: string,
  size: number,
  read: (view: DataView, offset: number) => T,
  write: (view: DataView, offset: number, value: T) => void,
): ElementType<T> {
  return Object.freeze({ tag, size: as_element_size(size), read, write });
}

export const ELEMENT_TYPES = {
  i8: element_type<number>(
    "i8",
    1,
    (v, o) => v.getInt8(o),
    (v, o, x) => v.setInt8(o, x),
  ),
  u8: element_type<number>(
    "u8",
    1,
    (v, o) => v.getUint8(o),
    (v, o, x) => v.setUint8(o, x),
  ),
  i16: element_type<number>(
    "i16",
    2,
    (v, o) => v.getInt16(o, LITTLE_ENDIAN),
    (v, o, x) => v.setInt16(o, x, LITTLE_ENDIAN),
  ),
  u16: element_type<number>(
    "u16",
    2,
    (v, o) => v.getUint16(o, LITTLE_ENDIAN),
    (v, o, x) => v.setUint16(o, x, LITTLE_ENDIAN),
  ),
  i32: element_type<number>(
    "i32",
    4,
    (v, o) => v.getInt32(o, LITTLE_ENDIAN),
    (v, o, x) => v.setInt32(o, x, LITTLE_ENDIAN),
  ),
  u32: element_type<number>(
    "u32",
    4,
    (v, o) => v.getUint32(o, LITTLE_ENDIAN),
    (v, o, x) => v.setUint32(o, x, LITTLE_ENDIAN),
  ),
  f32: element_type<number>(
    "f32",
    4,
    (v, o) => v.getFloat32(o, LITTLE_ENDIAN),
    (v, o, x) => v.setFloat32(o, x, LITTLE_ENDIAN),
  ),
  f64: element_type<number>(
    "f64",
    8,
    (v, o) => v.getFloat64(o, LITTLE_ENDIAN),
    (v, o, x) => v.setFloat64(o, x, LITTLE_ENDIAN),
  ),
  i64: element_type<bigint>(
    "i64",
    8,
    (v, o) => v.getBigInt64(o, LITTLE_ENDIAN),
    (v, o, x) => v.setBigInt64(o, x, LITTLE_ENDIAN),
  ),
  u64: element_type<bigint>(
    "u64",
    8,
    (v, o) => v.getBigUint64(o, LITTLE_ENDIAN),
    (v, o, x) => v.setBigUint64(o, x, LITTLE_ENDIAN),
  ),
} as const satisfies { readonly [K in ElementTag]: ElementType<ValueForTag<K>> };

//=========================================================
// Structs
//=========================================================

/** Record schema: field name → element tag. */
export type StructSchema = Readonly<Record<string, ElementTag>>;

/** Value shape for a schema: { x: number, id: bigint, ... }. */
export type StructValue<S extends StructSchema> = {
  readonly [K in keyof S]: ValueForTag<S[K]>;
};

interface StructField {
  readonly name: string;
  readonly offset: number;
  readonly type: ElementType<number> | ElementType<bigint>;
  read(view: DataView, offset: number): number | bigint;
  write(view: DataView, offset: number, value: number | bigint): void;
}

function struct_field(name: string, offset: number, tag: ElementTag): StructField {
  if (tag === "i64" || tag === "u64") {
    const type = ELEMENT_TYPES[tag];
    return {
      name,
      offset,
      type,
      read: type.read,
      write: (view, at, value) => type.write(view, at, BigInt(value)),
    };
  }
  const type = ELEMENT_TYPES[tag];
  return {
    name,
    offset,
    type,
    read: type.read,
    write: (view, at, value) => type.write(view, at, Number(value)),
  };
}

const INTEGER_KEY = /^(0|[1-9][0-9]*)$/;

const is_valid_schema = (schema: StructSchema): boolean => {
  const names = Object.keys(schema);
  return names.length > 0 && !names.some((name) => INTEGER_KEY.test(name));
};

/**
 * Pack a record schema into a single slot type. Fields are laid out
 * back to back with no padding, in the schema's key order.
 */
export function define_struct<const S extends StructSchema>(
  schema: S,
): ElementType<StructValue<S>> {
  validate_and_cast(
    schema,
    is_valid_schema,
    "struct schema must have fields, none of them integer-like",
  );

  const fields: StructField[] = [];
  let size = 0;
  for (const name of Object.keys(schema)) {
    const field = struct_field(name, size, schema[name]);
    fields.push(field);
    size += field.type.size;
  }

  const tag = `struct{${fields.map((f) => `${f.name}:${f.type.tag}`).join(",")}}`;

  return element_type<StructValue<S>>(
    tag,
    size,
    (view, offset) => {
      const out: Record<string, number | bigint> = {};
      for (const field of fields) {
        out[field.name] = field.read(view, offset + field.offset);
      }
      return unsafe_cast<StructValue<S>>(out);
    },
    (view, offset, value) => {
      const values = unsafe_cast<Readonly<Record<string, number | bigint>>>(value);
      for (const field of fields) {
        field.write(view, offset + field.offset, values[field.name]);
      }
    },
  );
}
