/***
 * Checked math — Overflow-safe arithmetic over a simulated address space.
 *
 * The engine reasons about two integer types the way a native allocator
 * would: an unsigned size type (byte counts, bounded by size_max) and a
 * signed index type (slot indices and counts, bounded by index_max).
 * Every value reaching an allocation size or a byte offset is checked
 * here first.
 *
 * All functions are total: they answer with a boolean or a clamped
 * value, never throw. Inputs are assumed to be non-negative safe
 * integers within the address space (signed helpers excepted).
 *
 ***/

import type { Brand } from "../brand";
import {
  validate_and_cast,
  is_non_negative_integer,
  is_positive_integer,
} from "../assertions";
import { DEFAULT_INDEX_MAX, DEFAULT_SIZE_MAX } from "../../utils/constants";

/** Width in bytes of one buffer slot. Always a positive integer. */
export type ElementSize = Brand<number, "element_size">;
export const as_element_size = (value: number) =>
  validate_and_cast<number, ElementSize>(
    value,
    is_positive_integer,
    "ElementSize must be a positive integer",
  );

export interface AddressSpace {
  /** Largest representable byte count. */
  readonly size_max: number;
  /** Largest representable slot index. */
  readonly index_max: number;
}

export const DEFAULT_ADDRESS_SPACE: AddressSpace = Object.freeze({
  size_max: DEFAULT_SIZE_MAX,
  index_max: DEFAULT_INDEX_MAX,
});

/**
 * Build an address space. Both bounds must be safe integers so that
 * every comparison below stays exact.
 */
export function create_address_space(
  size_max: number,
  index_max: number,
): AddressSpace {
  return Object.freeze({
    size_max: validate_and_cast(
      size_max,
      is_non_negative_integer,
      "size_max must be a non-negative safe integer",
    ),
    index_max: validate_and_cast(
      index_max,
      is_non_negative_integer,
      "index_max must be a non-negative safe integer",
    ),
  });
}

//=========================================================
// Unsigned size type
//=========================================================

export function can_size_add(
  x: number,
  y: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): boolean {
  return y <= space.size_max && x <= space.size_max - y;
}

export function can_size_multiply(
  x: number,
  y: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): boolean {
  // y <= 1 can never grow x; also avoids dividing by zero
  if (y <= 1) return x <= space.size_max;
  return x <= Math.floor(space.size_max / y);
}

/** True iff x + y does not overflow and stays within cap. */
export function can_add_within(
  x: number,
  y: number,
  cap: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): boolean {
  return can_size_add(x, y, space) && x + y <= cap;
}

export function add_capped(
  x: number,
  y: number,
  cap: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): number {
  return can_add_within(x, y, cap, space) ? x + y : cap;
}

//=========================================================
// Signed index type
//=========================================================

export function can_index_add(
  x: number,
  y: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): boolean {
  const index_min = -space.index_max - 1;
  return (
    (y <= 0 || x <= space.index_max - y) && (y >= 0 || x >= index_min - y)
  );
}

export function fits_in_index(
  x: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): boolean {
  return x <= space.index_max;
}

/** Convert a size to an index, capping at index_max. */
export function size_to_index(
  x: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): number {
  return fits_in_index(x, space) ? x : space.index_max;
}

//=========================================================
// Slots
//=========================================================

/**
 * True iff a buffer may hold n slots of element_size bytes: n is a
 * valid index-type value and n * element_size is a valid byte count.
 */
export function is_valid_slot_count(
  n: number,
  element_size: ElementSize,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): boolean {
  return fits_in_index(n, space) && can_size_multiply(n, element_size, space);
}

/** Largest n for which is_valid_slot_count(n, element_size) holds. */
export function max_slot_count(
  element_size: ElementSize,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): number {
  return Math.min(space.index_max, Math.floor(space.size_max / element_size));
}
