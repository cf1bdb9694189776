/***
 * Capacity planner — Decides how many slots a buffer should hold.
 *
 * Pure functions: given the element width, the current capacity and
 * the length the buffer is about to have, return the capacity it
 * should have. The resize engine reallocates only when the answer
 * differs from the current capacity.
 *
 * Without a hint, capacity is left alone while the new length stays
 * inside the hysteresis window [capacity / SHRINK_RATIO, capacity], so
 * alternating append/remove never thrashes. Outside the window the
 * target is new_len + new_len / GROWTH_RATIO + MIN_MARGIN, or an exact
 * fit when that margin would not be addressable.
 *
 * With a length hint the planner treats the hint as the expected mean
 * length with deviation hint / 3:
 *
 *   new_len < hint - 2sd          → hint - 2sd
 *   hint - 2sd <= new_len < hint - sd → grows with slope 2 towards hint
 *   hint - sd <= new_len <= hint  → hint exactly
 *   new_len > hint                → new_len + HINT_OVERSHOOT_MARGIN,
 *                                   capped at the largest slot count
 *
 * Every result is >= new_len, a valid slot count for element_size, and
 * a fixed point: planning again from the returned capacity returns it.
 *
 ***/

import {
  add_capped,
  assert_that,
  can_size_add,
  max_slot_count,
  is_valid_slot_count,
  DEFAULT_ADDRESS_SPACE,
  type AddressSpace,
  type ElementSize,
} from "type_primitives";
import {
  GROWTH_RATIO,
  HINT_DEVIATIONS,
  HINT_LINEAR_SLOPE,
  HINT_OVERSHOOT_MARGIN,
  MIN_MARGIN,
  SHRINK_RATIO,
} from "../utils/constants";

export function in_hysteresis_window(
  old_capacity: number,
  new_len: number,
): boolean {
  return (
    new_len <= old_capacity &&
    new_len >= Math.floor(old_capacity / SHRINK_RATIO)
  );
}

/** new_len + margin when addressable, otherwise new_len. */
function with_margin(
  element_size: ElementSize,
  new_len: number,
  margin: number,
  space: AddressSpace,
): number {
  if (!can_size_add(new_len, margin, space)) return new_len;
  const target = new_len + margin;
  return is_valid_slot_count(target, element_size, space) ? target : new_len;
}

export function plan_capacity(
  element_size: ElementSize,
  old_capacity: number,
  new_len: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): number {
  assert_that(
    is_valid_slot_count(new_len, element_size, space),
    "planned length must be a valid slot count",
    { element_size, new_len },
  );

  if (in_hysteresis_window(old_capacity, new_len)) return old_capacity;

  const margin = Math.floor(new_len / GROWTH_RATIO) + MIN_MARGIN;
  return with_margin(element_size, new_len, margin, space);
}

export function plan_capacity_with_hint(
  element_size: ElementSize,
  old_capacity: number,
  new_len: number,
  length_hint: number,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): number {
  assert_that(
    is_valid_slot_count(new_len, element_size, space),
    "planned length must be a valid slot count",
    { element_size, new_len, length_hint },
  );

  if (in_hysteresis_window(old_capacity, new_len)) return old_capacity;

  if (new_len > length_hint) {
    // clamp instead of dropping the margin: it is small and fixed
    return add_capped(
      new_len,
      HINT_OVERSHOOT_MARGIN,
      max_slot_count(element_size, space),
      space,
    );
  }

  const deviation = Math.floor(length_hint / HINT_DEVIATIONS);
  const two_under = length_hint - 2 * deviation;
  const one_under = length_hint - deviation;

  let target: number;
  if (new_len < two_under) {
    target = two_under;
  } else if (new_len < one_under) {
    // stays below length_hint since new_len - two_under < deviation
    target = two_under + HINT_LINEAR_SLOPE * (new_len - two_under);
  } else {
    target = length_hint;
  }

  return is_valid_slot_count(target, element_size, space) ? target : new_len;
}

/** Dispatch on whether the buffer carries a hint. */
export function plan(
  element_size: ElementSize,
  old_capacity: number,
  new_len: number,
  length_hint: number | undefined,
  space: AddressSpace = DEFAULT_ADDRESS_SPACE,
): number {
  return length_hint === undefined
    ? plan_capacity(element_size, old_capacity, new_len, space)
    : plan_capacity_with_hint(element_size, old_capacity, new_len, length_hint, space);
}
