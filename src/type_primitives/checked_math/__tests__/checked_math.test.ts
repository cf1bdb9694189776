import { describe, expect, it } from "vitest";
import {
  add_capped,
  as_element_size,
  can_add_within,
  can_index_add,
  can_size_add,
  can_size_multiply,
  create_address_space,
  DEFAULT_ADDRESS_SPACE,
  fits_in_index,
  is_valid_slot_count,
  max_slot_count,
  size_to_index,
} from "../checked_math";
import { TypeError } from "../../error";

// 8-bit sizes, 8-bit signed indices
const SPACE = create_address_space(255, 127);
const SIZE_MAX = SPACE.size_max;
const INDEX_MAX = SPACE.index_max;
const INDEX_MIN = -INDEX_MAX - 1;

describe("checked_math", () => {
  //=========================================================
  // Address spaces
  //=========================================================

  it("default address space bounds sizes by safe integers and indices by int32", () => {
    expect(DEFAULT_ADDRESS_SPACE.size_max).toBe(Number.MAX_SAFE_INTEGER);
    expect(DEFAULT_ADDRESS_SPACE.index_max).toBe(2_147_483_647);
    expect(Object.isFrozen(DEFAULT_ADDRESS_SPACE)).toBe(true);
  });

  it("create_address_space rejects bounds that are not safe integers", () => {
    expect(() => create_address_space(-1, 10)).toThrow(TypeError);
    expect(() => create_address_space(10, 1.5)).toThrow(TypeError);
    expect(() => create_address_space(2 ** 60, 10)).toThrow(TypeError);
  });

  //=========================================================
  // can_size_add
  //=========================================================

  it("can_size_add accepts sums up to size_max", () => {
    expect(can_size_add(0, 0, SPACE)).toBe(true);
    expect(can_size_add(0, SIZE_MAX, SPACE)).toBe(true);
    expect(can_size_add(SIZE_MAX, 0, SPACE)).toBe(true);
    expect(can_size_add(1, 1, SPACE)).toBe(true);
    expect(can_size_add(127, 127, SPACE)).toBe(true);
  });

  it("can_size_add rejects sums past size_max", () => {
    expect(can_size_add(SIZE_MAX, 1, SPACE)).toBe(false);
    expect(can_size_add(1, SIZE_MAX, SPACE)).toBe(false);
    expect(can_size_add(SIZE_MAX, SIZE_MAX, SPACE)).toBe(false);
    expect(can_size_add(SIZE_MAX, SIZE_MAX - 1, SPACE)).toBe(false);
    expect(can_size_add(127, 129, SPACE)).toBe(false);
  });

  //=========================================================
  // can_size_multiply
  //=========================================================

  it("can_size_multiply accepts products up to size_max", () => {
    expect(can_size_multiply(0, 0, SPACE)).toBe(true);
    expect(can_size_multiply(1, 0, SPACE)).toBe(true);
    expect(can_size_multiply(0, 1, SPACE)).toBe(true);
    expect(can_size_multiply(SIZE_MAX, 0, SPACE)).toBe(true);
    expect(can_size_multiply(0, SIZE_MAX, SPACE)).toBe(true);
    expect(can_size_multiply(SIZE_MAX, 1, SPACE)).toBe(true);
    expect(can_size_multiply(127, 2, SPACE)).toBe(true);
  });

  it("can_size_multiply rejects products past size_max", () => {
    expect(can_size_multiply(SIZE_MAX, 2, SPACE)).toBe(false);
    expect(can_size_multiply(128, 2, SPACE)).toBe(false);
    expect(can_size_multiply(SIZE_MAX, SIZE_MAX, SPACE)).toBe(false);
  });

  //=========================================================
  // can_add_within / add_capped
  //=========================================================

  it("can_add_within holds the sum to the given cap", () => {
    expect(can_add_within(0, 0, 10, SPACE)).toBe(true);
    expect(can_add_within(10, 0, 10, SPACE)).toBe(true);
    expect(can_add_within(0, 10, 10, SPACE)).toBe(true);
    expect(can_add_within(10, 1, 10, SPACE)).toBe(false);
    expect(can_add_within(1, 10, 10, SPACE)).toBe(false);
    expect(can_add_within(INDEX_MAX - 1, 1, INDEX_MAX, SPACE)).toBe(true);
    expect(can_add_within(INDEX_MAX, 1, INDEX_MAX, SPACE)).toBe(false);
  });

  it("can_add_within rejects sums that overflow the size type", () => {
    expect(can_add_within(SIZE_MAX, 0, SIZE_MAX, SPACE)).toBe(true);
    expect(can_add_within(SIZE_MAX, 1, SIZE_MAX, SPACE)).toBe(false);
    expect(can_add_within(SIZE_MAX, SIZE_MAX, INDEX_MAX, SPACE)).toBe(false);
  });

  it("add_capped returns the sum or the cap", () => {
    expect(add_capped(0, 0, 10, SPACE)).toBe(0);
    expect(add_capped(1, 1, 10, SPACE)).toBe(2);
    expect(add_capped(10, 0, 10, SPACE)).toBe(10);
    expect(add_capped(10, 1, 10, SPACE)).toBe(10);
    expect(add_capped(1, 10, 10, SPACE)).toBe(10);
    expect(add_capped(INDEX_MAX - 1, 1, INDEX_MAX, SPACE)).toBe(INDEX_MAX);
    expect(add_capped(SIZE_MAX, SIZE_MAX, INDEX_MAX, SPACE)).toBe(INDEX_MAX);
  });

  //=========================================================
  // Signed index type
  //=========================================================

  it("can_index_add accepts sums within [index_min, index_max]", () => {
    expect(can_index_add(0, 0, SPACE)).toBe(true);
    expect(can_index_add(1, -1, SPACE)).toBe(true);
    expect(can_index_add(0, INDEX_MAX, SPACE)).toBe(true);
    expect(can_index_add(INDEX_MAX, -1, SPACE)).toBe(true);
    expect(can_index_add(INDEX_MIN, 1, SPACE)).toBe(true);
    expect(can_index_add(INDEX_MIN, INDEX_MAX, SPACE)).toBe(true);
    expect(can_index_add(63, 63, SPACE)).toBe(true);
  });

  it("can_index_add rejects sums outside the index range", () => {
    expect(can_index_add(INDEX_MAX, 1, SPACE)).toBe(false);
    expect(can_index_add(1, INDEX_MAX, SPACE)).toBe(false);
    expect(can_index_add(INDEX_MIN, -1, SPACE)).toBe(false);
    expect(can_index_add(INDEX_MIN, INDEX_MIN, SPACE)).toBe(false);
    expect(can_index_add(INDEX_MAX, INDEX_MAX, SPACE)).toBe(false);
    expect(can_index_add(63, 65, SPACE)).toBe(false);
  });

  it("fits_in_index and size_to_index cap at index_max", () => {
    expect(fits_in_index(INDEX_MAX, SPACE)).toBe(true);
    expect(fits_in_index(INDEX_MAX + 1, SPACE)).toBe(false);
    expect(size_to_index(0, SPACE)).toBe(0);
    expect(size_to_index(100, SPACE)).toBe(100);
    expect(size_to_index(INDEX_MAX + 1, SPACE)).toBe(INDEX_MAX);
    expect(size_to_index(SIZE_MAX, SPACE)).toBe(INDEX_MAX);
  });

  //=========================================================
  // Slot counts
  //=========================================================

  it("is_valid_slot_count bounds by index_max for narrow elements", () => {
    const one = as_element_size(1);
    expect(is_valid_slot_count(INDEX_MAX, one, SPACE)).toBe(true);
    expect(is_valid_slot_count(INDEX_MAX + 1, one, SPACE)).toBe(false);
    expect(max_slot_count(one, SPACE)).toBe(INDEX_MAX);
  });

  it("is_valid_slot_count bounds by size_max for wide elements", () => {
    const four = as_element_size(4);
    expect(is_valid_slot_count(63, four, SPACE)).toBe(true);
    expect(is_valid_slot_count(64, four, SPACE)).toBe(false);
    expect(max_slot_count(four, SPACE)).toBe(63);
  });

  it("max_slot_count is itself a valid slot count and the next one is not", () => {
    for (const width of [1, 2, 3, 5, 7, 8, 200]) {
      const size = as_element_size(width);
      const max = max_slot_count(size, SPACE);
      expect(is_valid_slot_count(max, size, SPACE)).toBe(true);
      expect(is_valid_slot_count(max + 1, size, SPACE)).toBe(false);
    }
  });
});
