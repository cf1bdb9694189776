export type { Brand } from "./brand";
export { TypeError, TYPE_ERROR } from "./error";
export {
  assert,
  assert_that,
  validate_and_cast,
  unsafe_cast,
  is_non_negative_integer,
  is_positive_integer,
} from "./assertions";
export {
  as_element_size,
  create_address_space,
  DEFAULT_ADDRESS_SPACE,
  can_size_add,
  can_size_multiply,
  can_add_within,
  add_capped,
  can_index_add,
  fits_in_index,
  size_to_index,
  is_valid_slot_count,
  max_slot_count,
  type AddressSpace,
  type ElementSize,
} from "./checked_math/checked_math";
export {
  ELEMENT_TYPES,
  define_struct,
  type ElementType,
  type ElementTag,
  type NumberTag,
  type BigIntTag,
  type ValueForTag,
  type StructSchema,
  type StructValue,
} from "./element_types/element_types";
