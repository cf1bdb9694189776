// Buffers
export {
  GrowableBuffer,
  type BufferOptions,
  type SlotComparator,
} from "./growable/growable_buffer";
export {
  GrowableArray,
  GrowableInt8Array,
  GrowableUint8Array,
  GrowableInt16Array,
  GrowableUint16Array,
  GrowableInt32Array,
  GrowableUint32Array,
  GrowableFloat32Array,
  GrowableFloat64Array,
  GrowableBigInt64Array,
  GrowableBigUint64Array,
  ArrayFor,
  type Comparator,
} from "./growable/growable_array";

// Allocation
export {
  BudgetAllocator,
  heap_allocator,
  type Allocator,
} from "./growable/allocator";

// Capacity planning
export {
  plan,
  plan_capacity,
  plan_capacity_with_hint,
  in_hysteresis_window,
} from "./capacity/capacity_planner";

// Element types & checked math
export {
  ELEMENT_TYPES,
  define_struct,
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
  TypeError,
  TYPE_ERROR,
} from "./type_primitives";
export type {
  AddressSpace,
  ElementSize,
  ElementType,
  ElementTag,
  NumberTag,
  BigIntTag,
  ValueForTag,
  StructSchema,
  StructValue,
} from "./type_primitives";

// Results & errors
export {
  ok,
  err,
  OK,
  is_ok,
  is_err,
  unwrap,
  unwrap_or,
  map_result,
  type Ok,
  type Err,
  type Result,
} from "./utils/result";
export { AppError, BufferError, BUFFER_ERROR, is_buffer_error } from "./utils/error";

// Logging
export { logger, child_logger, type Logger } from "./utils/logger";
