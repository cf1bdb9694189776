// Capacity planner
//   capacity = new_len + new_len / GROWTH_RATIO + MIN_MARGIN
// recomputed only when new_len leaves [capacity / SHRINK_RATIO, capacity].
export const GROWTH_RATIO = 8;
export const MIN_MARGIN = 4;
export const SHRINK_RATIO = 2;

// Hinted planner: the hint is treated as a mean with deviation hint / HINT_DEVIATIONS,
// and lengths past the hint get a fixed margin instead of a proportional one.
export const HINT_DEVIATIONS = 3;
export const HINT_LINEAR_SLOPE = 2;
export const HINT_OVERSHOOT_MARGIN = 4;

// Default address space: byte sizes stay exact as JS numbers, slot indices
// stay within signed 32-bit range (usable as typed array indices).
export const DEFAULT_SIZE_MAX = Number.MAX_SAFE_INTEGER;
export const DEFAULT_INDEX_MAX = 0x7fffffff;

// DataView accessors
export const LITTLE_ENDIAN = true;

// Logging
export const LOG_LEVEL_ENV = "GROWBUF_LOG_LEVEL";
export const DEFAULT_LOG_LEVEL = "silent";
