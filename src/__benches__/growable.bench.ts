import { bench, describe } from "vitest";
import { GrowableBuffer } from "../growable/growable_buffer";
import { GrowableFloat64Array } from "../growable/growable_array";
import { as_element_size } from "../type_primitives";

const TIERS = [1_000, 10_000, 100_000] as const;

const EIGHT = as_element_size(8);
const SLOT = new Uint8Array(8);

// ============================================================
// Append — amortized growth
// ============================================================

describe("append", () => {
  for (const N of TIERS) {
    bench(`append ${N.toLocaleString()} slots`, () => {
      const buf = GrowableBuffer.empty(EIGHT);
      for (let i = 0; i < N; i++) buf.append(SLOT);
    });

    bench(`append ${N.toLocaleString()} slots with length hint`, () => {
      const buf = GrowableBuffer.empty(EIGHT, { length_hint: N });
      for (let i = 0; i < N; i++) buf.append(SLOT);
    });

    bench(`append ${N.toLocaleString()} f64 values`, () => {
      const arr = new GrowableFloat64Array();
      for (let i = 0; i < N; i++) arr.append(i);
    });
  }
});

// ============================================================
// Append/remove churn — hysteresis window
// ============================================================

describe("append/remove churn", () => {
  for (const N of TIERS) {
    bench(`${N.toLocaleString()} alternating append/remove at the boundary`, () => {
      const buf = GrowableBuffer.empty(EIGHT);
      for (let i = 0; i < 64; i++) buf.append(SLOT);
      for (let i = 0; i < N; i++) {
        buf.append(SLOT);
        buf.remove(buf.length - 1);
      }
    });
  }
});

// ============================================================
// Slice — strided copy
// ============================================================

describe("slice", () => {
  for (const N of TIERS) {
    const source = GrowableBuffer.from_array(new Uint8Array(N * 8), N, EIGHT);
    if (!source.ok) throw source.error;
    const buf = source.value;

    bench(`slice ${N.toLocaleString()} slots, step 1`, () => {
      buf.slice(0, N, 1);
    });

    bench(`slice ${N.toLocaleString()} slots, step -3`, () => {
      buf.slice(N, 0, -3);
    });
  }
});
