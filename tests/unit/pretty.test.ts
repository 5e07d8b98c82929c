import { describe, expect, it } from "vitest";

import { fromMillis, pretty } from "../../src/pretty.js";

const DAY_NS = 86_400_000_000_000n;

describe("pretty", () => {
  describe("nanoseconds", () => {
    it("prints sub-microsecond values as ns", () => {
      expect(pretty(0n)).toBe("0 ns");
      expect(pretty(1n)).toBe("1 ns");
      expect(pretty(372n)).toBe("372 ns");
      expect(pretty(999n)).toBe("999 ns");
    });
  });

  describe("microseconds", () => {
    it("prints exact microseconds as integers", () => {
      expect(pretty(1_000n)).toBe("1 us");
      expect(pretty(37_000n)).toBe("37 us");
    });

    it("prints fractional microseconds with three decimals", () => {
      expect(pretty(1_500n)).toBe("1.500 us");
      expect(pretty(1_001n)).toBe("1.001 us");
      expect(pretty(999_999n)).toBe("999.999 us");
    });
  });

  describe("milliseconds", () => {
    it("prints exact milliseconds as integers", () => {
      expect(pretty(1_000_000n)).toBe("1 ms");
      expect(pretty(250_000_000n)).toBe("250 ms");
    });

    it("ignores sub-microsecond remainders when checking for exact ms", () => {
      expect(pretty(1_000_999n)).toBe("1 ms");
    });

    it("formats from the truncated microsecond count", () => {
      expect(pretty(1_500_000n)).toBe("1.500 ms");
      expect(pretty(1_234_567n)).toBe("1.234 ms");
      expect(pretty(999_999_999n)).toBe("999.999 ms");
    });
  });

  describe("seconds", () => {
    it("prints exact seconds as integers", () => {
      expect(pretty(1_000_000_000n)).toBe("1 s");
      expect(pretty(59_000_000_000n)).toBe("59 s");
    });

    it("prints fractional seconds with three decimals", () => {
      expect(pretty(1_500_000_000n)).toBe("1.500 s");
      expect(pretty(1_020_000_000n)).toBe("1.020 s");
      expect(pretty(59_999_999_999n)).toBe("59.999 s");
    });
  });

  describe("clock format", () => {
    it("switches to HH:MM:SS from one minute", () => {
      expect(pretty(60_000_000_000n)).toBe("00:01:00");
      expect(pretty(90_000_000_000n)).toBe("00:01:30");
      expect(pretty(3_661_500_000_000n)).toBe("01:01:01");
    });

    it("prefixes whole days", () => {
      expect(pretty(DAY_NS + 90_000_000_000n)).toBe("1 days 00:01:30");
      expect(pretty(3_920_101_000_000_000n)).toBe("45 days 08:55:01");
    });

    it("drops sub-second remainders", () => {
      expect(pretty(90_999_999_999n)).toBe("00:01:30");
    });
  });

  describe("number input", () => {
    it("accepts safe integers", () => {
      expect(pretty(1500)).toBe("1.500 us");
      expect(pretty(90_000_000_000)).toBe("00:01:30");
    });

    it("rejects fractional and unsafe numbers", () => {
      expect(() => pretty(1.5)).toThrow(RangeError);
      expect(() => pretty(Number.MAX_SAFE_INTEGER + 1)).toThrow(RangeError);
      expect(() => pretty(Number.NaN)).toThrow(RangeError);
    });
  });

  it("keeps a single leading sign on negative durations", () => {
    expect(pretty(-5n)).toBe("-5 ns");
    expect(pretty(-1_500n)).toBe("-1.500 us");
    expect(pretty(-1_500_000n)).toBe("-1.500 ms");
    expect(pretty(-1_500_000_000n)).toBe("-1.500 s");
  });
});

describe("fromMillis", () => {
  it("converts milliseconds to nanoseconds", () => {
    expect(fromMillis(0)).toBe(0n);
    expect(fromMillis(1.5)).toBe(1_500_000n);
    expect(fromMillis(2000)).toBe(2_000_000_000n);
  });

  it("rejects non-finite readings", () => {
    expect(() => fromMillis(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});
