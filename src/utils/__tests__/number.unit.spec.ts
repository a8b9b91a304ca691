import { clamp, median, roundTo, toOptionalNumber } from "../number";

describe("number utils", () => {
  it("parses numeric strings and rejects the rest", () => {
    expect(toOptionalNumber(" 10.50 ")).toBe(10.5);
    expect(toOptionalNumber("")).toBeUndefined();
    expect(toOptionalNumber("abc")).toBeUndefined();
    expect(toOptionalNumber(Number.NaN)).toBeUndefined();
  });

  it("rounds ties on the scaled value to the even neighbour", () => {
    expect(roundTo(0.125, 2)).toBe(0.12);
    expect(roundTo(0.375, 2)).toBe(0.38);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(3.5, 0)).toBe(4);
    expect(roundTo(-2.5, 0)).toBe(-2);
  });

  it("rounds non-ties to the nearest value", () => {
    // 1.005 * 100 is 100.49999999999999 in binary
    expect(roundTo(1.005, 2)).toBe(1);
    expect(roundTo(64.51612903225806, 2)).toBe(64.52);
    expect(roundTo(1e-7, 2)).toBe(0);
  });

  it("takes the middle value or the mean of the two middle values", () => {
    expect(median([9, 1, 5])).toBe(5);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBeUndefined();
  });

  it("clamps into a range", () => {
    expect(clamp(7, 1, 5)).toBe(5);
    expect(clamp(-1, 1, 5)).toBe(1);
    expect(clamp(3, 1, 5)).toBe(3);
  });
});
