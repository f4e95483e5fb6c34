import { roundHalfEven } from "./rounding";

describe("roundHalfEven", () => {
  it("rounds exact halves to the even integer", () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
  });

  it("rounds non-halves to the nearest integer", () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(3.0000000000000004)).toBe(3);
  });

  it("rounds to two decimals", () => {
    expect(roundHalfEven((6 / 13) * 100, 2)).toBe(46.15);
    expect(roundHalfEven(2 / 3, 2)).toBe(0.67);
    expect(roundHalfEven(0.3, 2)).toBe(0.3);
  });

  it("leaves whole numbers unchanged", () => {
    expect(roundHalfEven(100, 2)).toBe(100);
    expect(roundHalfEven(0, 2)).toBe(0);
  });
});
