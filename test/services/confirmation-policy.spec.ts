import { computeSafeHead } from "../../src/services/confirmation-policy.service";

describe("computeSafeHead", () => {
  it("subtracts the confirmation depth from the head", () => {
    expect(computeSafeHead(110, 3)).toBe(107);
    expect(computeSafeHead(110, 0)).toBe(110);
  });

  it("clamps at zero when the chain is shorter than the depth", () => {
    expect(computeSafeHead(2, 12)).toBe(0);
  });

  it("rejects negative or fractional inputs", () => {
    expect(() => computeSafeHead(10, -1)).toThrow(RangeError);
    expect(() => computeSafeHead(10, 1.5)).toThrow(RangeError);
    expect(() => computeSafeHead(-1, 0)).toThrow(RangeError);
  });
});
