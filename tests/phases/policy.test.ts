import { describe, it, expect } from "vitest";
import { describePolicy, policySatisfied } from "../../src/phases/policy.js";

describe("pass policies", () => {
  it("all requires every session", () => {
    expect(policySatisfied("all", 3, 3)).toBe(true);
    expect(policySatisfied("all", 2, 3)).toBe(false);
  });

  it("majority requires strictly more than half", () => {
    expect(policySatisfied("majority", 2, 3)).toBe(true);
    expect(policySatisfied("majority", 2, 4)).toBe(false);
    expect(policySatisfied("majority", 3, 4)).toBe(true);
  });

  it("any requires one result, or nothing addressed", () => {
    expect(policySatisfied("any", 1, 5)).toBe(true);
    expect(policySatisfied("any", 0, 5)).toBe(false);
    expect(policySatisfied("any", 0, 0)).toBe(true);
  });

  it("describes each policy", () => {
    expect(describePolicy("all", 3)).toBe("all 3 required");
    expect(describePolicy("majority", 5)).toBe("majority (3 of 5) required");
    expect(describePolicy("any", 5)).toBe("at least one required");
  });
});
