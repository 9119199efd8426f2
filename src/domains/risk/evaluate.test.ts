import { describe, expect, it } from "vitest";

import { assessRisk, classifyRisk, summarizeRisk } from "./evaluate";

describe("classifyRisk", () => {
  it("uses strict thresholds at the band edges", () => {
    expect(classifyRisk(0.71)).toBe("high");
    expect(classifyRisk(0.7)).toBe("medium");
    expect(classifyRisk(0.41)).toBe("medium");
    expect(classifyRisk(0.4)).toBe("low");
    expect(classifyRisk(0)).toBe("low");
  });

  it("accepts custom thresholds", () => {
    expect(classifyRisk(0.6, { highThreshold: 0.5, mediumThreshold: 0.2 })).toBe("high");
  });
});

describe("assessRisk", () => {
  it("maps each band to a report decision", () => {
    expect(assessRisk(0.82)).toEqual({ score: 0.82, level: "high", decision: "deny" });
    expect(assessRisk(0.5)).toEqual({ score: 0.5, level: "medium", decision: "review" });
    expect(assessRisk(0.1)).toEqual({ score: 0.1, level: "low", decision: "allow" });
  });
});

describe("summarizeRisk", () => {
  it("counts bands and averages scores", () => {
    const distribution = summarizeRisk([0.9, 0.5, 0.25, 0.75]);

    expect(distribution.high).toBe(2);
    expect(distribution.medium).toBe(1);
    expect(distribution.low).toBe(1);
    expect(distribution.averageScore).toBeCloseTo(0.6);
  });

  it("returns zeros for no scores", () => {
    expect(summarizeRisk([])).toEqual({ low: 0, medium: 0, high: 0, averageScore: 0 });
  });
});
