import type { SarDecision } from "@/adapters/voice-api";

import { DEFAULT_RISK_THRESHOLDS, type RiskThresholds } from "./config";
import type { RiskAssessment, RiskDistribution, RiskLevel } from "./types";

export const classifyRisk = (
  score: number,
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS,
): RiskLevel => {
  if (score > thresholds.highThreshold) {
    return "high";
  }
  if (score > thresholds.mediumThreshold) {
    return "medium";
  }
  return "low";
};

const DECISION_BY_LEVEL: Record<RiskLevel, SarDecision> = {
  high: "deny",
  medium: "review",
  low: "allow",
};

/**
 * Maps a deepfake score to a risk level and the action a caller should take.
 *
 * @example
 * ```typescript
 * assessRisk(0.82); // { score: 0.82, level: "high", decision: "deny" }
 * ```
 */
export const assessRisk = (
  score: number,
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS,
): RiskAssessment => {
  const level = classifyRisk(score, thresholds);
  return { score, level, decision: DECISION_BY_LEVEL[level] };
};

export const summarizeRisk = (
  scores: readonly number[],
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS,
): RiskDistribution => {
  const distribution: RiskDistribution = { low: 0, medium: 0, high: 0, averageScore: 0 };
  if (scores.length === 0) {
    return distribution;
  }

  let total = 0;
  for (const score of scores) {
    distribution[classifyRisk(score, thresholds)]++;
    total += score;
  }
  distribution.averageScore = total / scores.length;
  return distribution;
};
