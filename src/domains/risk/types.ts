import type { SarDecision } from "@/adapters/voice-api";

export type RiskLevel = "low" | "medium" | "high";

export interface RiskAssessment {
  score: number;
  level: RiskLevel;
  /** Decision to file with a suspicious activity report */
  decision: SarDecision;
}

export interface RiskDistribution {
  low: number;
  medium: number;
  high: number;
  /** Mean score over every assessed response, 0 when there are none */
  averageScore: number;
}
