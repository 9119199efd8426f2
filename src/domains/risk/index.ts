export type { RiskThresholds } from "./config";
export { assessRisk, classifyRisk, summarizeRisk } from "./evaluate";
export type { RiskAssessment, RiskDistribution, RiskLevel } from "./types";
