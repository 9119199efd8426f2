/**
 * Risk band thresholds for deepfake scores.
 *
 * A score strictly above `highThreshold` is high risk, strictly above
 * `mediumThreshold` medium, anything else low.
 */
export interface RiskThresholds {
  highThreshold: number;
  mediumThreshold: number;
}

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = {
  highThreshold: 0.7,
  mediumThreshold: 0.4,
};
