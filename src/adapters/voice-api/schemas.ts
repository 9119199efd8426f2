import * as v from "valibot";

// Deepfake detection

export const deepfakeLabelSchema = v.picklist(["likely_synthetic", "likely_real", "uncertain"]);

export const deepfakeResponseSchema = v.pipe(
  v.object({
    score: v.pipe(v.number(), v.minValue(0), v.maxValue(1)),
    label: deepfakeLabelSchema,
    latency_ms: v.number(),
    session_id: v.string(),
    model_version: v.string(),
  }),
  v.transform((raw) => ({
    score: raw.score,
    label: raw.label,
    latencyMs: raw.latency_ms,
    sessionId: raw.session_id,
    modelVersion: raw.model_version,
  })),
);

export type DeepfakeLabel = v.InferOutput<typeof deepfakeLabelSchema>;
export type DeepfakeResult = v.InferOutput<typeof deepfakeResponseSchema>;

// Voice MFA

export const mfaResponseSchema = v.pipe(
  v.object({
    verified: v.boolean(),
    enrollment_id: v.string(),
    confidence: v.pipe(v.number(), v.minValue(0), v.maxValue(1)),
    session_id: v.string(),
    latency_ms: v.number(),
    recommended_action: v.optional(v.picklist(["deny", "defer_to_review"])),
  }),
  v.transform((raw) => ({
    verified: raw.verified,
    enrollmentId: raw.enrollment_id,
    confidence: raw.confidence,
    sessionId: raw.session_id,
    latencyMs: raw.latency_ms,
    recommendedAction: raw.recommended_action,
  })),
);

export type MfaResult = v.InferOutput<typeof mfaResponseSchema>;

// Suspicious activity reports

export const sarDecisionSchema = v.picklist(["allow", "deny", "review"]);

export const sarResponseSchema = v.pipe(
  v.object({
    status: v.picklist(["submitted", "pending", "processed"]),
    case_id: v.string(),
    session_id: v.string(),
    submitted_at: v.string(),
  }),
  v.transform((raw) => ({
    status: raw.status,
    caseId: raw.case_id,
    sessionId: raw.session_id,
    submittedAt: raw.submitted_at,
  })),
);

export type SarDecision = v.InferOutput<typeof sarDecisionSchema>;
export type SarResult = v.InferOutput<typeof sarResponseSchema>;

export interface SarReport {
  sessionId: string;
  decision: SarDecision;
  reason: string;
  metadata?: Record<string, unknown>;
}
