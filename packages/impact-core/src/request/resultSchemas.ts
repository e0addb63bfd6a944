import { z } from "zod";

const score = z.number().finite().min(0).max(100);

/** Response body of POST /v1/assess-impact. */
export const ImpactResultSchema = z.object({
    product_name: z.string(),
    total_sustainability_score: score,
    co2_estimate_kg: z.number().finite().nonnegative(),
    water_usage_liters: z.number().finite().nonnegative(),
    breakdown: z.object({
        material_score: score,
        logistics_score: score,
        weight_impact: score,
    }),
    cbam_relevant: z.boolean(),
    cbam_reason: z.string(),
    logistics_tier: z.enum(["domestic", "regional", "intercontinental"]),
    explanation: z.array(z.string()),
    limitations: z.string(),
    methodology_version: z.string(),
});

/** Response body of GET /health. */
export const HealthStatusSchema = z.object({
    status: z.string(),
    methodology_version: z.string(),
});

export type HealthStatus = z.infer<typeof HealthStatusSchema>;

/** Top-level fields of GET /v1/methodology; nested sections pass through. */
export const MethodologySummarySchema = z
    .object({
        methodology_version: z.string(),
        total_sustainability_score: z
            .object({
                weights: z.object({ material: z.number(), logistics: z.number(), weight: z.number() }),
            })
            .passthrough(),
        limitations: z.string(),
        disclaimer: z.string(),
    })
    .passthrough();

export type MethodologySummary = z.infer<typeof MethodologySummarySchema>;
