import { clamp, round2 } from "../math.js";
import type { DistanceTier, ImpactBreakdown, ImpactResult } from "../types.js";
import type { CbamAnalysis } from "./cbam.js";
import type { LogisticsScore } from "./logisticsScorer.js";
import type { MaterialScore } from "./materialScorer.js";

export const METHODOLOGY_VERSION = "1.0.0-indicative";

export const SCORE_WEIGHTS = Object.freeze({
    material: 0.5,
    logistics: 0.3,
    weight: 0.2,
});

export const LIMITATIONS_TEXT =
    "Indicative model-based estimate; not a certified LCA and not for regulatory CBAM filings.";

export interface AggregateInput {
    productName: string;
    weightKg: number;
    material: MaterialScore;
    logistics: LogisticsScore;
    weightImpact: number;
    cbam: CbamAnalysis;
    explanation: string[];
}

export function totalSustainabilityScore(breakdown: ImpactBreakdown): number {
    return clamp(
        SCORE_WEIGHTS.material * breakdown.material_score +
            SCORE_WEIGHTS.logistics * breakdown.logistics_score +
            SCORE_WEIGHTS.weight * breakdown.weight_impact,
        0,
        100,
    );
}

/** Combines the sub-results into one frozen ImpactResult. */
export function aggregateImpact(input: AggregateInput): ImpactResult {
    const { productName, weightKg, material, logistics, weightImpact, cbam } = input;

    const breakdown: ImpactBreakdown = Object.freeze({
        material_score: material.materialScore,
        logistics_score: logistics.logisticsScore,
        weight_impact: weightImpact,
    });

    const tier: DistanceTier = logistics.profile.tier;

    return Object.freeze({
        product_name: productName,
        total_sustainability_score: totalSustainabilityScore(breakdown),
        co2_estimate_kg: round2(weightKg * (material.co2PerKg + logistics.co2PerKg)),
        water_usage_liters: round2(weightKg * material.waterPerKg),
        breakdown,
        cbam_relevant: cbam.relevant,
        cbam_reason: cbam.reason,
        logistics_tier: tier,
        explanation: Object.freeze([...input.explanation]),
        limitations: LIMITATIONS_TEXT,
        methodology_version: METHODOLOGY_VERSION,
    });
}
