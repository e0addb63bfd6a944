import type { FactorTableSummary, FactorTables } from "../factors/factorTables.js";
import { COMPOSITION_TOLERANCE, MAX_WEIGHT_KG } from "../request/assessmentRequest.js";
import { LIMITATIONS_TEXT, METHODOLOGY_VERSION, SCORE_WEIGHTS } from "../scoring/aggregate.js";
import { SHIPPING_MODE_FACTORS } from "../scoring/logisticsScorer.js";
import { WEIGHT_IMPACT_FLOOR, WEIGHT_IMPACT_FORMULA, WEIGHT_IMPACT_HALF_KG } from "../scoring/weightImpact.js";
import type { ShippingMode } from "../types.js";

export const DISCLAIMER_TEXT =
    "Results are indicative estimates only. They are not a certified Life Cycle Assessment (LCA) " +
    "and must not be used as the sole basis for compliance or marketing claims. " +
    "Methodology may change; check methodology_version.";

export interface Methodology {
    methodology_version: string;
    description: string;
    total_sustainability_score: {
        formula: string;
        weights: { material: number; logistics: number; weight: number };
        range: string;
    };
    co2_estimate_kg: { formula: string; unit: string; note: string };
    water_usage_liters: { formula: string; unit: string; note: string };
    breakdown: {
        material_score: string;
        logistics_score: string;
        weight_impact: {
            formula: string;
            floor: number;
            half_weight_kg: number;
            note: string;
        };
    };
    shipping_modes: Record<ShippingMode, { co2_multiplier: number; score_penalty: number }>;
    composition: { share_sum_tolerance: number; key_normalization: string };
    limits: { max_weight_kg: number };
    factor_tables: FactorTableSummary;
    limitations: string;
    disclaimer: string;
}

export function buildMethodology(tables: FactorTables): Methodology {
    const { material, logistics, weight } = SCORE_WEIGHTS;

    const modeEntry = (mode: ShippingMode) => ({
        co2_multiplier: SHIPPING_MODE_FACTORS[mode].co2Multiplier,
        score_penalty: SHIPPING_MODE_FACTORS[mode].scorePenalty,
    });

    return {
        methodology_version: METHODOLOGY_VERSION,
        description:
            "Indicative sustainability scoring and impact estimates for products based on material composition, " +
            "weight, and origin-to-destination logistics. Not a certified LCA.",
        total_sustainability_score: {
            formula: `clamp(${material} * material_score + ${logistics} * logistics_score + ${weight} * weight_impact, 0, 100)`,
            weights: { material, logistics, weight },
            range: "0-100, higher is better",
        },
        co2_estimate_kg: {
            formula: "weight_kg * (sum(share * material_co2_per_kg) + tier_co2_per_kg * mode_co2_multiplier)",
            unit: "kg CO2 equivalent",
            note: "Uses indicative emission factors per material and a distance tier per origin/destination pair.",
        },
        water_usage_liters: {
            formula: "weight_kg * sum(share * material_water_liters_per_kg)",
            unit: "liters",
            note: "Mainly from cultivation/processing (e.g. cotton). Synthetic materials use lower factors.",
        },
        breakdown: {
            material_score: "Share-weighted average of per-material sustainability scores (0-100). Unknown materials use the default factor.",
            logistics_score:
                "Distance tier score (domestic > regional > intercontinental) minus the shipping mode penalty, clamped to 0-100. " +
                "Unrecognized routes use the intercontinental tier.",
            weight_impact: {
                formula: WEIGHT_IMPACT_FORMULA,
                floor: WEIGHT_IMPACT_FLOOR,
                half_weight_kg: WEIGHT_IMPACT_HALF_KG,
                note: "Strictly decreasing in weight; approaches 100 for very light products and the floor for very heavy ones.",
            },
        },
        shipping_modes: {
            sea: modeEntry("sea"),
            rail: modeEntry("rail"),
            road: modeEntry("road"),
            air: modeEntry("air"),
        },
        composition: {
            share_sum_tolerance: COMPOSITION_TOLERANCE,
            key_normalization: "trimmed, lowercased, spaces and hyphens replaced by underscores",
        },
        limits: { max_weight_kg: MAX_WEIGHT_KG },
        factor_tables: tables.summary(),
        limitations: LIMITATIONS_TEXT,
        disclaimer: DISCLAIMER_TEXT,
    };
}
