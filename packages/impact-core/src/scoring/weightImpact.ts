import { round2 } from "../math.js";

/** Score approached by very heavy products. */
export const WEIGHT_IMPACT_FLOOR = 10;
/** Weight at which the score sits halfway between 100 and the floor. */
export const WEIGHT_IMPACT_HALF_KG = 2;

export const WEIGHT_IMPACT_FORMULA =
    `${WEIGHT_IMPACT_FLOOR} + ${100 - WEIGHT_IMPACT_FLOOR} / (1 + weight_kg / ${WEIGHT_IMPACT_HALF_KG})`;

/**
 * Saturating, strictly decreasing in weight: tends to 100 for very light
 * products and to WEIGHT_IMPACT_FLOOR for very heavy ones.
 */
export function scoreWeightImpact(weightKg: number): number {
    if (!Number.isFinite(weightKg) || weightKg <= 0) {
        throw new RangeError(`weightKg must be a positive finite number, got ${weightKg}`);
    }
    const score = WEIGHT_IMPACT_FLOOR + (100 - WEIGHT_IMPACT_FLOOR) / (1 + weightKg / WEIGHT_IMPACT_HALF_KG);
    return round2(score);
}
