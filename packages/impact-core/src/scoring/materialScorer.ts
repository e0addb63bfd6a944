import type { FactorTables } from "../factors/factorTables.js";
import { clampScore, round2 } from "../math.js";
import type { Composition } from "../types.js";

export interface MaterialScore {
    /** share-weighted average of per-material sustainability, 0-100 */
    materialScore: number;
    /** kg CO2e per kg of product */
    co2PerKg: number;
    /** liters per kg of product */
    waterPerKg: number;
}

export function scoreMaterials(composition: Composition, tables: FactorTables): MaterialScore {
    let totalShare = 0;
    let weightedScore = 0;
    let co2PerKg = 0;
    let waterPerKg = 0;

    for (const [materialId, share] of composition) {
        if (share <= 0) continue;
        const factor = tables.factorFor(materialId);
        weightedScore += share * factor.sustainability;
        co2PerKg += share * factor.co2PerKg;
        waterPerKg += share * factor.waterPerKg;
        totalShare += share;
    }

    if (totalShare <= 0) {
        return { materialScore: tables.defaultFactor.sustainability, co2PerKg: 0, waterPerKg: 0 };
    }

    return {
        materialScore: round2(clampScore(weightedScore / totalShare)),
        co2PerKg,
        waterPerKg,
    };
}
