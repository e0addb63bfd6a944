import type { FactorTables } from "../factors/factorTables.js";
import { clampScore, round2 } from "../math.js";
import type { LogisticsProfile, ShippingMode } from "../types.js";

export interface ShippingModeFactor {
    /** relative to sea freight */
    readonly co2Multiplier: number;
    readonly scorePenalty: number;
}

export const SHIPPING_MODE_FACTORS: Readonly<Record<ShippingMode, ShippingModeFactor>> = Object.freeze({
    sea: Object.freeze({ co2Multiplier: 1, scorePenalty: 0 }),
    rail: Object.freeze({ co2Multiplier: 2, scorePenalty: 5 }),
    road: Object.freeze({ co2Multiplier: 5, scorePenalty: 10 }),
    air: Object.freeze({ co2Multiplier: 50, scorePenalty: 30 }),
});

export interface LogisticsScore {
    profile: LogisticsProfile;
    logisticsScore: number;
    /** kg CO2e per kg of product */
    co2PerKg: number;
    co2Kg: number;
}

export function scoreLogistics(
    origin: string,
    destination: string,
    weightKg: number,
    tables: FactorTables,
    mode: ShippingMode = "sea",
): LogisticsScore {
    const profile = tables.logisticsProfile(origin, destination);
    const modeFactor = SHIPPING_MODE_FACTORS[mode];

    const logisticsScore = round2(clampScore(profile.score - modeFactor.scorePenalty));
    const co2PerKg = profile.co2PerKg * modeFactor.co2Multiplier;

    return {
        profile,
        logisticsScore,
        co2PerKg,
        co2Kg: weightKg * co2PerKg,
    };
}
