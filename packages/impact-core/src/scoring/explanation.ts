import type { FactorTables } from "../factors/factorTables.js";
import type { Composition, LogisticsProfile, ShippingMode } from "../types.js";

export interface ExplanationInput {
    composition: Composition;
    weightKg: number;
    profile: LogisticsProfile;
    mode: ShippingMode;
    originCountry: string;
    destinationCountry: string;
}

const MODE_NOTES: Readonly<Record<ShippingMode, string>> = {
    sea: "Sea freight is the most carbon-efficient shipping mode.",
    rail: "Rail freight is relatively efficient (~2x sea freight CO2).",
    road: "Road freight has ~5x higher CO2 than sea freight.",
    air: "Air freight penalty applied (approx. 50x higher CO2 than sea freight).",
};

/** Human-readable notes surfaced next to the scores. */
export function explainAssessment(input: ExplanationInput, tables: FactorTables): string[] {
    const notes: string[] = [];

    for (const [materialId, share] of input.composition) {
        if (share <= 0) continue;
        if (!tables.hasMaterial(materialId)) {
            notes.push(`No factor data for "${materialId}"; the neutral default factor was applied.`);
            continue;
        }
        const note = tables.factorFor(materialId).note;
        if (note) notes.push(note);
    }

    notes.push(MODE_NOTES[input.mode]);

    const { distanceKm, resolved, tier } = input.profile;
    if (!resolved && tier === "intercontinental") {
        notes.push(
            `Route ${input.originCountry} -> ${input.destinationCountry} is not recognized; the conservative intercontinental tier was applied.`,
        );
    } else if (distanceKm !== null) {
        if (distanceKm > 10_000) {
            notes.push("Very long-distance shipping (>10,000 km) substantially increases emissions.");
        } else if (distanceKm > 5_000) {
            notes.push("Long-distance shipping (>5,000 km) significantly increases emissions.");
        } else if (distanceKm > 0 && distanceKm < 500) {
            notes.push("Short shipping distance (<500 km) keeps logistics impact low.");
        }
    }

    if (input.weightKg > 5) {
        notes.push(`Heavy product (${input.weightKg.toFixed(1)} kg) adds a significant weight penalty.`);
    } else if (input.weightKg < 0.3) {
        notes.push("Lightweight product contributes to a better sustainability score.");
    }

    return notes;
}
