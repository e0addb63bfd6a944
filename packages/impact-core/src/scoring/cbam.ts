import type { FactorTables } from "../factors/factorTables.js";
import type { Composition } from "../types.js";

export interface CbamAnalysis {
    relevant: boolean;
    /** CBAM-category materials present, in composition order */
    materials: string[];
    reason: string;
}

function formatAlternatives(items: string[]): string {
    if (items.length <= 1) return items.join("");
    return `${items.slice(0, -1).join(", ")}, or ${items[items.length - 1]}`;
}

/** Presence of any CBAM-category material with share > 0; no threshold. */
export function detectCbam(composition: Composition, tables: FactorTables): CbamAnalysis {
    const materials: string[] = [];
    for (const [materialId, share] of composition) {
        if (share > 0 && tables.factorFor(materialId).cbamRelevant) {
            materials.push(materialId);
        }
    }

    const relevant = materials.length > 0;
    const reason = relevant
        ? `Product contains CBAM-relevant material(s): ${materials.join(", ")}.`
        : `Materials do not contain ${formatAlternatives(tables.cbamMaterials())}.`;

    return { relevant, materials, reason };
}
