/** "Recycled Polyester" / "recycled-polyester" -> "recycled_polyester" */
export function normalizeMaterialKey(key: string): string {
    return key.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/** "United_States" / " united  states " -> "united states" */
export function normalizeCountryKey(key: string): string {
    return key.trim().toLowerCase().replace(/[\s_]+/g, " ");
}
