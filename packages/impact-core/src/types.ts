export type ShippingMode = "sea" | "road" | "rail" | "air";

export type DistanceTier = "domestic" | "regional" | "intercontinental";

export interface MaterialFactor {
    readonly id: string;
    /** kg CO2e per kg of material */
    readonly co2PerKg: number;
    /** liters per kg of material */
    readonly waterPerKg: number;
    /** 0-100, higher = lower impact */
    readonly sustainability: number;
    readonly cbamRelevant: boolean;
    readonly note?: string;
}

export interface LogisticsProfile {
    readonly tier: DistanceTier;
    /** kg CO2e per kg shipped, sea-freight baseline */
    readonly co2PerKg: number;
    readonly score: number;
    /** great-circle distance, null when a country could not be resolved */
    readonly distanceKm: number | null;
    readonly resolved: boolean;
}

/** material id (normalized) -> share, shares sum to 1.0 */
export type Composition = ReadonlyMap<string, number>;

export interface AssessmentRequest {
    readonly productName: string;
    readonly composition: Composition;
    readonly weightKg: number;
    readonly originCountry: string;
    readonly destinationCountry: string;
    readonly shippingMode: ShippingMode;
}

export interface ImpactBreakdown {
    readonly material_score: number;
    readonly logistics_score: number;
    readonly weight_impact: number;
}

export interface ImpactResult {
    readonly product_name: string;
    readonly total_sustainability_score: number;
    readonly co2_estimate_kg: number;
    readonly water_usage_liters: number;
    readonly breakdown: ImpactBreakdown;
    readonly cbam_relevant: boolean;
    readonly cbam_reason: string;
    readonly logistics_tier: DistanceTier;
    readonly explanation: readonly string[];
    readonly limitations: string;
    readonly methodology_version: string;
}
