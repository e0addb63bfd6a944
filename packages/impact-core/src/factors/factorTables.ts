import { readFileSync } from "node:fs";
import { z } from "zod";
import { haversineKm } from "./geo.js";
import { normalizeCountryKey, normalizeMaterialKey } from "./keys.js";
import type { DistanceTier, LogisticsProfile, MaterialFactor } from "../types.js";

export const DEFAULT_DATA_DIR = new URL("../../data/", import.meta.url);

export const DEFAULT_MATERIAL_ID = "default";

/** Upper bound (great-circle km) of the regional tier. */
export const REGIONAL_MAX_KM = 3_000;

export interface TierFactor {
    readonly co2PerKg: number;
    readonly score: number;
}

export const TIER_FACTORS: Readonly<Record<DistanceTier, TierFactor>> = Object.freeze({
    domestic: Object.freeze({ co2PerKg: 0.05, score: 95 }),
    regional: Object.freeze({ co2PerKg: 0.25, score: 70 }),
    intercontinental: Object.freeze({ co2PerKg: 0.6, score: 35 }),
});

const MaterialEntrySchema = z.object({
    co2PerKg: z.number().nonnegative(),
    waterPerKg: z.number().nonnegative(),
    sustainability: z.number().min(0).max(100),
    cbamRelevant: z.boolean(),
    note: z.string().optional(),
});

const MaterialTableSchema = z.object({
    default: MaterialEntrySchema,
    materials: z.record(MaterialEntrySchema),
});

const CountryEntrySchema = z.object({
    code: z.string().min(2),
    names: z.array(z.string().min(1)),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
});

const CountryTableSchema = z.object({
    countries: z.array(CountryEntrySchema),
});

export type MaterialTableData = z.infer<typeof MaterialTableSchema>;
export type CountryTableData = z.infer<typeof CountryTableSchema>;

export interface CountryEntry {
    readonly code: string;
    readonly lat: number;
    readonly lon: number;
}

export interface FactorTableSummary {
    materials: string[];
    default_factor: {
        co2_per_kg: number;
        water_liters_per_kg: number;
        sustainability: number;
    };
    cbam_materials: string[];
    tiers: Record<DistanceTier, { co2_per_kg: number; score: number; max_distance_km: number | null }>;
    regional_max_km: number;
    countries: number;
}

function toFactor(id: string, entry: z.infer<typeof MaterialEntrySchema>): MaterialFactor {
    return Object.freeze({
        id,
        co2PerKg: entry.co2PerKg,
        waterPerKg: entry.waterPerKg,
        sustainability: entry.sustainability,
        cbamRelevant: entry.cbamRelevant,
        ...(entry.note !== undefined ? { note: entry.note } : {}),
    });
}

function tierProfile(tier: DistanceTier, distanceKm: number | null, resolved: boolean): LogisticsProfile {
    const { co2PerKg, score } = TIER_FACTORS[tier];
    return Object.freeze({ tier, co2PerKg, score, distanceKm, resolved });
}

/**
 * Static emission/water factors per material and the country table used to
 * derive logistics tiers. Built once, then only read.
 */
export class FactorTables {
    private readonly materials: ReadonlyMap<string, MaterialFactor>;
    private readonly fallback: MaterialFactor;
    private readonly countries: ReadonlyMap<string, CountryEntry>;

    constructor(materials: MaterialTableData, countries: CountryTableData) {
        const materialMap = new Map<string, MaterialFactor>();
        for (const [rawId, entry] of Object.entries(materials.materials)) {
            const id = normalizeMaterialKey(rawId);
            materialMap.set(id, toFactor(id, entry));
        }
        this.materials = materialMap;
        this.fallback = toFactor(DEFAULT_MATERIAL_ID, materials.default);

        const countryMap = new Map<string, CountryEntry>();
        for (const country of countries.countries) {
            const entry: CountryEntry = Object.freeze({
                code: country.code.toLowerCase(),
                lat: country.lat,
                lon: country.lon,
            });
            countryMap.set(normalizeCountryKey(country.code), entry);
            for (const name of country.names) {
                countryMap.set(normalizeCountryKey(name), entry);
            }
        }
        this.countries = countryMap;
    }

    get defaultFactor(): MaterialFactor {
        return this.fallback;
    }

    hasMaterial(materialId: string): boolean {
        return this.materials.has(normalizeMaterialKey(materialId));
    }

    /** Unknown ids resolve to the neutral default entry. */
    factorFor(materialId: string): MaterialFactor {
        return this.materials.get(normalizeMaterialKey(materialId)) ?? this.fallback;
    }

    cbamMaterials(): string[] {
        return [...this.materials.values()].filter((f) => f.cbamRelevant).map((f) => f.id);
    }

    resolveCountry(nameOrCode: string): CountryEntry | undefined {
        return this.countries.get(normalizeCountryKey(nameOrCode));
    }

    /**
     * Same country -> domestic, <= REGIONAL_MAX_KM -> regional, otherwise
     * intercontinental. An unresolved side gets the intercontinental tier.
     */
    logisticsProfile(origin: string, destination: string): LogisticsProfile {
        const originKey = normalizeCountryKey(origin);
        const destinationKey = normalizeCountryKey(destination);

        const from = this.countries.get(originKey);
        const to = this.countries.get(destinationKey);

        if (originKey !== "" && originKey === destinationKey) {
            return tierProfile("domestic", 0, from !== undefined);
        }

        if (!from || !to) {
            return tierProfile("intercontinental", null, false);
        }

        if (from.code === to.code) {
            return tierProfile("domestic", 0, true);
        }

        const distanceKm = haversineKm(from, to);
        const tier: DistanceTier = distanceKm <= REGIONAL_MAX_KM ? "regional" : "intercontinental";
        return tierProfile(tier, distanceKm, true);
    }

    summary(): FactorTableSummary {
        const codes = new Set([...this.countries.values()].map((c) => c.code));
        return {
            materials: [...this.materials.keys()].sort(),
            default_factor: {
                co2_per_kg: this.fallback.co2PerKg,
                water_liters_per_kg: this.fallback.waterPerKg,
                sustainability: this.fallback.sustainability,
            },
            cbam_materials: this.cbamMaterials(),
            tiers: {
                domestic: { co2_per_kg: TIER_FACTORS.domestic.co2PerKg, score: TIER_FACTORS.domestic.score, max_distance_km: 0 },
                regional: { co2_per_kg: TIER_FACTORS.regional.co2PerKg, score: TIER_FACTORS.regional.score, max_distance_km: REGIONAL_MAX_KM },
                intercontinental: {
                    co2_per_kg: TIER_FACTORS.intercontinental.co2PerKg,
                    score: TIER_FACTORS.intercontinental.score,
                    max_distance_km: null,
                },
            },
            regional_max_km: REGIONAL_MAX_KM,
            countries: codes.size,
        };
    }
}

/** Validates raw table data (already JSON-parsed) and builds the tables. */
export function parseFactorTables(raw: { materials: unknown; countries: unknown }): FactorTables {
    const materials = MaterialTableSchema.parse(raw.materials);
    const countries = CountryTableSchema.parse(raw.countries);
    return new FactorTables(materials, countries);
}

function readJson(file: URL): unknown {
    return JSON.parse(readFileSync(file, "utf-8"));
}

/** Reads materials.json and countries.json from dataDir. */
export function loadFactorTables(dataDir: URL = DEFAULT_DATA_DIR): FactorTables {
    return parseFactorTables({
        materials: readJson(new URL("materials.json", dataDir)),
        countries: readJson(new URL("countries.json", dataDir)),
    });
}
