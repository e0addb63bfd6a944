export type {
    AssessmentRequest,
    Composition,
    DistanceTier,
    ImpactBreakdown,
    ImpactResult,
    LogisticsProfile,
    MaterialFactor,
    ShippingMode,
} from "./types.js";

export { ValidationError } from "./errors.js";
export { clamp, clampScore, round2 } from "./math.js";

export {
    FactorTables,
    loadFactorTables,
    parseFactorTables,
    DEFAULT_DATA_DIR,
    DEFAULT_MATERIAL_ID,
    REGIONAL_MAX_KM,
    TIER_FACTORS,
} from "./factors/factorTables.js";
export type { CountryEntry, CountryTableData, FactorTableSummary, MaterialTableData, TierFactor } from "./factors/factorTables.js";
export { haversineKm } from "./factors/geo.js";
export { normalizeCountryKey, normalizeMaterialKey } from "./factors/keys.js";

export {
    AssessImpactBodySchema,
    COMPOSITION_TOLERANCE,
    MAX_WEIGHT_KG,
    SHIPPING_MODES,
    validateAssessmentRequest,
} from "./request/assessmentRequest.js";
export type { AssessImpactBody } from "./request/assessmentRequest.js";
export { FrozenComposition } from "./request/composition.js";
export { HealthStatusSchema, ImpactResultSchema, MethodologySummarySchema } from "./request/resultSchemas.js";
export type { HealthStatus, MethodologySummary } from "./request/resultSchemas.js";

export { scoreMaterials } from "./scoring/materialScorer.js";
export type { MaterialScore } from "./scoring/materialScorer.js";
export { scoreLogistics, SHIPPING_MODE_FACTORS } from "./scoring/logisticsScorer.js";
export type { LogisticsScore, ShippingModeFactor } from "./scoring/logisticsScorer.js";
export { scoreWeightImpact, WEIGHT_IMPACT_FLOOR, WEIGHT_IMPACT_HALF_KG } from "./scoring/weightImpact.js";
export { detectCbam } from "./scoring/cbam.js";
export type { CbamAnalysis } from "./scoring/cbam.js";
export { explainAssessment } from "./scoring/explanation.js";
export {
    aggregateImpact,
    totalSustainabilityScore,
    LIMITATIONS_TEXT,
    METHODOLOGY_VERSION,
    SCORE_WEIGHTS,
} from "./scoring/aggregate.js";

export { buildMethodology, DISCLAIMER_TEXT } from "./methodology/methodology.js";
export type { Methodology } from "./methodology/methodology.js";

export { ImpactEngine, createImpactEngine } from "./engine/ImpactEngine.js";
export type { ImpactEngineOptions, CreateImpactEngineOptions } from "./engine/ImpactEngine.js";
