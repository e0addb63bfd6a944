import { pino, type Logger } from "pino";
import { loadFactorTables, type FactorTables } from "../factors/factorTables.js";
import { buildMethodology, type Methodology } from "../methodology/methodology.js";
import { validateAssessmentRequest } from "../request/assessmentRequest.js";
import { aggregateImpact } from "../scoring/aggregate.js";
import { detectCbam } from "../scoring/cbam.js";
import { explainAssessment } from "../scoring/explanation.js";
import { scoreLogistics } from "../scoring/logisticsScorer.js";
import { scoreMaterials } from "../scoring/materialScorer.js";
import { scoreWeightImpact } from "../scoring/weightImpact.js";
import type { AssessmentRequest, ImpactResult } from "../types.js";

export interface ImpactEngineOptions {
    tables: FactorTables;
    logger?: Logger;
}

export class ImpactEngine {
    public readonly tables: FactorTables;
    private readonly logger: Logger;

    constructor(options: ImpactEngineOptions) {
        this.tables = options.tables;
        this.logger = options.logger ?? pino({ level: "silent" });
    }

    /** Validates an untrusted body, then scores it. Throws ValidationError. */
    assess(input: unknown): ImpactResult {
        return this.assessRequest(validateAssessmentRequest(input));
    }

    assessRequest(request: AssessmentRequest): ImpactResult {
        const { composition, weightKg, originCountry, destinationCountry, shippingMode } = request;

        for (const materialId of composition.keys()) {
            if (!this.tables.hasMaterial(materialId)) {
                this.logger.debug({ material: materialId }, "unknown material, default factor applied");
            }
        }

        const material = scoreMaterials(composition, this.tables);
        const logistics = scoreLogistics(originCountry, destinationCountry, weightKg, this.tables, shippingMode);
        if (!logistics.profile.resolved && logistics.profile.tier === "intercontinental") {
            this.logger.debug(
                { origin: originCountry, destination: destinationCountry },
                "unknown route, intercontinental tier applied",
            );
        }
        const weightImpact = scoreWeightImpact(weightKg);
        const cbam = detectCbam(composition, this.tables);

        const explanation = explainAssessment(
            { composition, weightKg, profile: logistics.profile, mode: shippingMode, originCountry, destinationCountry },
            this.tables,
        );

        return aggregateImpact({
            productName: request.productName,
            weightKg,
            material,
            logistics,
            weightImpact,
            cbam,
            explanation,
        });
    }

    methodology(): Methodology {
        return buildMethodology(this.tables);
    }
}

export interface CreateImpactEngineOptions {
    dataDir?: URL;
    logger?: Logger;
}

/** Loads the built-in factor tables once and wraps them in an engine. */
export function createImpactEngine(options: CreateImpactEngineOptions = {}): ImpactEngine {
    const tables = loadFactorTables(options.dataDir);
    options.logger?.debug({ summary: tables.summary() }, "factor tables loaded");
    return new ImpactEngine({ tables, logger: options.logger });
}
