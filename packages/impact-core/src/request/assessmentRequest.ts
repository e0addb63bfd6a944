import { z } from "zod";
import { ValidationError } from "../errors.js";
import { normalizeMaterialKey } from "../factors/keys.js";
import { FrozenComposition } from "./composition.js";
import type { AssessmentRequest, ShippingMode } from "../types.js";

/** Allowed distance of the share sum from 1.0. */
export const COMPOSITION_TOLERANCE = 0.01;

/** Upper bound on weight_kg; keeps CO2 and water estimates finite. */
export const MAX_WEIGHT_KG = 1_000_000;

export const SHIPPING_MODES = ["sea", "road", "rail", "air"] as const satisfies readonly ShippingMode[];

export const AssessImpactBodySchema = z.object({
    product_name: z.string().trim().min(1, "must not be empty"),
    material_composition: z
        .record(
            z.number()
                .finite()
                .gt(0, "share must be greater than 0")
                .lte(1, "share must be at most 1"),
        )
        .refine((composition) => Object.keys(composition).length > 0, "must contain at least one material"),
    weight_kg: z.number().finite().gt(0, "must be greater than 0").lte(MAX_WEIGHT_KG, `must be at most ${MAX_WEIGHT_KG}`),
    origin_country: z.string().trim().min(1, "must not be empty"),
    destination_country: z.string().trim().min(1, "must not be empty"),
    shipping_mode: z.enum(SHIPPING_MODES).default("sea"),
});

/** Wire shape of POST /v1/assess-impact. */
export type AssessImpactBody = z.input<typeof AssessImpactBodySchema>;

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

/**
 * Parses an untrusted request body into a frozen AssessmentRequest.
 * Material keys are normalized; shares within COMPOSITION_TOLERANCE of 1.0
 * are rescaled to sum to exactly 1.0. Throws ValidationError otherwise.
 */
export function validateAssessmentRequest(input: unknown): AssessmentRequest {
    const parsed = AssessImpactBodySchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError(formatIssues(parsed.error));
    }
    const body = parsed.data;

    const issues: string[] = [];
    const shares = new Map<string, number>();
    let total = 0;

    for (const [rawKey, share] of Object.entries(body.material_composition)) {
        const key = normalizeMaterialKey(rawKey);
        if (key === "") {
            issues.push("material_composition: material identifier must not be empty");
            continue;
        }
        if (shares.has(key)) {
            issues.push(`material_composition: duplicate material "${key}" after normalization`);
            continue;
        }
        shares.set(key, share);
        total += share;
    }

    if (issues.length === 0 && Math.abs(total - 1) > COMPOSITION_TOLERANCE) {
        issues.push(
            `material_composition: shares must sum to 1.0 (±${COMPOSITION_TOLERANCE}), got ${Number(total.toFixed(4))}`,
        );
    }

    if (issues.length > 0) {
        throw new ValidationError(issues);
    }

    const composition = new FrozenComposition([...shares].map(([key, share]) => [key, share / total] as const));

    return Object.freeze({
        productName: body.product_name,
        composition,
        weightKg: body.weight_kg,
        originCountry: body.origin_country,
        destinationCountry: body.destination_country,
        shippingMode: body.shipping_mode,
    });
}
