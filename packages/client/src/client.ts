import process from "node:process";
import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type Method } from "axios";
import type { z } from "zod";
import {
    HealthStatusSchema,
    ImpactResultSchema,
    MethodologySummarySchema,
    normalizeMaterialKey,
} from "@ecoscore/impact-core";
import type {
    AssessImpactBody,
    HealthStatus,
    ImpactResult,
    MethodologySummary,
    ShippingMode,
} from "@ecoscore/impact-core";
import { EcoScoreApiError, EcoScoreConfigError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface EcoScoreClientOptions {
    /** falls back to ECOSCORE_API_KEY */
    apiKey?: string;
    /** API root, falls back to ECOSCORE_BASE_URL */
    baseUrl?: string;
    timeoutMs?: number;
    /** custom axios transport */
    adapter?: AxiosAdapter;
}

/** A single material id (share 1.0) or an id -> share mapping. */
export type MaterialInput = string | Record<string, number>;

function detailOf(body: unknown): string | undefined {
    if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
        return body.message;
    }
    return undefined;
}

export function toComposition(material: MaterialInput): Record<string, number> {
    if (typeof material === "string") {
        return { [normalizeMaterialKey(material)]: 1.0 };
    }
    const composition: Record<string, number> = {};
    for (const [key, share] of Object.entries(material)) {
        const id = normalizeMaterialKey(key);
        if (Object.hasOwn(composition, id)) {
            throw new EcoScoreConfigError(`material "${id}" is given more than once after normalization`);
        }
        composition[id] = share;
    }
    return composition;
}

export class EcoScoreClient {
    readonly baseUrl: string;
    private readonly http: AxiosInstance;

    constructor(options: EcoScoreClientOptions = {}) {
        const apiKey = (options.apiKey ?? process.env.ECOSCORE_API_KEY ?? "").trim();
        if (!apiKey) {
            throw new EcoScoreConfigError("API key required. Pass apiKey or set ECOSCORE_API_KEY.");
        }

        const baseUrl = (options.baseUrl ?? process.env.ECOSCORE_BASE_URL ?? "").trim().replace(/\/+$/, "");
        if (!baseUrl) {
            throw new EcoScoreConfigError("Base URL required. Pass baseUrl or set ECOSCORE_BASE_URL to the API root.");
        }
        this.baseUrl = baseUrl;

        this.http = axios.create({
            baseURL: baseUrl,
            timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            headers: {
                "X-API-Key": apiKey,
                "Content-Type": "application/json",
            },
            // status handling happens in request()
            validateStatus: () => true,
            ...(options.adapter ? { adapter: options.adapter } : {}),
        });
    }

    /** Sends the request and validates a 2xx body against schema. */
    private async request<S extends z.ZodTypeAny>(method: Method, path: string, schema: S, data?: unknown): Promise<z.output<S>> {
        let status: number;
        let body: unknown;
        try {
            const response = await this.http.request<unknown>({ method, url: path, data });
            status = response.status;
            body = response.data;
        } catch (error: unknown) {
            if (error instanceof AxiosError) {
                throw new EcoScoreApiError(`${method} ${path} failed: ${error.message}`, {
                    status: error.response?.status ?? 0,
                    body: error.response?.data,
                    cause: error,
                });
            }
            throw error;
        }

        if (status < 200 || status >= 300) {
            const detail = detailOf(body);
            throw new EcoScoreApiError(`${method} ${path} failed with status ${status}${detail ? `: ${detail}` : ""}`, {
                status,
                body,
            });
        }

        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            throw new EcoScoreApiError(`${method} ${path} returned an unexpected response body`, {
                status,
                body,
                cause: parsed.error,
            });
        }
        return parsed.data;
    }

    /**
     * Assesses one product. Material ids are normalized ("Recycled Cotton"
     * becomes "recycled_cotton") before sending.
     */
    async assessImpact(
        product: string,
        material: MaterialInput,
        weightKg = 0.2,
        originCountry = "CN",
        destinationCountry = "US",
        shippingMode?: ShippingMode,
    ): Promise<ImpactResult> {
        const body: AssessImpactBody = {
            product_name: product,
            material_composition: toComposition(material),
            weight_kg: weightKg,
            origin_country: originCountry,
            destination_country: destinationCountry,
            ...(shippingMode ? { shipping_mode: shippingMode } : {}),
        };
        return this.request("POST", "/v1/assess-impact", ImpactResultSchema, body);
    }

    async getMethodology(): Promise<MethodologySummary> {
        return this.request("GET", "/v1/methodology", MethodologySummarySchema);
    }

    async health(): Promise<HealthStatus> {
        return this.request("GET", "/health", HealthStatusSchema);
    }
}
