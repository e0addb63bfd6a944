import fastify from "fastify";
import type { Logger } from "pino";
import { ValidationError, type ImpactEngine } from "@ecoscore/impact-core";
import { errorMessage } from "@ecoscore/shared";
import { createApiKeyGuard } from "./auth.js";
import { SlidingWindowRateLimiter } from "./rateLimiter.js";

export interface ServerOptions {
    engine: ImpactEngine;
    logger: Logger;
    apiKeys: readonly string[];
    rateLimit: { max: number; windowMs: number };
}

function statusCodeOf(error: unknown): number | undefined {
    if (typeof error === "object" && error !== null && "statusCode" in error) {
        const { statusCode } = error;
        if (typeof statusCode === "number" && statusCode >= 400 && statusCode < 500) return statusCode;
    }
    return undefined;
}

export async function buildServer(options: ServerOptions) {
    const { engine, logger } = options;
    const app = fastify({ loggerInstance: logger });

    const apiKeyGuard = createApiKeyGuard({
        apiKeys: options.apiKeys,
        rateLimiter: new SlidingWindowRateLimiter(options.rateLimit),
    });

    // static for the lifetime of the process
    const methodology = engine.methodology();

    app.setErrorHandler((error, request, reply) => {
        if (error instanceof ValidationError) {
            return reply.code(400).send({
                error: "validation_error",
                message: error.message,
                issues: error.issues,
            });
        }

        const clientStatus = statusCodeOf(error);
        if (clientStatus !== undefined) {
            return reply.code(clientStatus).send({ error: "bad_request", message: errorMessage(error) });
        }

        request.log.error({ err: error }, "unhandled error");
        return reply.code(500).send({ error: "internal_error", message: "Internal server error" });
    });

    app.get('/health', async () => {
        return {
            status: 'ok',
            methodology_version: methodology.methodology_version,
        };
    });

    app.get('/v1/methodology', async () => {
        return methodology;
    });

    app.post('/v1/assess-impact', { preHandler: apiKeyGuard }, async (request) => {
        const result = engine.assess(request.body);
        request.log.info(
            { product: result.product_name, score: result.total_sustainability_score, cbam: result.cbam_relevant },
            "impact assessed",
        );
        return result;
    });

    return app;
}
