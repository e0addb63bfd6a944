import type { FastifyReply, FastifyRequest } from "fastify";
import type { SlidingWindowRateLimiter } from "./rateLimiter.js";

export const API_KEY_HEADER = "x-api-key";

export interface ApiKeyGuardOptions {
    apiKeys: readonly string[];
    rateLimiter: SlidingWindowRateLimiter;
}

/**
 * preHandler for protected routes: 401 on a missing or unknown X-API-Key,
 * 429 once the key exceeds its rate limit.
 */
export function createApiKeyGuard(options: ApiKeyGuardOptions) {
    const validKeys = new Set(options.apiKeys);
    const { rateLimiter } = options;

    return async function apiKeyGuard(request: FastifyRequest, reply: FastifyReply) {
        const header = request.headers[API_KEY_HEADER];
        const apiKey = Array.isArray(header) ? header[0] : header;

        if (!apiKey) {
            return reply.code(401).send({
                error: "unauthorized",
                message: "Missing API key. Provide X-API-Key header.",
            });
        }

        if (!validKeys.has(apiKey)) {
            request.log.warn("rejected request with an invalid API key");
            return reply.code(401).send({ error: "unauthorized", message: "Invalid API key." });
        }

        if (!rateLimiter.tryAcquire(apiKey)) {
            const retryAfterSeconds = Math.ceil(rateLimiter.retryAfterMs(apiKey) / 1000);
            return reply
                .code(429)
                .header("retry-after", String(Math.max(1, retryAfterSeconds)))
                .send({ error: "rate_limited", message: "Too many requests for this API key." });
        }
    };
}
