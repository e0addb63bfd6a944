export class EcoScoreConfigError extends Error {
    readonly code = "ECOSCORE_CONFIG_ERROR";

    constructor(message: string) {
        super(message);
        this.name = "EcoScoreConfigError";
    }
}

/** Non-2xx response, or no response at all (status 0). */
export class EcoScoreApiError extends Error {
    readonly code = "ECOSCORE_API_ERROR";
    readonly status: number;
    readonly body: unknown;

    constructor(message: string, options: { status: number; body?: unknown; cause?: unknown }) {
        super(message, { cause: options.cause });
        this.name = "EcoScoreApiError";
        this.status = options.status;
        this.body = options.body;
    }
}
