import { readFile } from "node:fs/promises";
import { z } from "zod";
import { extractErrorCode, reasonFromCode } from "@ecoscore/shared";
import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";

//parameter resolution order

//CLI FLAGS > CONFIG FILE > ENV > DEFAULT

export const DEFAULT_CONFIG_FILE = "ecoscore.config.json";

/** Accepted only when no key is configured anywhere; never use in production. */
export const DEV_API_KEY = "demo-api-key-change-in-production";

export const DEFAULTS: Readonly<{
    host: string;
    port: number;
    logLevel: LogLevel;
    rateLimitMax: number;
    rateLimitWindowMs: number;
}> = Object.freeze({
    host: "0.0.0.0",
    port: 8000,
    logLevel: "info",
    rateLimitMax: 5,
    rateLimitWindowMs: 1000,
});

const PartialConfigSchema = z
    .object({
        server: z
            .object({
                host: z.string().min(1).optional(),
                port: z.number().int().min(0).max(65535).optional(),
            })
            .strict()
            .optional(),
        logLevel: z.enum(LOG_LEVELS).optional(),
        apiKeys: z.array(z.string().min(1)).optional(),
        rateLimit: z
            .object({
                max: z.number().int().positive().optional(),
                windowMs: z.number().int().positive().optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

/** Shape of ecoscore.config.json; also what the environment layer produces. */
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

export interface CliOverrides {
    host?: string;
    port?: number;
    logLevel?: LogLevel;
}

export type ConfigSource = "cli" | "config" | "env" | "default";

export interface AppConfig {
    host: string;
    port: number;
    logLevel: LogLevel;
    apiKeys: string[];
    rateLimit: {
        max: number;
        windowMs: number;
    };
    /** true when DEV_API_KEY was injected because nothing was configured */
    usingDevApiKey: boolean;
    sources: {
        host: ConfigSource;
        port: ConfigSource;
        logLevel: ConfigSource;
        apiKeys: ConfigSource;
        rateLimit: ConfigSource;
    };
}

export class ConfigError extends Error {
    readonly code = "CONFIG_ERROR";

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigError";
    }
}

function formatZodIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
}

/**
 * Reads and validates a JSON config file. A missing file is an error unless
 * `optional` is set, in which case undefined is returned.
 */
export async function loadConfig(configPath: string, { optional = false } = {}): Promise<PartialConfig | undefined> {
    let raw: string;
    try {
        raw = await readFile(configPath, "utf-8");
    } catch (error) {
        const code = extractErrorCode(error);
        if (code === "ENOENT" && optional) return undefined;
        throw new ConfigError(`[--config]: cannot read ${configPath} (${reasonFromCode(code)})`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`[--config]: invalid JSON in ${configPath}`, { cause: error });
    }

    const result = PartialConfigSchema.safeParse(parsed);
    if (!result.success) {
        throw new ConfigError(`[--config]: ${formatZodIssues(result.error)}`);
    }
    return result.data;
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name]?.trim();
    if (!raw) return undefined;
    const n = Number(raw);
    if (!Number.isInteger(n)) {
        throw new ConfigError(`${name} must be an integer, got "${raw}"`);
    }
    return n;
}

/**
 * PORT, HOST, LOG_LEVEL, ECOSCORE_API_KEYS (comma separated; API_KEY is
 * accepted for a single key), RATE_LIMIT_MAX, RATE_LIMIT_WINDOW_MS.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PartialConfig {
    const keys = (env.ECOSCORE_API_KEYS ?? env.API_KEY ?? "")
        .split(",")
        .map((key) => key.trim())
        .filter((key) => key.length > 0);

    const candidate = {
        server: {
            host: env.HOST?.trim() || undefined,
            port: parseIntegerEnv(env, "PORT"),
        },
        logLevel: env.LOG_LEVEL?.trim() || undefined,
        apiKeys: keys.length > 0 ? keys : undefined,
        rateLimit: {
            max: parseIntegerEnv(env, "RATE_LIMIT_MAX"),
            windowMs: parseIntegerEnv(env, "RATE_LIMIT_WINDOW_MS"),
        },
    };

    const result = PartialConfigSchema.safeParse(candidate);
    if (!result.success) {
        throw new ConfigError(`environment: ${formatZodIssues(result.error)}`);
    }
    return result.data;
}

function pick<T>(
    layers: [ConfigSource, T | undefined][],
    fallback: T,
): { value: T; source: ConfigSource } {
    for (const [source, value] of layers) {
        if (value !== undefined) return { value, source };
    }
    return { value: fallback, source: "default" };
}

export function resolveConfig(layers: { cli?: CliOverrides; file?: PartialConfig; env?: PartialConfig } = {}): AppConfig {
    const { cli = {}, file = {}, env = {} } = layers;

    const host = pick<string>([["cli", cli.host], ["config", file.server?.host], ["env", env.server?.host]], DEFAULTS.host);
    const port = pick<number>([["cli", cli.port], ["config", file.server?.port], ["env", env.server?.port]], DEFAULTS.port);
    const logLevel = pick<LogLevel>([["cli", cli.logLevel], ["config", file.logLevel], ["env", env.logLevel]], DEFAULTS.logLevel);
    const apiKeys = pick<string[]>([["config", file.apiKeys], ["env", env.apiKeys]], []);
    const rateLimitMax = pick<number>([["config", file.rateLimit?.max], ["env", env.rateLimit?.max]], DEFAULTS.rateLimitMax);
    const rateLimitWindowMs = pick<number>(
        [["config", file.rateLimit?.windowMs], ["env", env.rateLimit?.windowMs]],
        DEFAULTS.rateLimitWindowMs,
    );

    const usingDevApiKey = apiKeys.value.length === 0;

    return {
        host: host.value,
        port: port.value,
        logLevel: logLevel.value,
        apiKeys: usingDevApiKey ? [DEV_API_KEY] : [...new Set(apiKeys.value)],
        rateLimit: { max: rateLimitMax.value, windowMs: rateLimitWindowMs.value },
        usingDevApiKey,
        sources: {
            host: host.source,
            port: port.source,
            logLevel: logLevel.source,
            apiKeys: apiKeys.source,
            rateLimit: rateLimitMax.source === "default" ? rateLimitWindowMs.source : rateLimitMax.source,
        },
    };
}
