export { EcoScoreClient, toComposition, DEFAULT_TIMEOUT_MS } from "./client.js";
export type { EcoScoreClientOptions, MaterialInput } from "./client.js";
export { EcoScoreApiError, EcoScoreConfigError } from "./errors.js";
