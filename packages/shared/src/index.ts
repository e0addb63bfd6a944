export { reasonFromCode, extractErrorCode, errorMessage } from "./errors.js";
