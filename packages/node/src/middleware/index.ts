export { createErrorHandler } from "./error-handler.js";
export { requestLogger } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { requestContext, REQUEST_ID_HEADER, SERVED_BY_HEADER } from "./request-context.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
