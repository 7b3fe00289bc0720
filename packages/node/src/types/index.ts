/**
 * Type barrel: re-exports all public types from @multicustody/node.
 */

// DTOs
export { AccountQuerySchema, CreatePendingSchema, ImportPendingSchema, ListPendingQuerySchema } from "./dto.js";
export type { AccountQuery, CreatePendingDto, ImportPendingDto, ListPendingQuery } from "./dto.js";

// Error
export { createErrorEnvelope, RequestValidationError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
