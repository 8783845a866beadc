/**
 * Type barrel: re-exports all public types from @swapledger/node.
 */

// DTOs
export {
  PrincipalSchema,
  IdSchema,
  IdParamSchema,
  IssueAssetSchema,
  CreateOfferSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type { IssueAssetDto, CreateOfferDto, ListEventsQuery } from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { API_KEY_HEADER, PRINCIPAL_HEADER } from "./auth.js";
export type { AuthMode, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
