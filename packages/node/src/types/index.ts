/**
 * Type barrel: re-exports the public types of @concord/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  CreateIntentSchema,
  ListIntentsQuerySchema,
  CreateProposalSchema,
  CastVoteSchema,
  ListProposalsQuerySchema,
  CreateSessionSchema,
  MakeMoveSchema,
  ListSessionsQuerySchema,
} from "./dto.js";
export type {
  CreateIntentDto,
  ListIntentsQuery,
  CreateProposalDto,
  CastVoteDto,
  ListProposalsQuery,
  CreateSessionDto,
  MakeMoveDto,
  ListSessionsQuery,
} from "./dto.js";

// Error
export { API_ERROR_STATUS, apiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, compareCreation, pageByCreation } from "./pagination.js";
export type { Created, PageRequest, Page } from "./pagination.js";

// Views
export { roundView, proposalView, sessionView } from "./views.js";

// App env
export type { AppEnv } from "./api-contract.js";
