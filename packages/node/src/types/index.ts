/**
 * Type barrel: re-exports all public types from @tracebound/node.
 */

// DTOs
export {
  AddressSchema,
  Bytes32Schema,
  HexSchema,
  IdentityIdSchema,
  TokenStrategySchema,
  RegisterIdentitySchema,
  SetMetadataSchema,
  SetWalletSchema,
  SetAuthoritySchema,
  SetCardSchema,
  ApproveSpenderSchema,
  TransferIdentitySchema,
  SetOperatorSchema,
  CreateReviewSchema,
  CreateApprovalSchema,
  FulfillReviewSchema,
  DecideApprovalSchema,
  NeedsRevisionSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  RegisterIdentityDto,
  SetWalletDto,
  CreateReviewDto,
  CreateApprovalDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
