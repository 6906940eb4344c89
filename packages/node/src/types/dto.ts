/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 */

import { z } from "zod";
import {
  ActionDescriptorSchema,
  JsonObjectSchema,
  JsonValueSchema,
} from "@concord/router";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Intent DTOs
// =============================================================================

export const CreateIntentSchema = z.object({
  resourceKey: z.string().min(1).max(256),
  action: ActionDescriptorSchema,
  priority: z.number().int(),
});

export type CreateIntentDto = z.infer<typeof CreateIntentSchema>;

export const ListIntentsQuerySchema = PaginationQuerySchema.extend({
  status: z
    .enum(["pending", "coordinating", "executed", "executed_by_peer", "failed"])
    .optional(),
});

export type ListIntentsQuery = z.infer<typeof ListIntentsQuerySchema>;

// =============================================================================
// Proposal DTOs
// =============================================================================

export const CreateProposalSchema = z.object({
  payload: JsonObjectSchema,
  votingDurationSeconds: z.number().int().min(1).optional(),
});

export type CreateProposalDto = z.infer<typeof CreateProposalSchema>;

export const CastVoteSchema = z.object({
  decision: z.boolean(),
  weight: z.number().int().min(0).default(1),
});

export type CastVoteDto = z.infer<typeof CastVoteSchema>;

export const ListProposalsQuerySchema = PaginationQuerySchema.extend({
  status: z.enum(["active", "finalizing", "passed", "rejected"]).optional(),
});

export type ListProposalsQuery = z.infer<typeof ListProposalsQuerySchema>;

// =============================================================================
// Session DTOs
// =============================================================================

export const CreateSessionSchema = z.object({
  type: z.string().min(1).max(128),
  initialState: JsonObjectSchema.default({}),
});

export type CreateSessionDto = z.infer<typeof CreateSessionSchema>;

export const MakeMoveSchema = z.object({
  payload: JsonValueSchema,
});

export type MakeMoveDto = z.infer<typeof MakeMoveSchema>;

export const ListSessionsQuerySchema = PaginationQuerySchema.extend({
  status: z.enum(["active", "ended"]).optional(),
});

export type ListSessionsQuery = z.infer<typeof ListSessionsQuerySchema>;
