/**
 * Zod schemas for the wire envelope and every message kind.
 *
 * The payload map is closed: a kind missing here cannot be dispatched.
 */

import { z } from "zod";
import type { JsonValue, MessageKind, MessagePayloads } from "@concord/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const JsonObjectSchema = z.record(JsonValueSchema);

export const HexDataSchema = z
  .string()
  .regex(/^0x([0-9a-fA-F]{2})*$/, "must be 0x-prefixed even-length hex");

export const ActionDescriptorSchema = z.object({
  description: z.string().min(1),
  callData: HexDataSchema,
  value: z.string().regex(/^\d+$/, "must be a decimal wei amount"),
});

const id = z.string().min(1).max(256);

// =============================================================================
// Envelope
// =============================================================================

export const EnvelopeHeaderSchema = z.object({
  kind: z.string().min(1),
  senderId: id,
  timestamp: z.number().int().nonnegative(),
  payload: z.unknown(),
});

export type EnvelopeHeader = z.infer<typeof EnvelopeHeaderSchema>;

// =============================================================================
// Payloads
// =============================================================================

export const IntentPayloadSchema = z.object({
  intentId: id,
  targetResource: z.string().min(1),
  actionDescriptor: ActionDescriptorSchema,
  costEstimate: z.number().nonnegative(),
  priority: z.number().int(),
});

export const CoordinationPayloadSchema = z
  .object({
    roundId: id,
    proposedIntentId: id,
    targetResource: z.string().min(1),
    candidateIds: z.array(id).min(2),
  })
  .refine((p) => p.candidateIds.includes(p.proposedIntentId), {
    message: "proposedIntentId must be one of candidateIds",
    path: ["proposedIntentId"],
  });

export const ProposalPayloadSchema = z.object({
  proposalId: id,
  creatorId: id,
  payload: JsonObjectSchema,
  votingDurationSeconds: z.number().int().positive(),
});

export const VotePayloadSchema = z.object({
  proposalId: id,
  decision: z.boolean(),
  weight: z.number().int().nonnegative(),
});

export const SessionPayloadSchema = z.object({
  sessionId: id,
  sessionType: z.string().min(1),
  initialState: JsonObjectSchema,
  participants: z.array(id).optional(),
});

export const MovePayloadSchema = z.object({
  sessionId: id,
  moveSequence: z.number().int().nonnegative(),
  movePayload: JsonValueSchema,
  stateDigest: z.string().regex(/^[0-9a-f]{64}$/).optional(),
});

export const CheckpointPayloadSchema = z.object({
  sessionId: id,
  sequence: z.number().int().nonnegative(),
  stateDigest: z.string().regex(/^[0-9a-f]{64}$/),
  moveCount: z.number().int().nonnegative(),
});

export type PayloadSchemas = {
  readonly [K in MessageKind]: z.ZodType<MessagePayloads[K], z.ZodTypeDef, unknown>;
};

export const PAYLOAD_SCHEMAS: PayloadSchemas = {
  intent: IntentPayloadSchema,
  coordination: CoordinationPayloadSchema,
  proposal: ProposalPayloadSchema,
  vote: VotePayloadSchema,
  session: SessionPayloadSchema,
  move: MovePayloadSchema,
  checkpoint: CheckpointPayloadSchema,
};

export function isMessageKind(value: string): value is MessageKind {
  return Object.prototype.hasOwnProperty.call(PAYLOAD_SCHEMAS, value);
}
