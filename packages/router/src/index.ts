/**
 * @concord/router: Wire format and message dispatch.
 *
 * - Channel identifiers and the kinds each carries
 * - Zod schemas for the envelope and every payload kind
 * - JSON codec (bytes ↔ message)
 * - MessageRouter: (channel, kind) → typed handler
 */

export {
  INTENT_CHANNEL,
  VOTE_CHANNEL,
  SESSION_CHANNEL,
  CHANNEL_KINDS,
  ALL_CHANNELS,
  isKnownChannel,
} from "./channels.js";

export {
  JsonValueSchema,
  JsonObjectSchema,
  HexDataSchema,
  ActionDescriptorSchema,
  EnvelopeHeaderSchema,
  IntentPayloadSchema,
  CoordinationPayloadSchema,
  ProposalPayloadSchema,
  VotePayloadSchema,
  SessionPayloadSchema,
  MovePayloadSchema,
  CheckpointPayloadSchema,
  PAYLOAD_SCHEMAS,
  isMessageKind,
} from "./schemas.js";
export type { EnvelopeHeader, PayloadSchemas } from "./schemas.js";

export { JsonMessageCodec, RouterError } from "./codec.js";
export type { MessageCodec, RouterErrorCode } from "./codec.js";

export { MessageRouter, createEnvelope } from "./router.js";
export type { MessageHandler, DispatchOutcome, MessageRouterOptions } from "./router.js";
