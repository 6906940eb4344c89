/**
 * Protocol channel identifiers.
 *
 * Each channel carries a fixed subset of message kinds.
 */

import type { MessageKind } from "@concord/types";

export const INTENT_CHANNEL = "/concord/intent/1.0.0";
export const VOTE_CHANNEL = "/concord/vote/1.0.0";
export const SESSION_CHANNEL = "/concord/session/1.0.0";

export const CHANNEL_KINDS: Readonly<Record<string, readonly MessageKind[]>> = {
  [INTENT_CHANNEL]: ["intent", "coordination"],
  [VOTE_CHANNEL]: ["proposal", "vote"],
  [SESSION_CHANNEL]: ["session", "move", "checkpoint"],
};

export const ALL_CHANNELS: readonly string[] = Object.keys(CHANNEL_KINDS);

export function isKnownChannel(channel: string): boolean {
  return channel in CHANNEL_KINDS;
}
