/**
 * Creation-order paging for list endpoints.
 *
 * Intents, proposals and sessions all list oldest first by
 * (createdAt, id). A cursor names the last record of the previous page as
 * base64url JSON `{ t, id }`. List responses carry
 * `{ data, pagination: { nextCursor, hasMore } }`.
 */

import { z } from "zod";

export interface Created {
  readonly id: string;
  /** Epoch seconds */
  readonly createdAt: number;
}

export interface PageRequest {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface Page<T> {
  readonly data: readonly T[];
  readonly pagination: {
    readonly nextCursor: string | null;
    readonly hasMore: boolean;
  };
}

const CursorSchema = z.object({
  t: z.number().int().nonnegative(),
  id: z.string().min(1),
});

export function encodeCursor(position: Created): string {
  return Buffer.from(JSON.stringify({ t: position.createdAt, id: position.id })).toString(
    "base64url",
  );
}

/**
 * @returns the position a cursor names, or undefined when it is not one of ours
 */
export function decodeCursor(cursor: string): Created | undefined {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  const parsed = CursorSchema.safeParse(json);
  return parsed.success ? { id: parsed.data.id, createdAt: parsed.data.t } : undefined;
}

/** Oldest first; ids break ties by code unit order. */
export function compareCreation(a: Created, b: Created): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * One page of `items` after the cursor position. An unreadable cursor
 * starts from the beginning.
 */
export function pageByCreation<T extends Created>(
  items: readonly T[],
  request: PageRequest,
): Page<T> {
  const sorted = [...items].sort(compareCreation);
  const after = request.cursor === undefined ? undefined : decodeCursor(request.cursor);
  const remaining =
    after === undefined ? sorted : sorted.filter((item) => compareCreation(item, after) > 0);

  const data = remaining.slice(0, request.limit);
  const hasMore = remaining.length > request.limit;
  const last = data[data.length - 1];

  return {
    data,
    pagination: {
      nextCursor: hasMore && last !== undefined ? encodeCursor(last) : null,
      hasMore,
    },
  };
}
