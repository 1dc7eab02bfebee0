import { InvalidRequest, OperationFailed } from "../errors.js";
import type { ImapSession } from "./client.js";
import type { RawMessage } from "./types.js";

/** Maximum number of messages a folder listing returns */
export const LIST_LIMIT = 10;

export const DRAFT_FLAGS = ["\\Draft"];
export const ARCHIVE_FLAGS = ["\\Seen"];

/**
 * Parse a caller-supplied message id (an IMAP UID).
 */
export function parseMessageId(id: string): string {
  if (!/^[1-9]\d*$/.test(id)) {
    throw new InvalidRequest(`Invalid message id: ${id}`);
  }
  return id;
}

/**
 * UIDs of the newest `limit` messages in the selected mailbox, newest first.
 *
 * "Newest" follows the server's UID order, which grows with arrival on every
 * compliant server. Date headers are not consulted.
 */
export async function listRecentIds(
  session: ImapSession,
  limit: number = LIST_LIMIT
): Promise<number[]> {
  const uids = await session.search({ all: true }, { uid: true });

  if (!uids || uids.length === 0) {
    return [];
  }

  return [...uids].sort((a, b) => b - a).slice(0, limit);
}

/**
 * Fetch the full sources of the newest `limit` messages in the selected
 * mailbox, newest first.
 */
export async function fetchRecent(
  session: ImapSession,
  limit: number = LIST_LIMIT
): Promise<RawMessage[]> {
  const uids = await listRecentIds(session, limit);
  if (uids.length === 0) {
    return [];
  }

  const byUid = new Map<number, Buffer>();
  for await (const msg of session.fetch(uids.join(","), { uid: true, source: true }, { uid: true })) {
    if (msg.source) {
      byUid.set(msg.uid, msg.source);
    }
  }

  // FETCH responses arrive in mailbox order; restore newest-first.
  const results: RawMessage[] = [];
  for (const uid of uids) {
    const source = byUid.get(uid);
    if (source) {
      results.push({ id: String(uid), source });
    }
  }
  return results;
}

/**
 * Fetch one message's full source from the selected mailbox.
 */
export async function fetchRaw(session: ImapSession, id: string): Promise<RawMessage> {
  const msg = await session.fetchOne(id, { uid: true, source: true }, { uid: true });

  if (!msg || !msg.source) {
    throw new OperationFailed("fetch", `message ${id} not found`);
  }

  return { id, source: msg.source };
}

/**
 * Append a raw RFC 822 message to a mailbox, stamped with the current time.
 */
export async function appendMessage(
  session: ImapSession,
  path: string,
  raw: string,
  flags: readonly string[]
): Promise<void> {
  await session.append(path, Buffer.from(raw, "utf-8"), [...flags], new Date());
}
