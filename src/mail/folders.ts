import { ConnectorUnavailable, FolderUnavailable, InvalidRequest } from "../errors.js";
import { isTransportError, type ImapSession, type MailboxLock } from "./client.js";
import type { FolderRole } from "./types.js";

export const LOGICAL_FOLDERS = ["Inbox", "Drafts", "Sent", "Trash"] as const;

export type LogicalFolder = (typeof LOGICAL_FOLDERS)[number];

/**
 * Provider-side mailbox names per logical folder, canonical name first.
 * Providers disagree on naming, Gmail in particular nests its system folders
 * under "[Gmail]/".
 */
export const FOLDER_ALIASES: Readonly<Record<LogicalFolder, readonly string[]>> = {
  Inbox: ["INBOX"],
  Drafts: ["Drafts", "[Gmail]/Drafts"],
  Sent: ["Sent", "[Gmail]/Sent Mail"],
  Trash: ["Trash", "[Gmail]/Trash"],
};

const OUTGOING: ReadonlySet<LogicalFolder> = new Set<LogicalFolder>(["Drafts", "Sent"]);

/**
 * Map a caller-supplied folder name onto its logical folder. Accepts the
 * logical names, INBOX in any case, and every alias from the table, so
 * "[Gmail]/Sent Mail" and "Sent" land on the same folder.
 */
export function parseFolderName(input: string): LogicalFolder | undefined {
  for (const folder of LOGICAL_FOLDERS) {
    if (input === folder || FOLDER_ALIASES[folder].includes(input)) {
      return folder;
    }
  }
  return input.toUpperCase() === "INBOX" ? "Inbox" : undefined;
}

export function requireFolder(input: string): LogicalFolder {
  const folder = parseFolderName(input);
  if (!folder) {
    throw new InvalidRequest(`Invalid folder: ${input}`);
  }
  return folder;
}

export function folderRole(folder: LogicalFolder): FolderRole {
  return OUTGOING.has(folder) ? "outgoing" : "received";
}

export type FolderAttempt =
  | { action: "select"; path: string }
  | { action: "create"; path: string };

export interface ResolveOptions {
  /** Create the canonical mailbox when no candidate can be selected */
  create?: boolean;
}

/**
 * The ordered attempts for reaching `folder`: every candidate name, then,
 * for writes, creating the canonical name and selecting it.
 */
export function planFolderAttempts(
  folder: LogicalFolder,
  options: ResolveOptions = {}
): FolderAttempt[] {
  const candidates = FOLDER_ALIASES[folder];
  const attempts: FolderAttempt[] = candidates.map((path) => ({ action: "select", path }));
  if (options.create) {
    const canonical = candidates[0];
    attempts.push({ action: "create", path: canonical }, { action: "select", path: canonical });
  }
  return attempts;
}

export type SelectOutcome =
  | { ok: true; path: string; lock: MailboxLock }
  | { ok: false; path: string; error: unknown };

/**
 * Select a mailbox, reporting failure as a value.
 */
export async function trySelect(session: ImapSession, path: string): Promise<SelectOutcome> {
  try {
    const lock = await session.getMailboxLock(path);
    return { ok: true, path, lock };
  } catch (error) {
    return { ok: false, path, error };
  }
}

export interface ResolvedFolder {
  folder: LogicalFolder;
  /** Concrete mailbox name on the server */
  path: string;
  lock: MailboxLock;
}

/**
 * Select the mailbox backing `folder`. Caller must release the lock when done.
 */
export async function resolveFolder(
  session: ImapSession,
  folder: LogicalFolder,
  options: ResolveOptions = {}
): Promise<ResolvedFolder> {
  const tried: string[] = [];

  for (const attempt of planFolderAttempts(folder, options)) {
    if (attempt.action === "create") {
      tried.push(`create ${attempt.path}`);
      try {
        await session.mailboxCreate(attempt.path);
      } catch (error) {
        if (isTransportError(error)) {
          throw new ConnectorUnavailable(`Lost IMAP connection while creating ${attempt.path}`, {
            cause: error,
          });
        }
      }
      continue;
    }

    tried.push(attempt.path);
    const outcome = await trySelect(session, attempt.path);
    if (outcome.ok) {
      return { folder, path: outcome.path, lock: outcome.lock };
    }
    if (isTransportError(outcome.error)) {
      throw new ConnectorUnavailable(`Lost IMAP connection while selecting ${attempt.path}`, {
        cause: outcome.error,
      });
    }
  }

  throw new FolderUnavailable(folder, tried);
}
