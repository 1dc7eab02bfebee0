import { InvalidRequest, describeError, runStage } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import {
  ARCHIVE_FLAGS,
  DRAFT_FLAGS,
  LIST_LIMIT,
  appendMessage,
  composeMessage,
  fetchRaw,
  fetchRecent,
  folderRole,
  normalizeDetail,
  normalizeEnvelope,
  parseMessageId,
  requireFolder,
  resolveFolder,
} from "../mail/index.js";
import type {
  Credentials,
  ImapSession,
  LogicalFolder,
  MailboxConnector,
  MessageDetail,
  MessageEnvelope,
  OutboundMessage,
} from "../mail/index.js";
import type { SessionStore } from "../session/store.js";

export interface LoginResult {
  token: string;
  address: string;
}

export interface FolderListing {
  folder: LogicalFolder;
  emails: MessageEnvelope[];
}

export interface SendResult {
  /** False when the message left but the Sent copy could not be stored */
  archived: boolean;
  warning?: string;
}

function requireText(value: string, field: string): string {
  if (value.trim() === "") {
    throw new InvalidRequest(`${field} is required`);
  }
  return value;
}

/**
 * Request-level mail operations. Each call resolves the session, opens its own
 * connection(s) and closes them before returning; nothing is kept between
 * calls except the session itself.
 */
export class MailGateway {
  constructor(
    private readonly sessions: SessionStore,
    private readonly connector: MailboxConnector,
    private readonly log: Logger = defaultLogger
  ) {}

  async login(address: string, secret: string): Promise<LoginResult> {
    requireText(address, "email");
    requireText(secret, "password");

    await this.connector.probe({ address, secret });
    const token = this.sessions.create(address, secret);
    this.log.info("Session created", { address });
    return { token, address };
  }

  async listFolder(token: string, folderName: string): Promise<FolderListing> {
    const credentials = this.sessions.resolve(token);
    const folder = requireFolder(folderName);

    const emails = await this.connector.withMailbox(credentials, async (session) => {
      const resolved = await runStage("select", () => resolveFolder(session, folder));
      try {
        const raws = await runStage("list", () => fetchRecent(session, LIST_LIMIT));
        const role = folderRole(folder);
        return await runStage("normalize", () =>
          Promise.all(raws.map((raw) => normalizeEnvelope(raw, role)))
        );
      } finally {
        resolved.lock.release();
      }
    });

    return { folder, emails };
  }

  async fetchDetail(token: string, id: string, folderName = "Inbox"): Promise<MessageDetail> {
    const credentials = this.sessions.resolve(token);
    const messageId = parseMessageId(id);
    const folder = requireFolder(folderName);

    return this.connector.withMailbox(credentials, async (session) => {
      const resolved = await runStage("select", () => resolveFolder(session, folder));
      try {
        const raw = await runStage("fetch", () => fetchRaw(session, messageId));
        return await runStage("normalize", () => normalizeDetail(raw));
      } finally {
        resolved.lock.release();
      }
    });
  }

  async saveDraft(token: string, draft: OutboundMessage): Promise<void> {
    const credentials = this.sessions.resolve(token);
    const raw = await runStage("compose", async () =>
      composeMessage(credentials.address, draft)
    );

    await this.connector.withMailbox(credentials, async (session) => {
      await this.store(session, "Drafts", raw, DRAFT_FLAGS);
    });
    this.log.info("Draft saved", { address: credentials.address });
  }

  /**
   * Transmit, then file a copy under Sent. Only transmission decides the
   * outcome: once the message has left, a failed copy is reported as a
   * warning and the send still succeeds.
   */
  async send(token: string, message: OutboundMessage): Promise<SendResult> {
    const credentials = this.sessions.resolve(token);
    requireText(message.to, "to");

    await this.connector.transmit(credentials, message);
    this.log.info("Message transmitted", { address: credentials.address, to: message.to });

    try {
      await this.archive(credentials, message);
      return { archived: true };
    } catch (error) {
      const warning = `Could not save to Sent folder: ${describeError(error)}`;
      this.log.warn(warning, { address: credentials.address });
      return { archived: false, warning };
    }
  }

  logout(token: string): void {
    this.sessions.invalidate(token);
  }

  private async archive(credentials: Credentials, message: OutboundMessage): Promise<void> {
    const raw = await runStage("compose", async () =>
      composeMessage(credentials.address, message)
    );
    await this.connector.withMailbox(credentials, async (session) => {
      await this.store(session, "Sent", raw, ARCHIVE_FLAGS);
    });
  }

  private async store(
    session: ImapSession,
    folder: LogicalFolder,
    raw: string,
    flags: readonly string[]
  ): Promise<void> {
    const resolved = await runStage("select", () =>
      resolveFolder(session, folder, { create: true })
    );
    try {
      await runStage("append", () => appendMessage(session, resolved.path, raw, flags));
    } finally {
      resolved.lock.release();
    }
  }
}
