import { ImapFlow } from "imapflow";
import { createTransport } from "nodemailer";
import {
  ConnectorUnavailable,
  GatewayError,
  InvalidCredentials,
  OperationFailed,
  describeError,
} from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import type {
  Credentials,
  MailConfig,
  OutboundMessage,
  RetrievalEndpoint,
  SubmissionEndpoint,
} from "./types.js";

/**
 * The part of ImapFlow the gateway drives.
 */
export type ImapSession = Pick<
  ImapFlow,
  | "connect"
  | "logout"
  | "close"
  | "on"
  | "getMailboxLock"
  | "mailboxCreate"
  | "search"
  | "fetch"
  | "fetchOne"
  | "append"
>;

export type MailboxLock = Awaited<ReturnType<ImapSession["getMailboxLock"]>>;

export interface SubmittedMail {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/**
 * The part of a nodemailer transport the gateway drives.
 */
export interface SmtpTransport {
  sendMail(mail: SubmittedMail): Promise<unknown>;
  close(): void;
}

/**
 * Opens protocol connections. Swapped for in-process fakes in tests.
 */
export interface ProtocolFactories {
  openImap(endpoint: RetrievalEndpoint, credentials: Credentials, timeoutMs: number): ImapSession;
  openSmtp(endpoint: SubmissionEndpoint, credentials: Credentials, timeoutMs: number): SmtpTransport;
}

export const defaultProtocols: ProtocolFactories = {
  openImap(endpoint, credentials, timeoutMs) {
    return new ImapFlow({
      host: endpoint.host,
      port: endpoint.port,
      secure: true,
      auth: { user: credentials.address, pass: credentials.secret },
      logger: false,
      disableAutoIdle: true,
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
      tls: { rejectUnauthorized: endpoint.tlsRejectUnauthorized },
    });
  },
  openSmtp(endpoint, credentials, timeoutMs) {
    return createTransport({
      host: endpoint.host,
      port: endpoint.port,
      secure: false,
      requireTLS: true,
      auth: { user: credentials.address, pass: credentials.secret },
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
    });
  },
};

const TRANSPORT_ERROR_CODES = [
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  "CONNECT_TIMEOUT",
  "GREETING_TIMEOUT",
  "NoConnection",
];

/** nodemailer's codes for failures before or outside the SMTP dialogue */
const SMTP_CONNECTION_CODES = ["ECONNECTION", "ETIMEDOUT", "ESOCKET", "EDNS", "ETLS"];

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * True when the error means the connection itself is gone, as opposed to the
 * server refusing one command.
 */
export function isTransportError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const code = errorCode(error);
  if (code && TRANSPORT_ERROR_CODES.includes(code)) {
    return true;
  }

  return /connection|socket|not connected|closed|broken pipe|timeout/i.test(error.message);
}

/**
 * Classify an IMAP connect error. Inspects the properties ImapFlow and Node.js
 * set to tell a rejected login from an unreachable server.
 */
export function classifyImapError(error: unknown, endpoint: RetrievalEndpoint): GatewayError {
  if (!(error instanceof Error)) {
    return new ConnectorUnavailable(`IMAP error: ${String(error)}`, { cause: error });
  }

  if (Reflect.get(error, "authenticationFailed") === true) {
    return new InvalidCredentials();
  }

  const code = errorCode(error);

  if (code === "ECONNREFUSED") {
    return new ConnectorUnavailable(
      `Cannot reach IMAP server at ${endpoint.host}:${endpoint.port}: connection refused`,
      { cause: error }
    );
  }

  if (code === "ENOTFOUND" || code === "EAI_AGAIN") {
    return new ConnectorUnavailable(`Cannot resolve IMAP server hostname '${endpoint.host}'`, {
      cause: error,
    });
  }

  if (code === "ETIMEDOUT" || code === "CONNECT_TIMEOUT" || code === "GREETING_TIMEOUT") {
    return new ConnectorUnavailable("Connection to IMAP server timed out", { cause: error });
  }

  if (code?.startsWith("ERR_TLS") || /tls|certificate/i.test(error.message)) {
    return new ConnectorUnavailable("TLS error connecting to IMAP server", { cause: error });
  }

  return new ConnectorUnavailable(`IMAP error: ${error.message}`, { cause: error });
}

/**
 * Classify an SMTP submission error. Connection trouble is retryable by the
 * caller; everything else (rejected auth, rejected recipients) is not.
 */
export function classifySmtpError(error: unknown, endpoint: SubmissionEndpoint): GatewayError {
  if (error instanceof Error) {
    const code = errorCode(error);
    if (code && (SMTP_CONNECTION_CODES.includes(code) || TRANSPORT_ERROR_CODES.includes(code))) {
      return new ConnectorUnavailable(
        `Cannot reach SMTP server at ${endpoint.host}:${endpoint.port}: ${error.message}`,
        { cause: error }
      );
    }
  }
  return new OperationFailed("transmit", error);
}

/**
 * Opens one short-lived, authenticated connection per operation and closes it
 * on every exit path. Connections are never cached or shared.
 */
export class MailboxConnector {
  constructor(
    private readonly config: MailConfig,
    private readonly protocols: ProtocolFactories = defaultProtocols,
    private readonly log: Logger = defaultLogger
  ) {}

  /**
   * Check credentials by logging in and straight back out.
   */
  async probe(credentials: Credentials): Promise<void> {
    await this.withMailbox(credentials, async () => undefined);
  }

  /**
   * Run `work` against a freshly authenticated IMAP session.
   */
  async withMailbox<T>(
    credentials: Credentials,
    work: (session: ImapSession) => Promise<T>
  ): Promise<T> {
    const session = await this.open(credentials);
    try {
      return await work(session);
    } finally {
      await this.close(session);
    }
  }

  /**
   * Submit a message over SMTP as the session's address.
   */
  async transmit(credentials: Credentials, message: OutboundMessage): Promise<void> {
    const { submission, connectionTimeoutMs } = this.config;
    const transport = this.protocols.openSmtp(submission, credentials, connectionTimeoutMs);
    try {
      await transport.sendMail({
        from: credentials.address,
        to: message.to,
        subject: message.subject,
        text: message.body,
      });
    } catch (error) {
      throw classifySmtpError(error, submission);
    } finally {
      transport.close();
    }
  }

  private async open(credentials: Credentials): Promise<ImapSession> {
    const { retrieval, connectionTimeoutMs } = this.config;
    const session = this.protocols.openImap(retrieval, credentials, connectionTimeoutMs);

    // EventEmitter requires an "error" listener, otherwise Node throws.
    session.on("error", (error: unknown) => {
      this.log.warn("IMAP connection error", {
        host: retrieval.host,
        error: describeError(error),
      });
    });

    try {
      await session.connect();
    } catch (error) {
      session.close();
      throw classifyImapError(error, retrieval);
    }
    return session;
  }

  private async close(session: ImapSession): Promise<void> {
    try {
      await session.logout();
    } catch (error) {
      this.log.warn("IMAP logout failed, dropping connection", {
        error: describeError(error),
      });
      session.close();
    }
  }
}
