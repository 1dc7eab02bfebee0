import { describe, it, expect, vi } from "vitest";
import {
  MailboxConnector,
  classifyImapError,
  classifySmtpError,
  isTransportError,
  type ImapSession,
  type ProtocolFactories,
} from "./client.js";
import type { MailConfig, RetrievalEndpoint, SubmissionEndpoint } from "./types.js";
import {
  ConnectorUnavailable,
  InvalidCredentials,
  OperationFailed,
} from "../errors.js";
import type { Logger } from "../logger.js";
import { FakeMailServer } from "../testing/fake-mail.js";

const retrieval: RetrievalEndpoint = {
  host: "imap.example.com",
  port: 993,
  tlsRejectUnauthorized: true,
};

const submission: SubmissionEndpoint = { host: "smtp.example.com", port: 587 };

const config: MailConfig = { retrieval, submission, connectionTimeoutMs: 1000 };

const alice = { address: "alice@example.com", secret: "test-secret" };

function createMockLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

// ---------------------------------------------------------------------------
// classifyImapError
// ---------------------------------------------------------------------------

describe("classifyImapError", () => {
  it("detects authentication failures", () => {
    const err = Object.assign(new Error("Authentication failed"), {
      authenticationFailed: true,
    });
    expect(classifyImapError(err, retrieval)).toBeInstanceOf(InvalidCredentials);
  });

  it("detects connection refused", () => {
    const result = classifyImapError(withCode("connect ECONNREFUSED", "ECONNREFUSED"), retrieval);
    expect(result).toBeInstanceOf(ConnectorUnavailable);
    expect(result.message).toBe(
      "Cannot reach IMAP server at imap.example.com:993: connection refused"
    );
  });

  it("detects DNS failure", () => {
    const result = classifyImapError(withCode("getaddrinfo ENOTFOUND", "ENOTFOUND"), retrieval);
    expect(result.message).toBe("Cannot resolve IMAP server hostname 'imap.example.com'");
  });

  it("detects timeout", () => {
    const result = classifyImapError(withCode("timed out", "CONNECT_TIMEOUT"), retrieval);
    expect(result).toBeInstanceOf(ConnectorUnavailable);
    expect(result.message).toBe("Connection to IMAP server timed out");
  });

  it("detects TLS errors by code", () => {
    const result = classifyImapError(
      withCode("TLS handshake failed", "ERR_TLS_CERT_ALTNAME_INVALID"),
      retrieval
    );
    expect(result.message).toBe("TLS error connecting to IMAP server");
  });

  it("detects TLS errors by message", () => {
    const result = classifyImapError(new Error("unable to verify the first certificate"), retrieval);
    expect(result.message).toBe("TLS error connecting to IMAP server");
  });

  it("falls back to a generic connector error", () => {
    const result = classifyImapError(new Error("something unexpected"), retrieval);
    expect(result).toBeInstanceOf(ConnectorUnavailable);
    expect(result.message).toBe("IMAP error: something unexpected");
  });

  it("handles non-Error values", () => {
    expect(classifyImapError("string error", retrieval).message).toBe("IMAP error: string error");
  });
});

// ---------------------------------------------------------------------------
// classifySmtpError / isTransportError
// ---------------------------------------------------------------------------

describe("classifySmtpError", () => {
  it("treats connection failures as connector errors", () => {
    const result = classifySmtpError(withCode("Connection timeout", "ETIMEDOUT"), submission);
    expect(result).toBeInstanceOf(ConnectorUnavailable);
    expect(result.message).toBe(
      "Cannot reach SMTP server at smtp.example.com:587: Connection timeout"
    );
  });

  it("treats protocol rejections as failed transmissions", () => {
    const result = classifySmtpError(withCode("Invalid login: 535", "EAUTH"), submission);
    expect(result).toBeInstanceOf(OperationFailed);
    expect(result.message).toBe("transmit failed: Invalid login: 535");
  });
});

describe("isTransportError", () => {
  it("recognises socket error codes", () => {
    expect(isTransportError(withCode("read ECONNRESET", "ECONNRESET"))).toBe(true);
  });

  it("recognises connection wording", () => {
    expect(isTransportError(new Error("Connection not available"))).toBe(true);
  });

  it("ignores command failures", () => {
    expect(isTransportError(new Error("Mailbox doesn't exist: Sent"))).toBe(false);
    expect(isTransportError("Connection closed")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// MailboxConnector
// ---------------------------------------------------------------------------

describe("MailboxConnector", () => {
  it("probes credentials and logs out", async () => {
    const server = new FakeMailServer();
    const connector = new MailboxConnector(config, server.protocols(), createMockLogger());

    await connector.probe(alice);

    expect(server.connections).toHaveLength(1);
    expect(server.connections[0].connected).toBe(true);
    expect(server.connections[0].loggedOut).toBe(true);
  });

  it("rejects a wrong password and drops the connection", async () => {
    const server = new FakeMailServer();
    const connector = new MailboxConnector(config, server.protocols(), createMockLogger());

    await expect(
      connector.probe({ address: "alice@example.com", secret: "wrong" })
    ).rejects.toBeInstanceOf(InvalidCredentials);

    expect(server.connections[0].connected).toBe(false);
    expect(server.connections[0].closed).toBe(true);
  });

  it("reports an unreachable server", async () => {
    const server = new FakeMailServer();
    server.connectFailure = { error: withCode("connect ECONNREFUSED", "ECONNREFUSED") };
    const connector = new MailboxConnector(config, server.protocols(), createMockLogger());

    await expect(connector.probe(alice)).rejects.toBeInstanceOf(ConnectorUnavailable);
    expect(server.connections[0].finished).toBe(true);
  });

  it("returns the work's result and closes the connection", async () => {
    const server = new FakeMailServer();
    const connector = new MailboxConnector(config, server.protocols(), createMockLogger());

    const result = await connector.withMailbox(alice, async () => "done");

    expect(result).toBe("done");
    expect(server.connections[0].loggedOut).toBe(true);
  });

  it("closes the connection when the work fails", async () => {
    const server = new FakeMailServer();
    const connector = new MailboxConnector(config, server.protocols(), createMockLogger());

    await expect(
      connector.withMailbox(alice, async () => {
        throw new Error("fetch exploded");
      })
    ).rejects.toThrow("fetch exploded");

    expect(server.connections[0].loggedOut).toBe(true);
  });

  it("force-closes when logout fails", async () => {
    const session = {
      on: vi.fn(),
      connect: vi.fn().mockResolvedValue(undefined),
      logout: vi.fn().mockRejectedValue(new Error("Connection closed")),
      close: vi.fn(),
    };
    const protocols: ProtocolFactories = {
      openImap: () => session as unknown as ImapSession,
      openSmtp: () => {
        throw new Error("unused");
      },
    };
    const log = createMockLogger();
    const connector = new MailboxConnector(config, protocols, log);

    await connector.withMailbox(alice, async () => undefined);

    expect(session.close).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith("IMAP logout failed, dropping connection", {
      error: "Connection closed",
    });
  });

  it("registers an error listener before connecting", async () => {
    const server = new FakeMailServer();
    const log = createMockLogger();
    let onError: ((error: unknown) => void) | undefined;
    const base = server.protocols();
    const protocols: ProtocolFactories = {
      ...base,
      openImap: (endpoint, credentials, timeoutMs) => {
        const session = base.openImap(endpoint, credentials, timeoutMs);
        return Object.assign(session, {
          on: (_event: string, listener: (error: unknown) => void) => {
            onError = listener;
            return session;
          },
        });
      },
    };
    const connector = new MailboxConnector(config, protocols, log);

    await connector.probe(alice);
    onError?.(new Error("Socket timeout"));

    expect(log.warn).toHaveBeenCalledWith("IMAP connection error", {
      host: "imap.example.com",
      error: "Socket timeout",
    });
  });

  it("transmits as the session address and closes the transport", async () => {
    const server = new FakeMailServer();
    const connector = new MailboxConnector(config, server.protocols(), createMockLogger());

    await connector.transmit(alice, { to: "bob@example.com", subject: "Hi", body: "Hello" });

    expect(server.outbox).toEqual([
      { from: "alice@example.com", to: "bob@example.com", subject: "Hi", text: "Hello" },
    ]);
    expect(server.smtpClosed).toBe(1);
  });

  it("classifies transmission failures and still closes the transport", async () => {
    const server = new FakeMailServer();
    server.sendFailure = { error: withCode("Greeting never received", "ETIMEDOUT") };
    const connector = new MailboxConnector(config, server.protocols(), createMockLogger());

    await expect(
      connector.transmit(alice, { to: "bob@example.com", subject: "Hi", body: "Hello" })
    ).rejects.toBeInstanceOf(ConnectorUnavailable);
    expect(server.outbox).toEqual([]);
    expect(server.smtpClosed).toBe(1);
  });
});
