/**
 * IMAP endpoint. The connection is TLS-wrapped from the first byte.
 */
export interface RetrievalEndpoint {
  host: string;
  port: number;
  tlsRejectUnauthorized: boolean;
}

/**
 * SMTP submission endpoint. The connection starts in plain text and must be
 * upgraded with STARTTLS before authenticating.
 */
export interface SubmissionEndpoint {
  host: string;
  port: number;
}

/**
 * Everything the connector needs to reach the provider.
 */
export interface MailConfig {
  retrieval: RetrievalEndpoint;
  submission: SubmissionEndpoint;
  /** Applied to connect, greeting and socket inactivity on both protocols */
  connectionTimeoutMs: number;
}

export interface Credentials {
  /** Mailbox address, also the login user name */
  address: string;
  secret: string;
}

/**
 * A message exactly as the server returned it.
 */
export interface RawMessage {
  /** IMAP UID as a decimal string */
  id: string;
  source: Buffer;
}

/**
 * Whether a folder holds mail the account received or mail it wrote.
 * Decides which address a listing shows as the counterpart.
 */
export type FolderRole = "received" | "outgoing";

/**
 * Lightweight listing entry.
 */
export interface MessageEnvelope {
  id: string;
  /** Sender for received folders, recipient for Sent and Drafts */
  from: string;
  subject: string;
  /** Raw Date header, not reparsed */
  date: string;
  /** First 100 characters of the primary text payload */
  preview: string;
}

export interface MessageDetail {
  id: string;
  from: string;
  to: string;
  subject: string;
  date: string;
  body: string;
}

export interface OutboundMessage {
  to: string;
  subject: string;
  body: string;
}
