export {
  MailboxConnector,
  classifyImapError,
  classifySmtpError,
  defaultProtocols,
  isTransportError,
} from "./client.js";
export {
  FOLDER_ALIASES,
  LOGICAL_FOLDERS,
  folderRole,
  parseFolderName,
  planFolderAttempts,
  requireFolder,
  resolveFolder,
  trySelect,
} from "./folders.js";
export {
  ARCHIVE_FLAGS,
  DRAFT_FLAGS,
  LIST_LIMIT,
  appendMessage,
  fetchRaw,
  fetchRecent,
  listRecentIds,
  parseMessageId,
} from "./messages.js";
export { composeMessage } from "./compose.js";
export { normalizeDetail, normalizeEnvelope, firstPart } from "./normalize.js";
export type {
  ImapSession,
  MailboxLock,
  ProtocolFactories,
  SmtpTransport,
  SubmittedMail,
} from "./client.js";
export type {
  FolderAttempt,
  LogicalFolder,
  ResolveOptions,
  ResolvedFolder,
  SelectOutcome,
} from "./folders.js";
export type {
  Credentials,
  FolderRole,
  MailConfig,
  MessageDetail,
  MessageEnvelope,
  OutboundMessage,
  RawMessage,
  RetrievalEndpoint,
  SubmissionEndpoint,
} from "./types.js";
