import {
  simpleParser,
  type AddressObject,
  type EmailAddress,
  type HeaderValue,
  type ParsedMail,
} from "mailparser";
import type { FolderRole, MessageDetail, MessageEnvelope, RawMessage } from "./types.js";

export const PREVIEW_LENGTH = 100;
export const UNKNOWN_ADDRESS = "Unknown";
export const NO_SUBJECT = "(no subject)";
export const EMPTY_PREVIEW = "(empty)";

function formatAddress(entry: EmailAddress): string {
  if (entry.group) {
    return entry.group.map(formatAddress).join(", ");
  }
  const address = entry.address ?? "";
  return entry.name ? `${entry.name} <${address}>` : address;
}

function addressText(value: AddressObject | AddressObject[] | undefined): string {
  if (!value) return "";
  const objects = Array.isArray(value) ? value : [value];
  return objects
    .flatMap((obj) => obj.value.map(formatAddress))
    .filter((text) => text.length > 0)
    .join(", ");
}

/**
 * Unparsed value of a header, with folding undone.
 */
function rawHeader(parsed: ParsedMail, key: string): string | undefined {
  const header = parsed.headerLines.find((h) => h.key === key);
  if (!header) return undefined;
  const colon = header.line.indexOf(":");
  return header.line
    .slice(colon + 1)
    .replace(/\r?\n[ \t]+/g, " ")
    .trim();
}

function multipartBoundary(contentType: HeaderValue | undefined): string | undefined {
  if (!contentType || typeof contentType !== "object" || !("params" in contentType)) {
    return undefined;
  }
  if (!contentType.value.toLowerCase().startsWith("multipart/")) {
    return undefined;
  }
  return contentType.params.boundary || undefined;
}

/**
 * Raw text of the first body part of a multipart source: everything between
 * the first boundary delimiter line and the next one, part headers included.
 */
export function firstPart(source: string, boundary: string): string | undefined {
  const delimiter = `--${boundary}`;
  const lines = source.split(/\r?\n/);
  const start = lines.findIndex((line) => line.trimEnd() === delimiter);
  if (start === -1) return undefined;

  const rest = lines.slice(start + 1);
  const end = rest.findIndex((line) => line.startsWith(delimiter));
  return (end === -1 ? rest : rest.slice(0, end)).join("\r\n");
}

/** HTML is passed through as markup. Line breaks are kept as decoded. */
function payloadOf(parsed: ParsedMail): string {
  return typeof parsed.html === "string" ? parsed.html : parsed.text ?? "";
}

async function primaryPayload(parsed: ParsedMail, source: Buffer): Promise<string> {
  const boundary = multipartBoundary(parsed.headers.get("content-type"));
  if (boundary === undefined) {
    return payloadOf(parsed);
  }

  // latin1 keeps every byte so mailparser can apply the part's own charset.
  const part = firstPart(source.toString("latin1"), boundary);
  if (part === undefined) {
    return "";
  }
  return payloadOf(await simpleParser(Buffer.from(part, "latin1")));
}

function previewOf(body: string): string {
  if (body.length === 0) return EMPTY_PREVIEW;
  return Array.from(body).slice(0, PREVIEW_LENGTH).join("");
}

/**
 * Listing entry for a raw message. For outgoing folders the counterpart is
 * the recipient, otherwise the sender.
 */
export async function normalizeEnvelope(
  raw: RawMessage,
  role: FolderRole
): Promise<MessageEnvelope> {
  const parsed = await simpleParser(raw.source);
  const counterpart = addressText(role === "outgoing" ? parsed.to : parsed.from);

  return {
    id: raw.id,
    from: counterpart || UNKNOWN_ADDRESS,
    subject: parsed.subject ?? NO_SUBJECT,
    date: rawHeader(parsed, "date") ?? "",
    preview: previewOf(await primaryPayload(parsed, raw.source)),
  };
}

/**
 * Full record for a raw message. Only the first part of a multipart message
 * becomes the body.
 */
export async function normalizeDetail(raw: RawMessage): Promise<MessageDetail> {
  const parsed = await simpleParser(raw.source);

  return {
    id: raw.id,
    from: addressText(parsed.from) || UNKNOWN_ADDRESS,
    to: addressText(parsed.to) || UNKNOWN_ADDRESS,
    subject: parsed.subject ?? NO_SUBJECT,
    date: rawHeader(parsed, "date") ?? "",
    body: await primaryPayload(parsed, raw.source),
  };
}
