import { createMimeMessage } from "mimetext";
import type { OutboundMessage } from "./types.js";

/**
 * Build the RFC 822 source stored in Drafts or Sent. The copy actually
 * transmitted is produced by the SMTP transport and may differ byte-for-byte.
 */
export function composeMessage(sender: string, message: OutboundMessage): string {
  const msg = createMimeMessage();

  msg.setSender(sender);
  msg.setTo(message.to);
  msg.setSubject(message.subject);

  msg.addMessage({
    contentType: "text/plain",
    data: message.body,
  });

  return msg.asRaw();
}
