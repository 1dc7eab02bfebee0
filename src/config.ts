import type { MailConfig } from "./mail/types.js";

export interface GatewayConfig {
  mail: MailConfig;
  /** 0 disables expiry */
  sessionTtlMs: number;
  httpPort: number;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readRequired(env: Env, name: string): string {
  const value = env[name];
  if (!value) throw new Error(`${name} environment variable is required`);
  return value;
}

/**
 * Build the gateway configuration from environment variables.
 */
export function createConfigFromEnv(env: Env = process.env): GatewayConfig {
  const imapHost = readRequired(env, "IMAP_HOST");
  const smtpHost = readRequired(env, "SMTP_HOST");

  return {
    mail: {
      retrieval: {
        host: imapHost,
        port: readInteger(env, "IMAP_PORT", 993),
        tlsRejectUnauthorized: env.IMAP_TLS_REJECT_UNAUTHORIZED !== "false",
      },
      submission: {
        host: smtpHost,
        port: readInteger(env, "SMTP_PORT", 587),
      },
      connectionTimeoutMs: readInteger(env, "MAIL_TIMEOUT_MS", 10_000),
    },
    sessionTtlMs: readInteger(env, "SESSION_TTL_MINUTES", 0) * 60_000,
    httpPort: readInteger(env, "PORT", 8888),
  };
}
