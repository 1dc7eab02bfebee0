import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { InvalidRequest, Unauthenticated, isGatewayError, type StatusClass } from "./errors.js";
import type { MailGateway } from "./gateway/operations.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import type { OutboundMessage } from "./mail/index.js";
import type { SessionStore } from "./session/store.js";

const HTTP_STATUS: Record<StatusClass, number> = {
  Unauthorized: 401,
  BadRequest: 400,
  ServerError: 500,
};

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

/**
 * Session token from `?token=` or an `Authorization: Bearer` header.
 */
function findToken(req: Request): string | undefined {
  const query = req.query.token;
  if (typeof query === "string" && query !== "") {
    return query;
  }
  const match = req.get("authorization")?.match(/^Bearer\s+(.+)$/i);
  return match ? match[1] : undefined;
}

function requireToken(req: Request): string {
  const token = findToken(req);
  if (!token) {
    throw new Unauthenticated("Missing session token");
  }
  return token;
}

function bodyField(body: unknown, field: string): string {
  const value: unknown =
    typeof body === "object" && body !== null ? Reflect.get(body, field) : undefined;
  if (typeof value !== "string") {
    throw new InvalidRequest(`${field} must be a string`);
  }
  return value;
}

function outboundFrom(body: unknown): OutboundMessage {
  return {
    to: bodyField(body, "to"),
    subject: bodyField(body, "subject"),
    body: bodyField(body, "body"),
  };
}

/**
 * Create the HTTP application. Every route maps onto one gateway operation.
 */
export function createServer(
  gateway: MailGateway,
  sessions: Pick<SessionStore, "size">,
  log: Logger = defaultLogger
): Express {
  const app = express();
  app.use(express.json());

  app.post(
    "/api/login",
    asyncHandler(async (req, res) => {
      const { token, address } = await gateway.login(
        bodyField(req.body, "email"),
        bodyField(req.body, "password")
      );
      res.json({ access_token: token, token_type: "bearer", email: address });
    })
  );

  app.get(
    "/api/folder/:folder",
    asyncHandler(async (req, res) => {
      const listing = await gateway.listFolder(requireToken(req), req.params.folder);
      res.json({ emails: listing.emails, folder: listing.folder });
    })
  );

  app.get(
    "/api/inbox",
    asyncHandler(async (req, res) => {
      const listing = await gateway.listFolder(requireToken(req), "Inbox");
      res.json({ emails: listing.emails, folder: listing.folder });
    })
  );

  app.get(
    "/api/email/:id",
    asyncHandler(async (req, res) => {
      const folder = typeof req.query.folder === "string" ? req.query.folder : undefined;
      const detail = await gateway.fetchDetail(requireToken(req), req.params.id, folder);
      res.json(detail);
    })
  );

  app.post(
    "/api/draft",
    asyncHandler(async (req, res) => {
      await gateway.saveDraft(requireToken(req), outboundFrom(req.body));
      res.json({ status: "Draft saved successfully" });
    })
  );

  app.post(
    "/api/send",
    asyncHandler(async (req, res) => {
      const result = await gateway.send(requireToken(req), outboundFrom(req.body));
      res.json({ status: "Email sent successfully", ...result });
    })
  );

  app.post("/api/logout", (req, res) => {
    const token = findToken(req);
    if (token) {
      gateway.logout(token);
    }
    res.json({ status: "Logged out" });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "OK", sessions: sessions.size });
  });

  // Express recognises error middleware by its four parameters.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    let status: StatusClass = "ServerError";
    let detail = "Internal server error";
    if (isGatewayError(err)) {
      status = err.status;
      detail = err.message;
    } else if (err instanceof SyntaxError) {
      // express.json() rejects malformed bodies with a SyntaxError
      status = "BadRequest";
      detail = "Malformed JSON body";
    }
    if (status === "ServerError") {
      log.error("Request failed", err, { method: req.method, path: req.path });
    } else {
      log.warn("Request rejected", { method: req.method, path: req.path, detail });
    }
    res.status(HTTP_STATUS[status]).json({ error: status, detail });
  });

  return app;
}
