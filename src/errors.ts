/**
 * Gateway error taxonomy.
 *
 * Every failure the gateway surfaces carries a status class that the HTTP layer
 * maps onto a response code, plus a human-readable message.
 */

export type StatusClass = "Unauthorized" | "BadRequest" | "ServerError";

export type ErrorKind =
  | "Unauthenticated"
  | "InvalidCredentials"
  | "InvalidRequest"
  | "ConnectorUnavailable"
  | "FolderUnavailable"
  | "OperationFailed";

/** Pipeline step an operation was in when it failed. */
export type Stage =
  | "select"
  | "list"
  | "fetch"
  | "normalize"
  | "compose"
  | "append"
  | "transmit";

export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: StatusClass;
}

export class Unauthenticated extends GatewayError {
  readonly kind = "Unauthenticated";
  readonly status = "Unauthorized";

  constructor(message = "Invalid or expired session") {
    super(message);
    this.name = "Unauthenticated";
  }
}

export class InvalidCredentials extends GatewayError {
  readonly kind = "InvalidCredentials";
  readonly status = "Unauthorized";

  constructor(message = "Authentication failed: the mail server rejected the credentials") {
    super(message);
    this.name = "InvalidCredentials";
  }
}

export class InvalidRequest extends GatewayError {
  readonly kind = "InvalidRequest";
  readonly status = "BadRequest";

  constructor(message: string) {
    super(message);
    this.name = "InvalidRequest";
  }
}

export class ConnectorUnavailable extends GatewayError {
  readonly kind = "ConnectorUnavailable";
  readonly status = "ServerError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectorUnavailable";
  }
}

export class FolderUnavailable extends GatewayError {
  readonly kind = "FolderUnavailable";
  readonly status = "ServerError";

  constructor(readonly folder: string, attempted: readonly string[] = []) {
    super(
      attempted.length > 0
        ? `Folder ${folder} is unavailable (tried: ${attempted.join(", ")})`
        : `Folder ${folder} is unavailable`
    );
    this.name = "FolderUnavailable";
  }
}

export class OperationFailed extends GatewayError {
  readonly kind = "OperationFailed";
  readonly status = "ServerError";

  constructor(readonly stage: Stage, cause: unknown) {
    super(`${stage} failed: ${describeError(cause)}`, { cause });
    this.name = "OperationFailed";
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one step of an operation. Taxonomy errors pass through untouched; anything
 * else is reported as a failure of `stage`.
 */
export async function runStage<T>(stage: Stage, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (isGatewayError(error)) {
      throw error;
    }
    throw new OperationFailed(stage, error);
  }
}
