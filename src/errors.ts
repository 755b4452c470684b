/* ------------------------------------------------- */
/* File: src/errors.ts                               */
/* ------------------------------------------------- */

/*  Codes d'erreur (envoyés aussi dans les messages `error`)            */
export const ERROR_CODES = [
  "INVALID_USERNAME",
  "USERNAME_ALREADY_EXISTS",
  "NOT_LOGGED_IN",
  "NO_MATCH",
  "NOT_YOUR_TURN",
  "INVALID_PLACEMENT",
  "INVALID_MOVE",
  "INVALID_SHOT",
  "UNEXPECTED_MESSAGE",
  "CONNECTION_FAILED",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export class BattleshipError extends Error {
  readonly name = "BattleshipError";

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BattleshipError);
    }
  }

  static invalidPlacement(message: string, details?: Record<string, unknown>): BattleshipError {
    return new BattleshipError("INVALID_PLACEMENT", message, details);
  }
}

/** octets invalides : fatal pour cette connexion seulement */
export class ProtocolError extends Error {
  readonly name = "ProtocolError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConnectionClosedError extends Error {
  readonly name = "ConnectionClosedError";

  constructor(message = "Connection is closed") {
    super(message);
  }
}
