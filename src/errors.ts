export type GameErrorKind = "NotFound" | "Forbidden" | "InvalidArgument" | "InvalidState";

/**
 * Raised by game operations before any state is written.
 * Interfaces translate `kind` into their own status codes.
 */
export class GameError extends Error {
  readonly kind: GameErrorKind;

  constructor(kind: GameErrorKind, message: string) {
    super(message);
    this.name = "GameError";
    this.kind = kind;
  }
}

export const notFound = (msg: string) => new GameError("NotFound", msg);
export const forbidden = (msg: string) => new GameError("Forbidden", msg);
export const invalidArgument = (msg: string) => new GameError("InvalidArgument", msg);
export const invalidState = (msg: string) => new GameError("InvalidState", msg);

// HTTP status per error kind
export const HTTP_STATUS: Record<GameErrorKind, number> = {
  NotFound: 404,
  Forbidden: 403,
  InvalidArgument: 422,
  InvalidState: 400,
};
