export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export type FeedErrorKind = "http_status" | "timeout" | "network" | "decode";

export class FeedError extends Error {
  readonly kind: FeedErrorKind;
  readonly feedPath: string;
  readonly status: number | undefined;

  constructor(kind: FeedErrorKind, feedPath: string, message: string, status?: number) {
    super(message);
    this.name = "FeedError";
    this.kind = kind;
    this.feedPath = feedPath;
    this.status = status;
  }
}

export const safeErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return JSON.stringify(error) ?? String(error);
};
