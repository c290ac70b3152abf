export type QrRenderErrorKind =
  | "invalid-color"
  | "logo-not-found"
  | "logo-decode"
  | "payload-too-large"
  | "unknown-version"
  | "output-write";

export class QrRenderError extends Error {
  readonly kind: QrRenderErrorKind;

  constructor(kind: QrRenderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QrRenderError";
    this.kind = kind;
  }
}

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: QrRenderError };

export function stageOk<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function stageFail<T>(error: QrRenderError): StageResult<T> {
  return { ok: false, error };
}

/**
 * Runs a stage body and folds a thrown `QrRenderError` into a failed result.
 * Anything else is a bug and keeps propagating.
 */
export async function runStage<T>(fn: () => T | Promise<T>): Promise<StageResult<T>> {
  try {
    return stageOk(await fn());
  } catch (err) {
    if (err instanceof QrRenderError) {
      return stageFail(err);
    }
    throw err;
  }
}
