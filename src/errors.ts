import { ApiException } from "chanfana";

// Malformed upload or form fields; never reaches the detection model
export class InputError extends ApiException {
  status = 400;
  code = 7001;

  constructor(message: string, readonly details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.name = "InputError";
  }
}

export class ClassificationNotFoundError extends ApiException {
  status = 404;
  code = 7002;

  constructor(readonly id: string) {
    super("Classification not found");
    this.name = "ClassificationNotFoundError";
  }
}

/**
 * Every acquisition strategy failed, or inference itself failed.
 * `reasons` keeps one entry per failed strategy, in the order they were tried.
 */
export class ModelUnavailableError extends ApiException {
  status = 503;
  code = 7503;

  constructor(message: string, readonly reasons: string[] = []) {
    super(reasons.length > 0 ? `${message} (${reasons.join("; ")})` : message);
    this.name = "ModelUnavailableError";
  }
}

export class StoreUnavailableError extends ApiException {
  status = 503;
  code = 7504;

  constructor(message: string) {
    super(`Classification store unavailable: ${message}`);
    this.name = "StoreUnavailableError";
  }
}

// The backend produced a class index with no Stage counterpart
export class InvalidStageError extends ApiException {
  status = 500;
  code = 7005;

  constructor(readonly index: number) {
    super(`Model produced unknown stage index ${index}`);
    this.name = "InvalidStageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
