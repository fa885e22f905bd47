export type ReindexErrorCode = "invalid_config";

export class ReindexConfigError extends Error {
  readonly code: ReindexErrorCode = "invalid_config";

  constructor(message: string) {
    super(message);
    this.name = "ReindexConfigError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
