/**
 * Raised when a referenced assessment, submission or lesson does not exist.
 * The message names the missing entity and is safe to return to clients.
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}
