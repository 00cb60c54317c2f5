export class UnsupportedOperationError extends Error {
  constructor(
    public readonly operation: string,
    reason: string,
  ) {
    super(`Unsupported operation ${operation}: ${reason}`);
    this.name = "UnsupportedOperationError";
  }
}
