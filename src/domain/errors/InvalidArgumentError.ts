export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }

  static because(issues: readonly string[]): InvalidArgumentError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid argument"
        : issues.length === 1
          ? (firstIssue ?? "Invalid argument")
          : `Invalid argument: ${issues.join("; ")}`;
    return new InvalidArgumentError(message, issues);
  }
}
