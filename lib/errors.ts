/**
 * Raised when a job cannot be nested as given: non-positive dimensions,
 * negative spacing, an empty sheet stack and similar. Thrown before any
 * strategy runs.
 */
export class InvalidInputError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(
      issues.length === 1
        ? `Invalid nesting input: ${issues[0]}`
        : `Invalid nesting input (${issues.length} problems): ${issues.join("; ")}`,
    )
    this.name = "InvalidInputError"
    this.issues = issues
  }
}
