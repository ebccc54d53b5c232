/**
 * Thrown from the default branch of an exhaustive switch. The `never` parameter makes the compiler
 * reject the call site when a new union member or enum value is left unhandled.
 */
export class UnreachableError extends Error {
  readonly value: unknown;

  constructor(value: never) {
    super(`Unreachable code with specified value: ${String(value)}`);
    this.name = "UnreachableError";
    this.value = value;
  }
}
