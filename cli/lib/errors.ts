/**
 * Error types raised by the harness.
 *
 * Every error carries a `kind` so callers can tell the recovery scope
 * apart: configuration errors abort the invocation, provisioning errors
 * take out one environment, run errors one run, and aggregation errors
 * one report cell.
 *
 * @module
 */

export type HarnessErrorKind =
  | "ConfigurationError"
  | "ProvisioningError"
  | "PrepareError"
  | "CommandError"
  | "TestRunError"
  | "RunTimeoutError"
  | "AggregationError";

/**
 * Base class for harness errors.
 */
export abstract class HarnessError extends Error {
  abstract readonly kind: HarnessErrorKind;
}

/**
 * Malformed or empty experiment description. Fatal.
 */
export class ConfigurationError extends HarnessError {
  readonly kind = "ConfigurationError";

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join("\n  ")}` : message);
    this.name = "ConfigurationError";
  }
}

/**
 * A command exited non-zero.
 */
export class CommandError extends HarnessError {
  readonly kind = "CommandError";

  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly output: string,
  ) {
    super(`${command} failed (exit code ${exitCode})`);
    this.name = "CommandError";
  }
}

/**
 * Environment creation or dependency installation failed.
 */
export class ProvisioningError extends HarnessError {
  readonly kind = "ProvisioningError";

  constructor(
    public readonly environment: string,
    message: string,
    public readonly output = "",
  ) {
    super(`Provisioning ${environment} failed: ${message}`);
    this.name = "ProvisioningError";
  }
}

/**
 * A project adapter could not prepare its checkout.
 */
export class PrepareError extends HarnessError {
  readonly kind = "PrepareError";

  constructor(
    public readonly project: string,
    message: string,
    public readonly output = "",
  ) {
    super(`Preparing ${project} failed: ${message}`);
    this.name = "PrepareError";
  }
}

/**
 * A test-suite invocation failed.
 */
export class TestRunError extends HarnessError {
  readonly kind = "TestRunError";

  constructor(
    public readonly project: string,
    public readonly exitCode: number,
    public readonly output: string,
  ) {
    super(`Tests for ${project} failed (exit code ${exitCode})`);
    this.name = "TestRunError";
  }
}

/**
 * A run exceeded its wall-clock budget.
 */
export class RunTimeoutError extends HarnessError {
  readonly kind = "RunTimeoutError";

  constructor(
    public readonly cell: string,
    public readonly seconds: number,
  ) {
    super(`Run of ${cell} timed out after ${seconds}s`);
    this.name = "RunTimeoutError";
  }
}

/**
 * No successful samples to aggregate.
 */
export class AggregationError extends HarnessError {
  readonly kind = "AggregationError";

  constructor(
    public readonly cell: string,
    public readonly attempted: number,
  ) {
    super(`No successful runs for ${cell} (0/${attempted})`);
    this.name = "AggregationError";
  }
}

/**
 * Best-effort captured output of an error, for log files.
 */
export function errorOutput(error: Error): string {
  if (
    error instanceof CommandError ||
    error instanceof ProvisioningError ||
    error instanceof PrepareError ||
    error instanceof TestRunError
  ) {
    return error.output;
  }
  return "";
}
