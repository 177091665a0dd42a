/**
 * Error taxonomy shared by the agent packages.
 *
 * Startup and tick errors propagate to the CLI, which reports them once and
 * exits non-zero.
 */

/**
 * Invalid or inconsistent agent configuration.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

export type ResourceType = "server" | "subnet" | "port";

/**
 * A resource named in the configuration does not exist in the cloud.
 */
export class ResourceNotFoundError extends Error {
  constructor(
    public readonly resourceType: ResourceType,
    public readonly resourceName: string
  ) {
    super(`Unable to find ${resourceType} '${resourceName}'.`);
    this.name = "ResourceNotFoundError";
  }
}

/**
 * A networking config template is missing or does not have the expected shape.
 */
export class TemplateError extends Error {
  constructor(
    message: string,
    public readonly templatePath: string,
    cause?: unknown
  ) {
    super(`${message} (${templatePath})`, { cause });
    this.name = "TemplateError";
  }
}

/**
 * The networking apply command exited non-zero or could not be started.
 */
export class ApplyCommandError extends Error {
  constructor(
    public readonly command: readonly string[],
    public readonly output: string,
    public readonly exitCode: number | null,
    cause?: unknown
  ) {
    super(
      `Apply command '${command.join(" ")}' failed` +
        (exitCode === null ? "" : ` with exit code ${exitCode}`),
      { cause }
    );
    this.name = "ApplyCommandError";
  }
}
