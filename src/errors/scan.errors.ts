export class ProjectNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Path not found: ${path}`);
    this.name = "ProjectNotFoundError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath: string | null = null
  ) {
    super(configPath === null ? message : `${configPath}: ${message}`);
    this.name = "ConfigError";
  }
}
