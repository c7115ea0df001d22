export class SolverError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidParameterError extends SolverError {
  readonly parameter: string;
  readonly constraint: string;

  constructor(parameter: string, constraint: string) {
    super(`Invalid value for '${parameter}' parameter: ${constraint}`);
    this.parameter = parameter;
    this.constraint = constraint;
  }
}

export class ExternalResourceError extends SolverError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not load word list from '${path}'`, { cause });
    this.path = path;
  }
}

export class SolvingError extends SolverError {}
