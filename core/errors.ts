const ExitCode = {
  Success: 0,
  Unexpected: 1,
  Usage: 2,
  Git: 3,
  Api: 4,
  Config: 5,
} as const;

type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

class DescribeError extends Error {
  readonly exitCode: ExitCodeValue;

  constructor(message: string, exitCode: ExitCodeValue, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

class UsageError extends DescribeError {
  constructor(message: string) {
    super(message, ExitCode.Usage);
  }
}

class ConfigError extends DescribeError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message, ExitCode.Config);
    this.variable = variable;
  }
}

class GitError extends DescribeError {
  readonly args: string[];
  // null when git could not be started at all
  readonly gitExitCode: number | null;
  readonly stderr: string;

  constructor(
    args: string[],
    gitExitCode: number | null,
    stderr: string,
    options?: ErrorOptions
  ) {
    const command = ["git", ...args].join(" ");
    const status =
      gitExitCode === null ? "could not be started" : `exited with code ${gitExitCode}`;
    super(`${command} ${status}: ${stderr.trim()}`, ExitCode.Git, options);
    this.args = args;
    this.gitExitCode = gitExitCode;
    this.stderr = stderr;
  }
}

type ApiErrorKind =
  | "authentication"
  | "quota"
  | "rate_limit"
  | "request"
  | "server"
  | "transport"
  | "response";

class ApiError extends DescribeError {
  readonly kind: ApiErrorKind;
  readonly status?: number;

  constructor(
    kind: ApiErrorKind,
    message: string,
    status?: number,
    options?: ErrorOptions
  ) {
    super(message, ExitCode.Api, options);
    this.kind = kind;
    this.status = status;
  }
}

const exitCodeFor = (error: unknown): ExitCodeValue =>
  error instanceof DescribeError ? error.exitCode : ExitCode.Unexpected;

export {
  ApiError,
  ConfigError,
  DescribeError,
  ExitCode,
  GitError,
  UsageError,
  exitCodeFor,
};
export type { ApiErrorKind, ExitCodeValue };
