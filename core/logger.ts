import chalk from "chalk";

interface LogOptions {
  scope?: string;
  data?: unknown;
}

type LogLevel = "success" | "info" | "warn" | "error";

interface Logger {
  success: (message: string, options?: LogOptions) => void;
  info: (message: string, options?: LogOptions) => void;
  warn: (message: string, options?: LogOptions) => void;
  error: (message: string, options?: LogOptions) => void;
}

interface LoggerOptions {
  // Receives one formatted entry at a time, without the trailing newline.
  write?: (line: string) => void;
  quiet?: boolean;
}

const formatData = (data: unknown): string => {
  if (data === undefined) {
    return "";
  }
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  if (typeof data === "string") {
    return data;
  }
  if (typeof data === "number" || typeof data === "boolean") {
    return String(data);
  }
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return "Unable to serialize log data.";
  }
};

const formatScope = (options?: LogOptions) =>
  options?.scope ? ` ${chalk.gray(`[${options.scope}]`)}` : "";

const withData = (base: string, data: string) =>
  data.length === 0 ? base : `${base}\n${data}`;

const formatLine = (
  label: string,
  color: (value: string) => string,
  message: string,
  options?: LogOptions
) => {
  const timestamp = new Date().toLocaleString();
  const base = `${chalk.gray(timestamp)} ${color(label)}${formatScope(
    options
  )} ${message}`;
  return withData(base, formatData(options?.data));
};

const formatInfoLine = (message: string, options?: LogOptions) => {
  const timestamp = new Date().toLocaleString();
  const base = `${chalk.gray(timestamp)}${formatScope(options)} ${message}`;
  return withData(base, formatData(options?.data));
};

const formatWarnLine = (message: string, options?: LogOptions) => {
  const timestamp = new Date().toLocaleString();
  const scope = options?.scope ? ` [${options.scope}]` : "";
  const data = formatData(options?.data);
  const base = `${chalk.gray(timestamp)} ${chalk.yellowBright(
    `⚠${scope} ${message}`
  )}`;
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${chalk.yellowBright(data)}`;
};

const formatEntry = (level: LogLevel, message: string, options?: LogOptions) => {
  if (level === "success") {
    return formatLine("SUCCESS", chalk.greenBright, message, options);
  }
  if (level === "info") {
    return formatInfoLine(message, options);
  }
  if (level === "warn") {
    return formatWarnLine(message, options);
  }
  return formatLine("ERROR", chalk.redBright, message, options);
};

// Standard output carries the generated description only, so every entry
// goes to stderr.
const writeToStderr = (line: string) => {
  process.stderr.write(`${line}\n`);
};

const createLogger = (options: LoggerOptions = {}): Logger => {
  const write = options.write ?? writeToStderr;
  const quiet = options.quiet ?? false;

  const writeLog = (level: LogLevel, message: string, logOptions?: LogOptions) => {
    if (quiet && (level === "info" || level === "success")) {
      return;
    }
    write(formatEntry(level, message, logOptions));
  };

  return {
    success: (message, logOptions) => writeLog("success", message, logOptions),
    info: (message, logOptions) => writeLog("info", message, logOptions),
    warn: (message, logOptions) => writeLog("warn", message, logOptions),
    error: (message, logOptions) => writeLog("error", message, logOptions),
  };
};

export const logger: Logger = createLogger();

export { createLogger, formatData };
export type { LogOptions, Logger, LoggerOptions };
