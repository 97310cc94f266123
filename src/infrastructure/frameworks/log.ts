type LogFields = Record<string, string | number | boolean | null | undefined>;

export type Logger = {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
};

function isDebugEnabled(env: NodeJS.ProcessEnv): boolean {
  const value = env.TRACELENS_DEBUG?.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ` ${key}=${typeof value === "string" && /\s/.test(value) ? JSON.stringify(value) : String(value)}`)
    .join("");
}

export function createLogger(
  scope: string,
  options: { env?: NodeJS.ProcessEnv; write?: (line: string) => void } = {},
): Logger {
  const env = options.env ?? process.env;
  const write = options.write ?? ((line: string) => process.stderr.write(line));
  const debugEnabled = isDebugEnabled(env);

  const emit = (level: string, message: string, fields?: LogFields) => {
    write(`[tracelens] ${level} ${scope}: ${message}${formatFields(fields)}\n`);
  };

  return {
    debug: (message, fields) => {
      if (debugEnabled) emit("debug", message, fields);
    },
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  };
}
