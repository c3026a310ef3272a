import winston from "winston";

export const VERBOSITY_MIN = 0;
export const VERBOSITY_MAX = 3;
export const VERBOSITY_DEFAULT = 2;

const LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LEVELS)[number];

export function levelForVerbosity(verbosity: number): LogLevel {
  const clamped = Math.min(VERBOSITY_MAX, Math.max(VERBOSITY_MIN, Math.trunc(verbosity)));
  return LEVELS[clamped] ?? "info";
}

export type LoggerOptions = {
  verbosity?: number;
  colorize?: boolean;
  silent?: boolean;
};

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const colorize = options.colorize ?? Boolean(process.stderr.isTTY);
  const formats = [
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      let output = `${String(timestamp)} [${level}]: ${String(message)}`;
      if (Object.keys(meta).length > 0) {
        output += ` ${JSON.stringify(meta)}`;
      }
      return output;
    })
  ];
  if (colorize) formats.unshift(winston.format.colorize({ level: true }));

  return winston.createLogger({
    level: levelForVerbosity(options.verbosity ?? VERBOSITY_DEFAULT),
    silent: options.silent ?? false,
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LEVELS],
        format: winston.format.combine(...formats)
      })
    ]
  });
}
