import winston from "winston";
import { config } from "../config";

function stringifyMeta(meta: Record<string, unknown>): string {
  if (Object.keys(meta).length === 0) return "";
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    // axios and mongo errors carry circular references
    return ` [unserializable meta: ${Object.keys(meta).join(", ")}]`;
  }
}

const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
      const trace = typeof stack === "string" ? `\n${stack}` : "";
      return `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}${stringifyMeta(meta)}${trace}`;
    })
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
