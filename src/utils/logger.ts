import winston from "winston";
import path from "path";
import fs from "fs";
import { BotConfig } from "../config";

export type LoggerSettings = Pick<BotConfig, "logLevel" | "logFile" | "venueA" | "venueB" | "trackedPairs">;

/**
 * Fields stamped on every entry, so lines from bots running different venue
 * pairs can share one log sink.
 */
export function logMetadata(settings: LoggerSettings): Record<string, string> {
  return {
    service: "venue-arb-bot",
    venues: `${settings.venueA}/${settings.venueB}`,
    assets: settings.trackedPairs.map((p) => p.asset).join(","),
  };
}

export function createLogger(settings: LoggerSettings) {
  const { logLevel, logFile } = settings;
  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  return winston.createLogger({
    level: logLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      winston.format.json()
    ),
    defaultMeta: logMetadata(settings),
    transports: [
      new winston.transports.File({
        filename: logFile,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, "error.log"),
        level: "error",
        maxsize: 5242880,
        maxFiles: 5,
      }),
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(
            ({ timestamp, level, message, ...meta }) => {
              let msg = `${timestamp} [${level}]: ${message}`;
              if (Object.keys(meta).length > 0) {
                msg += ` ${JSON.stringify(meta)}`;
              }
              return msg;
            }
          )
        ),
      }),
    ],
  });
}

/**
 * Logger that discards every entry. Used by tests.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
}

export type Logger = winston.Logger;
