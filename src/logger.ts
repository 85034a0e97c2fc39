import "./env.js";
import { pino } from "pino";

const isDevelopment = process.env.NODE_ENV === "development";

export const logger = pino({
  level: process.env.LOG_LEVEL || (isDevelopment ? "debug" : "info"),

  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: { colorize: true },
      }
    : undefined,

  base: {
    service: "weekly-pr-report",
  },

  redact: {
    paths: ["headers.authorization", "config.githubToken", "config.llm.token"],
    censor: "[REDACTED]",
  },
});

export const githubLogger = logger.child({ component: "github" });
export const llmLogger = logger.child({ component: "llm" });
export const reportLogger = logger.child({ component: "report" });
export const jobLogger = logger.child({ component: "job" });
