import pino, { Logger } from "pino";
import { config } from "./config";

export type { Logger };

export const createLogger = (level: string = config.logLevel): Logger =>
  pino({
    name: "agent-trust-pipeline",
    level
  });

export const logger = createLogger();
