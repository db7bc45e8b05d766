import { pino, type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  name: "tiergate",
  level: process.env.TIERGATE_LOG_LEVEL || "info",
});
