import { Logger, defaultLogger } from "../observability/logger";

/** User-facing messages. The host decides how to show them. */
export interface Notifier {
  info(message: string): void;
  success(message: string): void;
  error(message: string): void;
}

export const createLogNotifier = (logger: Logger = defaultLogger): Notifier => ({
  info: (message) => logger.info({ msg: message, notification: "info" }),
  success: (message) => logger.info({ msg: message, notification: "success" }),
  error: (message) => logger.error({ msg: message, notification: "error" }),
});
