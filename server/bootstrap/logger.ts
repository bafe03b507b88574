import pino, { type Logger } from "pino";
import { AsyncLocalStorage } from "node:async_hooks";

export type { Logger };

export const correlationStore = new AsyncLocalStorage<{ correlationId: string }>();

/**
 * `destination` replaces stdout for plain JSON output; pretty output always
 * goes through the pino-pretty transport.
 */
export function getLogger(level: string, pretty: boolean, destination?: pino.DestinationStream): Logger {
  const options: pino.LoggerOptions = {
    level,
    base: undefined, // do not inject pid and hostname automatically
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin() {
      const correlationId = currentCorrelationId();
      return correlationId ? { correlationId } : {};
    }
  };
  if (pretty) {
    return pino({ ...options, transport: { target: "pino-pretty", options: { colorize: true } } });
  }
  return destination ? pino(options, destination) : pino(options);
}

export function withCorrelation<T>(cid: string, fn: () => Promise<T>) {
  return correlationStore.run({ correlationId: cid }, fn);
}

export function currentCorrelationId(): string | undefined {
  return correlationStore.getStore()?.correlationId;
}
