import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export function createLogger(
  level: LogLevel,
  filePath?: string,
  fileLevel?: LogLevel,
  opts?: { console?: boolean; stream?: pino.DestinationStream },
): { logger: Logger; close: () => void } {
  const consoleEnabled = opts?.console !== false;
  const consoleStream = opts?.stream ?? process.stdout;
  if (!filePath) {
    const logger = consoleEnabled ? pino({ level }, consoleStream) : pino({ level: "silent" });
    return { logger, close: () => {} };
  }

  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}`, { cause: err });
  }

  const dest = pino.destination({ dest: filePath, sync: true });
  const logger = consoleEnabled
    ? pino(
        { level: "trace" },
        multistream([
          { level, stream: consoleStream },
          { level: fileLevel ?? level, stream: dest },
        ]),
      )
    : pino({ level: fileLevel ?? level }, dest);

  return {
    logger,
    close: () => {
      dest.flushSync();
      dest.end();
    },
  };
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
