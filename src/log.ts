import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

export type Logger = pino.Logger;

export type LogLevel = pino.Level;

/**
 * Console logger, optionally mirrored to a file. When `filePath` is set the
 * file stream receives `fileLevel` (defaults to `level`). `console: false`
 * keeps only the file stream; `stderr` moves console output off stdout.
 */
export function createLogger(
  level: LogLevel,
  filePath?: string,
  fileLevel?: LogLevel,
  opts?: { console?: boolean; stderr?: boolean },
): Logger {
  const consoleEnabled = opts?.console !== false;
  const consoleStream = opts?.stderr ? process.stderr : process.stdout;
  if (!filePath) {
    return pino({ name: "toolloop", level: consoleEnabled ? level : "silent" }, consoleStream);
  }

  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}`, { cause: err });
  }

  const streams = [
    ...(consoleEnabled ? [{ level, stream: consoleStream }] : []),
    {
      level: fileLevel ?? level,
      stream: pino.destination({ dest: filePath, sync: false }),
    },
  ];
  return pino({ name: "toolloop", level: "trace" }, multistream(streams));
}

/** Logger that drops everything; used by library callers that pass none. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
