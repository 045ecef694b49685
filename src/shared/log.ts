export type LogLevel = 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

/**
 * Subset of the pino logger the domain code writes to. Fastify's `app.log`
 * satisfies it, so the server hands its own logger down.
 */
export interface Logger {
  info(obj: LogContext, msg?: string): void;
  warn(obj: LogContext, msg?: string): void;
  error(obj: LogContext, msg?: string): void;
}

export function toErrorMeta(err: unknown): { name?: string; message?: string; stack?: string; code?: unknown } {
  if (!err || typeof err !== 'object') {
    return { message: String(err) };
  }
  const code = 'code' in err ? err.code : undefined;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack, code };
  }
  return { message: String(err), code };
}

function write(level: LogLevel, obj: LogContext, msg?: string): void {
  const out: LogContext = {
    ts: new Date().toISOString(),
    level,
    pid: process.pid,
    ...obj,
  };
  if (msg !== undefined) out.msg = msg;
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(out));
}

/** One JSON line per record on stdout. */
export const jsonLineLogger: Logger = {
  info: (obj, msg) => write('info', obj, msg),
  warn: (obj, msg) => write('warn', obj, msg),
  error: (obj, msg) => write('error', obj, msg),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
