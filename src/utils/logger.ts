type Fields = Record<string, unknown>;
type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<Level | 'silent', number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLevelName(v: string): v is keyof typeof LEVEL_RANK {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);
}

function threshold(): number {
  const raw = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevelName(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.info;
}

function toErrorPayload(err: unknown) {
  if (!err) return undefined;
  if (err instanceof Error) {
    const extra: Fields = {};
    for (const key of ['code', 'status', 'stage', 'reason'] as const) {
      if (key in err) extra[key] = Reflect.get(err, key);
    }
    return { name: err.name, message: err.message, ...extra, stack: err.stack };
  }
  if (typeof err === 'object') return err;
  return { message: String(err) };
}

function emit(level: Level, msg?: string, fields?: Fields) {
  if (LEVEL_RANK[level] < threshold()) return;
  const payload: Fields = {
    level,
    time: new Date().toISOString(),
    ...(fields || {}),
    msg: msg || fields?.msg || '',
  };
  // Normalize embedded error if present
  if (fields && 'err' in fields) {
    payload.err = toErrorPayload(fields.err);
  }
  const line = JSON.stringify(payload);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function method(level: Level) {
  return (arg1?: string | Fields, arg2?: string) => {
    if (typeof arg1 === 'string') return emit(level, arg1);
    emit(level, arg2, arg1 || {});
  };
}

export const logger = {
  info: method('info'),
  warn: method('warn'),
  error: method('error'),
  debug: method('debug'),
};

export type Logger = typeof logger;
export type { Fields };
