/**
 * Tiny structured logger with namespaces. Every line goes to stderr so that
 * stdout only carries the final report.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_TIMESTAMPS=1         -> prefix text lines with an ISO timestamp
 *  - LOG_SERVICE_NAME=lxc     -> service tag (optional)
 */

type LevelName = "trace" | "debug" | "info" | "warn" | "error";

type LevelMap = Record<LevelName, number>;

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: unknown, meta?: LogMeta): void;
    debug(message: unknown, meta?: LogMeta): void;
    info(message: unknown, meta?: LogMeta): void;
    warn(message: unknown, meta?: LogMeta): void;
    error(message: unknown, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
}

export type LoggerOptions = {
    enabled: boolean;
    minLevel: LevelName;
    json: boolean;
    timestamps: boolean;
    service: string;
    write: (line: string) => void;
};

const LEVELS: LevelMap = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

// Severity tags printed in text mode.
const TAGS: Record<LevelName, string> = {
    trace: "TRACE",
    debug: "DEBUG",
    info: "INFO",
    warn: "WARNING",
    error: "ERROR",
};

function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function serializeError(err: unknown): unknown {
    if (!err) return undefined;
    if (err instanceof Error) {
        const extra: Record<string, unknown> = { ...err };
        delete extra.message;
        delete extra.name;
        delete extra.stack;
        return {
            message: err.message,
            stack: err.stack,
            name: err.name,
            ...extra,
        };
    }
    return err;
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj);
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function joinNamespace(ns?: string | string[]): string {
    if (!ns) return "";
    if (Array.isArray(ns)) return ns.join(":");
    return String(ns);
}

function compactMeta(meta: LogMeta): LogMeta {
    const out: LogMeta = { ...meta };
    if (out.error instanceof Error) out.error = out.error.message;
    if (out.err instanceof Error) out.err = out.err.message;
    return out;
}

function baseLog(options: LoggerOptions, ns?: string | string[]): Logger {
    const namespace = joinNamespace(ns);
    const minLevel = LEVELS[options.minLevel];

    const write = (level: LevelName, msg: unknown, meta?: LogMeta) => {
        if (!options.enabled || LEVELS[level] < minLevel) return;

        if (options.json) {
            const payload = {
                ts: new Date().toISOString(),
                level,
                ns: namespace || undefined,
                service: options.service || undefined,
                pid: process.pid,
                msg: String(msg ?? ""),
                ...(meta
                    ? {
                          meta: {
                              ...meta,
                              ...(meta.error ? { error: serializeError(meta.error) } : {}),
                              ...(meta.err ? { err: serializeError(meta.err) } : {}),
                          },
                      }
                    : {}),
            };
            options.write(safeStringify(payload));
            return;
        }

        const tags = [
            options.timestamps && `[${new Date().toISOString()}]`,
            options.service && `[${options.service}]`,
            `[${TAGS[level]}]`,
            namespace && `[${namespace}]`,
        ]
            .filter(Boolean)
            .join(" ");

        const tail = meta && Object.keys(meta).length > 0 ? ` ${safeStringify(compactMeta(meta))}` : "";
        options.write(`${tags} ${String(msg ?? "")}${tail}`);
    };

    const child = (subNs: string | string[]): Logger => {
        const next = Array.isArray(subNs) ? subNs : [String(subNs)];
        const merged = namespace ? [namespace, ...next] : next;
        return baseLog(options, merged);
    };

    return {
        trace: (m, meta) => write("trace", m, meta),
        debug: (m, meta) => write("debug", m, meta),
        info: (m, meta) => write("info", m, meta),
        warn: (m, meta) => write("warn", m, meta),
        error: (m, meta) => write("error", m, meta),
        child,
    };
}

export function createLogger(options: Partial<LoggerOptions> = {}, ns?: string | string[]): Logger {
    return baseLog(
        {
            enabled: options.enabled ?? true,
            minLevel: options.minLevel ?? "info",
            json: options.json ?? false,
            timestamps: options.timestamps ?? false,
            service: options.service ?? "",
            write: options.write ?? ((line) => process.stderr.write(`${line}\n`)),
        },
        ns
    );
}

const envLevel = (process.env.LOG_LEVEL || "info").toLowerCase();

const logger = createLogger({
    enabled: process.env.LOG_ENABLED !== "0",
    minLevel: isLevelName(envLevel) ? envLevel : "info",
    json: process.env.LOG_JSON === "1",
    timestamps: process.env.LOG_TIMESTAMPS === "1",
    service: process.env.LOG_SERVICE_NAME || "",
});

export default logger;
