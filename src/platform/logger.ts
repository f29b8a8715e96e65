/**
 * Logger Module - 结构化日志系统
 *
 * 设计原则：
 * 1. 结构化日志 (JSON 格式)，开发环境使用 pretty 输出
 * 2. 自动注入 Trace ID 和 Session ID (仅前 8 位)
 * 3. 日志轮转 (按天切割，保留 14 天)
 * 4. 错误信息完整写入运维日志，绝不回传给终端用户
 *
 * 分类标签 (kind):
 * - biz: 业务日志 (Usecase 层)
 * - sys: 系统日志 (Adapter 层)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getTraceId, getSessionId } from './tracing.js';
import config from './config.js';

// ============ 类型定义 ============

export type LogKind = 'biz' | 'sys';

export interface LogMeta {
    kind: LogKind;
    /** 组件名称 */
    component: string;
    message: string;
    /** 原始错误对象 (可选) */
    error?: unknown;
    meta?: Record<string, unknown>;
}

const IS_DEV = process.env.NODE_ENV !== 'production';

const SESSION_PREFIX_LENGTH = 8;

// ============ 格式化函数 ============

/**
 * 序列化错误对象，保留 cause 链
 */
export function serializeError(error: unknown): Record<string, unknown> | undefined {
    if (!error) return undefined;

    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(error.cause ? { cause: serializeError(error.cause) } : {}),
            // 保留任何自定义属性 (e.g. status, code)
            ...Object.fromEntries(
                Object.entries(error).filter(([key]) => !['name', 'message', 'stack', 'cause'].includes(key))
            ),
        };
    }

    return { raw: String(error) };
}

const sessionTag = (): string => {
    const sessionId = getSessionId();
    return sessionId ? sessionId.slice(0, SESSION_PREFIX_LENGTH) : '-';
};

/**
 * JSON 格式化器 (生产环境 / 文件)
 */
const jsonFormat = winston.format.printf(({ level, message, timestamp, ...rest }) => {
    const logObject: Record<string, unknown> = {
        timestamp,
        level,
        traceId: getTraceId() || '-',
        session: sessionTag(),
        ...rest,
        message,
    };

    if (rest.error) {
        logObject.error = serializeError(rest.error);
    }

    return JSON.stringify(logObject);
});

/**
 * Pretty 格式化器 (开发环境)
 */
const prettyFormat = winston.format.printf(({ level, message, timestamp, kind, component, error, meta }) => {
    const traceId = getTraceId() || '-';

    let output = `${timestamp} [${level.toUpperCase().padEnd(5)}] [${kind || 'sys'}] [${traceId}] [${sessionTag()}] ${component || 'App'}: ${message}`;

    if (error) {
        const serialized = serializeError(error);
        if (serialized) {
            output += `\n  error: ${serialized.name} - ${serialized.message}`;
            if (serialized.stack) {
                output += `\n  stack: ${serialized.stack}`;
            }
            if (serialized.cause) {
                output += `\n  cause: ${JSON.stringify(serialized.cause)}`;
            }
        }
    }

    if (meta && typeof meta === 'object' && Object.keys(meta).length > 0) {
        output += `\n  meta: ${JSON.stringify(meta)}`;
    }

    return output;
});

// ============ Transport 配置 ============

const consoleTransport = new winston.transports.Console({
    silent: config.logging.silent,
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.colorize({ all: IS_DEV }),
        IS_DEV ? prettyFormat : jsonFormat
    ),
});

/**
 * 文件 Transport (日志轮转)
 * - 按天切割
 * - 保留 14 天
 * - 单文件最大 50MB
 */
const createFileTransport = () =>
    new DailyRotateFile({
        dirname: config.logging.dir,
        filename: 'app-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '50m',
        maxFiles: '14d',
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
            jsonFormat
        ),
    });

const transports = config.logging.toFile
    ? [consoleTransport, createFileTransport()]
    : [consoleTransport];

const winstonLogger = winston.createLogger({
    level: config.logging.level,
    transports,
});

// ============ 封装的 Logger API ============

/**
 * 统一的日志接口
 *
 * @example
 * logger.error({
 *     kind: 'sys',
 *     component: 'AzureOpenAICompletionService',
 *     message: 'Completion request failed',
 *     error,
 *     meta: { status },
 * });
 */
export const logger = {
    debug: ({ message, ...rest }: LogMeta) => winstonLogger.debug(message, rest),
    info: ({ message, ...rest }: LogMeta) => winstonLogger.info(message, rest),
    warn: ({ message, ...rest }: LogMeta) => winstonLogger.warn(message, rest),
    error: ({ message, ...rest }: LogMeta) => winstonLogger.error(message, rest),

    raw: winstonLogger,
};

// ============ 便捷函数 ============

export function bizLog(component: string, message: string, meta?: Record<string, unknown>) {
    logger.info({ kind: 'biz', component, message, meta });
}

export function sysLog(component: string, message: string, meta?: Record<string, unknown>) {
    logger.info({ kind: 'sys', component, message, meta });
}

/**
 * 错误日志 (保留完整错误信息，只进运维日志)
 */
export function errLog(kind: LogKind, component: string, message: string, error: unknown, meta?: Record<string, unknown>) {
    logger.error({ kind, component, message, error, meta });
}
