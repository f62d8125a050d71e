/**
 * 结构化日志模块
 *
 * TTY 模式：彩色可读格式 + JSON 附加字段
 * 非 TTY 模式（Docker/CI）：JSON Lines
 */

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

/** Minimal writable target (process.stdout / process.stderr compatible) */
export interface LogStream {
	write(chunk: string): unknown;
	isTTY?: boolean;
}

export interface LoggerOptions {
	level?: LogLevel;
	prefix?: string;
	/** INFO 及以下级别的输出流，默认 stdout */
	out?: LogStream;
	/** ERROR 级别的输出流，默认 stderr */
	err?: LogStream;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: 'DEBUG',
	[LogLevel.INFO]: 'INFO',
	[LogLevel.WARN]: 'WARN',
	[LogLevel.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Record<LogLevel, number> = {
	[LogLevel.DEBUG]: 90,  // 灰色
	[LogLevel.INFO]:  36,  // 青色
	[LogLevel.WARN]:  33,  // 黄色
	[LogLevel.ERROR]: 31,  // 红色
};

function colorize(text: string, colorCode: number): string {
	return `\x1b[${colorCode}m${text}\x1b[0m`;
}

/**
 * 日志类 — 支持 TTY 彩色输出 / 非 TTY JSON Lines
 */
export class Logger {
	private level: LogLevel;
	private readonly prefix: string;
	private readonly out: LogStream;
	private readonly err: LogStream;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? LogLevel.INFO;
		this.prefix = options.prefix ?? '';
		this.out = options.out ?? process.stdout;
		this.err = options.err ?? process.stderr;
	}

	/** 创建带前缀的子 logger */
	withPrefix(prefix: string): Logger {
		return new Logger({
			level: this.level,
			prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
			out: this.out,
			err: this.err,
		});
	}

	/** 设置日志级别 */
	setLevel(level: LogLevel): void {
		this.level = level;
	}

	private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
		if (level < this.level) return;

		const ts = new Date().toISOString();
		const levelName = LEVEL_NAMES[level];
		const stream = level >= LogLevel.ERROR ? this.err : this.out;

		if (stream.isTTY === true) {
			const prefix = this.prefix ? `[${this.prefix}] ` : '';
			const colored = colorize(levelName.padEnd(5), LEVEL_COLORS[level]);
			const extra = data && Object.keys(data).length > 0
				? ' ' + JSON.stringify(data)
				: '';
			stream.write(`${ts} ${colored} ${prefix}${message}${extra}\n`);
		} else {
			const entry: Record<string, unknown> = {
				ts,
				level: levelName,
				...(this.prefix ? { module: this.prefix } : {}),
				msg: message,
				...data,
			};
			stream.write(JSON.stringify(entry) + '\n');
		}
	}

	debug(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.DEBUG, message, data);
	}

	info(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.INFO, message, data);
	}

	warn(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.WARN, message, data);
	}

	error(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.ERROR, message, data);
	}
}

/** 解析日志级别字符串，未知值返回 INFO */
export function parseLogLevel(value: string | undefined): LogLevel {
	switch (value?.toUpperCase()) {
		case 'DEBUG': return LogLevel.DEBUG;
		case 'INFO':  return LogLevel.INFO;
		case 'WARN':  return LogLevel.WARN;
		case 'ERROR': return LogLevel.ERROR;
		default:      return LogLevel.INFO;
	}
}

/** 从环境变量读取日志级别 */
export function getLogLevelFromEnv(): LogLevel {
	return parseLogLevel(process.env.LOG_LEVEL);
}

/** 创建默认 logger（从环境变量读取级别） */
export function createDefaultLogger(prefix?: string): Logger {
	return new Logger({
		level: getLogLevelFromEnv(),
		prefix,
	});
}

/** 丢弃所有输出的 logger（测试 / 嵌入场景） */
export function createSilentLogger(): Logger {
	const sink: LogStream = { write: () => true };
	return new Logger({ level: LogLevel.ERROR + 1, out: sink, err: sink });
}
