/**
 * 共享错误类型
 *
 * 自定义错误类，便于统一处理和类型区分
 */

/**
 * 配置相关错误
 */
export class ConfigError extends Error {
	constructor(message: string, public readonly cause?: Error) {
		super(message);
		this.name = 'ConfigError';
		Error.captureStackTrace?.(this, ConfigError);
	}
}

/**
 * 检索相关错误（参数非法等）
 */
export class SearchError extends Error {
	constructor(message: string, public readonly cause?: Error) {
		super(message);
		this.name = 'SearchError';
		Error.captureStackTrace?.(this, SearchError);
	}
}

/**
 * API 调用相关错误
 */
export class ApiError extends Error {
	constructor(
		message: string,
		public readonly statusCode?: number,
		public readonly cause?: Error,
	) {
		super(message);
		this.name = 'ApiError';
		Error.captureStackTrace?.(this, ApiError);
	}
}

/**
 * 限流错误
 */
export class RateLimitError extends Error {
	constructor(
		message: string,
		public readonly retryAfter?: number,
	) {
		super(message);
		this.name = 'RateLimitError';
		Error.captureStackTrace?.(this, RateLimitError);
	}
}

/**
 * Document store failure (anything but the insert conflict)
 */
export class StoreError extends Error {
	constructor(message: string, public readonly cause?: Error) {
		super(message);
		this.name = 'StoreError';
		Error.captureStackTrace?.(this, StoreError);
	}
}

/**
 * Insert conflict: the id is already present in the store
 */
export class ObjectExistsError extends Error {
	constructor(public readonly id: string) {
		super(`Object ${id} already exists`);
		this.name = 'ObjectExistsError';
		Error.captureStackTrace?.(this, ObjectExistsError);
	}
}

/**
 * 文本提取失败（单个文件）
 */
export class ExtractionError extends Error {
	constructor(
		message: string,
		public readonly filePath: string,
		public readonly cause?: Error,
	) {
		super(message);
		this.name = 'ExtractionError';
		Error.captureStackTrace?.(this, ExtractionError);
	}
}

/**
 * Generation backend failure (connection, HTTP status, missing body)
 */
export class GenerationError extends Error {
	constructor(
		message: string,
		public readonly statusCode?: number,
		public readonly cause?: Error,
	) {
		super(message);
		this.name = 'GenerationError';
		Error.captureStackTrace?.(this, GenerationError);
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
