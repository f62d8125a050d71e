/**
 * 限流器
 *
 * 滑动窗口 RPM / TPM 限制，用于 Voyage API（embedding + rerank 共用配额）。
 * 超限时直接抛出 RateLimitError，不等待、不重试。
 */

import { RateLimitError } from './errors.js';
import { Logger, LogLevel } from './logger.js';

export interface RateLimiterConfig {
	/** 每分钟请求数限制 */
	requestsPerMinute: number;
	/** 每分钟 token 数限制 */
	tokensPerMinute: number;
	/** 窗口大小（毫秒），默认 60 秒 */
	windowMs?: number;
	/** 时钟（测试注入） */
	now?: () => number;
	logger?: Logger;
}

interface WindowEntry {
	timestamp: number;
	weight: number;
}

/**
 * 带权重的滑动窗口
 */
class SlidingWindow {
	private entries: WindowEntry[] = [];

	constructor(
		readonly windowMs: number,
		private readonly now: () => number,
	) {}

	private prune(): number {
		const now = this.now();
		const cutoff = now - this.windowMs;
		this.entries = this.entries.filter(e => e.timestamp > cutoff);
		return now;
	}

	add(weight: number): void {
		const now = this.prune();
		this.entries.push({ timestamp: now, weight });
	}

	total(): number {
		this.prune();
		return this.entries.reduce((sum, e) => sum + e.weight, 0);
	}

	/** 距离最早条目滑出窗口的秒数 */
	secondsUntilRelease(): number {
		const now = this.prune();
		const earliest = this.entries[0]?.timestamp;
		if (earliest === undefined) return 0;
		return Math.max(0, Math.ceil((earliest + this.windowMs - now) / 1000));
	}
}

export class RateLimiter {
	private readonly requests: SlidingWindow;
	private readonly tokens: SlidingWindow;
	private readonly rpmLimit: number;
	private readonly tpmLimit: number;
	private readonly logger: Logger;

	constructor(config: RateLimiterConfig) {
		const windowMs = config.windowMs ?? 60_000;
		const now = config.now ?? Date.now;
		this.rpmLimit = config.requestsPerMinute;
		this.tpmLimit = config.tokensPerMinute;
		this.requests = new SlidingWindow(windowMs, now);
		this.tokens = new SlidingWindow(windowMs, now);
		this.logger = config.logger ?? new Logger({ level: LogLevel.ERROR });
	}

	/**
	 * @throws RateLimitError 如果本次请求会超过限制
	 */
	checkAndRecord(tokenCount: number): void {
		const currentRpm = this.requests.total();
		if (currentRpm >= this.rpmLimit) {
			throw new RateLimitError(
				`Rate limit exceeded: ${currentRpm}/${this.rpmLimit} requests per minute`,
				this.requests.secondsUntilRelease(),
			);
		}

		const currentTpm = this.tokens.total();
		if (currentTpm + tokenCount > this.tpmLimit) {
			throw new RateLimitError(
				`Rate limit exceeded: ${currentTpm + tokenCount}/${this.tpmLimit} tokens per minute`,
				this.tokens.secondsUntilRelease(),
			);
		}

		this.requests.add(1);
		this.tokens.add(tokenCount);
		this.logger.debug(`RateLimiter: ${currentRpm + 1}/${this.rpmLimit} RPM, ${currentTpm + tokenCount}/${this.tpmLimit} TPM`);
	}

	getStats(): { rpm: number; tpm: number } {
		return { rpm: this.requests.total(), tpm: this.tokens.total() };
	}
}

/**
 * 创建 Voyage API 限流器
 */
export function createVoyageRateLimiter(
	requestsPerMinute: number,
	tokensPerMinute: number,
	logger?: Logger,
): RateLimiter {
	return new RateLimiter({ requestsPerMinute, tokensPerMinute, logger });
}
