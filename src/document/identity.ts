/**
 * 确定性 chunk 标识
 *
 * 同一 (source_file, position, content) 在任何进程、任何平台上都得到同一个 ID，
 * 重复导入时更新而不是新增。
 */

import { createHash } from 'node:crypto';

/** 字符串 → 确定性 UUID（MD5 哈希） */
export function stringToUuid(str: string): string {
	const hex = createHash('md5').update(str, 'utf8').digest('hex');
	return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

/**
 * Identity of one chunk's content at one position of one source file
 */
export function chunkIdentity(sourceFile: string, position: number, content: string): string {
	return stringToUuid(`${sourceFile}:${position}:${content}`);
}

/**
 * Content-independent key of a chunk slot. Store records are addressed by this key so an
 * edited chunk collides with its previous version instead of sitting next to it.
 */
export function slotKey(sourceFile: string, position: number): string {
	return stringToUuid(`${sourceFile}:${position}`);
}
