/**
 * 语言检测模块
 *
 * 使用 franc 检测文本语言，返回 ISO 639-1 代码，无法判断或不在映射表中时返回 'unknown'
 */

import { franc } from 'franc';

export const UNKNOWN_LANGUAGE = 'unknown';

/** franc 对短文本检测不准确的最小长度阈值 */
const MIN_DETECTION_LENGTH = 10;

/** franc 语言代码（ISO 639-3）→ ISO 639-1 */
const LANG_MAP: Record<string, string> = {
	eng: 'en',
	cmn: 'zh',
	zho: 'zh',
	jpn: 'ja',
	kor: 'ko',
	deu: 'de',
	fra: 'fr',
	spa: 'es',
	ita: 'it',
	por: 'pt',
	nld: 'nl',
	rus: 'ru',
	pol: 'pl',
	swe: 'sv',
	tur: 'tr',
	arb: 'ar',
	hin: 'hi',
	ukr: 'uk',
	ces: 'cs',
	slk: 'sk',
	slv: 'sl',
	hrv: 'hr',
	bul: 'bg',
	ron: 'ro',
	hun: 'hu',
	ell: 'el',
	dan: 'da',
	nob: 'no',
	fin: 'fi',
	est: 'et',
	ekk: 'et',
	lvs: 'lv',
	lit: 'lt',
	vie: 'vi',
	ind: 'id',
	heb: 'he',
	tha: 'th',
};

/**
 * 检测文本语言
 */
export function detectLanguage(text: string): string {
	const sample = text.trim();
	if (sample.length < MIN_DETECTION_LENGTH) {
		return UNKNOWN_LANGUAGE;
	}

	// 'und' 及未映射的语言均视为 unknown
	const code = franc(sample);
	return LANG_MAP[code] ?? UNKNOWN_LANGUAGE;
}
