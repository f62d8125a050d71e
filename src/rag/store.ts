/**
 * Document store contract
 *
 * Records are addressed by a caller-supplied id (the chunk slot key); `insert` refuses an
 * occupied id with ObjectExistsError so the caller can decide between replace and skip.
 */

import { z } from 'zod';
import type { ChunkProperties } from '../document/types.js';

// ============================================================
// Metadata filter
// ============================================================

export const equalClauseSchema = z.object({
	field: z.string().min(1),
	operator: z.literal('Equal'),
	value: z.union([z.string(), z.number(), z.boolean()]),
});

export type EqualClause = z.infer<typeof equalClauseSchema>;

export interface AndFilter {
	operator: 'And';
	operands: MetadataFilter[];
}

export type MetadataFilter = EqualClause | AndFilter;

export const metadataFilterSchema: z.ZodType<MetadataFilter> = z.lazy(() =>
	z.union([
		equalClauseSchema,
		z.object({
			operator: z.literal('And'),
			operands: z.array(metadataFilterSchema).min(1),
		}),
	]),
);

export interface FilterFields {
	source?: string;
	language?: string;
}

/**
 * Equality clauses for the given fields; AND-combined when there are several
 */
export function buildMetadataFilter(fields: FilterFields): MetadataFilter | undefined {
	const clauses: EqualClause[] = [];
	if (fields.source) clauses.push({ field: 'source', operator: 'Equal', value: fields.source });
	if (fields.language) clauses.push({ field: 'language', operator: 'Equal', value: fields.language });

	if (clauses.length === 0) return undefined;
	if (clauses.length === 1) return clauses[0];
	return { operator: 'And', operands: clauses };
}

/** Flatten nested ANDs into their equality clauses */
export function filterClauses(filter: MetadataFilter): EqualClause[] {
	if (filter.operator === 'Equal') return [filter];
	return filter.operands.flatMap(filterClauses);
}

/**
 * Evaluate a filter against stored properties (for stores without server-side filtering)
 */
export function matchesFilter(filter: MetadataFilter, properties: ChunkProperties): boolean {
	const values: Record<string, unknown> = { ...properties };
	return filterClauses(filter).every(clause => values[clause.field] === clause.value);
}

// ============================================================
// Store
// ============================================================

export interface StoreRecord {
	id: string;
	properties: ChunkProperties;
}

export interface StoreHit {
	id: string;
	properties: ChunkProperties;
	/** Higher is better */
	score?: number;
	/** Lower is better (vector queries only) */
	distance?: number;
}

export interface HybridQuery {
	text: string;
	vector: number[];
	/** 0 = pure lexical, 1 = pure vector */
	alpha: number;
	limit: number;
	filter?: MetadataFilter;
}

export interface VectorQuery {
	vector: number[];
	limit: number;
	filter?: MetadataFilter;
}

export type HybridSupport =
	| { kind: 'supported' }
	| { kind: 'unsupported'; reason: string };

export interface DocumentStore {
	/**
	 * @throws ObjectExistsError 如果 id 已存在
	 */
	insert(id: string, properties: ChunkProperties, vector: number[]): Promise<void>;
	/** null when the record does not exist */
	get(id: string): Promise<StoreRecord | null>;
	replace(id: string, properties: ChunkProperties, vector: number[]): Promise<void>;
	hybridSupport(): Promise<HybridSupport>;
	hybrid(query: HybridQuery): Promise<StoreHit[]>;
	nearest(query: VectorQuery): Promise<StoreHit[]>;
}
