import { z } from 'zod';

// Values in the corpus files are written by an extraction job and are not
// always strings; numbers are accepted and kept as text.
const TextValue = z.union([z.string(), z.number()]).transform(value => String(value));
const NumericIds = z.array(TextValue).default([]);

export const TechnicalSpecSchema = z.object({
    category: z.string().min(1).default('Övrigt'),
    name: z.string(),
    raw_value: TextValue,
    unit: z.string().nullish(),
    importance: z.string().nullish(),
    normalized_value: z.unknown().optional(),
    confidence: z.number().optional(),
    product_id: z.string().optional(),
}).passthrough();

export type TechnicalSpec = z.output<typeof TechnicalSpecSchema>;

export const CompatibilityRelationSchema = z.object({
    relation_type: z.string().min(1).default('Övrigt'),
    related_product: z.string(),
    numeric_ids: NumericIds,
    context: z.string().nullish(),
    confidence: z.number().default(0),
    product_id: z.string().optional(),
}).passthrough();

export type CompatibilityRelation = z.output<typeof CompatibilityRelationSchema>;

export const ArticleIdentifierSchema = z.object({
    type: z.string(),
    value: TextValue,
}).passthrough();

export type ArticleIdentifier = z.output<typeof ArticleIdentifierSchema>;

export const KeySpecificationSchema = z.object({
    category: z.string().nullish(),
    name: z.string(),
    value: TextValue,
    unit: z.string().nullish(),
});

export type KeySpecification = z.output<typeof KeySpecificationSchema>;

export const KeyCompatibilitySchema = z.object({
    type: z.string().min(1).default('other'),
    related_product: z.string(),
    numeric_ids: NumericIds,
    has_product_id: z.boolean().optional(),
});

export type KeyCompatibility = z.output<typeof KeyCompatibilitySchema>;

export const ProductSummarySchema = z.object({
    product_id: z.string().optional(),
    product_name: z.string().nullish(),
    generated_at: z.string().optional(),
    description: z.string().nullish(),
    key_specifications: z.array(KeySpecificationSchema).default([]),
    key_compatibility: z.array(KeyCompatibilitySchema).default([]),
    identifiers: z.record(z.array(TextValue)).default({}),
}).passthrough();

export type ProductSummary = z.output<typeof ProductSummarySchema>;

// --- Index files under <dataDir>/indices ---

export const IdentifierIndexSchema = z.record(z.array(z.object({
    product_id: z.string(),
    id_type: z.string().optional(),
}).passthrough()));

export const CompatibilityMapSchema = z.record(z.array(z.object({
    related_product: z.string(),
    relation_type: z.string(),
    numeric_ids: NumericIds,
}).passthrough()));

export type CompatibilityMapEntry = z.output<typeof CompatibilityMapSchema>[string][number];

export const TextSearchIndexSchema = z.record(z.array(z.string()));

export const ProductNamesSchema = z.record(z.object({
    name: z.string(),
}).passthrough());

export const INDEX_FILES = Object.freeze({
    articleNumbers: 'article_numbers.json',
    eanNumbers: 'ean_numbers.json',
    compatibilityMap: 'compatibility_map.json',
    textSearch: 'text_search_index.json',
    productNames: 'product_names.json',
});

export interface CorpusIndices {
    articleNumbers: ReadonlyMap<string, readonly string[]>;
    eanNumbers: ReadonlyMap<string, readonly string[]>;
    compatibilityMap: ReadonlyMap<string, readonly CompatibilityMapEntry[]>;
    /** Folded word to product IDs. */
    textSearch: ReadonlyMap<string, readonly string[]>;
    productNames: ReadonlyMap<string, string>;
}

export function emptyIndices(): CorpusIndices {
    return {
        articleNumbers: new Map(),
        eanNumbers: new Map(),
        compatibilityMap: new Map(),
        textSearch: new Map(),
        productNames: new Map(),
    };
}

// --- Operation results ---

export interface DataFailure {
    /** not_found: the product has no such data. error: the data exists but could not be read. */
    status: 'not_found' | 'error';
    message: string;
}

export interface SpecsSuccess {
    status: 'success';
    kind: 'specs';
    productId: string;
    specs: TechnicalSpec[];
    specsByCategory: ReadonlyMap<string, TechnicalSpec[]>;
    skippedLines: number;
    formattedText: string;
}

export interface CompatibilitySuccess {
    status: 'success';
    kind: 'compatibility';
    productId: string;
    relations: CompatibilityRelation[];
    relationsByType: ReadonlyMap<string, CompatibilityRelation[]>;
    skippedLines: number;
    formattedText: string;
}

export interface SummarySuccess {
    status: 'success';
    kind: 'summary';
    productId: string;
    summary: ProductSummary;
    dynamicallyGenerated: boolean;
    formattedText: string;
}

export interface FullInfoSuccess {
    status: 'success';
    kind: 'full_info';
    productId: string;
    content: string;
    formattedText: string;
}

export type MatchType = 'exact' | 'fuzzy';

export interface SearchMatch {
    productId: string;
    name: string;
    score: number;
    matchType: MatchType;
}

export interface SearchSuccess {
    status: 'success';
    kind: 'search';
    query: string;
    matches: SearchMatch[];
    totalMatches: number;
    formattedText: string;
}

export interface RelatedProduct {
    productId?: string;
    name: string;
    relationType: string;
    numericIds: string[];
}

export type SpecsResult = SpecsSuccess | DataFailure;
export type CompatibilityResult = CompatibilitySuccess | DataFailure;
export type SummaryResult = SummarySuccess | DataFailure;
export type FullInfoResult = FullInfoSuccess | DataFailure;

export type CorpusSuccess = SpecsSuccess | CompatibilitySuccess | SummarySuccess | FullInfoSuccess | SearchSuccess;
export type CorpusResult = CorpusSuccess | DataFailure;
