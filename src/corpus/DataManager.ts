import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { BotConfig } from '../config';
import type { ProductDirectory } from '../nlp/EntityExtractor';
import { foldText, tokenize } from '../nlp/TextPreprocessor';
import { dbg, errorMessage, isNodeError } from '../utils';
import {
    ArticleIdentifierSchema,
    CompatibilityMapSchema,
    CompatibilityRelationSchema,
    CompatibilityResult,
    CorpusIndices,
    DataFailure,
    emptyIndices,
    FullInfoResult,
    IdentifierIndexSchema,
    INDEX_FILES,
    KeyCompatibility,
    KeySpecification,
    ProductNamesSchema,
    ProductSummary,
    ProductSummarySchema,
    RelatedProduct,
    SearchMatch,
    SearchSuccess,
    SpecsResult,
    SummaryResult,
    TechnicalSpecSchema,
    TextSearchIndexSchema,
} from './corpus_types';
import { formatRelationsByType, formatSearchResults, formatSpecsByCategory, formatSummary, groupBy, importanceRank } from './formatting';

export interface DataManagerDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    statFn?: (path: string) => Promise<{ isDirectory(): boolean }>;
}

export type DataManagerConfig = Pick<BotConfig, 'dataDir' | 'productsDir' | 'maxSearchResults'>;

type ReadOutcome<T> =
    | { kind: 'ok'; records: T[]; skipped: number }
    | { kind: 'missing' }
    | { kind: 'failed'; message: string };

const DESCRIPTION_CATEGORIES = new Set(['general', 'allmänt', 'beskrivning', 'description'].map(foldText));
const DESCRIPTION_NAMES = new Set(['beskrivning', 'description']);
const SUMMARY_SPEC_LIMIT = 5;
const SUMMARY_RELATION_LIMIT = 5;
const FUZZY_MIN_SCORE = 0.2;

// Product IDs become directory names; nothing that could leave productsDir.
const PRODUCT_ID_PATTERN = /^[\p{L}\p{N}_-][\p{L}\p{N}._-]*$/u;

export function isSafeProductId(productId: string): boolean {
    return PRODUCT_ID_PATTERN.test(productId) && !productId.includes('..');
}

function splitFilterTerms(params: string): string[] {
    return params.split(/\s+/).filter(term => term.length > 0).map(term => term.toLowerCase());
}

/**
 * Keeps a group whole when its key matches a term, otherwise only its
 * matching items. With no match anywhere the groups come back unfiltered.
 */
function filterGroups<T>(
    groups: Map<string, T[]>,
    terms: readonly string[],
    itemMatches: (item: T, term: string) => boolean,
): Map<string, T[]> {
    if (terms.length === 0) {
        return groups;
    }
    const filtered = new Map<string, T[]>();
    for (const [key, items] of groups) {
        if (terms.some(term => key.toLowerCase().includes(term))) {
            filtered.set(key, items);
            continue;
        }
        const matching = items.filter(item => terms.some(term => itemMatches(item, term)));
        if (matching.length > 0) {
            filtered.set(key, matching);
        }
    }
    return filtered.size > 0 ? filtered : groups;
}

/**
 * Read-only access to the product corpus: per-product JSONL/markdown files
 * and the global lookup indices. Indices are loaded once by `load()`.
 */
export class DataManager implements ProductDirectory {
    private indices: CorpusIndices = emptyIndices();
    private nameIndex = new Map<string, string>();

    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly statFn: (path: string) => Promise<{ isDirectory(): boolean }>;

    constructor(private readonly config: DataManagerConfig, deps?: DataManagerDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.statFn = deps?.statFn || fs.stat;
    }

    /** Missing or unreadable index files load as empty; this never rejects. */
    async load(): Promise<void> {
        const indicesDir = path.join(this.config.dataDir, 'indices');
        const read = <T>(fileName: string, schema: z.ZodType<Record<string, T>, z.ZodTypeDef, unknown>) =>
            this.loadIndex(path.join(indicesDir, fileName), schema);

        const [articleNumbers, eanNumbers, compatibilityMap, textSearch, productNames] = await Promise.all([
            read(INDEX_FILES.articleNumbers, IdentifierIndexSchema),
            read(INDEX_FILES.eanNumbers, IdentifierIndexSchema),
            read(INDEX_FILES.compatibilityMap, CompatibilityMapSchema),
            read(INDEX_FILES.textSearch, TextSearchIndexSchema),
            read(INDEX_FILES.productNames, ProductNamesSchema),
        ]);

        const foldedTextIndex = new Map<string, string[]>();
        for (const [word, productIds] of Object.entries(textSearch)) {
            const key = foldText(word);
            foldedTextIndex.set(key, [...new Set([...(foldedTextIndex.get(key) ?? []), ...productIds])]);
        }

        this.indices = {
            articleNumbers: new Map(Object.entries(articleNumbers).map(([key, entries]): [string, string[]] => [key, entries.map(entry => entry.product_id)])),
            eanNumbers: new Map(Object.entries(eanNumbers).map(([key, entries]): [string, string[]] => [key, entries.map(entry => entry.product_id)])),
            compatibilityMap: new Map(Object.entries(compatibilityMap)),
            textSearch: foldedTextIndex,
            productNames: new Map(Object.entries(productNames).map(([productId, entry]): [string, string] => [productId, entry.name])),
        };

        this.nameIndex = new Map();
        for (const [productId, name] of this.indices.productNames) {
            const folded = foldText(name).trim();
            if (folded) {
                this.nameIndex.set(folded, productId);
            }
        }
        dbg(`Loaded ${this.indices.productNames.size} product names and ${this.indices.textSearch.size} search words`);
    }

    private async loadIndex<T>(filePath: string, schema: z.ZodType<Record<string, T>, z.ZodTypeDef, unknown>): Promise<Record<string, T>> {
        let raw: unknown;
        try {
            raw = JSON.parse(await this.readFileFn(filePath, 'utf-8'));
        } catch (error) {
            console.warn(`Could not load index ${filePath}, continuing with an empty index: ${errorMessage(error)}`);
            return {};
        }
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            console.warn(`Index ${filePath} has an unexpected shape, continuing with an empty index`);
            return {};
        }
        return parsed.data;
    }

    private productPath(productId: string, fileName: string): string {
        return path.join(this.config.productsDir, productId, fileName);
    }

    /**
     * Reads a JSONL file, one record per non-blank line. Lines that are not
     * JSON or fail the schema are skipped and counted.
     */
    private async readRecords<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ReadOutcome<T>> {
        let content: string;
        try {
            content = await this.readFileFn(filePath, 'utf-8');
        } catch (error) {
            if (isNodeError(error) && error.code === 'ENOENT') {
                return { kind: 'missing' };
            }
            console.error(`Error reading ${filePath}:`, error);
            return { kind: 'failed', message: errorMessage(error) };
        }

        const records: T[] = [];
        let skipped = 0;
        for (const line of content.split(/\r?\n/)) {
            if (line.trim() === '') {
                continue;
            }
            let raw: unknown;
            try {
                raw = JSON.parse(line);
            } catch {
                skipped++;
                continue;
            }
            const parsed = schema.safeParse(raw);
            if (parsed.success) {
                records.push(parsed.data);
            } else {
                skipped++;
            }
        }
        if (skipped > 0) {
            console.warn(`Skipped ${skipped} malformed line(s) in ${filePath}`);
        }
        return { kind: 'ok', records, skipped };
    }

    async getTechnicalSpecs(productId: string, params = ''): Promise<SpecsResult> {
        if (!isSafeProductId(productId)) {
            return { status: 'not_found', message: 'Inga tekniska specifikationer tillgängliga' };
        }
        const outcome = await this.readRecords(this.productPath(productId, 'technical_specs.jsonl'), TechnicalSpecSchema);
        if (outcome.kind === 'missing') {
            return { status: 'not_found', message: 'Inga tekniska specifikationer tillgängliga' };
        }
        if (outcome.kind === 'failed') {
            return { status: 'error', message: `Kunde inte läsa tekniska specifikationer: ${outcome.message}` };
        }

        const grouped = filterGroups(
            groupBy(outcome.records, spec => spec.category),
            splitFilterTerms(params),
            (spec, term) => spec.name.toLowerCase().includes(term) || spec.raw_value.toLowerCase().includes(term),
        );
        return {
            status: 'success',
            kind: 'specs',
            productId,
            specs: outcome.records,
            specsByCategory: grouped,
            skippedLines: outcome.skipped,
            formattedText: formatSpecsByCategory(grouped),
        };
    }

    async getCompatibilityInfo(productId: string, params = ''): Promise<CompatibilityResult> {
        if (!isSafeProductId(productId)) {
            return { status: 'not_found', message: 'Ingen kompatibilitetsinformation tillgänglig' };
        }
        const outcome = await this.readRecords(this.productPath(productId, 'compatibility.jsonl'), CompatibilityRelationSchema);
        if (outcome.kind === 'missing') {
            return { status: 'not_found', message: 'Ingen kompatibilitetsinformation tillgänglig' };
        }
        if (outcome.kind === 'failed') {
            return { status: 'error', message: `Kunde inte läsa kompatibilitetsinformation: ${outcome.message}` };
        }

        const grouped = filterGroups(
            groupBy(outcome.records, relation => relation.relation_type),
            splitFilterTerms(params),
            (relation, term) => relation.related_product.toLowerCase().includes(term),
        );
        return {
            status: 'success',
            kind: 'compatibility',
            productId,
            relations: outcome.records,
            relationsByType: grouped,
            skippedLines: outcome.skipped,
            formattedText: formatRelationsByType(grouped),
        };
    }

    /** The cached summary when the product has one, otherwise one assembled from its other files. */
    async getProductSummary(productId: string): Promise<SummaryResult> {
        if (!isSafeProductId(productId)) {
            return { status: 'not_found', message: 'Ingen sammanfattning tillgänglig' };
        }
        const outcome = await this.readRecords(this.productPath(productId, 'summary.jsonl'), ProductSummarySchema);
        if (outcome.kind === 'failed') {
            return { status: 'error', message: `Kunde inte läsa produktsammanfattning: ${outcome.message}` };
        }
        if (outcome.kind === 'ok') {
            const [cached] = outcome.records;
            if (cached) {
                const summary: ProductSummary = { ...cached, product_name: cached.product_name || this.getProductName(productId) };
                return {
                    status: 'success',
                    kind: 'summary',
                    productId,
                    summary,
                    dynamicallyGenerated: false,
                    formattedText: formatSummary(summary, productId),
                };
            }
            console.warn(`Cached summary for ${productId} is unreadable, generating one instead`);
        }
        return this.generateDynamicSummary(productId);
    }

    private async generateDynamicSummary(productId: string): Promise<SummaryResult> {
        const [specsResult, compatibilityResult, identifiers] = await Promise.all([
            this.getTechnicalSpecs(productId),
            this.getCompatibilityInfo(productId),
            this.readIdentifiers(productId),
        ]);

        let description: string | undefined;
        let keySpecifications: KeySpecification[] = [];
        if (specsResult.status === 'success') {
            for (const spec of specsResult.specs) {
                if (DESCRIPTION_CATEGORIES.has(foldText(spec.category)) && DESCRIPTION_NAMES.has(spec.name.toLowerCase())) {
                    description = spec.raw_value;
                }
            }
            keySpecifications = [...specsResult.specs]
                .sort((a, b) => importanceRank(a.importance) - importanceRank(b.importance) || a.category.localeCompare(b.category))
                .slice(0, SUMMARY_SPEC_LIMIT)
                .map(spec => ({ name: spec.name, value: spec.raw_value, unit: spec.unit, category: spec.category }));
        }

        let keyCompatibility: KeyCompatibility[] = [];
        if (compatibilityResult.status === 'success') {
            keyCompatibility = [...compatibilityResult.relations]
                .sort((a, b) => Number(b.numeric_ids.length > 0) - Number(a.numeric_ids.length > 0) || b.confidence - a.confidence)
                .slice(0, SUMMARY_RELATION_LIMIT)
                .map(relation => ({
                    type: relation.relation_type,
                    related_product: relation.related_product,
                    has_product_id: relation.numeric_ids.length > 0,
                    numeric_ids: relation.numeric_ids,
                }));
        }

        const hasContent = description !== undefined || keySpecifications.length > 0
            || keyCompatibility.length > 0 || Object.keys(identifiers).length > 0;
        if (!hasContent) {
            const readFailure = [specsResult, compatibilityResult].find((result): result is DataFailure => result.status === 'error');
            return readFailure ?? { status: 'not_found', message: 'Ingen sammanfattning tillgänglig' };
        }

        const summary: ProductSummary = {
            product_id: productId,
            product_name: this.getProductName(productId),
            generated_at: new Date().toISOString(),
            description,
            key_specifications: keySpecifications,
            key_compatibility: keyCompatibility,
            identifiers,
        };
        return {
            status: 'success',
            kind: 'summary',
            productId,
            summary,
            dynamicallyGenerated: true,
            formattedText: formatSummary(summary, productId),
        };
    }

    private async readIdentifiers(productId: string): Promise<Record<string, string[]>> {
        const outcome = await this.readRecords(this.productPath(productId, 'article_info.jsonl'), ArticleIdentifierSchema);
        if (outcome.kind !== 'ok') {
            return {};
        }
        const byType: Record<string, string[]> = {};
        for (const identifier of outcome.records) {
            if (identifier.type && identifier.value) {
                (byType[identifier.type] ??= []).push(identifier.value);
            }
        }
        return byType;
    }

    async getFullInfo(productId: string): Promise<FullInfoResult> {
        if (!isSafeProductId(productId)) {
            return { status: 'not_found', message: 'Ingen fullständig information tillgänglig' };
        }
        const filePath = this.productPath(productId, 'full_info.md');
        try {
            const content = await this.readFileFn(filePath, 'utf-8');
            return { status: 'success', kind: 'full_info', productId, content, formattedText: content };
        } catch (error) {
            if (isNodeError(error) && error.code === 'ENOENT') {
                return { status: 'not_found', message: 'Ingen fullständig information tillgänglig' };
            }
            console.error(`Error reading ${filePath}:`, error);
            return { status: 'error', message: `Kunde inte läsa fullständig information: ${errorMessage(error)}` };
        }
    }

    getProductName(productId: string): string {
        return this.indices.productNames.get(productId) ?? `Produkt ${productId}`;
    }

    getNameIndex(): ReadonlyMap<string, string> {
        return this.nameIndex;
    }

    findByArticleNumber(articleNumber: string): string | undefined {
        return this.indices.articleNumbers.get(articleNumber)?.[0];
    }

    findByEan(ean: string): string | undefined {
        return this.indices.eanNumbers.get(ean)?.[0];
    }

    /** True when the product has a directory in the corpus. */
    async validateProductId(productId: string): Promise<boolean> {
        if (!isSafeProductId(productId)) {
            return false;
        }
        try {
            const stats = await this.statFn(path.join(this.config.productsDir, productId));
            return stats.isDirectory();
        } catch (error) {
            if (isNodeError(error) && error.code === 'ENOENT') {
                return false;
            }
            throw error;
        }
    }

    /**
     * Exact word hits from the text index score 1.0; remaining slots are
     * filled from fuzzy name matches.
     */
    searchProducts(query: string, maxResults: number = this.config.maxSearchResults): SearchSuccess {
        const queryWords = new Set(tokenize(query));
        const exactIds = new Set<string>();
        for (const word of queryWords) {
            for (const productId of this.indices.textSearch.get(word) ?? []) {
                exactIds.add(productId);
            }
        }

        const results: SearchMatch[] = [...exactIds].sort().map((productId): SearchMatch => ({
            productId,
            name: this.getProductName(productId),
            score: 1,
            matchType: 'exact',
        }));

        if (results.length < maxResults) {
            for (const match of this.findFuzzyMatches(queryWords, maxResults - results.length)) {
                if (!exactIds.has(match.productId)) {
                    results.push(match);
                }
            }
        }

        const matches = results.sort((a, b) => b.score - a.score).slice(0, maxResults);
        return {
            status: 'success',
            kind: 'search',
            query: query.toLowerCase(),
            matches,
            totalMatches: matches.length,
            formattedText: formatSearchResults(matches),
        };
    }

    /**
     * Token Jaccard against every product name, with a bonus for multi-word
     * overlap and a penalty for short, generic names.
     */
    private findFuzzyMatches(queryWords: ReadonlySet<string>, maxResults: number): SearchMatch[] {
        const scored: SearchMatch[] = [];
        for (const [name, productId] of this.nameIndex) {
            const nameWords = new Set(tokenize(name));
            let overlap = 0;
            for (const word of queryWords) {
                if (nameWords.has(word)) {
                    overlap++;
                }
            }
            if (overlap === 0) {
                continue;
            }
            let score = overlap / (queryWords.size + nameWords.size - overlap);
            if (overlap > 1) {
                score += 0.1 * overlap;
            }
            if (nameWords.size <= 2) {
                score *= 0.8;
            }
            if (score > FUZZY_MIN_SCORE) {
                scored.push({ productId, name: this.getProductName(productId), score, matchType: 'fuzzy' });
            }
        }
        return scored.sort((a, b) => b.score - a.score).slice(0, maxResults);
    }

    suggestProducts(query: string, maxSuggestions = 3): SearchMatch[] {
        return this.searchProducts(query, maxSuggestions).matches;
    }

    findRelatedProducts(productId: string, relationTypes?: readonly string[]): RelatedProduct[] {
        const relations = this.indices.compatibilityMap.get(productId) ?? [];
        return relations
            .filter(relation => !relationTypes || relationTypes.length === 0 || relationTypes.includes(relation.relation_type))
            .filter(relation => relation.related_product)
            .map(relation => ({
                productId: relation.numeric_ids[0] ?? this.nameIndex.get(foldText(relation.related_product)),
                name: relation.related_product,
                relationType: relation.relation_type,
                numericIds: relation.numeric_ids,
            }));
    }
}
