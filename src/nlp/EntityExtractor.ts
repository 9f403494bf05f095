import type { ConversationContext } from '../memory/context_types';
import { dbg } from '../utils';
import { ENTITY_PATTERNS, EntityPattern, isValidEan, matchPatterns } from './entityPatterns';
import { EntityRecognizer, NullEntityRecognizer, RecognizedSpan } from './EntityRecognizer';
import type { Entity, EntityType } from './nlp_types';
import { tokenJaccard } from './similarity';
import { foldText, foldWithOffsets, sourceRange, tokenize } from './TextPreprocessor';

/**
 * Read-only view of the product catalogue that entity resolution needs.
 * Implemented by the DataManager.
 */
export interface ProductDirectory {
    /** Folded (NFKD, lower case) product name to product ID. */
    getNameIndex(): ReadonlyMap<string, string>;
    findByArticleNumber(articleNumber: string): string | undefined;
    findByEan(ean: string): string | undefined;
    getProductName(productId: string): string;
}

// Recognizer labels outside this table are dropped.
const RECOGNIZER_LABELS: ReadonlyMap<string, EntityType> = new Map<string, EntityType>([
    ['EAN', 'EAN'],
    ['PRODUCT', 'PRODUCT'],
    ['WORK_OF_ART', 'PRODUCT'],
    ['ORG', 'PRODUCT'],
    ['DIMENSION', 'DIMENSION'],
    ['QUANTITY', 'DIMENSION'],
    ['COMPATIBILITY', 'COMPATIBILITY'],
]);

const ANAPHORS = new Set(['den', 'denna', 'det', 'produkten', 'artikeln']);

const RECOGNIZER_CONFIDENCE = 0.8;
const DICTIONARY_CONFIDENCE = 0.9;
const CONTEXT_CONFIDENCE = 0.8;
const FUZZY_NAME_THRESHOLD = 0.8;

export class EntityExtractor {
    constructor(
        private readonly products: ProductDirectory,
        private readonly recognizer: EntityRecognizer = new NullEntityRecognizer(),
        private readonly patterns: readonly EntityPattern[] = ENTITY_PATTERNS,
    ) {}

    /**
     * Runs the recognizer, pattern, dictionary and context passes over the
     * processed text, merges overlapping spans and resolves product IDs.
     */
    async extractEntities(text: string, context: Readonly<ConversationContext>): Promise<Entity[]> {
        const spans = await this.recognizer.recognize(text);
        const candidates = [
            ...mapRecognizedSpans(spans),
            ...matchPatterns(text, this.patterns),
            ...this.extractProductNames(text),
            ...this.extractContextReference(text, context),
        ];
        const merged = mergeOverlappingEntities(candidates);
        dbg(`Extracted ${merged.length} entities from ${candidates.length} candidates`);
        return merged.map(entity => this.enrich(entity));
    }

    extractProductNames(text: string): Entity[] {
        const folded = foldWithOffsets(text);
        const entities: Entity[] = [];
        for (const [name, productId] of this.products.getNameIndex()) {
            if (!name) {
                continue;
            }
            let index = folded.text.indexOf(name);
            while (index !== -1) {
                const { start, end } = sourceRange(folded, index, index + name.length);
                entities.push({
                    type: 'PRODUCT',
                    text: text.slice(start, end),
                    start,
                    end,
                    confidence: DICTIONARY_CONFIDENCE,
                    source: 'product_index',
                    productId,
                });
                index = folded.text.indexOf(name, index + 1);
            }
        }
        return entities;
    }

    extractContextReference(text: string, context: Readonly<ConversationContext>): Entity[] {
        const productId = context.activeProductId;
        if (!productId || !tokenize(text).some(token => ANAPHORS.has(token))) {
            return [];
        }
        return [{
            type: 'PRODUCT',
            text: this.products.getProductName(productId),
            start: -1,
            end: -1,
            confidence: CONTEXT_CONFIDENCE,
            source: 'context',
            productId,
            isContextualReference: true,
        }];
    }

    private enrich(entity: Entity): Entity {
        switch (entity.type) {
            case 'PRODUCT': {
                if (entity.productId) {
                    return entity;
                }
                const productId = this.findProductIdByName(entity.text);
                return productId ? { ...entity, productId } : entity;
            }
            case 'ARTICLE_NUMBER': {
                const productId = this.products.findByArticleNumber(entity.text);
                return productId ? { ...entity, type: 'PRODUCT', productId } : entity;
            }
            case 'EAN': {
                const productId = isValidEan(entity.text) ? this.products.findByEan(entity.text) : undefined;
                return productId ? { ...entity, type: 'PRODUCT', productId } : entity;
            }
            default:
                return entity;
        }
    }

    /** Exact folded-name lookup, then the best token overlap above the fuzzy threshold. */
    findProductIdByName(name: string): string | undefined {
        const names = this.products.getNameIndex();
        const folded = foldText(name);
        const exact = names.get(folded);
        if (exact) {
            return exact;
        }
        let bestMatch: string | undefined;
        let bestScore = 0;
        for (const [productName, productId] of names) {
            const similarity = tokenJaccard(folded, productName);
            if (similarity > bestScore && similarity > FUZZY_NAME_THRESHOLD) {
                bestScore = similarity;
                bestMatch = productId;
            }
        }
        return bestMatch;
    }
}

export function mapRecognizedSpans(spans: readonly RecognizedSpan[]): Entity[] {
    const entities: Entity[] = [];
    for (const span of spans) {
        const type = RECOGNIZER_LABELS.get(span.label);
        if (!type) {
            continue;
        }
        entities.push({
            type,
            text: span.text,
            start: span.start,
            end: span.end,
            confidence: RECOGNIZER_CONFIDENCE,
            source: 'spacy',
        });
    }
    return entities;
}

/**
 * Collapses overlapping spans. Entities are ordered by start, longer first;
 * of two overlapping entities the one with strictly higher confidence wins,
 * otherwise the earlier one stays. Positionless entities never overlap.
 */
export function mergeOverlappingEntities(entities: readonly Entity[]): Entity[] {
    if (entities.length === 0) {
        return [];
    }
    const sorted = [...entities].sort((a, b) => a.start - b.start || b.text.length - a.text.length);
    const merged: Entity[] = [];
    let current = sorted[0];

    for (const next of sorted.slice(1)) {
        const overlaps = current.end >= next.start && next.start >= 0 && current.end >= 0;
        if (overlaps) {
            if (next.confidence > current.confidence) {
                current = next;
            }
        } else {
            merged.push(current);
            current = next;
        }
    }
    merged.push(current);
    return merged;
}
