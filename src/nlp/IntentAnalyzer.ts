import type { ConversationContext } from '../memory/context_types';
import { dbg, errorMessage } from '../utils';
import intentVocabulary from './data/intentVocabulary.json';
import { EmbeddingProvider, NullEmbeddingProvider } from './EmbeddingProvider';
import { emptyIntentScores, Entity, EntityType, INTENT_NAMES, IntentAnalysis, IntentName, IntentScores, RankedIntent } from './nlp_types';
import { cosineSimilarity, meanVector } from './similarity';
import { foldText } from './TextPreprocessor';

export interface IntentVocabulary {
    keywords: Record<IntentName, readonly string[]>;
    /** Example questions per intent, embedded once and averaged into a prototype vector. */
    prototypes: Record<IntentName, readonly string[]>;
}

export const DEFAULT_INTENT_VOCABULARY: IntentVocabulary = intentVocabulary;

export const INTENT_SIGNAL_WEIGHTS = Object.freeze({
    keyword: 0.35,
    semantic: 0.3,
    entity: 0.25,
    context: 0.1,
});

type PrototypeVectors = Map<IntentName, number[]>;

/**
 * Scores the four intents from keywords, embedding similarity, extracted
 * entities and conversation history, then combines them with fixed weights.
 * Deterministic for a given input when the embedding provider is.
 */
export class IntentAnalyzer {
    private readonly foldedKeywords: Record<IntentName, string[]>;
    private prototypeVectors?: Promise<PrototypeVectors>;

    constructor(
        private readonly embeddings: EmbeddingProvider = new NullEmbeddingProvider(),
        private readonly vocabulary: IntentVocabulary = DEFAULT_INTENT_VOCABULARY,
    ) {
        this.foldedKeywords = {
            technical: vocabulary.keywords.technical.map(foldText),
            compatibility: vocabulary.keywords.compatibility.map(foldText),
            summary: vocabulary.keywords.summary.map(foldText),
            search: vocabulary.keywords.search.map(foldText),
        };
    }

    async analyzeIntent(text: string, entities: readonly Entity[], context: Readonly<ConversationContext>): Promise<IntentAnalysis> {
        const keywordScores = this.keywordScores(text);
        const semanticScores = await this.semanticScores(text);
        const entityScores = scoreEntities(entities);
        const contextScores = scoreContext(context);

        const combined = combineIntentScores(keywordScores, semanticScores, entityScores, contextScores);
        const intents = rankIntents(combined);
        const { primaryIntent, confidence } = determinePrimaryIntent(intents);
        dbg(`Intent ${primaryIntent} with confidence ${confidence.toFixed(3)}`);

        return { intents, primaryIntent, confidence, keywordScores, semanticScores, entityScores, contextScores };
    }

    /** Fraction of each intent's keyword list found in the text; no hits at all leans to summary. */
    keywordScores(text: string): IntentScores {
        const folded = foldText(text);
        const scores = emptyIntentScores();
        for (const intent of INTENT_NAMES) {
            const keywords = this.foldedKeywords[intent];
            const hits = keywords.filter(keyword => folded.includes(keyword)).length;
            scores[intent] = keywords.length > 0 ? hits / keywords.length : 0;
        }
        if (INTENT_NAMES.every(intent => scores[intent] === 0)) {
            scores.summary = 0.1;
        }
        return scores;
    }

    /**
     * Cosine similarity to each intent's prototype, rescaled from [-1, 1] to
     * [0, 1]. All zeros when no embedding model is available or a call fails.
     */
    async semanticScores(text: string): Promise<IntentScores> {
        const scores = emptyIntentScores();
        if (!this.embeddings.available) {
            return scores;
        }
        try {
            const prototypes = await this.getPrototypeVectors();
            const [queryVector] = await this.embeddings.embed([text]);
            if (!queryVector) {
                return scores;
            }
            for (const intent of INTENT_NAMES) {
                const prototype = prototypes.get(intent);
                if (!prototype) {
                    continue;
                }
                const similarity = (cosineSimilarity(queryVector, prototype) + 1) / 2;
                scores[intent] = Math.max(0, Math.min(1, similarity));
            }
        } catch (error) {
            console.warn(`Semantic intent scoring failed, using zeros: ${errorMessage(error)}`);
            return emptyIntentScores();
        }
        return scores;
    }

    private getPrototypeVectors(): Promise<PrototypeVectors> {
        if (!this.prototypeVectors) {
            this.prototypeVectors = this.computePrototypeVectors().catch(error => {
                // Let the next request try again
                this.prototypeVectors = undefined;
                throw error;
            });
        }
        return this.prototypeVectors;
    }

    private async computePrototypeVectors(): Promise<PrototypeVectors> {
        const vectors: PrototypeVectors = new Map();
        for (const intent of INTENT_NAMES) {
            const examples = [...this.vocabulary.prototypes[intent]];
            if (examples.length === 0) {
                continue;
            }
            vectors.set(intent, meanVector(await this.embeddings.embed(examples)));
        }
        dbg(`Computed prototype vectors for ${vectors.size} intents`);
        return vectors;
    }
}

export function scoreEntities(entities: readonly Entity[]): IntentScores {
    const scores = emptyIntentScores();
    const counts = new Map<EntityType, number>();
    for (const entity of entities) {
        counts.set(entity.type, (counts.get(entity.type) ?? 0) + 1);
    }
    const dimensions = counts.get('DIMENSION') ?? 0;
    const products = counts.get('PRODUCT') ?? 0;
    const hasCompatibility = counts.has('COMPATIBILITY');

    if (dimensions > 0) {
        scores.technical += 0.6 * Math.min(dimensions, 3) / 3;
    }
    if (hasCompatibility) {
        scores.compatibility += 0.8;
    }
    if (products > 1) {
        scores.search += 0.5;
    } else if (products === 1) {
        scores.summary += 0.4;
        scores.technical += 0.3;
    }
    if (products > 1 && hasCompatibility) {
        scores.compatibility += 0.3;
    }
    if (entities.length === 0) {
        scores.summary += 0.2;
    }
    return scores;
}

export function scoreContext(context: Readonly<ConversationContext>): IntentScores {
    const scores = emptyIntentScores();
    if (context.queryHistory.length === 0) {
        scores.summary += 0.1;
        return scores;
    }
    switch (context.previousIntent) {
        case 'summary':
            scores.technical += 0.2;
            scores.compatibility += 0.2;
            break;
        case 'technical':
            scores.technical += 0.3;
            break;
        case 'compatibility':
            scores.compatibility += 0.3;
            break;
        case 'search':
            if (context.activeProductId) {
                scores.summary += 0.4;
            }
            break;
    }
    return scores;
}

export function combineIntentScores(
    keyword: IntentScores,
    semantic: IntentScores,
    entity: IntentScores,
    context: IntentScores,
): IntentScores {
    const combined = emptyIntentScores();
    for (const intent of INTENT_NAMES) {
        combined[intent] =
            keyword[intent] * INTENT_SIGNAL_WEIGHTS.keyword +
            semantic[intent] * INTENT_SIGNAL_WEIGHTS.semantic +
            entity[intent] * INTENT_SIGNAL_WEIGHTS.entity +
            context[intent] * INTENT_SIGNAL_WEIGHTS.context;
    }
    return combined;
}

/** Highest score first; equal scores keep the fixed intent order. */
export function rankIntents(scores: IntentScores): RankedIntent[] {
    return INTENT_NAMES
        .map(intent => ({ intent, score: scores[intent] }))
        .sort((a, b) => b.score - a.score);
}

/**
 * Confidence is the top score, discounted when the runner-up is within 0.1
 * and boosted when it trails by more than 0.3.
 */
export function determinePrimaryIntent(ranked: readonly RankedIntent[]): { primaryIntent: IntentName; confidence: number } {
    const [top, runnerUp] = ranked;
    if (!top) {
        return { primaryIntent: 'summary', confidence: 0.1 };
    }
    let confidence = top.score;
    if (runnerUp) {
        const margin = top.score - runnerUp.score;
        if (margin < 0.1) {
            confidence = top.score * 0.8;
        } else if (margin > 0.3) {
            confidence = Math.min(1, top.score * 1.1);
        }
    }
    return { primaryIntent: top.intent, confidence };
}
