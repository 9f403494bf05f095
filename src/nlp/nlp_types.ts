export const ENTITY_TYPES = ['PRODUCT', 'ARTICLE_NUMBER', 'EAN', 'DIMENSION', 'COMPATIBILITY'] as const;
export type EntityType = typeof ENTITY_TYPES[number];

/** Which extraction pass produced an entity. `spacy` marks the model-backed recognizer. */
export type EntitySource = 'regex' | 'spacy' | 'product_index' | 'context';

export interface Entity {
    type: EntityType;
    text: string;
    /** Offsets into the processed text; -1 for entities inferred from the conversation. */
    start: number;
    end: number;
    confidence: number;
    source: EntitySource;
    productId?: string;
    isContextualReference?: boolean;
}

// Order matters: ties in scoring resolve to the earlier intent.
export const INTENT_NAMES = ['technical', 'compatibility', 'summary', 'search'] as const;
export type IntentName = typeof INTENT_NAMES[number];

export type IntentScores = Record<IntentName, number>;

export function emptyIntentScores(): IntentScores {
    return { technical: 0, compatibility: 0, summary: 0, search: 0 };
}

export function isIntentName(value: string): value is IntentName {
    return INTENT_NAMES.some(name => name === value);
}

export interface RankedIntent {
    intent: IntentName;
    score: number;
}

export interface IntentAnalysis {
    /** Sorted by score, highest first. */
    intents: RankedIntent[];
    primaryIntent: IntentName;
    confidence: number;
    keywordScores: IntentScores;
    semanticScores: IntentScores;
    entityScores: IntentScores;
    contextScores: IntentScores;
}

export type QueryType = 'independent' | 'follow_up' | 'reference' | 'comparison';

export type ReferenceKind = 'product' | 'property' | 'multiple';

export interface ContextReference {
    kind: ReferenceKind;
    text: string;
    position: number;
}

export type ResolvedReference =
    | { kind: 'product'; productId: string }
    | { kind: 'property'; property: string }
    | { kind: 'multiple'; productIds: string[] };

export interface ContextAnalysis {
    queryType: QueryType;
    references: ContextReference[];
    /** Keyed by the reference text as it appeared in the query. */
    resolvedEntities: Record<string, ResolvedReference>;
    contextProducts: Array<{ productId: string; relation: 'active' }>;
    dialogHistory: string[];
    previousIntent?: IntentName;
}

/** Everything the engine learned about one request. Frozen once built. */
export interface QueryAnalysis {
    readonly originalQuery: string;
    readonly processedText: string;
    readonly entities: readonly Entity[];
    readonly intents: readonly RankedIntent[];
    readonly primaryIntent: IntentName;
    readonly confidence: number;
    readonly queryType: QueryType;
    readonly contextReferences: readonly ContextReference[];
    readonly resolvedEntities: Readonly<Record<string, ResolvedReference>>;
}
