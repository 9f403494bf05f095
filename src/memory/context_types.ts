import type { IntentName } from '../nlp/nlp_types';

export const MAX_QUERY_HISTORY = 10;

export type ExpertiseLevel = 'beginner' | 'intermediate' | 'expert';

/**
 * Session-scoped conversation state. The caller owns it and passes it into
 * every request; only `ContextManager.updateContext` writes to it.
 */
export interface ConversationContext {
    activeProductId?: string;
    mentionedProducts: string[];
    previousIntent?: IntentName;
    /** Most recent last, never longer than MAX_QUERY_HISTORY. */
    queryHistory: string[];
    lastMentionedProperty?: string;
    expertiseLevel?: ExpertiseLevel;
}

export function createEmptyContext(): ConversationContext {
    return { mentionedProducts: [], queryHistory: [] };
}

export interface ContextUpdate {
    productId?: string;
    intent?: IntentName;
    property?: string;
    query?: string;
}

export type ConversationStage = 'initial' | 'detailed_inquiry' | 'product_exploration' | 'search';
