import { ContextUpdate, ConversationContext, ConversationStage, MAX_QUERY_HISTORY } from '../memory/context_types';
import type { ContextAnalysis, ContextReference, IntentName, QueryType, ReferenceKind, ResolvedReference } from './nlp_types';
import { foldText, tokenize } from './TextPreprocessor';

const QUERY_TYPE_TERMS: ReadonlyArray<[Exclude<QueryType, 'independent'>, readonly string[]]> = [
    ['follow_up', ['mer', 'fortsätt', 'berätta mer', 'och', 'också']],
    ['reference', ['den', 'denna', 'det', 'dessa', 'dom', 'dom här', 'den där', 'detta']],
    ['comparison', ['jämfört med', 'kontra', 'vs', 'versus', 'jämför', 'skillnad', 'skillnaden mellan']],
];

const REFERENCE_TERMS: ReadonlyArray<[ReferenceKind, readonly string[]]> = [
    ['product', ['den', 'denna', 'den här', 'produkten', 'artikeln']],
    ['property', ['det', 'detta', 'den egenskapen', 'den funktionen']],
    ['multiple', ['dessa', 'de', 'dom', 'de här', 'dom här', 'produkterna']],
];

// Short queries with an active product read as follow-ups.
const FOLLOW_UP_MAX_TOKENS = 3;

interface TermMatcher {
    term: string;
    regex: RegExp;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matches the term as a whole word or phrase, never inside a longer word. */
function compileTerm(term: string): TermMatcher {
    const folded = foldText(term);
    return {
        term,
        regex: new RegExp(`(?<![\\p{L}\\p{M}\\p{N}])${escapeRegExp(folded)}(?![\\p{L}\\p{M}\\p{N}])`, 'u'),
    };
}

/**
 * Classifies how a query depends on the conversation, resolves anaphoric
 * references against the session context and is the only writer of that
 * context.
 */
export class ContextManager {
    private readonly queryTypeMatchers = QUERY_TYPE_TERMS.map(([type, terms]) => ({ type, matchers: terms.map(compileTerm) }));
    private readonly referenceMatchers = REFERENCE_TERMS.map(([kind, terms]) => ({ kind, matchers: terms.map(compileTerm) }));

    /**
     * Positions in the returned references refer to the query after Unicode
     * decomposition and lower-casing.
     */
    analyzeContext(query: string, context: Readonly<ConversationContext>): ContextAnalysis {
        const queryType = this.identifyQueryType(query, context);
        const references = queryType === 'independent' ? [] : this.identifyReferences(query);

        const analysis: ContextAnalysis = {
            queryType,
            references,
            resolvedEntities: resolveReferences(references, context),
            contextProducts: context.activeProductId ? [{ productId: context.activeProductId, relation: 'active' }] : [],
            dialogHistory: [...context.queryHistory],
        };
        if (context.previousIntent) {
            analysis.previousIntent = context.previousIntent;
        }
        return analysis;
    }

    identifyQueryType(query: string, context: Readonly<ConversationContext>): QueryType {
        const folded = foldText(query);
        for (const { type, matchers } of this.queryTypeMatchers) {
            if (matchers.some(matcher => matcher.regex.test(folded))) {
                return type;
            }
        }
        if (tokenize(query).length <= FOLLOW_UP_MAX_TOKENS && context.activeProductId) {
            return 'follow_up';
        }
        return 'independent';
    }

    identifyReferences(query: string): ContextReference[] {
        const folded = foldText(query);
        const references: ContextReference[] = [];
        for (const { kind, matchers } of this.referenceMatchers) {
            for (const matcher of matchers) {
                const match = matcher.regex.exec(folded);
                if (match) {
                    references.push({ kind, text: matcher.term, position: match.index });
                }
            }
        }
        return references;
    }

    /**
     * Applies what one request learned to the session context, in place.
     * Products are appended to the mention list once; the history keeps the
     * most recent MAX_QUERY_HISTORY queries.
     */
    updateContext(context: ConversationContext, update: ContextUpdate): ConversationContext {
        if (update.productId) {
            context.activeProductId = update.productId;
            if (!context.mentionedProducts.includes(update.productId)) {
                context.mentionedProducts.push(update.productId);
            }
        }
        if (update.property) {
            context.lastMentionedProperty = update.property;
        }
        if (update.intent) {
            context.previousIntent = update.intent;
        }
        if (update.query !== undefined) {
            context.queryHistory.push(update.query);
            if (context.queryHistory.length > MAX_QUERY_HISTORY) {
                context.queryHistory.splice(0, context.queryHistory.length - MAX_QUERY_HISTORY);
            }
        }
        return context;
    }

    conversationState(context: Readonly<ConversationContext>): ConversationState {
        return {
            activeProductId: context.activeProductId,
            dialogStage: dialogStage(context),
            mentionedProducts: [...context.mentionedProducts],
            previousIntent: context.previousIntent,
            turns: context.queryHistory.length,
        };
    }
}

export interface ConversationState {
    activeProductId?: string;
    dialogStage: ConversationStage;
    mentionedProducts: string[];
    previousIntent?: IntentName;
    turns: number;
}

function dialogStage(context: Readonly<ConversationContext>): ConversationStage {
    if (context.queryHistory.length === 0) {
        return 'initial';
    }
    if (context.activeProductId) {
        return context.previousIntent === 'technical' || context.previousIntent === 'compatibility'
            ? 'detailed_inquiry'
            : 'product_exploration';
    }
    return 'search';
}

/** References with nothing to point at in the context are left out. */
export function resolveReferences(
    references: readonly ContextReference[],
    context: Readonly<ConversationContext>,
): Record<string, ResolvedReference> {
    const resolved: Record<string, ResolvedReference> = {};
    for (const reference of references) {
        switch (reference.kind) {
            case 'product':
                if (context.activeProductId) {
                    resolved[reference.text] = { kind: 'product', productId: context.activeProductId };
                }
                break;
            case 'property':
                if (context.lastMentionedProperty) {
                    resolved[reference.text] = { kind: 'property', property: context.lastMentionedProperty };
                }
                break;
            case 'multiple':
                if (context.mentionedProducts.length > 0) {
                    resolved[reference.text] = { kind: 'multiple', productIds: [...context.mentionedProducts] };
                }
                break;
        }
    }
    return resolved;
}
