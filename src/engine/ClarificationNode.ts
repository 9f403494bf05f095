import { CLARIFICATION_THRESHOLD, INTENT_MENU_THRESHOLD } from '../config';
import type { DataManager } from '../corpus/DataManager';
import type { ResponseGenerator } from '../dialog/ResponseGenerator';
import type { QueryAnalysis } from '../nlp/nlp_types';
import { dbg } from '../utils';
import type { ClarificationOption, ClarificationQuestion, EngineResponse } from './engine_types';
import type { QueryNode } from './graph';
import { executeIntent, IntentServices } from './IntentExecutionNode';

const MAX_PRODUCT_OPTIONS = 4;

const INTENT_OPTIONS: readonly ClarificationOption[] = [
    { id: 'technical', name: 'Tekniska specifikationer' },
    { id: 'compatibility', name: 'Kompatibilitetsinformation' },
    { id: 'summary', name: 'Allmän produktinformation' },
    { id: 'search', name: 'Sök efter produkter' },
];

const PRODUCT_MENTION_TYPES = new Set(['PRODUCT', 'ARTICLE_NUMBER', 'EAN']);

export type ProductLookup = Pick<DataManager, 'getProductName' | 'suggestProducts'>;

/**
 * Picks the one question that addresses what is ambiguous: which of several
 * products, which product an unresolved mention meant, or, when the intent
 * is very unclear, what the user wants to know. Falls back to a general
 * request to rephrase.
 */
export function buildClarificationQuestions(analysis: QueryAnalysis, products: ProductLookup): ClarificationQuestion[] {
    const candidateIds = [...new Set(analysis.entities.flatMap(entity => (entity.productId ? [entity.productId] : [])))];
    const unresolved = analysis.entities.filter(entity => PRODUCT_MENTION_TYPES.has(entity.type) && !entity.productId);

    if (candidateIds.length > 1) {
        return [{
            type: 'product_selection',
            question: 'Vilken av dessa produkter menar du?',
            options: candidateIds.slice(0, MAX_PRODUCT_OPTIONS).map(id => ({ id, name: products.getProductName(id) })),
        }];
    }
    if (candidateIds.length === 0 && unresolved.length > 0) {
        const suggestions = products.suggestProducts(unresolved.map(entity => entity.text).join(' '));
        if (suggestions.length > 0) {
            return [{
                type: 'product_suggestion',
                question: 'Jag är inte säker på vilken produkt du menar. Är det någon av dessa?',
                options: suggestions.slice(0, MAX_PRODUCT_OPTIONS).map(match => ({ id: match.productId, name: match.name })),
            }];
        }
    }
    if (analysis.confidence < INTENT_MENU_THRESHOLD) {
        return [{
            type: 'intent_selection',
            question: 'Vad vill du veta om produkten?',
            options: [...INTENT_OPTIONS],
        }];
    }
    return [{
        type: 'general_clarification',
        question: 'Jag förstod inte riktigt din fråga. Kan du omformulera den eller vara mer specifik?',
        options: [],
    }];
}

export interface ClarificationServices extends IntentServices {
    products: ProductLookup;
    responseGenerator: Pick<ResponseGenerator, 'formatClarificationRequest' | 'formatLowConfidenceResponse'>;
}

/**
 * Handles queries below the answer threshold: very low confidence asks a
 * question, the band above it answers the best guess with a disclaimer.
 */
export function createClarificationNode(services: ClarificationServices): QueryNode {
    return async (state) => {
        const { analysis, context } = state;
        if (!analysis) {
            throw new Error('Clarification reached without an analysis');
        }
        const timestamp = new Date().toISOString();

        if (analysis.confidence < CLARIFICATION_THRESHOLD) {
            const clarificationQuestions = buildClarificationQuestions(analysis, services.products);
            dbg(`--- Clarification Node: asking ${clarificationQuestions.map(question => question.type).join(', ')} ---`);
            const response: EngineResponse = {
                status: 'needs_clarification',
                queryType: 'clarification_request',
                analysis,
                clarificationQuestions,
                formattedText: services.responseGenerator.formatClarificationRequest(analysis, clarificationQuestions),
                timestamp,
            };
            return { response };
        }

        dbg('--- Clarification Node: answering best guess ---');
        const { result, targetProductId, contextUpdate } = await executeIntent(services, analysis, context);
        const response: EngineResponse = {
            status: 'low_confidence',
            queryType: 'best_guess',
            analysis,
            targetProductId,
            result,
            confidence: analysis.confidence,
            alternativeIntents: analysis.intents.slice(0, 3),
            formattedText: services.responseGenerator.formatLowConfidenceResponse(analysis, result, context, targetProductId),
            timestamp,
        };
        return { response, contextUpdate };
    };
}
