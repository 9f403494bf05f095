import type { DataManager } from '../corpus/DataManager';
import type { ResponseGenerator } from '../dialog/ResponseGenerator';
import type { ContextUpdate, ConversationContext } from '../memory/context_types';
import type { QueryAnalysis } from '../nlp/nlp_types';
import { dbg } from '../utils';
import type { EngineResponse, IntentResult } from './engine_types';
import type { QueryNode } from './graph';

export interface IntentServices {
    dataManager: Pick<DataManager, 'getTechnicalSpecs' | 'getCompatibilityInfo' | 'getProductSummary' | 'searchProducts'>;
}

export interface IntentExecution {
    result: IntentResult;
    targetProductId?: string;
    contextUpdate: ContextUpdate;
}

/** The first entity that resolved to a product, else the active product. */
export function resolveTargetProduct(analysis: QueryAnalysis, context: Readonly<ConversationContext>): string | undefined {
    return analysis.entities.find(entity => entity.productId)?.productId ?? context.activeProductId;
}

async function runIntent(
    dataManager: IntentServices['dataManager'],
    analysis: QueryAnalysis,
    productId: string,
): Promise<IntentResult> {
    switch (analysis.primaryIntent) {
        case 'technical':
            return dataManager.getTechnicalSpecs(productId);
        case 'compatibility':
            return dataManager.getCompatibilityInfo(productId);
        case 'summary':
            return dataManager.getProductSummary(productId);
        case 'search': {
            const terms = analysis.entities
                .filter(entity => entity.type !== 'PRODUCT')
                .map(entity => entity.text)
                .join(' ');
            return dataManager.searchProducts(terms || analysis.processedText);
        }
    }
}

/**
 * Runs the corpus operation that answers the primary intent. Without a
 * target product every intent falls back to a search over the query.
 */
export async function executeIntent(
    services: IntentServices,
    analysis: QueryAnalysis,
    context: Readonly<ConversationContext>,
): Promise<IntentExecution> {
    const { dataManager } = services;
    const targetProductId = resolveTargetProduct(analysis, context);
    const property = analysis.entities.find(entity => entity.type === 'DIMENSION')?.text;
    const contextUpdate: ContextUpdate = { productId: targetProductId, intent: analysis.primaryIntent, property };

    if (!targetProductId) {
        return { result: dataManager.searchProducts(analysis.processedText), contextUpdate };
    }

    const result = await runIntent(dataManager, analysis, targetProductId);
    dbg(`Executed ${analysis.primaryIntent} for ${targetProductId}: ${result.status}`);
    return { result, targetProductId, contextUpdate };
}

export interface ExecutionNodeServices extends IntentServices {
    responseGenerator: Pick<ResponseGenerator, 'generateNlResponse'>;
}

export function createIntentExecutionNode(services: ExecutionNodeServices): QueryNode {
    return async (state) => {
        const { analysis, context } = state;
        if (!analysis) {
            throw new Error('Intent execution reached without an analysis');
        }
        const { result, targetProductId, contextUpdate } = await executeIntent(services, analysis, context);
        const formattedText = services.responseGenerator.generateNlResponse(analysis, result, context, targetProductId);
        const timestamp = new Date().toISOString();

        let response: EngineResponse;
        if (result.status !== 'success') {
            response = { status: 'error', queryType: 'natural_language', message: result.message, analysis, formattedText, timestamp };
        } else {
            const noResults = result.kind === 'search' && result.matches.length === 0;
            response = {
                status: noResults ? 'no_results' : 'success',
                queryType: 'natural_language',
                analysis,
                targetProductId,
                result,
                formattedText,
                timestamp,
            };
        }
        return { response, contextUpdate };
    };
}
