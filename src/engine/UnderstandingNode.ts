import type { ContextManager } from '../nlp/ContextManager';
import type { EntityExtractor } from '../nlp/EntityExtractor';
import type { IntentAnalyzer } from '../nlp/IntentAnalyzer';
import type { QueryAnalysis } from '../nlp/nlp_types';
import { preprocess } from '../nlp/TextPreprocessor';
import { dbg } from '../utils';
import type { QueryNode } from './graph';

export interface UnderstandingServices {
    contextManager: Pick<ContextManager, 'analyzeContext'>;
    entityExtractor: Pick<EntityExtractor, 'extractEntities'>;
    intentAnalyzer: Pick<IntentAnalyzer, 'analyzeIntent'>;
}

/** Preprocesses the query, reads its context, extracts entities and scores intents. */
export function createUnderstandingNode(services: UnderstandingServices): QueryNode {
    return async (state) => {
        const { userInput, context } = state;
        const processedText = preprocess(userInput);
        const contextAnalysis = services.contextManager.analyzeContext(userInput, context);
        const entities = await services.entityExtractor.extractEntities(processedText, context);
        const intentAnalysis = await services.intentAnalyzer.analyzeIntent(processedText, entities, context);

        const analysis: QueryAnalysis = Object.freeze({
            originalQuery: userInput,
            processedText,
            entities: Object.freeze(entities),
            intents: Object.freeze(intentAnalysis.intents),
            primaryIntent: intentAnalysis.primaryIntent,
            confidence: intentAnalysis.confidence,
            queryType: contextAnalysis.queryType,
            contextReferences: Object.freeze(contextAnalysis.references),
            resolvedEntities: Object.freeze(contextAnalysis.resolvedEntities),
        });
        dbg(`--- Understanding Node: ${analysis.primaryIntent} (${analysis.confidence.toFixed(3)}), ${entities.length} entities ---`);
        return { analysis };
    };
}
