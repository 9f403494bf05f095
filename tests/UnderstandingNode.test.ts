import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it } from 'mocha';
import { createUnderstandingNode } from '../src/engine/UnderstandingNode';
import { createEmptyContext } from '../src/memory/context_types';
import { ContextManager } from '../src/nlp/ContextManager';
import { IntentAnalyzer } from '../src/nlp/IntentAnalyzer';
import type { Entity } from '../src/nlp/nlp_types';
import { preprocess } from '../src/nlp/TextPreprocessor';

const QUERY = 'Vad passar till Låshus 310-50?';

const ENTITIES: Entity[] = [
    { type: 'COMPATIBILITY', text: 'passar till', start: 4, end: 15, confidence: 0.85, source: 'regex' },
    { type: 'PRODUCT', text: 'Låshus 310-50', start: 16, end: 30, confidence: 0.9, source: 'product_index', productId: '50091812' },
];

describe('UnderstandingNode', () => {
    it('should combine preprocessing, context, entities and intents into one analysis', async () => {
        const extractEntities = sinon.stub().resolves(ENTITIES);
        const node = createUnderstandingNode({
            contextManager: new ContextManager(),
            entityExtractor: { extractEntities },
            intentAnalyzer: new IntentAnalyzer(),
        });
        const context = { ...createEmptyContext(), queryHistory: [QUERY] };

        const { analysis } = await node({ userInput: QUERY, context });

        sinon.assert.calledOnceWithExactly(extractEntities, preprocess(QUERY), context);
        expect(analysis).to.deep.include({
            originalQuery: QUERY,
            processedText: preprocess(QUERY),
            primaryIntent: 'compatibility',
            queryType: 'independent',
        });
        expect(analysis?.entities).to.deep.equal(ENTITIES);
        expect(analysis?.confidence).to.be.closeTo(0.27778, 1e-4);
        expect(Object.isFrozen(analysis)).to.be.true;
    });
});
