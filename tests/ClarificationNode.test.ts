import { expect } from 'chai';
import sinon from 'sinon';
import { afterEach, beforeEach, describe, it } from 'mocha';
import { buildClarificationQuestions, ClarificationServices, createClarificationNode, ProductLookup } from '../src/engine/ClarificationNode';
import { createEmptyContext } from '../src/memory/context_types';
import type { Entity, QueryAnalysis } from '../src/nlp/nlp_types';

function analysis(confidence: number, entities: Entity[] = []): QueryAnalysis {
    return {
        originalQuery: 'fråga',
        processedText: 'fråga',
        entities,
        intents: [
            { intent: 'compatibility', score: 0.5 },
            { intent: 'summary', score: 0.3 },
            { intent: 'technical', score: 0.1 },
            { intent: 'search', score: 0 },
        ],
        primaryIntent: 'compatibility',
        confidence,
        queryType: 'independent',
        contextReferences: [],
        resolvedEntities: {},
    };
}

function product(productId: string, start: number): Entity {
    return { type: 'PRODUCT', text: productId, start, end: start + 8, confidence: 0.9, source: 'product_index', productId };
}

const UNKNOWN_ARTICLE: Entity = { type: 'ARTICLE_NUMBER', text: '12345678', start: 0, end: 8, confidence: 0.9, source: 'regex' };

describe('ClarificationNode', () => {
    let products: ProductLookup & { suggestProducts: sinon.SinonStub };

    beforeEach(() => {
        products = {
            getProductName: (productId: string) => (productId === '50091812' ? 'Låshus 310-50' : 'Slutbleck 1487'),
            suggestProducts: sinon.stub().returns([]),
        };
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('buildClarificationQuestions', () => {
        it('should ask which of several products is meant', () => {
            const questions = buildClarificationQuestions(
                analysis(0.35, [product('50091812', 0), product('50091900', 10), product('50091812', 20)]),
                products,
            );

            expect(questions).to.deep.equal([{
                type: 'product_selection',
                question: 'Vilken av dessa produkter menar du?',
                options: [{ id: '50091812', name: 'Låshus 310-50' }, { id: '50091900', name: 'Slutbleck 1487' }],
            }]);
        });

        it('should suggest products for an unresolved mention instead of the intent menu', () => {
            products.suggestProducts.returns([{ productId: '50091900', name: 'Slutbleck 1487', score: 0.5, matchType: 'fuzzy' }]);

            const questions = buildClarificationQuestions(analysis(0.2, [UNKNOWN_ARTICLE]), products);

            sinon.assert.calledOnceWithExactly(products.suggestProducts, '12345678');
            expect(questions).to.deep.equal([{
                type: 'product_suggestion',
                question: 'Jag är inte säker på vilken produkt du menar. Är det någon av dessa?',
                options: [{ id: '50091900', name: 'Slutbleck 1487' }],
            }]);
        });

        it('should ask only about the product when the intent is unclear too', () => {
            const questions = buildClarificationQuestions(analysis(0.1, [product('50091812', 0), product('50091900', 10)]), products);
            expect(questions.map(question => question.type)).to.deep.equal(['product_selection']);
        });

        it('should offer the intent menu when nothing else is ambiguous', () => {
            const questions = buildClarificationQuestions(analysis(0.2, [UNKNOWN_ARTICLE]), products);
            expect(questions).to.have.lengthOf(1);
            expect(questions[0].type).to.equal('intent_selection');
            expect(questions[0].options.map(option => option.id)).to.deep.equal(['technical', 'compatibility', 'summary', 'search']);
        });

        it('should skip the suggestion when nothing resembles the mention', () => {
            const questions = buildClarificationQuestions(analysis(0.35, [UNKNOWN_ARTICLE]), products);

            expect(questions).to.deep.equal([{
                type: 'general_clarification',
                question: 'Jag förstod inte riktigt din fråga. Kan du omformulera den eller vara mer specifik?',
                options: [],
            }]);
        });

        it('should not ask about a single product', () => {
            const questions = buildClarificationQuestions(analysis(0.1, [product('50091812', 0)]), products);
            expect(questions.map(question => question.type)).to.deep.equal(['intent_selection']);
        });
    });

    describe('createClarificationNode', () => {
        let getCompatibilityInfo: sinon.SinonStub;
        let formatClarificationRequest: sinon.SinonStub;
        let formatLowConfidenceResponse: sinon.SinonStub;
        let services: ClarificationServices;

        beforeEach(() => {
            getCompatibilityInfo = sinon.stub().resolves({ status: 'not_found', message: 'Ingen kompatibilitetsinformation tillgänglig' });
            formatClarificationRequest = sinon.stub().returns('fråga tillbaka');
            formatLowConfidenceResponse = sinon.stub().returns('gissning');
            services = {
                dataManager: {
                    getTechnicalSpecs: sinon.stub(),
                    getCompatibilityInfo,
                    getProductSummary: sinon.stub(),
                    searchProducts: sinon.stub(),
                },
                products,
                responseGenerator: { formatClarificationRequest, formatLowConfidenceResponse },
            };
        });

        it('should ask for clarification below the clarification threshold', async () => {
            const node = createClarificationNode(services);
            const queryAnalysis = analysis(0.2);

            const update = await node({ userInput: 'fråga', context: createEmptyContext(), analysis: queryAnalysis });

            expect(update.contextUpdate).to.be.undefined;
            expect(update.response).to.deep.include({
                status: 'needs_clarification',
                queryType: 'clarification_request',
                formattedText: 'fråga tillbaka',
            });
            sinon.assert.calledOnce(formatClarificationRequest);
            sinon.assert.notCalled(getCompatibilityInfo);
        });

        it('should answer the best guess between the thresholds', async () => {
            const node = createClarificationNode(services);
            const queryAnalysis = analysis(0.5, [product('50091812', 0)]);

            const update = await node({ userInput: 'fråga', context: createEmptyContext(), analysis: queryAnalysis });

            sinon.assert.calledOnceWithExactly(getCompatibilityInfo, '50091812');
            expect(update.response).to.deep.include({
                status: 'low_confidence',
                queryType: 'best_guess',
                targetProductId: '50091812',
                confidence: 0.5,
                formattedText: 'gissning',
            });
            if (update.response?.status !== 'low_confidence') return;
            expect(update.response.alternativeIntents.map(intent => intent.intent)).to.deep.equal(['compatibility', 'summary', 'technical']);
            expect(update.contextUpdate).to.deep.equal({ productId: '50091812', intent: 'compatibility', property: undefined });
        });

        it('should need an analysis', async () => {
            const node = createClarificationNode(services);

            try {
                await node({ userInput: 'fråga', context: createEmptyContext() });
                expect.fail('Should have thrown an error');
            } catch (error) {
                expect(error).to.have.property('message', 'Clarification reached without an analysis');
            }
        });
    });
});
