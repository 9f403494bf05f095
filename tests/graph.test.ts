import { expect } from 'chai';
import sinon from 'sinon';
import { afterEach, beforeEach, describe, it } from 'mocha';
import type { EngineResponse } from '../src/engine/engine_types';
import { createQueryWorkflow, QueryState, QueryWorkflow } from '../src/engine/graph';
import { createEmptyContext } from '../src/memory/context_types';
import type { QueryAnalysis } from '../src/nlp/nlp_types';

type NodeStub = sinon.SinonStub<[QueryState], Promise<Partial<QueryState>>>;

function analysisWithConfidence(confidence: number): QueryAnalysis {
    return {
        originalQuery: 'fråga',
        processedText: 'fråga',
        entities: [],
        intents: [{ intent: 'summary', score: confidence }],
        primaryIntent: 'summary',
        confidence,
        queryType: 'independent',
        contextReferences: [],
        resolvedEntities: {},
    };
}

function errorResponse(message: string): EngineResponse {
    return {
        status: 'error',
        queryType: 'natural_language',
        message,
        formattedText: message,
        timestamp: '2024-01-01T00:00:00.000Z',
    };
}

describe('Query workflow', () => {
    let commandMock: NodeStub;
    let understandMock: NodeStub;
    let clarifyMock: NodeStub;
    let executeMock: NodeStub;
    let app: QueryWorkflow;

    beforeEach(() => {
        commandMock = sinon.stub<[QueryState], Promise<Partial<QueryState>>>().resolves({
            response: errorResponse('from command'),
            contextUpdate: { productId: '50091812' },
        });
        understandMock = sinon.stub<[QueryState], Promise<Partial<QueryState>>>().resolves({ analysis: analysisWithConfidence(0.9) });
        clarifyMock = sinon.stub<[QueryState], Promise<Partial<QueryState>>>().resolves({ response: errorResponse('from clarify') });
        executeMock = sinon.stub<[QueryState], Promise<Partial<QueryState>>>().resolves({ response: errorResponse('from execute') });

        app = createQueryWorkflow({
            command: commandMock,
            understand: understandMock,
            clarify: clarifyMock,
            execute: executeMock,
        }, 0.6);
    });

    afterEach(() => {
        sinon.restore();
    });

    it('should send commands to the command node only', async () => {
        const finalState = await app.invoke({ userInput: '-t 50091812', context: createEmptyContext() });

        sinon.assert.calledOnce(commandMock);
        sinon.assert.notCalled(understandMock);
        expect(finalState.response?.formattedText).to.equal('from command');
        expect(finalState.contextUpdate).to.deep.equal({ productId: '50091812' });
    });

    it('should answer a confident question', async () => {
        const finalState = await app.invoke({ userInput: 'Vad passar till Låshus 310-50?', context: createEmptyContext() });

        sinon.assert.calledOnce(understandMock);
        sinon.assert.calledOnce(executeMock);
        sinon.assert.notCalled(clarifyMock);
        sinon.assert.notCalled(commandMock);
        expect(finalState.response?.formattedText).to.equal('from execute');
    });

    it('should pass the analysis on to the next node', async () => {
        await app.invoke({ userInput: 'Vad passar till Låshus 310-50?', context: createEmptyContext() });

        expect(executeMock.firstCall.args[0].analysis?.confidence).to.equal(0.9);
    });

    it('should clarify below the minimum confidence', async () => {
        understandMock.resolves({ analysis: analysisWithConfidence(0.59) });

        const finalState = await app.invoke({ userInput: 'info', context: createEmptyContext() });

        sinon.assert.calledOnce(clarifyMock);
        sinon.assert.notCalled(executeMock);
        expect(finalState.response?.formattedText).to.equal('from clarify');
    });

    it('should answer at exactly the minimum confidence', async () => {
        understandMock.resolves({ analysis: analysisWithConfidence(0.6) });

        await app.invoke({ userInput: 'info', context: createEmptyContext() });

        sinon.assert.calledOnce(executeMock);
        sinon.assert.notCalled(clarifyMock);
    });
});
