import { expect } from 'chai';
import { afterEach, describe, it } from 'mocha';
import sinon from 'sinon';
import type { ILLMClient } from '../src/llm/ILLMClient';
import { LLMEntityRecognizer, locateSpans, parseRecognitionResponse } from '../src/nlp/EntityRecognizer';

function stubClient(): sinon.SinonStubbedInstance<ILLMClient> {
    return {
        chatCompletion: sinon.stub(),
        embed: sinon.stub(),
    };
}

describe('EntityRecognizer', () => {
    afterEach(() => {
        sinon.restore();
    });

    describe('parseRecognitionResponse', () => {
        it('should read entities from JSON wrapped in a markdown fence', () => {
            const response = '```json\n{"entities": [{"text": "Slutbleck 1487", "label": "PRODUCT"}]}\n```';
            expect(parseRecognitionResponse(response)).to.deep.equal([{ text: 'Slutbleck 1487', label: 'PRODUCT' }]);
        });

        it('should return nothing when there is no JSON object', () => {
            expect(parseRecognitionResponse('Inga entiteter hittades.')).to.deep.equal([]);
        });

        it('should return nothing for malformed JSON', () => {
            expect(parseRecognitionResponse('{"entities": [')).to.deep.equal([]);
        });

        it('should return nothing when the JSON has the wrong shape', () => {
            expect(parseRecognitionResponse('{"entities": [{"text": "", "label": "PRODUCT"}]}')).to.deep.equal([]);
            expect(parseRecognitionResponse('{"items": []}')).to.deep.equal([]);
        });
    });

    describe('locateSpans', () => {
        it('should locate spans case-insensitively and keep the original text', () => {
            expect(locateSpans('Passar Slutbleck 1487?', [{ text: 'slutbleck 1487', label: 'PRODUCT' }])).to.deep.equal([
                { label: 'PRODUCT', text: 'Slutbleck 1487', start: 7, end: 21 },
            ]);
        });

        it('should give repeated spans successive occurrences', () => {
            const spans = locateSpans('10 mm eller 10 mm', [
                { text: '10 mm', label: 'DIMENSION' },
                { text: '10 mm', label: 'DIMENSION' },
            ]);
            expect(spans.map(span => span.start)).to.deep.equal([0, 12]);
        });

        it('should give offsets into composed text', () => {
            expect(locateSpans('Passar L\u00E5shus 310-50?', [{ text: 'L\u00E5shus 310-50', label: 'PRODUCT' }])).to.deep.equal([
                { label: 'PRODUCT', text: 'L\u00E5shus 310-50', start: 7, end: 20 },
            ]);
        });

        it('should drop spans that are not in the text', () => {
            expect(locateSpans('Visa cylinder', [{ text: 'trycke', label: 'PRODUCT' }])).to.deep.equal([]);
        });
    });

    describe('LLMEntityRecognizer', () => {
        it('should ask the model and locate its answer in the text', async () => {
            const client = stubClient();
            client.chatCompletion.resolves('{"entities": [{"text": "Cylinder 2000", "label": "PRODUCT"}]}');
            const recognizer = new LLMEntityRecognizer(client, 'test-model');

            const spans = await recognizer.recognize('Visa Cylinder 2000');

            expect(spans).to.deep.equal([{ label: 'PRODUCT', text: 'Cylinder 2000', start: 5, end: 18 }]);
            sinon.assert.calledOnce(client.chatCompletion);
            const [history, prompt, options] = client.chatCompletion.firstCall.args;
            expect(history).to.deep.equal([]);
            expect(prompt.endsWith('Visa Cylinder 2000')).to.be.true;
            expect(options).to.deep.equal({ modelName: 'test-model', temperature: 0 });
        });

        it('should not call the model for blank text', async () => {
            const client = stubClient();
            const recognizer = new LLMEntityRecognizer(client, 'test-model');

            expect(await recognizer.recognize('   ')).to.deep.equal([]);
            sinon.assert.notCalled(client.chatCompletion);
        });

        it('should return no spans when the model call fails', async () => {
            const client = stubClient();
            client.chatCompletion.rejects(new Error('connection refused'));
            const warn = sinon.stub(console, 'warn');
            const recognizer = new LLMEntityRecognizer(client, 'test-model');

            expect(await recognizer.recognize('Visa Cylinder 2000')).to.deep.equal([]);
            sinon.assert.calledOnce(warn);
        });
    });
});
