import { expect } from 'chai';
import sinon from 'sinon';
import { afterEach, describe, it } from 'mocha';
import type { ILLMClient } from '../../src/llm/ILLMClient';
import { OPENAI_API_KEY_ENV_VAR } from '../../src/llm/llmConstants';
import { OpenAIClient } from '../../src/llm/OpenAIClient';
import { NullEmbeddingProvider, OpenAIEmbeddingProvider } from '../../src/nlp/EmbeddingProvider';

describe('OpenAIClient', () => {
    afterEach(() => {
        sinon.restore();
    });

    it('should refuse to start without an API key', () => {
        expect(() => new OpenAIClient({})).to.throw(
            'OpenAI API key (OPENAI_API_KEY) is not set in environment variables.',
        );
    });

    it('should start with an API key and an optional base URL', () => {
        expect(new OpenAIClient({ [OPENAI_API_KEY_ENV_VAR]: 'test-secret' })).to.be.instanceOf(OpenAIClient);
        expect(new OpenAIClient({ [OPENAI_API_KEY_ENV_VAR]: 'test-secret', BASE_URL: 'http://localhost:4000' }))
            .to.be.instanceOf(OpenAIClient);
    });

    it('should not call the API to embed nothing', async () => {
        const client = new OpenAIClient({ [OPENAI_API_KEY_ENV_VAR]: 'test-secret' });
        expect(await client.embed([])).to.deep.equal([]);
    });
});

describe('EmbeddingProvider', () => {
    it('should embed through the client with the configured model', async () => {
        const client: sinon.SinonStubbedInstance<ILLMClient> = {
            chatCompletion: sinon.stub(),
            embed: sinon.stub<Parameters<ILLMClient['embed']>, ReturnType<ILLMClient['embed']>>().resolves([[1, 0]]),
        };
        const provider = new OpenAIEmbeddingProvider(client, 'test-embeddings');

        expect(await provider.embed(['låshus'])).to.deep.equal([[1, 0]]);
        sinon.assert.calledOnceWithExactly(client.embed, ['låshus'], 'test-embeddings');
        expect(provider.available).to.be.true;
    });

    it('should report no model behind the null provider', async () => {
        const provider = new NullEmbeddingProvider();
        expect(provider.available).to.be.false;
        expect(await provider.embed()).to.deep.equal([]);
    });
});
