import type { ILLMClient } from '../llm/ILLMClient';

export interface EmbeddingProvider {
    /** False when there is no model behind the provider; callers then skip semantic scoring. */
    readonly available: boolean;
    embed(texts: string[]): Promise<number[][]>;
}

export class NullEmbeddingProvider implements EmbeddingProvider {
    readonly available = false;

    async embed(): Promise<number[][]> {
        return [];
    }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    readonly available = true;

    constructor(
        private readonly llmClient: ILLMClient,
        private readonly modelName: string,
    ) {}

    embed(texts: string[]): Promise<number[][]> {
        return this.llmClient.embed(texts, this.modelName);
    }
}
