export type ChatRole = 'user' | 'assistant' | 'system';

export type ChatMessage = {
    role: ChatRole;
    content: string;
};

export interface ChatOptions {
    modelName?: string;
    temperature?: number;
    maxTokens?: number;
}

export interface ILLMClient {
    /**
     * Calls the underlying provider's chat completions API.
     *
     * @param history Earlier turns, system instructions first.
     * @param prompt The user prompt for this turn.
     * @returns The content of the model's response.
     * @throws Error on API errors or an empty completion.
     */
    chatCompletion(history: ChatMessage[], prompt: string, options?: ChatOptions): Promise<string>;

    /**
     * Embeds each input text; the result has one vector per input, in order.
     */
    embed(texts: string[], modelName?: string): Promise<number[][]>;
}
