import OpenAI from "openai";
import { ILLMClient, ChatMessage, ChatOptions } from "./ILLMClient";
import { OPENAI_API_KEY_ENV_VAR, BASE_URL_ENV_VAR, DEFAULT_MODEL_NAME, DEFAULT_EMBEDDINGS_MODEL_NAME } from "./llmConstants";
import { dbg, errorMessage } from "../utils";

/**
 * OpenAIClient implements ILLMClient on top of the OpenAI SDK. Any
 * OpenAI-compatible endpoint can be used by setting BASE_URL.
 */
export class OpenAIClient implements ILLMClient {
    private openai: OpenAI;

    /**
     * @throws Error if the API key is not set in the environment
     */
    constructor(env: NodeJS.ProcessEnv = process.env) {
        const apiKey = env[OPENAI_API_KEY_ENV_VAR] || '';
        if (!apiKey) {
            throw new Error(`OpenAI API key (${OPENAI_API_KEY_ENV_VAR}) is not set in environment variables.`);
        }

        const baseURL = env[BASE_URL_ENV_VAR] || '';
        if (!baseURL) {
            dbg('BASE_URL is not set in environment variables. Using default OpenAI URL.');
            this.openai = new OpenAI({ apiKey });
        } else {
            dbg(`Using base URL: ${baseURL}`);
            this.openai = new OpenAI({ apiKey, baseURL });
        }
    }

    async chatCompletion(history: ChatMessage[], prompt: string, options?: ChatOptions): Promise<string> {
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
            ...history.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
                switch (msg.role) {
                    case 'system':
                        return { role: 'system', content: msg.content };
                    case 'user':
                        return { role: 'user', content: msg.content };
                    default:
                        return { role: 'assistant', content: msg.content };
                }
            }),
            { role: 'user', content: prompt }
        ];

        const effectiveModel = options?.modelName && options.modelName.trim() !== ''
            ? options.modelName
            : DEFAULT_MODEL_NAME;

        try {
            dbg(`Calling OpenAI chat completions with model ${effectiveModel}`);
            const completion = await this.openai.chat.completions.create({
                model: effectiveModel,
                messages,
                temperature: options?.temperature ?? 0,
                max_tokens: options?.maxTokens ?? 500,
            });

            const responseContent = completion.choices[0]?.message?.content;
            if (!responseContent) {
                throw new Error("OpenAI API call returned successfully but contained no content.");
            }
            return responseContent;
        } catch (error) {
            throw new Error(`Failed to communicate with OpenAI: ${errorMessage(error)}`);
        }
    }

    async embed(texts: string[], modelName: string = DEFAULT_EMBEDDINGS_MODEL_NAME): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }
        try {
            dbg(`Embedding ${texts.length} text(s) with model ${modelName}`);
            const response = await this.openai.embeddings.create({ model: modelName, input: texts });
            return [...response.data]
                .sort((a, b) => a.index - b.index)
                .map(item => item.embedding);
        } catch (error) {
            throw new Error(`Failed to create embeddings with OpenAI: ${errorMessage(error)}`);
        }
    }
}
