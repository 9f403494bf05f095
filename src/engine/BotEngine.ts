import { LRUCache } from 'lru-cache';
import type { BotConfig } from '../config';
import { DataManager } from '../corpus/DataManager';
import { ResponseGenerator } from '../dialog/ResponseGenerator';
import { TemplateService } from '../dialog/TemplateService';
import type { ILLMClient } from '../llm/ILLMClient';
import { OpenAIClient } from '../llm/OpenAIClient';
import type { ConversationContext } from '../memory/context_types';
import { ContextManager, ConversationState } from '../nlp/ContextManager';
import { EmbeddingProvider, NullEmbeddingProvider, OpenAIEmbeddingProvider } from '../nlp/EmbeddingProvider';
import { EntityExtractor } from '../nlp/EntityExtractor';
import { EntityRecognizer, LLMEntityRecognizer, NullEntityRecognizer } from '../nlp/EntityRecognizer';
import { IntentAnalyzer } from '../nlp/IntentAnalyzer';
import { dbg, errorMessage, say, warnOnce } from '../utils';
import { createClarificationNode } from './ClarificationNode';
import { CommandCache, CommandServices, createCommandNode, runCommand } from './CommandNode';
import { formatCommand, parseCommand } from './commandParser';
import type { CommandLetter, CommandResponse, EngineResponse, EngineStats } from './engine_types';
import { createQueryWorkflow, QueryWorkflow } from './graph';
import { createIntentExecutionNode } from './IntentExecutionNode';
import { createUnderstandingNode } from './UnderstandingNode';

export interface BotEngineComponents {
    dataManager: DataManager;
    templateService: TemplateService;
    entityRecognizer: EntityRecognizer;
    embeddingProvider: EmbeddingProvider;
}

export interface BotEngineDependencies {
    dataManager?: DataManager;
    templateService?: TemplateService;
    /** JSON file overriding response template files; ignored when templateService is given. */
    templatesConfigPath?: string;
    llmClient?: ILLMClient;
    entityRecognizer?: EntityRecognizer;
    embeddingProvider?: EmbeddingProvider;
    /** Builds the LLM client when none is given; the default reads OPENAI_API_KEY. */
    createLLMClient?: () => ILLMClient;
}

type Counters = Omit<EngineStats, 'startTime' | 'uptimeSeconds' | 'successRate' | 'cacheSize'>;

/** What the user said about a response. */
export interface InteractionFeedback {
    helpful?: boolean;
    comment?: string;
}

/**
 * Answers structured commands and Swedish free-text questions about the
 * product corpus. One instance serves one process; the conversation context
 * belongs to the caller and is passed in with every request.
 */
export class BotEngine {
    private readonly contextManager = new ContextManager();
    private readonly responseGenerator: ResponseGenerator;
    private readonly cache?: CommandCache;
    private readonly workflow: QueryWorkflow;
    private readonly startTime = new Date();
    private readonly counters: Counters = {
        totalQueries: 0,
        commandQueries: 0,
        naturalLanguageQueries: 0,
        successfulQueries: 0,
        failures: 0,
        ambiguousQueries: 0,
    };

    constructor(private readonly config: BotConfig, private readonly components: BotEngineComponents) {
        const { dataManager, templateService, entityRecognizer, embeddingProvider } = components;
        this.responseGenerator = new ResponseGenerator(templateService, dataManager);
        if (config.cacheEnabled) {
            this.cache = new LRUCache<string, CommandResponse>({ max: config.cacheMaxEntries, ttl: config.cacheTtlMs });
        }

        const entityExtractor = new EntityExtractor(dataManager, entityRecognizer);
        const intentAnalyzer = new IntentAnalyzer(embeddingProvider);
        this.workflow = createQueryWorkflow({
            command: createCommandNode(this.commandServices()),
            understand: createUnderstandingNode({ contextManager: this.contextManager, entityExtractor, intentAnalyzer }),
            clarify: createClarificationNode({ dataManager, products: dataManager, responseGenerator: this.responseGenerator }),
            execute: createIntentExecutionNode({ dataManager, responseGenerator: this.responseGenerator }),
        }, config.minConfidence);
    }

    /**
     * Loads the corpus indices and response templates and picks the
     * model-backed capabilities when NLP is on and a model is reachable.
     * Without one the engine runs on patterns and keywords alone.
     */
    static async create(config: BotConfig, deps: BotEngineDependencies = {}): Promise<BotEngine> {
        const dataManager = deps.dataManager ?? new DataManager(config);
        const templateService = deps.templateService ?? new TemplateService({
            configFilePath: deps.templatesConfigPath,
            inlineTemplates: config.responseTemplates,
        });
        await Promise.all([dataManager.load(), templateService.load()]);

        let llmClient: ILLMClient | undefined;
        if (config.useNlp && !(deps.entityRecognizer && deps.embeddingProvider)) {
            llmClient = deps.llmClient ?? BotEngine.tryCreateLLMClient(deps.createLLMClient ?? (() => new OpenAIClient()));
        }
        const entityRecognizer = deps.entityRecognizer
            ?? (llmClient ? new LLMEntityRecognizer(llmClient, config.nerModel) : new NullEntityRecognizer());
        const embeddingProvider = deps.embeddingProvider
            ?? (llmClient ? new OpenAIEmbeddingProvider(llmClient, config.embeddingsModel) : new NullEmbeddingProvider());

        dbg(`Engine ready (entity model: ${llmClient ? config.nerModel : 'none'}, min confidence ${config.minConfidence})`);
        return new BotEngine(config, { dataManager, templateService, entityRecognizer, embeddingProvider });
    }

    private static tryCreateLLMClient(factory: () => ILLMClient): ILLMClient | undefined {
        try {
            return factory();
        } catch (error) {
            warnOnce('llm-unavailable', `Language model unavailable, using pattern and keyword analysis only: ${errorMessage(error)}`);
            return undefined;
        }
    }

    private commandServices(): CommandServices {
        return {
            dataManager: this.components.dataManager,
            responseGenerator: this.responseGenerator,
            cache: this.cache,
        };
    }

    /**
     * The single entry point for user input. Never rejects: failures come
     * back as responses with status `error` and the context stays usable.
     */
    async processInput(text: string, context: ConversationContext): Promise<EngineResponse> {
        const userInput = text.trim();
        this.contextManager.updateContext(context, { query: userInput });

        let response: EngineResponse;
        try {
            const finalState = await this.workflow.invoke({ userInput, context });
            if (!finalState.response) {
                throw new Error('the query produced no response');
            }
            response = finalState.response;
            if (finalState.contextUpdate) {
                this.contextManager.updateContext(context, finalState.contextUpdate);
            }
        } catch (error) {
            console.error(`Error processing "${userInput}":`, error);
            response = this.errorResponse(userInput, error);
        }
        this.record(response);
        return response;
    }

    async executeCommand(command: CommandLetter, productId: string, params: string, context: ConversationContext): Promise<EngineResponse> {
        const parsed = { command, productId, params: params.trim() };
        dbg(`Executing ${formatCommand(parsed)}`);
        let response: EngineResponse;
        try {
            const outcome = await runCommand(this.commandServices(), parsed);
            response = outcome.response;
            if (outcome.contextUpdate) {
                this.contextManager.updateContext(context, outcome.contextUpdate);
            }
        } catch (error) {
            console.error(`Error executing -${command} for ${productId}:`, error);
            response = this.failure('command', `Ett fel uppstod: ${errorMessage(error)}`, { command, productId });
        }
        this.record(response);
        return response;
    }

    getStats(): EngineStats {
        const uptimeSeconds = (Date.now() - this.startTime.getTime()) / 1000;
        return {
            ...this.counters,
            cacheSize: this.cache?.size ?? 0,
            startTime: this.startTime.toISOString(),
            uptimeSeconds,
            successRate: this.counters.totalQueries > 0 ? this.counters.successfulQueries / this.counters.totalQueries : 0,
        };
    }

    /** Where the conversation held in `context` stands. */
    conversationState(context: Readonly<ConversationContext>): ConversationState {
        return this.contextManager.conversationState(context);
    }

    /** Hook for feedback-driven tuning; it only logs the interaction. */
    learnFromInteraction(query: string, response: EngineResponse, feedback?: InteractionFeedback): void {
        if (!this.config.enableLearning) {
            return;
        }
        const verdict = feedback?.helpful === undefined ? 'no feedback' : feedback.helpful ? 'helpful' : 'not helpful';
        say(`Learning: "${query}" -> ${response.status} (${verdict})`);
    }

    private errorResponse(userInput: string, error: unknown): EngineResponse {
        const parsed = parseCommand(userInput);
        if (parsed) {
            return this.failure('command', `Ett fel uppstod: ${errorMessage(error)}`, {
                command: parsed.command,
                productId: parsed.productId,
            });
        }
        return this.failure('natural_language', `Ett fel uppstod vid analys av din fråga: ${errorMessage(error)}`, {});
    }

    private failure(
        queryType: 'command' | 'natural_language',
        message: string,
        details: { command?: CommandLetter; productId?: string },
    ): EngineResponse {
        return {
            status: 'error',
            queryType,
            message,
            ...details,
            formattedText: this.responseGenerator.formatErrorResponse(message),
            timestamp: new Date().toISOString(),
        };
    }

    private record(response: EngineResponse) {
        const counters = this.counters;
        counters.totalQueries++;
        if (response.queryType === 'command') {
            counters.commandQueries++;
        } else {
            counters.naturalLanguageQueries++;
        }
        switch (response.status) {
            case 'success':
            case 'no_results':
                counters.successfulQueries++;
                break;
            case 'error':
                counters.failures++;
                break;
            case 'needs_clarification':
            case 'low_confidence':
                counters.ambiguousQueries++;
                break;
        }
    }
}
