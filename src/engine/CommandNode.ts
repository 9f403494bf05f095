import type { LRUCache } from 'lru-cache';
import type { CorpusResult } from '../corpus/corpus_types';
import type { DataManager } from '../corpus/DataManager';
import type { ResponseGenerator } from '../dialog/ResponseGenerator';
import type { ContextUpdate } from '../memory/context_types';
import { dbg } from '../utils';
import { parseCommand } from './commandParser';
import type { CommandResponse, EngineResponse, ParsedCommand } from './engine_types';
import type { QueryNode } from './graph';

export type CommandCache = LRUCache<string, CommandResponse>;

export interface CommandServices {
    dataManager: Pick<DataManager, 'validateProductId' | 'getTechnicalSpecs' | 'getCompatibilityInfo' | 'getProductSummary' | 'getFullInfo'>;
    responseGenerator: Pick<ResponseGenerator, 'formatCommandResponse' | 'formatErrorResponse'>;
    /** Absent when caching is switched off. */
    cache?: CommandCache;
}

export interface CommandOutcome {
    response: EngineResponse;
    contextUpdate?: ContextUpdate;
}

export function commandCacheKey({ command, productId, params }: ParsedCommand): string {
    return `${command}:${productId}:${params}`;
}

function fetchCommandData(dataManager: CommandServices['dataManager'], { command, productId, params }: ParsedCommand): Promise<CorpusResult> {
    switch (command) {
        case 't':
            return dataManager.getTechnicalSpecs(productId, params);
        case 'c':
            return dataManager.getCompatibilityInfo(productId, params);
        case 's':
            return dataManager.getProductSummary(productId);
        case 'f':
            return dataManager.getFullInfo(productId);
    }
}

/**
 * Validates the product, answers from the cache when it can, otherwise
 * fetches and formats the data. Only successful responses are cached.
 * A valid product becomes the active one.
 */
export async function runCommand(services: CommandServices, parsed: ParsedCommand): Promise<CommandOutcome> {
    const { command, productId, params } = parsed;
    if (!(await services.dataManager.validateProductId(productId))) {
        const message = `Ogiltig produkt: ${productId}`;
        return {
            response: {
                status: 'error',
                queryType: 'command',
                message,
                command,
                productId,
                formattedText: services.responseGenerator.formatErrorResponse(message),
                timestamp: new Date().toISOString(),
            },
        };
    }
    const contextUpdate: ContextUpdate = { productId };

    const cacheKey = commandCacheKey(parsed);
    const cached = services.cache?.get(cacheKey);
    if (cached) {
        dbg(`Cache hit for ${cacheKey}`);
        return { response: cached, contextUpdate };
    }

    const result = await fetchCommandData(services.dataManager, parsed);
    if (result.status !== 'success') {
        return {
            response: {
                status: 'error',
                queryType: 'command',
                message: result.message,
                command,
                productId,
                formattedText: services.responseGenerator.formatErrorResponse(result.message),
                timestamp: new Date().toISOString(),
            },
            contextUpdate,
        };
    }

    const response: CommandResponse = {
        status: 'success',
        queryType: 'command',
        command,
        productId,
        params,
        result,
        formattedText: services.responseGenerator.formatCommandResponse(productId, result),
        timestamp: new Date().toISOString(),
    };
    services.cache?.set(cacheKey, response);
    return { response, contextUpdate };
}

export function createCommandNode(services: CommandServices): QueryNode {
    return async (state) => {
        const parsed = parseCommand(state.userInput);
        if (!parsed) {
            throw new Error(`Not a command: ${state.userInput}`);
        }
        dbg(`--- Command Node: -${parsed.command} ${parsed.productId} ---`);
        return runCommand(services, parsed);
    };
}
