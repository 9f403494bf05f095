import type { BotEngine } from '../engine/BotEngine';
import type { EngineResponse } from '../engine/engine_types';
import { createEmptyContext } from '../memory/context_types';
import { dbg, say } from '../utils';

/**
 * Handles the 'ask' command: one query against a fresh context, answer
 * printed to stdout.
 *
 * @returns the engine response, so the caller can pick an exit code
 */
export async function runAsk(inputText: string, engine: Pick<BotEngine, 'processInput'>): Promise<EngineResponse> {
    if (!inputText.trim()) {
        throw new Error("No input provided for the 'ask' command.");
    }
    dbg(`Asking: "${inputText}"`);
    const response = await engine.processInput(inputText, createEmptyContext());
    say(response.formattedText);
    dbg(`ask finished with status ${response.status}`);
    return response;
}
