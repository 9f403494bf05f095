import inquirer from 'inquirer';
import type { BotEngine } from '../engine/BotEngine';
import type { EngineStats } from '../engine/engine_types';
import type { ConversationState } from '../nlp/ContextManager';
import { ConversationContext, createEmptyContext } from '../memory/context_types';
import { dbg, newSessionId, say } from '../utils';

const EXIT_COMMAND = 'exit';
const STATS_COMMAND = 'stats';
const RESET_COMMAND = 'reset';
const HELP_COMMAND = 'help';

const HELP_TEXT = [
    'Ställ en fråga på svenska, t.ex. "Vad passar till Låshus 310-50?", eller använd ett kommando:',
    '  -t <artikelnr> [filter]   tekniska specifikationer',
    '  -c <artikelnr> [filter]   kompatibilitet',
    '  -s <artikelnr>            sammanfattning',
    '  -f <artikelnr>            fullständig information',
    `Skalkommandon: ${EXIT_COMMAND}, ${STATS_COMMAND}, ${RESET_COMMAND}, ${HELP_COMMAND}`,
].join('\n');

/** One conversation: the engine plus the context it accumulates. */
export interface ShellSession {
    engine: Pick<BotEngine, 'processInput' | 'getStats' | 'conversationState'>;
    context: ConversationContext;
    sessionId: string;
}

export function newShellSession(engine: ShellSession['engine']): ShellSession {
    return { engine, context: createEmptyContext(), sessionId: newSessionId() };
}

/**
 * Prompts the user for the next line of input.
 *
 * @returns the trimmed line
 */
export async function getQueryInput(): Promise<string> {
    const answers = await inquirer.prompt<{ query: string }>([
        { type: 'input', name: 'query', message: 'fråga> ' },
    ]);
    return answers.query.trim();
}

export function formatStats(stats: EngineStats): string {
    return [
        `Frågor totalt:        ${stats.totalQueries}`,
        `  kommandon:          ${stats.commandQueries}`,
        `  naturligt språk:    ${stats.naturalLanguageQueries}`,
        `Lyckade:              ${stats.successfulQueries}`,
        `Misslyckade:          ${stats.failures}`,
        `Oklara:               ${stats.ambiguousQueries}`,
        `Cachade svar:         ${stats.cacheSize}`,
        `Andel lyckade:        ${(stats.successRate * 100).toFixed(1)}%`,
        `Drifttid:             ${Math.round(stats.uptimeSeconds)} s`,
    ].join('\n');
}

const STAGE_NAMES: Readonly<Record<ConversationState['dialogStage'], string>> = {
    initial: 'början',
    detailed_inquiry: 'detaljerade frågor',
    product_exploration: 'utforskar produkt',
    search: 'sökning',
};

export function formatConversationState(state: ConversationState): string {
    return [
        `Samtalsläge:          ${STAGE_NAMES[state.dialogStage]}`,
        `Aktiv produkt:        ${state.activeProductId ?? '-'}`,
        `Nämnda produkter:     ${state.mentionedProducts.length}`,
        `Frågor i samtalet:    ${state.turns}`,
    ].join('\n');
}

/**
 * Handles one line of shell input.
 *
 * @returns false when the shell should stop
 */
export async function handleShellInput(input: string, session: ShellSession): Promise<boolean> {
    switch (input.toLowerCase()) {
        case '':
            return true;
        case EXIT_COMMAND:
            say('Hej då!');
            return false;
        case STATS_COMMAND:
            say(formatStats(session.engine.getStats()));
            say(formatConversationState(session.engine.conversationState(session.context)));
            return true;
        case RESET_COMMAND:
            session.context = createEmptyContext();
            session.sessionId = newSessionId();
            say('Konversationen är återställd.');
            return true;
        case HELP_COMMAND:
            say(HELP_TEXT);
            return true;
        default: {
            dbg(`[${session.sessionId}] ${input}`);
            const response = await session.engine.processInput(input, session.context);
            say(response.formattedText);
            return true;
        }
    }
}

/**
 * Runs the interactive read-eval-print loop until the user types `exit`.
 * The session context lives as long as the loop, or until `reset`.
 */
export async function startShell(engine: ShellSession['engine'], readInput: () => Promise<string> = getQueryInput): Promise<void> {
    say(`Produktassistenten är redo. Skriv "${HELP_COMMAND}" för hjälp eller "${EXIT_COMMAND}" för att avsluta.`);
    const session = newShellSession(engine);
    let shellRunning = true;
    while (shellRunning) {
        shellRunning = await handleShellInput(await readInput(), session);
    }
}
