import { END, START, StateGraph } from '@langchain/langgraph';
import type { ContextUpdate, ConversationContext } from '../memory/context_types';
import type { QueryAnalysis } from '../nlp/nlp_types';
import { dbg } from '../utils';
import { isCommand } from './commandParser';
import type { EngineResponse } from './engine_types';

// Node names
export const COMMAND = 'command';
export const UNDERSTAND = 'understand';
export const CLARIFY = 'clarify';
export const EXECUTE = 'execute';

/** What flows through the graph for one request. */
export interface QueryState {
    userInput: string;
    /** Snapshot of the session context; nodes describe changes in `contextUpdate` instead of writing to it. */
    context: Readonly<ConversationContext>;
    analysis?: QueryAnalysis;
    response?: EngineResponse;
    contextUpdate?: ContextUpdate;
}

export type QueryNode = (state: QueryState) => Promise<Partial<QueryState>>;

export interface QueryNodes {
    command: QueryNode;
    understand: QueryNode;
    clarify: QueryNode;
    execute: QueryNode;
}

/**
 * Commands go straight to the command node. Everything else is analysed
 * first, then either answered or routed to clarification when the intent
 * confidence is below `minConfidence`.
 */
export function createQueryWorkflow(nodes: QueryNodes, minConfidence: number) {
    const workflow = new StateGraph<QueryState>({
            channels: {
                userInput: { value: (x, y) => y ?? x, default: () => '' },
                context: { value: (x, y) => y ?? x, default: () => ({ mentionedProducts: [], queryHistory: [] }) },
                analysis: { value: (x, y) => y ?? x, default: () => undefined },
                response: { value: (x, y) => y ?? x, default: () => undefined },
                contextUpdate: { value: (x, y) => y ?? x, default: () => undefined },
            },
        })
        .addNode(COMMAND, nodes.command)
        .addNode(UNDERSTAND, nodes.understand)
        .addNode(CLARIFY, nodes.clarify)
        .addNode(EXECUTE, nodes.execute)

        .addConditionalEdges(START,
            (state: QueryState) => {
                const next = isCommand(state.userInput) ? COMMAND : UNDERSTAND;
                dbg(`Initial routing: ${next}`);
                return next;
            },
            {
                [COMMAND]: COMMAND,
                [UNDERSTAND]: UNDERSTAND,
            }
        )
        .addConditionalEdges(UNDERSTAND,
            (state: QueryState) => {
                const confidence = state.analysis?.confidence ?? 0;
                const next = confidence < minConfidence ? CLARIFY : EXECUTE;
                dbg(`Confidence ${confidence.toFixed(3)}: routing to ${next}`);
                return next;
            },
            {
                [CLARIFY]: CLARIFY,
                [EXECUTE]: EXECUTE,
            }
        )
        .addEdge(COMMAND, END)
        .addEdge(CLARIFY, END)
        .addEdge(EXECUTE, END);

    return workflow.compile();
}

export type QueryWorkflow = ReturnType<typeof createQueryWorkflow>;
