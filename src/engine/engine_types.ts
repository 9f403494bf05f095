import type { CompatibilitySuccess, CorpusSuccess, DataFailure, SearchSuccess, SpecsSuccess, SummarySuccess } from '../corpus/corpus_types';
import type { QueryAnalysis, RankedIntent } from '../nlp/nlp_types';

export type CommandLetter = 't' | 'c' | 's' | 'f';

export interface ParsedCommand {
    command: CommandLetter;
    productId: string;
    params: string;
}

export type ResponseStatus = 'success' | 'error' | 'needs_clarification' | 'low_confidence' | 'no_results';

export type ClarificationType = 'product_selection' | 'product_suggestion' | 'intent_selection' | 'general_clarification';

export interface ClarificationOption {
    id: string;
    name: string;
}

export interface ClarificationQuestion {
    type: ClarificationType;
    question: string;
    options: ClarificationOption[];
}

/** What executing an intent produced: one corpus operation's success, or why it failed. */
export type IntentResult = SpecsSuccess | CompatibilitySuccess | SummarySuccess | SearchSuccess | DataFailure;

interface ResponseBase {
    formattedText: string;
    timestamp: string;
}

export interface CommandResponse extends ResponseBase {
    status: 'success';
    queryType: 'command';
    command: CommandLetter;
    productId: string;
    params: string;
    result: CorpusSuccess;
}

export interface AnswerResponse extends ResponseBase {
    status: 'success' | 'no_results';
    queryType: 'natural_language';
    analysis: QueryAnalysis;
    targetProductId?: string;
    result: Exclude<IntentResult, DataFailure>;
}

export interface BestGuessResponse extends ResponseBase {
    status: 'low_confidence';
    queryType: 'best_guess';
    analysis: QueryAnalysis;
    targetProductId?: string;
    result: IntentResult;
    confidence: number;
    alternativeIntents: RankedIntent[];
}

export interface ClarificationResponse extends ResponseBase {
    status: 'needs_clarification';
    queryType: 'clarification_request';
    analysis: QueryAnalysis;
    clarificationQuestions: ClarificationQuestion[];
}

export interface ErrorResponse extends ResponseBase {
    status: 'error';
    queryType: 'command' | 'natural_language';
    message: string;
    command?: CommandLetter;
    productId?: string;
    analysis?: QueryAnalysis;
}

export type EngineResponse = CommandResponse | AnswerResponse | BestGuessResponse | ClarificationResponse | ErrorResponse;

export interface EngineStats {
    totalQueries: number;
    commandQueries: number;
    naturalLanguageQueries: number;
    successfulQueries: number;
    failures: number;
    ambiguousQueries: number;
    cacheSize: number;
    startTime: string;
    uptimeSeconds: number;
    successRate: number;
}
