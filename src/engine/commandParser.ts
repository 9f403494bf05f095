import type { CommandLetter, ParsedCommand } from './engine_types';

const COMMAND_PATTERN = /^-([tcfs])\s+(\S+)(.*)$/s;

function isCommandLetter(letter: string): letter is CommandLetter {
    return letter === 't' || letter === 'c' || letter === 's' || letter === 'f';
}

export function isCommand(input: string): boolean {
    return COMMAND_PATTERN.test(input.trim());
}

/** `-t 50091812 mått` parses to `{ command: 't', productId: '50091812', params: 'mått' }`. */
export function parseCommand(input: string): ParsedCommand | undefined {
    const match = COMMAND_PATTERN.exec(input.trim());
    if (!match) {
        return undefined;
    }
    const [, letter, productId, rest] = match;
    if (!isCommandLetter(letter)) {
        return undefined;
    }
    return { command: letter, productId, params: rest.trim() };
}

export function formatCommand(command: ParsedCommand): string {
    return command.params ? `-${command.command} ${command.productId} ${command.params}` : `-${command.command} ${command.productId}`;
}
