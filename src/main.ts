#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { startShell } from './cli/shell';
import { runAsk } from './commands/ask';
import { BotConfig, BotConfigInput, ConfigError, loadBotConfig } from './config';
import { BotEngine } from './engine/BotEngine';
import { dbg, errorMessage, setDebug } from './utils';

const GENERAL_ERROR = 1;
const CONFIG_ERROR = 2;
const QUERY_ERROR = 3;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

interface GlobalOptions {
    dataDir?: string;
    settings?: string;
    templatesConfig?: string;
    nlp: boolean;
    model?: string;
    debug?: boolean;
}

function configOverrides(options: GlobalOptions): BotConfigInput {
    return {
        dataDir: options.dataDir,
        useNlp: options.nlp ? undefined : false,
        nerModel: options.model,
        debug: options.debug,
    };
}

async function createEngine(options: GlobalOptions): Promise<BotEngine> {
    if (options.debug) {
        setDebug(true);
    }
    let config: BotConfig;
    try {
        config = await loadBotConfig({ settingsPath: options.settings, overrides: configOverrides(options) });
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(error.message);
            process.exit(CONFIG_ERROR);
        }
        throw error;
    }
    setDebug(config.debug);
    dbg(`Using data directory: ${config.dataDir}`);
    return BotEngine.create(config, { templatesConfigPath: options.templatesConfig });
}

async function main() {
    const program = new Command();

    // --- Global Options ---
    program
        .name('product-assistant')
        .version('1.0.0')
        .description('Product assistant - answers questions about the product corpus')
        .option('--data-dir <path>', 'Root directory of the product corpus')
        .option('--settings <path>', 'JSON settings file')
        .option('--templates-config <path>', 'JSON file with response template overrides')
        .option('--no-nlp', 'Disable the model-backed entity recognizer and embeddings')
        .option('-m, --model <model_name>', 'Model used by the entity recognizer')
        .option('--debug', 'Print debug output')
        // global options go before the subcommand, so "ask -t 123" reaches ask as input
        .enablePositionalOptions();

    // 'chat' command
    program
        .command('chat')
        .description('Start an interactive session')
        .action(async () => {
            const engine = await createEngine(program.opts<GlobalOptions>());
            try {
                await startShell(engine);
            } catch (error) {
                console.error(`Chat session failed: ${errorMessage(error)}`);
                process.exit(GENERAL_ERROR);
            }
        });

    // 'ask' command
    program
        .command('ask')
        .description('Answer a single question or command')
        .argument('<input...>', 'The question, or a command such as "-t 50091812"')
        .allowUnknownOption()
        .action(async (inputParts: string[]) => {
            const engine = await createEngine(program.opts<GlobalOptions>());
            const response = await runAsk(inputParts.join(' '), engine);
            if (response.status === 'error') {
                process.exitCode = QUERY_ERROR;
            }
        });

    // --- Parse and Execute ---
    try {
        await program.parseAsync(process.argv);
    } catch (error) {
        dbg(`Error during command parsing or execution: ${error}`);
        console.error(errorMessage(error));
        process.exit(COMMAND_PARSING_ERROR);
    }
}

main().catch(error => {
    console.error(`Unhandled application error: ${errorMessage(error)}`);
    process.exit(UNHANDLED_ERROR);
});
