#!/usr/bin/env node
import { Command } from 'commander'
import { input } from '@inquirer/prompts';
import chalk from 'chalk'
import ora from 'ora'
import "dotenv/config";
import { loadConfig, toAssistantSettings, AppConfig } from './config';
import { createDependencies } from './container';
import { Assistant } from './core/assistant';
import { Answer } from './core/query-handler';
import { getErrorMessage } from './errors';
import { createLogger } from './utils/logger';

const program = new Command()

program
    .name('policydesk')
    .description('Answers HR and IT policy questions from a local document set')
    .version('1.0.0')
    .option('-d, --docs <dir>', 'documents directory (overrides DOCS_DIR)')

function resolveConfig(): AppConfig {
    const config = loadConfig(process.env)
    const { docs } = program.opts<{ docs?: string }>()
    return docs ? { ...config, docsDir: docs } : config
}

async function startAssistant(options: { rebuild?: boolean } = {}): Promise<Assistant> {
    const config = resolveConfig()
    const logger = createLogger(config.logLevel)
    logger.info(`📂 Loading knowledge base from: ${config.docsDir}`)
    return Assistant.start(createDependencies(config, logger), toAssistantSettings(config), options)
}

function printAnswer(answer: Answer): void {
    if (answer.kind === 'answered') {
        console.log(chalk.green(`📝 Answer: ${answer.text}`))
        console.log(chalk.gray(`Sources: ${answer.sources.join(', ')}`))
    } else {
        console.log(chalk.yellow(`📝 Answer: ${answer.text}`))
    }
}

function fail(error: unknown): never {
    console.error(chalk.red(`❌ ${getErrorMessage(error)}`))
    process.exit(1)
}

program
    .command('index')
    .description('Build the index, or load it when a persisted copy exists')
    .option('--rebuild', 'embed every document again and replace the persisted index')
    .action(async (options: { rebuild?: boolean }) => {
        const spinner = ora('📚 Preparing index\n').start();
        try {
            const assistant = await startAssistant({ rebuild: options.rebuild })
            spinner.stop();
            console.log(chalk.green(`✅ Index ready with ${assistant.index.size} chunks`))
            await assistant.close()
        } catch (error) {
            spinner.stop();
            fail(error)
        }
    })

program
    .command('ask')
    .description('Answer a single question')
    .argument('<question...>', 'the question to ask')
    .action(async (words: string[]) => {
        let assistant: Assistant
        try {
            assistant = await startAssistant()
        } catch (error) {
            fail(error)
        }

        const spinner = ora('🔍 Searching...').start();
        const answer = await assistant.ask(words.join(' '))
        spinner.stop();
        printAnswer(answer)
        await assistant.close()
    })

program
    .command('query')
    .description('Ask questions about your policies interactively')
    .action(async () => {
        let assistant: Assistant
        try {
            assistant = await startAssistant()
        } catch (error) {
            fail(error)
        }

        console.log(chalk.blue('🤖 Ask your question (type "exit" to quit)'))

        while (true) {
            let question: string
            try {
                question = await input({
                    message: chalk.cyan('Question:'),
                    validate: (value) => value.trim().length > 0 || 'Please enter a question'
                });
            } catch (error) {
                // Ctrl+C closes the prompt
                if (error instanceof Error && error.name === 'ExitPromptError') break;
                throw error
            }

            if (question.trim().toLowerCase() === 'exit') break;

            const spinner = ora('🔍 Searching...').start();
            const answer = await assistant.ask(question);
            spinner.stop();
            printAnswer(answer)
        }

        await assistant.close();
    })

program.parseAsync().catch(fail)
