#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from 'commander'
import { input } from '@inquirer/prompts';
import chalk from 'chalk'
import ora from 'ora'
import { ConsoleLogger } from './adapters/ConsoleLogger';
import { FileChunkCollectionStore } from './adapters/FileChunkCollectionStore';
import { FileDocumentSource } from './adapters/FileDocumentSource';
import { FileHistoryStore } from './adapters/FileHistoryStore';
import { FileIndexStore } from './adapters/FileIndexStore';
import { OpenAiEmbedder } from './adapters/OpenAiEmbedder';
import { PostgresIndexStore } from './adapters/PostgresIndexStore';
import { Config, loadConfig } from './config/env';
import { Answer } from './core/answer';
import { describeError } from './core/errors';
import { IndexHandler } from './core/index-handler';
import { IngestHandler } from './core/ingest-handler';
import { QueryHandler } from './core/query-handler';
import { toChannelName } from './lib/channel-name';
import { ChunkCollectionStore } from './ports/ChunkCollectionStore';
import { HistoryStore } from './ports/HistoryStore';
import { IndexStore } from './ports/IndexStore';
import { Logger } from './ports/Logger';

const EXIT_WORDS = new Set(['exit', 'quit', 'q']);

interface Services {
    logger: Logger;
    indexStore: IndexStore;
    collections: ChunkCollectionStore;
    indexHandler: IndexHandler;
    embedder: () => OpenAiEmbedder;
}

function createServices(config: Config): Services {
    const logger = new ConsoleLogger({ level: config.logLevel });
    const indexStore: IndexStore = config.indexStore.kind === 'postgres'
        ? PostgresIndexStore.fromConnectionString(config.indexStore.connectionString)
        : new FileIndexStore(config.indexDir);
    const collections = new FileChunkCollectionStore(config.embeddingsDir);

    return {
        logger,
        indexStore,
        collections,
        indexHandler: new IndexHandler(collections, indexStore, logger.child('index')),
        // Built lazily: build and stats do not need an API key.
        embedder: () => new OpenAiEmbedder({ apiKey: config.openAiApiKey, model: config.embeddingModel }),
    };
}

async function withServices(run: (services: Services, config: Config) => Promise<void>): Promise<void> {
    const config = loadConfig();
    const services = createServices(config);
    try {
        await run(services, config);
    } finally {
        await services.indexStore.close();
    }
}

function parseTopK(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('top-k must be a positive integer.');
    }
    return parsed;
}

function printAnswer(answer: Answer) {
    const color = answer.hasSources ? chalk.green : chalk.yellow;
    console.log(`\n${color(answer.answerText)}\n`);
}

async function answerQuestion(queryHandler: QueryHandler, history: HistoryStore, channelName: string, question: string) {
    const spinner = ora('🔍 Searching...').start();
    try {
        const answer = await queryHandler.run(channelName, question);
        spinner.stop();
        printAnswer(answer);
        await history.append({ channelName, query: answer.query, response: answer, timestamp: answer.generationTimestamp });
    } catch (error) {
        spinner.stop();
        throw error;
    }
}

const program = new Command()

program
    .name('channel-qa')
    .description('Ask questions about a video channel and get answers with timestamped sources')
    .version('1.0.0')

program
    .command('ingest')
    .description('Chunk and embed every processed video of a channel')
    .argument('<channel>', 'channel name, with or without @', toChannelName)
    .action(async (channelName: string) => {
        await withServices(async ({ logger, collections, embedder }, config) => {
            const ingestion = new IngestHandler(
                new FileDocumentSource(config.processedDir),
                collections,
                embedder(),
                logger.child('ingest'),
            );

            const spinner = ora(`📚 Ingesting ${channelName}`).start();
            try {
                const report = await ingestion.run(channelName, (done, total) => {
                    spinner.text = `📚 Ingesting ${channelName} (${done}/${total})`;
                });
                spinner.succeed(`Stored ${report.processed.length} videos, skipped ${report.skipped.length}`);
                for (const { videoId, error } of report.skipped) {
                    console.log(chalk.gray(`  - ${videoId}: ${describeError(error)}`));
                }
            } catch (error) {
                spinner.fail('Ingest failed');
                throw error;
            }
        });
    })

program
    .command('build')
    .description('Build and publish the search index of a channel')
    .argument('<channel>', 'channel name, with or without @', toChannelName)
    .action(async (channelName: string) => {
        await withServices(async ({ indexHandler }) => {
            const spinner = ora(`🧱 Building index for ${channelName}`).start();
            const result = await indexHandler.build(channelName);
            if (!result.ok) {
                spinner.fail(describeError(result.error));
                process.exitCode = 1;
                return;
            }
            spinner.succeed(`Indexed ${result.value.chunkCount} chunks (dimension ${result.value.dimension})`);
        });
    })

program
    .command('ask')
    .description('Answer a single question about a channel')
    .argument('<channel>', 'channel name, with or without @', toChannelName)
    .argument('[question...]', 'the question; prompted for when omitted')
    .option('-k, --top-k <n>', 'number of chunks to retrieve', parseTopK)
    .action(async (channelName: string, words: string[] | undefined, options: { topK?: number }) => {
        await withServices(async ({ logger, indexHandler, embedder }, config) => {
            const question = words && words.length > 0
                ? words.join(' ')
                : await input({ message: chalk.cyan('Question:'), validate: (value) => value.trim().length > 0 || 'Please enter a question' });

            const queryHandler = new QueryHandler(indexHandler, embedder(), logger.child('query'), options.topK ?? config.topK);
            await answerQuestion(queryHandler, new FileHistoryStore(config.historyDir), channelName, question);
        });
    })

program
    .command('chat')
    .description('Ask questions about a channel interactively')
    .argument('<channel>', 'channel name, with or without @', toChannelName)
    .action(async (channelName: string) => {
        await withServices(async ({ logger, indexHandler, embedder }, config) => {
            const queryHandler = new QueryHandler(indexHandler, embedder(), logger.child('query'), config.topK);
            const history = new FileHistoryStore(config.historyDir);

            console.log(chalk.blue(`\n🎬 Ask questions about ${channelName}, or type 'exit' to quit.\n`));

            while (true) {
                let question: string;
                try {
                    question = await input({ message: chalk.cyan('>') });
                } catch (error) {
                    // Ctrl+C closes the prompt.
                    if (error instanceof Error && error.name === 'ExitPromptError') break;
                    throw error;
                }
                if (EXIT_WORDS.has(question.trim().toLowerCase())) break;
                if (!question.trim()) continue;

                try {
                    await answerQuestion(queryHandler, history, channelName, question);
                } catch (error) {
                    logger.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
                }
            }
        });
    })

program
    .command('stats')
    .description('Show the published index of a channel')
    .argument('<channel>', 'channel name, with or without @', toChannelName)
    .action(async (channelName: string) => {
        await withServices(async ({ indexHandler }) => {
            const result = await indexHandler.describe(channelName);
            if (!result.ok) {
                console.log(chalk.yellow(describeError(result.error)));
                process.exitCode = 1;
                return;
            }
            const { chunkCount, dimension, buildTimestamp } = result.value;
            console.log(`${chalk.bold(channelName)}: ${chunkCount} chunks, dimension ${dimension}, built ${buildTimestamp}`);
        });
    })

program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`));
    process.exitCode = 1;
});
