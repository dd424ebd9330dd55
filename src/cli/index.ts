#!/usr/bin/env node

import { Command } from 'commander';
import { handleAsk, handleBatch, handleStream, type AskCommandOptions } from './commands/ask.js';
import { handleDelete, handleDocuments, handleIngest } from './commands/documents.js';
import {
  handleExport,
  handleHistory,
  handlePatterns,
  handleReport,
  handleSuggest,
  handleWipe,
} from './commands/owner.js';
import { handleReindex, handleStatus } from './commands/status.js';
import { run } from './utils/command-runner.js';
import { parseList, parseNonNegativeInt, parseNumber, parsePositiveInt } from './utils/options.js';

interface GlobalOptions {
  owner?: string;
}

const program = new Command();

program
  .name('groundwork')
  .description('Answer questions from your own documents')
  .version('1.0.0')
  .option('-o, --owner <id>', 'owner whose documents to use (defaults to GROUNDWORK_DEFAULT_OWNER)');

const owner = (): string | undefined => program.opts<GlobalOptions>().owner;

function withQuestionOptions(command: Command): Command {
  return command
    .option('-k, --k <number>', 'number of chunks to retrieve', parsePositiveInt)
    .option('--max-context <chars>', 'maximum context length in characters', parsePositiveInt)
    .option('--documents <ids>', 'comma-separated document ids to search', parseList)
    .option('--temperature <number>', 'sampling temperature (0-2)', parseNumber)
    .option('--top-p <number>', 'nucleus sampling probability (0-1]', parseNumber)
    .option('--max-tokens <number>', 'maximum answer length in tokens', parsePositiveInt);
}

function questionCommand(name: string, description: string): Command {
  return withQuestionOptions(
    program.command(name).argument('<question...>', 'question to answer').description(description)
  );
}

// Documents
program
  .command('ingest')
  .argument('<file>', 'text file to ingest')
  .description('chunk, embed and index a document')
  .option('-t, --title <title>', 'document title (defaults to the file name)')
  .option('--chunk-size <chars>', 'target chunk size in characters', parsePositiveInt)
  .option('--overlap <chars>', 'overlap between chunks in characters', parseNonNegativeInt)
  .action((file: string, options: { title?: string; chunkSize?: number; overlap?: number }) =>
    run(owner(), ctx => handleIngest(ctx, file, options))
  );

program
  .command('documents')
  .description('list stored documents')
  .option('--json', 'output as JSON')
  .action((options: { json?: boolean }) => run(owner(), ctx => handleDocuments(ctx, options)));

program
  .command('delete')
  .argument('<documentId>', 'document to delete')
  .description('delete a document with its chunks and vectors')
  .action((documentId: string) => run(owner(), ctx => handleDelete(ctx, documentId)));

program
  .command('reindex')
  .description('re-embed every stored chunk (after changing the embedding model)')
  .action(() => run(owner(), handleReindex));

// Questions
questionCommand('ask', 'answer a question').action((words: string[], options: AskCommandOptions) =>
  run(owner(), ctx => handleAsk(ctx, words.join(' '), options))
);

questionCommand('stream', 'answer a question, printing the answer as it is generated').action(
  (words: string[], options: AskCommandOptions) => run(owner(), ctx => handleStream(ctx, words.join(' '), options))
);

withQuestionOptions(
  program
    .command('batch')
    .argument('<file>', 'file with one question per line')
    .description('answer every line of a file as a question')
).action((file: string, options: AskCommandOptions) => run(owner(), ctx => handleBatch(ctx, file, options)));

program
  .command('history')
  .description('show recent questions and answers')
  .option('-n, --limit <number>', 'number of records', parsePositiveInt)
  .option('--json', 'output as JSON')
  .action((options: { limit?: number; json?: boolean }) => run(owner(), ctx => handleHistory(ctx, options)));

program
  .command('suggest')
  .description('suggest questions about your documents')
  .option('-d, --document <id>', 'base suggestions on one document')
  .action((options: { document?: string }) => run(owner(), ctx => handleSuggest(ctx, options)));

// Owner data
program
  .command('report')
  .description('usage report')
  .option('--days <number>', 'report period in days', parsePositiveInt)
  .option('--json', 'output as JSON')
  .action((options: { days?: number; json?: boolean }) => run(owner(), ctx => handleReport(ctx, options)));

program
  .command('patterns')
  .description('question types, busiest hour and daily rate')
  .option('--days <number>', 'period in days', parsePositiveInt)
  .option('--json', 'output as JSON')
  .action((options: { days?: number; json?: boolean }) => run(owner(), ctx => handlePatterns(ctx, options)));

program
  .command('export')
  .description('export documents, chunks and history as JSON')
  .option('--out <file>', 'write to a file instead of stdout')
  .action((options: { out?: string }) => run(owner(), ctx => handleExport(ctx, options)));

program
  .command('wipe')
  .description('delete all data of the owner')
  .option('-y, --yes', 'confirm deletion')
  .action((options: { yes?: boolean }) => run(owner(), ctx => handleWipe(ctx, options)));

program
  .command('status')
  .description('show configured backends')
  .option('--json', 'output as JSON')
  .action((options: { json?: boolean }) => run(owner(), ctx => handleStatus(ctx, options)));

await program.parseAsync(process.argv);
