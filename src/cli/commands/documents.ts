import fs from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';
import { InvalidParametersError, getErrorMessage } from '../../core/utils/errors.js';
import type { CommandContext } from '../utils/command-runner.js';
import { formatTimeAgo } from '../utils/options.js';

export interface IngestOptions {
  title?: string;
  chunkSize?: number;
  overlap?: number;
}

export async function handleIngest(ctx: CommandContext, file: string, options: IngestOptions = {}): Promise<void> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new InvalidParametersError(`Cannot read ${file}: ${getErrorMessage(error)}`, { cause: error });
  }

  ctx.print(chalk.gray(`📥 Ingesting ${file}...`));
  const { document, deduplicated } = await ctx.services.ingestion.ingest(
    ctx.owner,
    {
      text,
      title: options.title ?? path.basename(file),
      chunkSize: options.chunkSize,
      overlap: options.overlap,
    },
    ctx.signal
  );

  if (deduplicated) {
    ctx.print(chalk.yellow(`⚠️  Identical content already stored as ${document.id} (${document.title})`));
    return;
  }
  ctx.print(chalk.green(`✓ Stored ${document.id} "${document.title}" in ${document.chunkCount} chunk(s)`));
}

export async function handleDocuments(ctx: CommandContext, options: { json?: boolean } = {}): Promise<void> {
  const documents = await ctx.services.ingestion.listDocuments(ctx.owner);

  if (options.json) {
    ctx.print(JSON.stringify(documents, null, 2));
    return;
  }
  if (documents.length === 0) {
    ctx.print('📭 No documents yet. Use "groundwork ingest <file>" to add one.');
    return;
  }

  for (const document of documents) {
    ctx.print(
      `${chalk.cyan(document.id)}  ${document.title}  ${chalk.gray(
        `${document.chunkCount} chunk(s), ${formatTimeAgo(new Date(document.createdAt))}`
      )}`
    );
  }
  ctx.print(`Total: ${documents.length} document${documents.length !== 1 ? 's' : ''}`);
}

export async function handleDelete(ctx: CommandContext, documentId: string): Promise<void> {
  const removed = await ctx.services.ingestion.deleteDocument(ctx.owner, documentId);
  ctx.print(removed ? chalk.green(`✓ Deleted ${documentId}`) : chalk.yellow(`Nothing to delete for ${documentId}`));
}
