import fs from 'node:fs/promises';
import chalk from 'chalk';
import type { AskOptions } from '../../core/services/QAService.js';
import { GroundworkError, InvalidParametersError, SessionCancelledError, getErrorMessage } from '../../core/utils/errors.js';
import type { CommandContext } from '../utils/command-runner.js';

export interface AskCommandOptions {
  k?: number;
  maxContext?: number;
  documents?: string[];
  temperature?: number;
  topP?: number;
  maxTokens?: number;
}

export function toAskOptions(options: AskCommandOptions): Omit<AskOptions, 'signal'> {
  return {
    k: options.k,
    maxContextLength: options.maxContext,
    documentIds: options.documents,
    generation: {
      temperature: options.temperature,
      topP: options.topP,
      maxOutputTokens: options.maxTokens,
    },
  };
}

export async function handleAsk(ctx: CommandContext, question: string, options: AskCommandOptions = {}): Promise<void> {
  const result = await ctx.services.qa.ask(ctx.owner, question, { ...toAskOptions(options), signal: ctx.signal });

  for (const notice of result.fallbacks) {
    ctx.print(chalk.yellow(`⚠️  ${notice.from} failed (${notice.reason}); used ${notice.to}`));
  }
  ctx.print(result.answer);
  ctx.print(
    chalk.gray(`\n${result.backend} · ${result.chunkIds.length} context chunk(s) · ${result.elapsedMs}ms`)
  );
}

/**
 * Print a streamed answer as it arrives. Ctrl-C cancels the session.
 */
export async function handleStream(
  ctx: CommandContext,
  question: string,
  options: AskCommandOptions = {}
): Promise<void> {
  const session = await ctx.services.qa.stream(ctx.owner, question, toAskOptions(options));
  const onAbort = () => session.cancel();
  ctx.signal.addEventListener('abort', onAbort, { once: true });
  if (ctx.signal.aborted) session.cancel();

  try {
    for await (const event of session.events()) {
      switch (event.type) {
        case 'status':
          if (event.status === 'fallback') {
            ctx.print(chalk.yellow(`\n⚠️  ${event.message}`));
          } else {
            ctx.print(chalk.gray(`… ${event.message}`));
          }
          break;
        case 'chunk':
          ctx.write(event.content);
          break;
        case 'complete':
          ctx.print(chalk.gray(`\n\n${event.backend} · ${event.chunkCount} context chunk(s) · ${event.elapsedMs}ms`));
          break;
        case 'error':
          throw new GroundworkError(event.message, event.kind);
      }
    }
  } finally {
    ctx.signal.removeEventListener('abort', onAbort);
  }

  if (session.state === 'cancelled') {
    throw new SessionCancelledError();
  }
}

/**
 * Answer every non-empty line of a file as its own question.
 */
export async function handleBatch(ctx: CommandContext, file: string, options: AskCommandOptions = {}): Promise<void> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new InvalidParametersError(`Cannot read ${file}: ${getErrorMessage(error)}`, { cause: error });
  }
  const questions = content
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);

  const items = await ctx.services.qa.askMany(ctx.owner, questions, { ...toAskOptions(options), signal: ctx.signal });

  items.forEach((item, i) => {
    ctx.print(chalk.cyan(`${i + 1}. ${item.question}`));
    if (item.status === 'answered') {
      ctx.print(item.result.answer);
      ctx.print(chalk.gray(`   ${item.result.backend} · ${item.result.elapsedMs}ms\n`));
    } else {
      ctx.print(chalk.red(`   ❌ ${item.message} (${item.kind})\n`));
    }
  });
  const failed = items.filter(item => item.status === 'failed').length;
  ctx.print(`Answered ${items.length - failed} of ${items.length} question(s)`);
}
