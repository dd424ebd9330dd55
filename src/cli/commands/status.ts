import chalk from 'chalk';
import type { CommandContext } from '../utils/command-runner.js';

export async function handleStatus(ctx: CommandContext, options: { json?: boolean } = {}): Promise<void> {
  const status = ctx.services.qa.backendStatus();

  if (options.json) {
    ctx.print(JSON.stringify(status, null, 2));
    return;
  }
  ctx.print(chalk.cyan('Generation chain:'));
  status.generation.forEach((backend, i) => ctx.print(`  ${i + 1}. ${backend.name} ${chalk.gray(`(${backend.kind})`)}`));
  ctx.print(`${chalk.cyan('Vector index:')} ${status.vector.kind} (${status.vector.dimension} dimensions)`);
  ctx.print(`${chalk.cyan('Embeddings:')} ${status.embedding.name} (${status.embedding.dimension} dimensions)`);
}

export async function handleReindex(ctx: CommandContext): Promise<void> {
  ctx.print(chalk.gray(`🔄 Re-embedding chunks of ${ctx.owner}...`));
  await ctx.services.vectorIndex.init();
  const { chunks } = await ctx.services.ingestion.reindexOwner(ctx.owner, ctx.signal);
  ctx.print(chalk.green(`✓ Reindexed ${chunks} chunk(s)`));
}
