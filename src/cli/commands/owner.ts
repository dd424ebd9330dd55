import fs from 'node:fs/promises';
import chalk from 'chalk';
import type { CommandContext } from '../utils/command-runner.js';
import { formatTimeAgo } from '../utils/options.js';

export async function handleHistory(ctx: CommandContext, options: { limit?: number; json?: boolean } = {}): Promise<void> {
  const records = await ctx.services.qa.history(ctx.owner, options.limit);

  if (options.json) {
    ctx.print(JSON.stringify(records, null, 2));
    return;
  }
  if (records.length === 0) {
    ctx.print('📭 No questions asked yet.');
    return;
  }
  for (const record of records) {
    ctx.print(chalk.cyan(`Q: ${record.question}`));
    ctx.print(`A: ${record.answer}`);
    ctx.print(
      chalk.gray(`   ${record.backend} · ${record.mode} · ${record.elapsedMs}ms · ${formatTimeAgo(new Date(record.createdAt))}\n`)
    );
  }
}

export async function handleSuggest(ctx: CommandContext, options: { document?: string } = {}): Promise<void> {
  const suggestions = await ctx.services.qa.suggestQuestions(ctx.owner, options.document);
  if (suggestions.length === 0) {
    ctx.print('📭 No documents found to base suggestions on.');
    return;
  }
  suggestions.forEach((suggestion, i) => ctx.print(`${i + 1}. ${suggestion}`));
}

export async function handleReport(ctx: CommandContext, options: { days?: number; json?: boolean } = {}): Promise<void> {
  const report = await ctx.services.qa.usageReport(ctx.owner, options.days);

  if (options.json) {
    ctx.print(JSON.stringify(report, null, 2));
    return;
  }
  const { documents, queries, limits } = report;
  ctx.print(chalk.cyan(`Usage for ${report.ownerId}, last ${report.periodDays} day(s)`));
  ctx.print(`  Documents: ${documents.total} (${documents.recent} recent, ${documents.chunks} chunks)`);
  ctx.print(`  Questions: ${queries.total} (${queries.recent} recent, mean ${queries.meanResponseMs}ms)`);
  for (const [day, count] of Object.entries(queries.daily).sort(([a], [b]) => a.localeCompare(b))) {
    ctx.print(chalk.gray(`    ${day}: ${count}`));
  }
  ctx.print(
    `  Limits: ${limits.documentsRemaining}/${limits.maxDocuments} documents left, ` +
      (limits.rateLimitEnabled ? `${limits.maxQueriesPerHour} questions per hour` : 'no rate limit')
  );
}

export async function handlePatterns(
  ctx: CommandContext,
  options: { days?: number; json?: boolean } = {}
): Promise<void> {
  const patterns = await ctx.services.qa.queryPatterns(ctx.owner, options.days);

  if (options.json) {
    ctx.print(JSON.stringify(patterns, null, 2));
    return;
  }
  if (patterns.totalQueries === 0) {
    ctx.print(`📭 No questions in the last ${patterns.periodDays} day(s).`);
    return;
  }
  ctx.print(chalk.cyan(`Question patterns for ${patterns.ownerId}, last ${patterns.periodDays} day(s)`));
  ctx.print(`  Questions: ${patterns.totalQueries} (${patterns.queriesPerDay} per day, mean ${patterns.meanResponseMs}ms)`);
  ctx.print(
    `  Types: ${Object.entries(patterns.questionTypes)
      .map(([word, count]) => `${word} ${count}`)
      .join(', ')}`
  );
  if (patterns.peakHour !== null) {
    ctx.print(`  Busiest hour: ${String(patterns.peakHour).padStart(2, '0')}:00 UTC`);
  }
}

export async function handleExport(ctx: CommandContext, options: { out?: string } = {}): Promise<void> {
  const data = await ctx.services.qa.exportOwnerData(ctx.owner);
  const json = JSON.stringify(data, null, 2);

  if (!options.out) {
    ctx.print(json);
    return;
  }
  await fs.writeFile(options.out, json, 'utf-8');
  ctx.print(
    chalk.green(
      `✓ Exported ${data.documents.length} document(s) and ${data.history.length} history record(s) to ${options.out}`
    )
  );
}

/**
 * Remove every document, chunk, vector and history record of the owner.
 * Refuses to run without `--yes`.
 */
export async function handleWipe(ctx: CommandContext, options: { yes?: boolean } = {}): Promise<void> {
  if (!options.yes) {
    ctx.print(chalk.yellow(`This deletes all data of ${ctx.owner}. Re-run with --yes to confirm.`));
    return;
  }
  const result = await ctx.services.ingestion.deleteOwner(ctx.owner);
  ctx.print(
    chalk.green(
      `✓ Removed ${result.documents} document(s), ${result.chunks} chunk(s), ${result.vectors} vector(s) and ${result.history} history record(s)`
    )
  );
}
