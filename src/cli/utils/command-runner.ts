import chalk from 'chalk';
import { ServiceContainer, type IServiceContainer } from '../../core/services/ServiceContainer.js';
import { getErrorMessage, isCancellation, isGroundworkError, logError } from '../../core/utils/errors.js';
import { getLogger } from '../../core/utils/logger.js';

const logger = getLogger('cli');

export interface CommandContext {
  services: IServiceContainer;
  owner: string;
  /** Aborted on Ctrl-C */
  signal: AbortSignal;
  /** Write a full line */
  print: (text: string) => void;
  /** Write without a trailing newline, for streamed output */
  write: (text: string) => void;
}

export type CommandHandler = (ctx: CommandContext) => Promise<void>;

/**
 * Run a command against the shared services. Errors are printed rather
 * than thrown and set a non-zero exit code; Ctrl-C aborts the context
 * signal and exits with 130.
 */
export async function run(owner: string | undefined, handler: CommandHandler): Promise<void> {
  const controller = new AbortController();
  const onSigint = () => {
    logger.debug('SIGINT received');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let services: ServiceContainer | undefined;
  try {
    services = ServiceContainer.getInstance();
    await handler({
      services,
      owner: owner ?? services.config.defaultOwner,
      signal: controller.signal,
      print: text => console.log(text),
      write: text => {
        process.stdout.write(text);
      },
    });
  } catch (error) {
    process.exitCode = reportError(error, controller.signal);
  } finally {
    process.removeListener('SIGINT', onSigint);
    if (services) {
      await ServiceContainer.reset().catch((error: unknown) => logError(error, 'closing services'));
    }
  }
}

/**
 * Print the failure and return the exit code for it.
 */
export function reportError(error: unknown, signal?: AbortSignal): number {
  if (isCancellation(error, signal)) {
    console.error(chalk.yellow('🚫 Operation cancelled'));
    return 130;
  }
  if (isGroundworkError(error)) {
    console.error(chalk.red(`❌ ${error.message}`), chalk.gray(`(${error.code})`));
  } else {
    console.error(chalk.red(`❌ ${getErrorMessage(error)}`));
  }
  logger.debug({ err: error }, 'Command failed');
  return 1;
}
