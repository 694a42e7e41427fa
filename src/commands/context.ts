import { ConfigLoader, SettingsOverrides } from '../lib/config-loader';
import { Logger } from '../lib/logger';
import { AdminApi } from '../types/admin-types';
import { Settings } from '../types/settings';
import { Prompter } from '../utils/prompt-utils';

/**
 * Everything a command needs from the program, created once per invocation
 */
export interface CommandContext {
  readonly logger: Logger;
  readonly prompter: Prompter;
  readonly loader: ConfigLoader;
  readonly configPath?: string;
  readonly overrides: SettingsOverrides;      // from global flags

  /** Write a result to stdout */
  print(text: string): void;

  /** Settings from every layer; prompts for the token when none is configured */
  settings(): Promise<Settings>;

  /** The manager for this invocation, created on first use */
  manager(): Promise<AdminApi>;
}

/**
 * Ask each question in turn unless `skip` is set. False as soon as one is declined.
 */
export async function confirmAll(context: CommandContext, questions: string[], skip = false): Promise<boolean> {
  if (skip) {
    return true;
  }
  for (const question of questions) {
    if (!(await context.prompter.confirm(question))) {
      context.logger.info('Cancelled');
      return false;
    }
  }
  return true;
}

/**
 * Make sure the target was evacuated, offering to do it now. False when the
 * user declines both.
 */
export async function ensureEvacuated(
  context: CommandContext,
  target: string,
  alreadyEvacuated: boolean,
  evacuate: () => Promise<void>
): Promise<boolean> {
  if (alreadyEvacuated) {
    return true;
  }
  if (await context.prompter.confirm(`Have you already evacuated ${target}?`)) {
    return true;
  }
  if (await context.prompter.confirm(`Evacuate ${target} now?`)) {
    await evacuate();
    return true;
  }
  context.logger.warn('Aborting. Evacuate first or pass --i-have-evacuated.');
  return false;
}

export interface ListCommandOptions {
  pageSize?: number;
  json?: boolean;
  databaseUri?: string;
}

/**
 * Store the database URI in the config file. Listings never read from it.
 */
export async function rememberDatabaseUri(context: CommandContext, databaseUri: string): Promise<void> {
  const location = await context.loader.resolveConfigPath(context.configPath);
  await context.loader.setValue(location.path, 'database_uri', databaseUri);
  context.logger.debug(`Saved database_uri to ${location.path}`);
}
