import { Command, Option } from 'commander';
import { HttpApiManager } from './lib/api-manager';
import { ConfigLoader, SettingsOverrides, parseSeconds } from './lib/config-loader';
import { ConfigurationError, describeError } from './lib/errors';
import { LOG_LEVELS, LogLevel, Logger, isLogLevel } from './lib/logger';
import { AdminApi } from './types/admin-types';
import { CLI_VERSION, Settings } from './types/settings';
import { Prompter, createTerminalPrompter } from './utils/prompt-utils';
import { CommandContext } from './commands/context';
import { registerCommand, RegisterCommandOptions } from './commands/register';
import { evacuateRoomCommand, evacuateUserCommand, EvacuateOptions } from './commands/evacuate';
import { purgeRoomCommand, PurgeRoomOptions } from './commands/purge-room';
import { refreshDevicesCommand } from './commands/refresh-devices';
import { reindexEventsCommand } from './commands/reindex-events';
import { whoisCommand } from './commands/whois';
import { listAccountsCommand } from './commands/list-accounts';
import { listRoomsCommand } from './commands/list-rooms';
import { deactivateAccountCommand, DeactivateAccountOptions } from './commands/deactivate-account';
import { resetPasswordCommand, ResetPasswordCommandOptions } from './commands/reset-password';
import { serverNoticeCommand } from './commands/server-notice';
import { configSetCommand, configShowCommand, configUnsetCommand } from './commands/config';
import { ListCommandOptions } from './commands/context';

type GlobalOptions = {
  config?: string;
  server?: string;
  accessToken?: string;
  timeout?: number;
  logLevel?: LogLevel;
};

export interface ProgramDependencies {
  env?: NodeJS.ProcessEnv;
  loader?: ConfigLoader;
  prompter?: Prompter;
  createManager?: (settings: Settings, logger: Logger) => AdminApi;
  stdout?: (text: string) => void;
  stderr?: (line: string) => void;
  setExitCode?: (code: number) => void;
}

const LOG_LEVEL_ENV = 'DENDRITECLI_LOG_LEVEL';

/**
 * Build the dendritecli program. Every dependency can be replaced, which is
 * how the tests drive it without a terminal or a real server.
 */
export function createProgram(deps: ProgramDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const loader = deps.loader ?? new ConfigLoader({ env });
  const prompter = deps.prompter ?? createTerminalPrompter();
  const createManager =
    deps.createManager ?? ((settings: Settings, logger: Logger) => HttpApiManager.fromSettings(settings, { logger }));
  const stdout = deps.stdout ?? ((text: string) => console.log(text));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));
  const setExitCode = deps.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });

  const resolveLogLevel = (flag: LogLevel | undefined): LogLevel => {
    if (flag) return flag;
    const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
    if (!fromEnv) return 'info';
    if (!isLogLevel(fromEnv)) {
      throw new ConfigurationError(`Invalid ${LOG_LEVEL_ENV}: "${fromEnv}". Use one of ${LOG_LEVELS.join(', ')}`, LOG_LEVEL_ENV);
    }
    return fromEnv;
  };

  const createContext = (globals: GlobalOptions, logger: Logger) => {
    const overrides: SettingsOverrides = {
      server: globals.server,
      accessToken: globals.accessToken,
      timeout: globals.timeout,
    };

    let settings: Promise<Settings> | undefined;
    let manager: AdminApi | undefined;

    const loadSettings = async (): Promise<Settings> => {
      let promptedToken: string | undefined;
      const loaded = await loader.load({
        configPath: globals.config,
        overrides,
        promptForToken: prompter.interactive
          ? async () => {
              promptedToken = await prompter.secret('Access token');
              return promptedToken;
            }
          : undefined,
      });

      if (promptedToken) {
        const location = await loader.resolveConfigPath(globals.config);
        await loader.setValue(location.path, 'access_token', promptedToken.trim());
        logger.info(`Saved access token to ${location.path}`);
      }
      return loaded;
    };

    const context: CommandContext = {
      logger,
      prompter,
      loader,
      configPath: globals.config,
      overrides,
      print: stdout,
      settings: () => {
        settings ??= loadSettings();
        return settings;
      },
      manager: async () => {
        if (!manager) {
          const loaded = await context.settings();
          logger.debug(`Using ${loaded.server}`);
          manager = createManager(loaded, logger);
        }
        return manager;
      },
    };

    const close = (): void => {
      manager?.close();
    };

    return { context, close };
  };

  const run = async (command: Command, action: (context: CommandContext) => Promise<void>): Promise<void> => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    let logger = new Logger('error', stderr);
    let close = (): void => {};
    try {
      logger = new Logger(resolveLogLevel(globals.logLevel), stderr);
      const created = createContext(globals, logger);
      close = created.close;
      await action(created.context);
    } catch (error) {
      const report = describeError(error);
      logger.error(`❌ Error: ${report.title === 'Error' ? '' : `${report.title}: `}${report.message}`);
      setExitCode(report.exitCode);
    } finally {
      close();
    }
  };

  const program = new Command();

  program
    .name('dendritecli')
    .description('Manage a Dendrite server through its admin API')
    .version(CLI_VERSION)
    .option('-c, --config <path>', 'Config file (default: ~/.config/dendritecli.toml)')
    .option('-s, --server <url>', 'Dendrite server URL (default: from config, else http://localhost:8008)')
    .option('-t, --access-token <token>', 'Admin access token (default: from config, else prompts)')
    .option('--timeout <seconds>', 'Timeout for each request phase, in seconds', (value: string) => parseSeconds(value, '--timeout'))
    .addOption(new Option('-l, --log-level <level>', 'Log level').choices(LOG_LEVELS));

  program
    .command('register')
    .description('Register a user with the registration shared secret')
    .argument('<shared-secret>', 'registration_shared_secret from the Dendrite config')
    .argument('<username>', 'Localpart of the new user')
    .option('-d, --display-name <name>', 'Display name (default: the username)')
    .option('--admin', 'Register as a server admin')
    .option('-p, --password <password>', 'Password (prompted for when omitted)')
    .action(async (sharedSecret: string, username: string, options: RegisterCommandOptions, command: Command) => {
      await run(command, (context) => registerCommand(context, sharedSecret, username, options));
    });

  program
    .command('evacuate-room')
    .description('Make every local user leave a room')
    .argument('<room>', 'Room ID or alias')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (room: string, options: EvacuateOptions, command: Command) => {
      await run(command, (context) => evacuateRoomCommand(context, room, options));
    });

  program
    .command('evacuate-user')
    .description('Make a local user leave every room')
    .argument('<user>', 'Fully qualified user ID (@user:example.org)')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (user: string, options: EvacuateOptions, command: Command) => {
      await run(command, (context) => evacuateUserCommand(context, user, options));
    });

  program
    .command('purge-room')
    .description('Delete every event of a room. Irreversible.')
    .argument('<room>', 'Room ID or alias')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('--i-am-sure', 'Skip the confirmation prompts')
    .option('--i-have-evacuated', 'Skip the evacuation check')
    .action(async (room: string, options: PurgeRoomOptions, command: Command) => {
      await run(command, (context) => purgeRoomCommand(context, room, options));
    });

  program
    .command('refresh-devices')
    .alias('refresh-device')
    .description("Re-query a remote user's devices and keys")
    .argument('<user>', 'Fully qualified user ID')
    .action(async (user: string, _options: object, command: Command) => {
      await run(command, (context) => refreshDevicesCommand(context, user));
    });

  program
    .command('reindex-events')
    .description('Rebuild the full-text search index in the background')
    .action(async (_options: object, command: Command) => {
      await run(command, (context) => reindexEventsCommand(context));
    });

  program
    .command('whois')
    .description("Show a user's devices and sessions")
    .argument('<user>', 'Fully qualified user ID')
    .action(async (user: string, _options: object, command: Command) => {
      await run(command, (context) => whoisCommand(context, user));
    });

  program
    .command('list-accounts')
    .description('List every account through /_synapse/admin/v2/users, which not every Dendrite release serves')
    .option('--page-size <number>', 'Accounts per request', (value: string) => Number(value))
    .option('--json', 'Print JSON instead of a table')
    .option('-D, --database-uri <uri>', 'Store a database URI in the config file')
    .action(async (options: ListCommandOptions, command: Command) => {
      await run(command, (context) => listAccountsCommand(context, options));
    });

  program
    .command('list-rooms')
    .description('List the rooms published in the room directory')
    .option('--page-size <number>', 'Rooms per request', (value: string) => Number(value))
    .option('--json', 'Print JSON instead of a table')
    .option('-D, --database-uri <uri>', 'Store a database URI in the config file')
    .action(async (options: ListCommandOptions, command: Command) => {
      await run(command, (context) => listRoomsCommand(context, options));
    });

  program
    .command('deactivate-account')
    .description('Deactivate and erase an account')
    .argument('<user>', 'Fully qualified user ID')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('--i-have-evacuated', 'Skip the evacuation check')
    .action(async (user: string, options: DeactivateAccountOptions, command: Command) => {
      await run(command, (context) => deactivateAccountCommand(context, user, options));
    });

  program
    .command('reset-password')
    .description("Reset a user's password")
    .argument('<user>', 'Fully qualified user ID')
    .option('-p, --password <password>', 'New password (prompted for when omitted; blank for random)')
    .option('-L, --logout-devices', 'Log out every device and invalidate all tokens')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (user: string, options: ResetPasswordCommandOptions, command: Command) => {
      await run(command, (context) => resetPasswordCommand(context, user, options));
    });

  program
    .command('server-notice')
    .description('Send a server notice to a user')
    .argument('<user>', 'Fully qualified user ID')
    .argument('<message>', 'Notice text')
    .action(async (user: string, message: string, _options: object, command: Command) => {
      await run(command, (context) => serverNoticeCommand(context, user, message));
    });

  const config = program
    .command('config')
    .description('Show or change the config file');

  config
    .command('show')
    .description('Show the effective configuration')
    .action(async (_options: object, command: Command) => {
      await run(command, (context) => configShowCommand(context));
    });

  config
    .command('set')
    .description('Set a key, e.g. server, timeout, headers.X-Name or proxies.https')
    .argument('<key>', 'Config key')
    .argument('<value>', 'New value')
    .action(async (key: string, value: string, _options: object, command: Command) => {
      await run(command, (context) => configSetCommand(context, key, value));
    });

  config
    .command('unset')
    .description('Remove a key from the config file')
    .argument('<key>', 'Config key')
    .action(async (key: string, _options: object, command: Command) => {
      await run(command, (context) => configUnsetCommand(context, key));
    });

  return program;
}
