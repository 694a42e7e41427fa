import { resolveTimeout } from '../lib/config-loader';
import { DEFAULT_PASSWORD_MAX_BYTES, DEFAULT_SERVER } from '../types/settings';
import { fileExists } from '../utils/file-utils';
import { formatJson, maskSecret } from '../utils/format-utils';
import { CommandContext } from './context';

/**
 * Print the effective configuration (defaults, file, environment and flags
 * merged) with the access token masked
 */
export async function configShowCommand(context: CommandContext): Promise<void> {
  const { location, merged } = await context.loader.resolve({
    configPath: context.configPath,
    overrides: context.overrides,
  });

  const exists = await fileExists(location.path);
  context.logger.info(`📄 Config file: ${location.path}${exists ? '' : ' (not created yet)'}`);

  context.print(formatJson({
    access_token: merged.accessToken ? maskSecret(merged.accessToken) : null,
    server: merged.server ?? DEFAULT_SERVER,
    timeout: resolveTimeout(merged.timeout),
    proxies: merged.proxies ?? null,
    headers: merged.headers ?? {},
    'override-password-length-check': merged.overridePasswordLengthCheck ?? false,
    'password-max-bytes': merged.passwordMaxBytes ?? DEFAULT_PASSWORD_MAX_BYTES,
    database_uri: merged.databaseUri ?? null,
  }));
}

export async function configSetCommand(context: CommandContext, key: string, value: string): Promise<void> {
  const location = await context.loader.resolveConfigPath(context.configPath);
  await context.loader.setValue(location.path, key, value);
  context.logger.success(`✅ Set ${key} in ${location.path}`);
}

export async function configUnsetCommand(context: CommandContext, key: string): Promise<void> {
  const location = await context.loader.resolveConfigPath(context.configPath);
  await context.loader.unsetValue(location.path, key);
  context.logger.success(`✅ Removed ${key} from ${location.path}`);
}
