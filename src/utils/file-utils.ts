import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

export const CONFIG_FILENAME = 'dendritecli.toml';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true, mode: 0o755 });
}

/**
 * Write a file atomically (write to temp, then rename).
 * The config file holds an access token, so it is only readable by its owner.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, content, { encoding: 'utf-8', mode: 0o600 });
  await fs.rename(tempPath, filePath);
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Default config file location: ~/.config/dendritecli.toml when ~/.config
 * exists, otherwise ~/.dendritecli.toml
 */
export async function getDefaultConfigPath(homeDir: string = os.homedir()): Promise<string> {
  const xdgDir = path.join(homeDir, '.config');
  if (await directoryExists(xdgDir)) {
    return path.join(xdgDir, CONFIG_FILENAME);
  }
  return path.join(homeDir, `.${CONFIG_FILENAME}`);
}

/**
 * Expand tilde (~) in path to home directory
 */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === '~') {
    return homeDir;
  }
  if (filePath.startsWith('~/')) {
    return path.join(homeDir, filePath.slice(2));
  }
  return filePath;
}
