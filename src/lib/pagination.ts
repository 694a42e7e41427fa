import { Logger } from './logger';

export interface Page<T> {
  items: T[];
  nextToken: string | null;
}

/**
 * Request pages until the server stops returning a continuation token and
 * concatenate their items in the order received. A token already seen ends
 * the listing instead of looping forever.
 */
export async function collectPages<T>(
  fetchPage: (token: string | null) => Promise<Page<T>>,
  logger: Logger
): Promise<T[]> {
  const items: T[] = [];
  const seen = new Set<string>();
  let token: string | null = null;
  let pageCount = 0;

  for (;;) {
    const page = await fetchPage(token);
    pageCount++;
    items.push(...page.items);
    logger.debug(`Page ${pageCount}: ${page.items.length} item(s), next token ${page.nextToken ?? 'none'}`);

    if (!page.nextToken) {
      break;
    }
    if (seen.has(page.nextToken)) {
      logger.warn(`Server repeated pagination token "${page.nextToken}", stopping after ${pageCount} page(s)`);
      break;
    }
    seen.add(page.nextToken);
    token = page.nextToken;
  }

  return items;
}

/**
 * Normalise the assorted token encodings servers use (string, number, null)
 */
export function toPageToken(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const token = String(value);
  return token === '' ? null : token;
}
