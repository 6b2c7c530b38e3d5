import type { DeviceTokenRow, UserId } from './types';

/**
 * Group token rows by owner. Blank tokens are dropped and repeated token
 * strings collapse to one entry per user; users left with nothing are omitted.
 */
export function groupTokensByUser(rows: readonly DeviceTokenRow[]): Map<UserId, string[]> {
  const grouped = new Map<UserId, Set<string>>();

  for (const { userId, token } of rows) {
    if (token === null || token.trim().length === 0) continue;

    let tokens = grouped.get(userId);
    if (!tokens) {
      tokens = new Set<string>();
      grouped.set(userId, tokens);
    }
    tokens.add(token);
  }

  return new Map(Array.from(grouped, ([userId, tokens]) => [userId, Array.from(tokens)]));
}
