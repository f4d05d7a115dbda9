/**
 * Scoped XenAPI sessions
 *
 * A session is opened for exactly one unit of work and logged out on every exit path.
 */

import { AuthenticationError, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { SessionRef, XenCredentials, XenSessionClient } from './types.js';

export async function withSession<T>(
  client: XenSessionClient,
  credentials: XenCredentials,
  work: (session: SessionRef) => Promise<T>,
  logger?: Logger
): Promise<T> {
  let session: SessionRef;
  try {
    session = await client.login(credentials);
  } catch (error) {
    const cause = toError(error);
    throw new AuthenticationError(
      `Could not connect to XenServer: ${cause.message}`,
      { username: credentials.username },
      cause
    );
  }

  logger?.debug('XenAPI session opened');

  try {
    return await work(session);
  } finally {
    try {
      await client.logout(session);
      logger?.debug('XenAPI session closed');
    } catch (error) {
      // A logout failure must not replace the work's result or error
      logger?.warn('XenAPI logout failed', { error: toError(error).message });
    }
  }
}
