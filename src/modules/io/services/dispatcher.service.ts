/**
 * Request Dispatcher
 * Per-request state machine turning polls into push/pull calls on a session.
 *
 * Side effects always run in this order:
 *   push (POST only) -> sweep (if due) -> pull -> remove if closed -> id header
 */

import { logger } from '@/shared/utils';
import { SESSION_COMMANDS } from '@/modules/session';
import type { Command, WebIOSession } from '@/modules/session';
import { errorCommands, toIoError } from '../handlers/error.handler';
import { parseClientEvent, withTimeout } from '../utils';
import { PushTimeoutError, RequestState } from '../types';
import type { DispatcherOptions, IoRequest, IoResponse } from '../types';

interface ResolvedSession {
  state: RequestState.NEW_SESSION | RequestState.EXISTING_SESSION;
  sessionId: string;
  session: WebIOSession;
}

export class IoDispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  /**
   * Classify a request by the session identifier it presents
   */
  classify(sessionId: string | undefined): RequestState {
    if (!sessionId) {
      return RequestState.NEW_SESSION;
    }
    return this.options.context.lookupSession(sessionId)
      ? RequestState.EXISTING_SESSION
      : RequestState.UNKNOWN_SESSION;
  }

  async dispatch(request: IoRequest): Promise<IoResponse> {
    const resolved = this.resolveSession(request.sessionId);

    if (!resolved) {
      logger.debug('Request for unknown session', { sessionId: request.sessionId });
      return this.respond([{ command: SESSION_COMMANDS.CLOSE_SESSION }]);
    }

    const { context } = this.options;
    const { sessionId, session, state } = resolved;
    const isNew = state === RequestState.NEW_SESSION;

    if (request.method === 'POST') {
      try {
        await this.push(session, request.body);
      } catch (error) {
        const ioError = toIoError(error);
        if (ioError.statusCode >= 500) {
          logger.error('Push to session failed', error, { sessionId });
        } else {
          logger.warn('Rejected client event', { sessionId, reason: ioError.message });
        }
        // The client never learnt this id, so nobody could collect what is left
        if (isNew && session.isClosed()) {
          context.removeSession(sessionId);
        }
        return this.respond(
          errorCommands(ioError),
          ioError.statusCode,
          this.idHeader(sessionId, session, isNew)
        );
      }
    }

    context.sweepIfDue();

    const messages = session.pull();

    if (session.isClosed()) {
      context.removeSession(sessionId);
      return this.respond(messages);
    }

    return this.respond(messages, 200, this.idHeader(sessionId, session, isNew));
  }

  private resolveSession(sessionId: string | undefined): ResolvedSession | undefined {
    const { context, factory } = this.options;

    if (!sessionId) {
      const created = context.createSession(factory);
      return { state: RequestState.NEW_SESSION, ...created };
    }

    const session = context.lookupSession(sessionId);
    if (!session) {
      return undefined;
    }

    context.touchSession(sessionId);
    return { state: RequestState.EXISTING_SESSION, sessionId, session };
  }

  private async push(session: WebIOSession, body: unknown): Promise<void> {
    const event = parseClientEvent(body);
    const { pushTimeoutMs } = this.options;
    await withTimeout(
      Promise.resolve(session.push(event)),
      pushTimeoutMs,
      () => new PushTimeoutError(pushTimeoutMs)
    );
  }

  private idHeader(sessionId: string, session: WebIOSession, isNew: boolean): Record<string, string> {
    if (!isNew || session.isClosed()) {
      return {};
    }
    return { [this.options.sessionHeader]: sessionId };
  }

  private respond(
    body: Command[],
    status = 200,
    headers: Record<string, string> = {}
  ): IoResponse {
    return { status, body, headers };
  }
}
