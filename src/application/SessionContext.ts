import type { ISession } from '../domain/ports/ISession.js';

/**
 * View of the controller's connection that the other components work against.
 * Calls made through it are already inside the controller's serial section.
 */
export interface SessionContext {
  readonly endpoint: string;
  readonly session: ISession | null;
  readonly operating: boolean;

  /** Opens a session with the remembered connect options */
  connect(): Promise<boolean>;
}

/**
 * The session, when it exists, is connected and the controller is operating
 */
export function usableSession(context: SessionContext): ISession | null {
  const session = context.session;
  if (session === null || !context.operating || !session.connected) return null;
  return session;
}
