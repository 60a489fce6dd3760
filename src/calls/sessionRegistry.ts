import type { CallIdentifier } from './types';

export type CreateResult<S> = { ok: true; session: S } | { ok: false; reason: 'duplicate_call_identifier' };

/**
 * Live sessions keyed by call identifier. Check-and-insert happens in one
 * synchronous step, so two starts for the same call cannot both succeed.
 */
export class SessionRegistry<S> {
  private readonly sessions = new Map<CallIdentifier, S>();

  public createOrReject(callId: CallIdentifier, create: () => S): CreateResult<S> {
    if (this.sessions.has(callId)) {
      return { ok: false, reason: 'duplicate_call_identifier' };
    }
    const session = create();
    this.sessions.set(callId, session);
    return { ok: true, session };
  }

  public lookup(callId: CallIdentifier): S | undefined {
    return this.sessions.get(callId);
  }

  /**
   * Removes the entry. When `session` is given, only that exact session is
   * removed, so a late close from an old session never evicts a newer one.
   */
  public remove(callId: CallIdentifier, session?: S): boolean {
    const current = this.sessions.get(callId);
    if (current === undefined) {
      return false;
    }
    if (session !== undefined && current !== session) {
      return false;
    }
    return this.sessions.delete(callId);
  }

  public get size(): number {
    return this.sessions.size;
  }

  public ids(): CallIdentifier[] {
    return [...this.sessions.keys()];
  }

  public values(): S[] {
    return [...this.sessions.values()];
  }
}
