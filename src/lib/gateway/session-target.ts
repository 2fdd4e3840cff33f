import type { GatewaySession } from './types';

const PREFERRED_KINDS = new Set(['main', 'channel']);

/** First `main`/`channel` session, else the first session, else null. */
export const selectTargetSession = (sessions: readonly GatewaySession[]): string | null => {
  const preferred = sessions.find((session) => PREFERRED_KINDS.has(session.kind));
  return preferred?.key ?? sessions[0]?.key ?? null;
};
