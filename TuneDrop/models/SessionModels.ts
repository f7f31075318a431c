// SessionModels.ts
// -----------------------------------------------------------------------------
// Runtime session data the bot keeps between Telegram updates.  One entry is
// stored per user (keyed by their Telegram id) and every new search or link
// replaces it wholesale – entries are never merged.
// -----------------------------------------------------------------------------
//   • Candidate       – one search hit the user can pick.
//   • CandidateList   – the result list rendered after a text search.
//   • ResolvedTarget  – metadata of a single link the user sent directly.
//   • SessionPayload  – the tagged union saved under the user's id.
// -----------------------------------------------------------------------------

export interface Candidate {
  /** YouTube video id */
  id: string;
  title: string;
  channelName: string;
}

/**
 * Result of a text search.  Download buttons refer to items by index, so the
 * order must stay exactly as rendered.
 */
export interface CandidateList {
  kind: 'candidates';
  items: Candidate[];
  /** Query the list was produced for – reused by the lyrics buttons */
  originQuery: string;
}

/** A link the user sent directly, waiting for the confirm/cancel prompt. */
export interface ResolvedTarget {
  kind: 'resolved';
  item: Candidate;
  sourceLink: string;
}

export type SessionPayload = CandidateList | ResolvedTarget;

/** What the fetch step works on once a selection has been resolved. */
export interface DownloadTarget {
  item: Candidate;
  sourceLink: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isCandidate(value: unknown): value is Candidate {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.title === 'string' &&
    typeof value.channelName === 'string'
  );
}

/**
 * Type guard for payloads coming back from an external store (Redis keeps
 * plain JSON, so nothing guarantees the shape).
 */
export function isSessionPayload(value: unknown): value is SessionPayload {
  if (!isRecord(value)) return false;
  if (value.kind === 'candidates') {
    return (
      typeof value.originQuery === 'string' &&
      Array.isArray(value.items) &&
      value.items.every(isCandidate)
    );
  }
  if (value.kind === 'resolved') {
    return isCandidate(value.item) && typeof value.sourceLink === 'string';
  }
  return false;
}
