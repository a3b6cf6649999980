export type AnalysisState =
  | 'UNAUTHENTICATED'
  | 'RATE_CHECKING'
  | 'VALIDATING'
  | 'AWAITING_READINESS'
  | 'GENERATING'
  | 'NORMALIZING'
  | 'COMMITTING'
  | 'CLEANUP'
  | 'DONE'
  | 'REJECTED'
  | 'RATE_LIMITED'
  | 'ABORTING'
  | 'ERRORED';

export type AnalysisEvent =
  | { type: 'AUTHENTICATED' }
  | { type: 'AUTH_FAILED' }
  | { type: 'RATE_ALLOWED' }
  | { type: 'RATE_DENIED' }
  | { type: 'VALIDATION_SUCCEEDED' }
  | { type: 'VALIDATION_FAILED' }
  | { type: 'ARTIFACT_READY' }
  | { type: 'GENERATED' }
  | { type: 'NORMALIZED' }
  | { type: 'COMMITTED' }
  | { type: 'CLEANED_UP' }
  | { type: 'FAILED'; reason: 'cancelled' | 'processing' | 'upstream' | 'malformed' | 'unexpected' };

// States in which an artifact reference has been validated and must be
// cleaned up before the request can end.
const HOLDS_ARTIFACT: ReadonlySet<AnalysisState> = new Set([
  'AWAITING_READINESS',
  'GENERATING',
  'NORMALIZING',
  'COMMITTING',
]);

export function isTerminal(state: AnalysisState): boolean {
  return state === 'DONE' || state === 'REJECTED' || state === 'RATE_LIMITED' || state === 'ERRORED';
}

export function transition(current: AnalysisState, event: AnalysisEvent): AnalysisState {
  if (event.type === 'FAILED' && !isTerminal(current) && current !== 'ABORTING') {
    if (current === 'CLEANUP') return 'DONE';
    return HOLDS_ARTIFACT.has(current) ? 'ABORTING' : 'ERRORED';
  }

  switch (current) {
    case 'UNAUTHENTICATED':
      if (event.type === 'AUTHENTICATED') return 'RATE_CHECKING';
      if (event.type === 'AUTH_FAILED') return 'REJECTED';
      break;
    case 'RATE_CHECKING':
      if (event.type === 'RATE_ALLOWED') return 'VALIDATING';
      if (event.type === 'RATE_DENIED') return 'RATE_LIMITED';
      break;
    case 'VALIDATING':
      if (event.type === 'VALIDATION_SUCCEEDED') return 'AWAITING_READINESS';
      if (event.type === 'VALIDATION_FAILED') return 'REJECTED';
      break;
    case 'AWAITING_READINESS':
      if (event.type === 'ARTIFACT_READY') return 'GENERATING';
      break;
    case 'GENERATING':
      if (event.type === 'GENERATED') return 'NORMALIZING';
      break;
    case 'NORMALIZING':
      if (event.type === 'NORMALIZED') return 'COMMITTING';
      break;
    case 'COMMITTING':
      if (event.type === 'COMMITTED') return 'CLEANUP';
      break;
    case 'CLEANUP':
      if (event.type === 'CLEANED_UP') return 'DONE';
      break;
    case 'ABORTING':
      if (event.type === 'CLEANED_UP') return 'ERRORED';
      break;
    case 'DONE':
    case 'REJECTED':
    case 'RATE_LIMITED':
    case 'ERRORED':
      return current;
  }
  return current;
}
