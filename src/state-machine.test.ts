import assert from 'node:assert/strict';
import { test } from 'node:test';
import { isTerminal, transition, type AnalysisEvent, type AnalysisState } from './state-machine.js';

function run(events: AnalysisEvent[], from: AnalysisState = 'UNAUTHENTICATED'): AnalysisState {
  return events.reduce(transition, from);
}

test('state machine walks the success path', () => {
  let state = transition('UNAUTHENTICATED', { type: 'AUTHENTICATED' });
  assert.equal(state, 'RATE_CHECKING');
  state = transition(state, { type: 'RATE_ALLOWED' });
  assert.equal(state, 'VALIDATING');
  state = transition(state, { type: 'VALIDATION_SUCCEEDED' });
  assert.equal(state, 'AWAITING_READINESS');
  state = transition(state, { type: 'ARTIFACT_READY' });
  assert.equal(state, 'GENERATING');
  state = transition(state, { type: 'GENERATED' });
  assert.equal(state, 'NORMALIZING');
  state = transition(state, { type: 'NORMALIZED' });
  assert.equal(state, 'COMMITTING');
  state = transition(state, { type: 'COMMITTED' });
  assert.equal(state, 'CLEANUP');
  state = transition(state, { type: 'CLEANED_UP' });
  assert.equal(state, 'DONE');
});

test('rejections are terminal and sticky', () => {
  assert.equal(run([{ type: 'AUTH_FAILED' }]), 'REJECTED');
  const limited = run([{ type: 'AUTHENTICATED' }, { type: 'RATE_DENIED' }]);
  assert.equal(limited, 'RATE_LIMITED');
  assert.equal(transition(limited, { type: 'RATE_ALLOWED' }), 'RATE_LIMITED');
  assert.equal(transition(limited, { type: 'FAILED', reason: 'unexpected' }), 'RATE_LIMITED');
  assert.equal(run([{ type: 'AUTHENTICATED' }, { type: 'RATE_ALLOWED' }, { type: 'VALIDATION_FAILED' }]), 'REJECTED');
});

test('failures while holding an artifact go through cleanup', () => {
  for (const from of ['AWAITING_READINESS', 'GENERATING', 'NORMALIZING', 'COMMITTING'] as const) {
    const aborting = transition(from, { type: 'FAILED', reason: 'processing' });
    assert.equal(aborting, 'ABORTING');
    assert.equal(transition(aborting, { type: 'CLEANED_UP' }), 'ERRORED');
  }
});

test('failures before validation skip cleanup', () => {
  assert.equal(transition('RATE_CHECKING', { type: 'FAILED', reason: 'unexpected' }), 'ERRORED');
  assert.equal(transition('VALIDATING', { type: 'FAILED', reason: 'unexpected' }), 'ERRORED');
});

test('a failure during cleanup does not change a successful outcome', () => {
  assert.equal(transition('CLEANUP', { type: 'FAILED', reason: 'unexpected' }), 'DONE');
});

test('out-of-order events leave the state unchanged', () => {
  assert.equal(transition('UNAUTHENTICATED', { type: 'GENERATED' }), 'UNAUTHENTICATED');
  assert.equal(transition('GENERATING', { type: 'COMMITTED' }), 'GENERATING');
  assert.equal(isTerminal('DONE'), true);
  assert.equal(isTerminal('ABORTING'), false);
});
