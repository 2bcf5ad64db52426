/**
 * Bounded send escalation for one logical backend call. Two plain sends on
 * the current session, then two sends each preceded by a fresh session.
 */

import { LogContext, errorMessage, logger } from '../../utils/logger';

export type AttemptStep = 'send' | 'recreate_and_send';

export const RETRY_SCHEDULE: readonly AttemptStep[] = ['send', 'send', 'recreate_and_send', 'recreate_and_send'];

export type RetryState =
  | { phase: 'attempting'; attempt: number; step: AttemptStep }
  | { phase: 'delivered'; attempts: number; text: string }
  | { phase: 'exhausted'; attempts: number };

export function initialState(schedule: readonly AttemptStep[] = RETRY_SCHEDULE): RetryState {
  const step = schedule[0];
  return step === undefined ? { phase: 'exhausted', attempts: 0 } : { phase: 'attempting', attempt: 1, step };
}

/** Advances the machine after one attempt produced `text` (empty means nothing came back). */
export function advance(state: RetryState, text: string, schedule: readonly AttemptStep[] = RETRY_SCHEDULE): RetryState {
  if (state.phase !== 'attempting') {
    return state;
  }
  if (text.trim()) {
    return { phase: 'delivered', attempts: state.attempt, text };
  }
  const step = schedule[state.attempt];
  return step === undefined
    ? { phase: 'exhausted', attempts: state.attempt }
    : { phase: 'attempting', attempt: state.attempt + 1, step };
}

export interface RetryActions {
  /** One send over every wire shape; resolves to '' when nothing usable came back. */
  send(): Promise<string>;
  /** Tears down the bound session and binds a new one. */
  recreate(): Promise<void>;
}

export type RetryOutcome = Extract<RetryState, { phase: 'delivered' | 'exhausted' }>;

export async function runRetryMachine(
  actions: RetryActions,
  ctx: LogContext = {},
  schedule: readonly AttemptStep[] = RETRY_SCHEDULE,
): Promise<RetryOutcome> {
  let state = initialState(schedule);

  while (state.phase === 'attempting') {
    const { attempt, step } = state;
    let text = '';

    if (step === 'recreate_and_send') {
      try {
        await actions.recreate();
        text = await actions.send();
      } catch (err) {
        logger.warn('Backend session recreate failed', { ...ctx, attempt }, { error: errorMessage(err) });
      }
    } else {
      text = await actions.send();
    }

    state = advance(state, text, schedule);
    if (state.phase === 'attempting') {
      logger.warn('Backend returned no text, retrying', { ...ctx, attempt }, { next: state.step });
    }
  }

  return state;
}
