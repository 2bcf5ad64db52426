/**
 * Turn Controller: one user message in, one reply out.
 *
 * plan → validate → (chat | dispatch → phrase). Every failure path ends in a
 * short user-facing sentence and a Turn Log entry; nothing here throws past
 * the caller for an expected failure.
 */

import { Plan } from '../models/plan';
import { Session } from '../models/session';
import { ToolResult } from '../models/toolResult';
import { buildPhrasingPrompt, buildPlannerPrompt, recentLogSnippet } from '../planner/promptBuilder';
import { extractPlan, ParsedPlan } from '../planner/planParser';
import { validatePlan } from '../planner/planValidator';
import { ToolDispatcher } from './dispatcher';
import { normalizeResponse } from './responseNormalizer';
import { SessionStore } from './sessionStore';
import { LogContext, logger } from '../utils/logger';

export const EXIT_WORDS: readonly string[] = ['exit', 'quit'];
export const EXIT_REPLY = 'Session ended. Thank you!';
export const PLANNER_FAIL_REPLY = "Sorry, I couldn't figure out a plan. Could you rephrase?";
export const PLAN_INVALID_REPLY = 'Sorry, my plan came out malformed. Please try again.';
export const GENERIC_FAILURE_REPLY = "That didn't work. Please try again.";

const LOG_DETAIL_CHARS = 200;
const LOG_ANSWER_CHARS = 120;

export interface TurnControllerOptions {
  sessions: SessionStore;
  dispatcher: ToolDispatcher;
  planAttempts: number;
}

export class TurnController {
  private readonly sessions: SessionStore;
  private readonly dispatcher: ToolDispatcher;
  private readonly planAttempts: number;

  constructor(options: TurnControllerOptions) {
    this.sessions = options.sessions;
    this.dispatcher = options.dispatcher;
    this.planAttempts = Math.max(1, options.planAttempts);
  }

  /** Processes one turn with the session's turn lock held. */
  handleTurn(session: Session, userText: string, requestId?: string): Promise<string> {
    return this.sessions.runExclusive(session.sessionId, () => this.runTurn(session, userText.trim(), {
      sessionId: session.sessionId,
      requestId,
    }));
  }

  private async runTurn(session: Session, text: string, ctx: LogContext): Promise<string> {
    if (EXIT_WORDS.includes(text.toLowerCase())) {
      return EXIT_REPLY;
    }

    this.sessions.append(session, 'user_input', text);

    const planned = await this.acquirePlan(session, text, ctx);
    if (!planned.ok) {
      return planned.reply;
    }

    const validation = validatePlan(planned.parsed.value);
    if (!validation.ok) {
      logger.warn('Plan rejected', ctx, { violation: validation.violation });
      this.sessions.append(session, 'plan_invalid', validation.violation);
      return PLAN_INVALID_REPLY;
    }

    return this.execute(session, text, validation.plan, ctx);
  }

  private async acquirePlan(
    session: Session,
    text: string,
    ctx: LogContext,
  ): Promise<{ ok: true; parsed: ParsedPlan } | { ok: false; reply: string }> {
    const recentLogs = recentLogSnippet(session.log);
    let lastRaw = '';

    for (let attempt = 1; attempt <= this.planAttempts; attempt++) {
      const prompt = buildPlannerPrompt(text, { leadId: session.leadId, recentLogs }, attempt);
      const outcome = await session.backend.ask(prompt, { ...ctx, attempt });
      if (!outcome.delivered) {
        this.sessions.append(session, 'planner_fail', `backend produced no reply after ${outcome.attempts} attempts`);
        return { ok: false, reply: outcome.text };
      }

      const parsed = extractPlan(outcome.text);
      if (parsed) {
        return { ok: true, parsed };
      }
      lastRaw = outcome.text;
      logger.warn('No plan in backend reply', { ...ctx, attempt });
    }

    this.sessions.append(session, 'planner_fail', lastRaw.slice(0, LOG_DETAIL_CHARS));
    return { ok: false, reply: PLANNER_FAIL_REPLY };
  }

  private async execute(session: Session, text: string, plan: Plan, ctx: LogContext): Promise<string> {
    if (plan.action === 'chat') {
      const answer = normalizeResponse(plan.answer);
      this.sessions.append(session, 'chat', answer.slice(0, LOG_ANSWER_CHARS));
      return answer;
    }

    this.sessions.append(session, 'tool_call', `${plan.name}(${JSON.stringify(plan.args)})`);
    const result = await this.dispatcher.dispatch(plan.name, plan.args, session, ctx);
    this.sessions.append(session, 'tool_result', JSON.stringify(result).slice(0, LOG_DETAIL_CHARS));
    logger.info('Tool finished', { ...ctx, tool: plan.name }, { status: result.status, code: result.code });

    if (result.status !== 'success') {
      return failureReply(result);
    }

    const outcome = await session.backend.ask(buildPhrasingPrompt(text, plan.name, result), ctx);
    const reply = outcome.delivered ? normalizeResponse(outcome.text) : '';
    if (!reply) {
      this.sessions.append(session, 'phrase_fail', `no phrasing after ${outcome.attempts} attempts`);
      return result.message;
    }

    this.sessions.append(session, 'tool_response_generated', reply.slice(0, LOG_ANSWER_CHARS));
    return reply;
  }
}

// ─── Failure wording ────────────────────────────────────────────────────────

function describeCandidate(candidate: unknown): string {
  if (typeof candidate !== 'object' || candidate === null) {
    return String(candidate);
  }
  return Object.entries(candidate)
    .filter(([, value]) => value !== null && value !== undefined && value !== '')
    .map(([key, value]) => `${key} ${String(value)}`)
    .join(', ');
}

export function failureReply(result: ToolResult): string {
  if (result.code === 'TIME_ALREADY_BOOKED') {
    const existing = result.data.existing_schedule;
    const existingTime =
      typeof existing === 'object' && existing !== null && 'schedule_time' in existing
        ? existing.schedule_time
        : result.data.requested_time;
    return `The buyer is already booked at ${String(existingTime ?? '')}. Please choose another time.`;
  }

  if (result.code === 'AMBIGUOUS' && Array.isArray(result.data.candidates)) {
    const options = result.data.candidates.map(describeCandidate).join('; ');
    return `I found several matches: ${options}. Which one did you mean?`;
  }

  return result.message || GENERIC_FAILURE_REPLY;
}
