import { Plan, RESTRICTED_KEY, SESSION_OWNED_KEYS, isRecord, isToolName } from '../models/plan';

export type PlanValidation = { ok: true; plan: Plan } | { ok: false; violation: string };

function invalid(violation: string): PlanValidation {
  return { ok: false, violation };
}

/** Checks a parsed value against the plan shape and returns the first violation. */
export function validatePlan(value: unknown): PlanValidation {
  if (!isRecord(value)) {
    return invalid('plan is not a JSON object');
  }

  const { action } = value;
  if (action !== 'chat' && action !== 'tool') {
    return invalid("action must be 'chat' or 'tool'");
  }

  if (action === 'chat') {
    const { answer } = value;
    if (typeof answer !== 'string') {
      return invalid("chat plan must include string 'answer'");
    }
    return { ok: true, plan: { action: 'chat', answer } };
  }

  const { name, args } = value;
  if (!isToolName(name)) {
    return invalid(`unknown tool '${String(name)}'`);
  }
  if (!isRecord(args)) {
    return invalid("tool plan must include object 'args'");
  }

  const owned = SESSION_OWNED_KEYS.filter((key) => key in args);
  if (owned.length > 0) {
    return invalid(`args must not include ${owned.join(', ')}`);
  }
  if (RESTRICTED_KEY in args) {
    return invalid(`args must not include ${RESTRICTED_KEY} (only staff can set the company's offer)`);
  }

  return { ok: true, plan: { action: 'tool', name, args: { ...args } } };
}
