import { RESTRICTED_KEY, SESSION_OWNED_KEYS, TOOL_NAMES, ToolName } from '../models/plan';
import { TurnLogEntry, RECENT_CONTEXT_ENTRIES } from '../models/session';
import { TOOL_CATALOG } from '../models/toolCatalog';
import { ToolResult } from '../models/toolResult';

export const RECENT_CONTEXT_MAX_CHARS = 300;

const PLAN_REMINDER =
  'Your previous reply did not contain a plan. Reply with exactly one JSON object inside ```json fences.';

// ─── Planner ────────────────────────────────────────────────────────────────

function toolCatalogText(): string {
  return TOOL_CATALOG.map((tool) => {
    const args = tool.args.length ? ` (args: ${tool.args.join(', ')})` : '';
    return `- ${tool.name}${args}: ${tool.description}`;
  }).join('\n');
}

const PLANNER_SYSTEM = `You are a planner that decides whether to respond directly or call ONE tool.

Return EXACTLY ONE JSON object (and nothing else) inside \`\`\`json code fences.

Valid outputs:

\`\`\`json
{"action":"chat","answer":"<final user-facing text>"}
\`\`\`
OR
\`\`\`json
{"action":"tool","name":"<one of: ${TOOL_NAMES.join(', ')}>","args":{}}
\`\`\`

Rules:
- If you do not have enough details to call a tool, ask a short clarifying question with action="chat".
- NEVER include ${[...SESSION_OWNED_KEYS, RESTRICTED_KEY].join(', ')} in args. The runtime injects session values; ${RESTRICTED_KEY} can only be set by staff.
- You represent the buyer. Customers are sellers: you may ask what they want to sell for (seller_ask_cents), but you CANNOT set ${RESTRICTED_KEY}.
- Use ONE tool only per response.
- Keep args minimal and valid for the chosen tool (e.g., for car_retrieve use one of: car_id, vin, model, make, year).
- Output must be valid JSON (double quotes, no trailing commas).
- Always attempt a tool call when the request matches a tool's purpose, even if earlier tool calls failed.`;

/** `event:detail` pairs for the last few log entries, joined and capped. */
export function recentLogSnippet(log: readonly TurnLogEntry[]): string {
  return log
    .slice(-RECENT_CONTEXT_ENTRIES)
    .map((entry) => `${entry.event}:${entry.detail}`)
    .join('; ')
    .slice(0, RECENT_CONTEXT_MAX_CHARS);
}

export interface PlannerContext {
  leadId: string | number;
  recentLogs: string;
}

export function buildPlannerPrompt(userText: string, context: PlannerContext, attempt = 1): string {
  const contextLines = [`- lead_id: ${context.leadId}`];
  if (context.recentLogs) {
    contextLines.push(`- recent_logs: ${context.recentLogs}`);
  }

  const sections = [
    PLANNER_SYSTEM,
    `Available Tools:\n${toolCatalogText()}`,
    `Context:\n${contextLines.join('\n')}`,
    `User says:\n${userText}`,
  ];
  if (attempt > 1) {
    sections.push(PLAN_REMINDER);
  }
  sections.push('Return only ONE JSON object inside ```json fences.');
  return sections.join('\n\n');
}

// ─── Phrasing ───────────────────────────────────────────────────────────────

export function buildPhrasingPrompt(userText: string, toolName: ToolName, result: ToolResult): string {
  return [
    `The user asked: "${userText}"`,
    `I called the tool '${toolName}' and got this result:\n${JSON.stringify(result)}`,
    'Please give a natural, conversational answer to the user based on this result. Be concise and answer ' +
      'what they asked. Return ONLY the response text: no JSON, no code blocks, just plain text.',
  ].join('\n\n');
}
