/**
 * Chat Front End: turns a chat message into a reply.
 *
 * Recognises a few conversational intents (help, examples, agent list,
 * system status) and forwards everything else to the orchestrator as a
 * goal, rendering the outcome as plain text.
 */
import { ConductorError } from '@/core/errors.js';
import type { CallerIdentity, JsonObject, JsonValue } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import type { OrchestratorStatus, RequestOutcome } from '@/orchestrator/types.js';

// ─── Types ──────────────────────────────────────────────────────

export type ChatIntent = 'help' | 'examples' | 'agents' | 'status' | 'request';

/** The host record the conversation is attached to, if any. */
export interface RecordContext {
  caller?: CallerIdentity;
  recordModel?: string;
  recordId?: number;
}

export interface ChatReply {
  intent: ChatIntent;
  text: string;
  /** Set when the message was forwarded and an outcome came back. */
  outcome?: RequestOutcome;
}

export interface ChatFrontEnd {
  handleMessage(text: string, recordContext?: RecordContext): Promise<ChatReply>;
}

interface ChatFrontEndDeps {
  orchestrator: Orchestrator;
  logger: Logger;
  /** Task cap for goals arriving through chat. */
  maxTasks?: number;
}

// ─── Intents ────────────────────────────────────────────────────

const INTENT_PATTERNS: readonly [Exclude<ChatIntent, 'request'>, RegExp][] = [
  ['help', /^\s*(help|what can you do|capabilities|features)[\s?!.]*$/i],
  ['examples', /\b(examples?|show me how|how to|usage)\b/i],
  ['agents', /\bagents\b/i],
  ['status', /\b(status|health)\b/i],
];

export function detectIntent(text: string): ChatIntent {
  if (text.trim() === '') return 'help';
  return INTENT_PATTERNS.find(([, pattern]) => pattern.test(text))?.[0] ?? 'request';
}

const HELP_TEXT = [
  'I can route requests to the business agents:',
  '- CRM: create and search leads',
  '- Sales: create orders',
  '- Inventory: check stock levels',
  '- Accounting: create invoices',
  '- HR: search employees',
  'Ask "examples" for sample requests, "agents" for the agent list, or "status" for system status.',
].join('\n');

const EXAMPLES_TEXT = [
  'Examples:',
  '- Create a new lead for ABC Company',
  '- Find leads for Acme',
  '- Create a sales order for ABC Corp',
  '- Check stock for desks then create an order for Acme',
  '- Create an invoice for XYZ',
  '- List employees',
].join('\n');

// ─── Rendering ──────────────────────────────────────────────────

function renderValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function renderOutcome(outcome: RequestOutcome): string {
  const lines: string[] = [];

  if (outcome.status === 'unroutable') {
    lines.push(`I could not route that request: ${outcome.reason}.`);
  } else {
    lines.push(
      outcome.status === 'success'
        ? `Request ${outcome.requestId} completed.`
        : `Request ${outcome.requestId} finished with failures.`,
    );
    for (const output of outcome.outputs) {
      lines.push(`✓ ${output.key}: ${renderValue(output.output)}`);
    }
    if (outcome.status === 'partial_failure') {
      for (const failure of outcome.failures) {
        const attempts = failure.attempts === 1 ? '1 attempt' : `${failure.attempts} attempts`;
        lines.push(
          `✗ ${failure.key}: ${failure.error.kind}: ${failure.error.message} (after ${attempts})`,
        );
      }
    }
  }

  if (outcome.unmatched.length > 0) {
    lines.push(`Not understood: ${outcome.unmatched.join('; ')}`);
  }
  return lines.join('\n');
}

function renderAgents(status: OrchestratorStatus): string {
  if (status.agents.length === 0) return 'No agents are registered.';
  const lines = ['Available agents:'];
  for (const agent of status.agents) {
    lines.push(`- ${agent.name} [${agent.type}] ${agent.state}`);
    if (agent.description) lines.push(`  ${agent.description}`);
    lines.push(`  tasks: ${agent.stats.completed} completed, ${agent.stats.failed} failed`);
  }
  return lines.join('\n');
}

function renderStatus(status: OrchestratorStatus): string {
  const active = status.agents.filter((agent) => agent.state === 'active').length;
  return [
    `Orchestrator: ${status.state}${status.draining ? ' (draining)' : ''}`,
    `Active agents: ${active}/${status.agents.length}`,
    `Requests processed: ${status.performance.totalProcessed}`,
    `Success rate: ${(status.performance.successRate * 100).toFixed(1)}%`,
  ].join('\n');
}

function requestContext(recordContext: RecordContext): JsonObject {
  const { caller } = recordContext;
  return {
    caller: caller ? { id: caller.id, name: caller.name ?? null, channel: caller.channel } : null,
    recordModel: recordContext.recordModel ?? null,
    recordId: recordContext.recordId ?? null,
  };
}

// ─── Factory Function ───────────────────────────────────────────

export function createChatFrontEnd(deps: ChatFrontEndDeps): ChatFrontEnd {
  const { orchestrator, logger } = deps;
  const maxTasks = deps.maxTasks ?? 5;

  async function forward(text: string, recordContext: RecordContext): Promise<ChatReply> {
    try {
      const outcome = await orchestrator.processRequest({
        goal: text,
        context: requestContext(recordContext),
        constraints: { maxTasks },
        caller: recordContext.caller,
      });
      return { intent: 'request', text: renderOutcome(outcome), outcome };
    } catch (error) {
      if (error instanceof ConductorError && error.isOperational) {
        logger.warn('Chat request rejected', {
          component: 'chat',
          code: error.code,
          error: error.message,
        });
        return { intent: 'request', text: `Sorry, I could not process your request: ${error.message}` };
      }
      logger.error('Chat request failed', {
        component: 'chat',
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        intent: 'request',
        text: 'Sorry, I encountered an error processing your request. Please try again.',
      };
    }
  }

  return {
    async handleMessage(text: string, recordContext: RecordContext = {}): Promise<ChatReply> {
      const intent = detectIntent(text);
      logger.debug('Chat message received', {
        component: 'chat',
        intent,
        caller: recordContext.caller?.id,
      });

      switch (intent) {
        case 'help':
          return { intent, text: HELP_TEXT };
        case 'examples':
          return { intent, text: EXAMPLES_TEXT };
        case 'agents':
          return { intent, text: renderAgents(orchestrator.getStatus()) };
        case 'status':
          return { intent, text: renderStatus(orchestrator.getStatus()) };
        case 'request':
          return forward(text.trim(), recordContext);
      }
    },
  };
}
