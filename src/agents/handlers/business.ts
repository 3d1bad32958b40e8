/**
 * Business agent handlers: CRM, sales, inventory, accounting, HR, custom.
 *
 * Each handler picks an action from `input.action`, or infers it from the
 * task text, and acts on host records through the HostRecordGateway.
 * Actions it does not know answer `{ status: 'unknown_action' }`.
 */
import type { JsonObject, JsonValue } from '@/core/types.js';
import type { HostRecord, HostRecordGateway } from '../host-record-gateway.js';
import type { AgentHandler, AgentTaskInput } from '../types.js';
import {
  fromDependencies,
  numberField,
  objectField,
  stringField,
  taskSubject,
  taskText,
} from './input.js';

// ─── Action Dispatch ────────────────────────────────────────────

interface ActionRule {
  action: string;
  pattern: RegExp;
}

type Action = (task: AgentTaskInput, gateway: HostRecordGateway) => Promise<JsonValue>;

interface BusinessAgentDefinition {
  /** Tried in order against the task text when `input.action` is absent. */
  rules: ActionRule[];
  actions: Record<string, Action>;
}

/** The action a task asks for, explicit or inferred. */
export function resolveAction(task: AgentTaskInput, rules: readonly ActionRule[]): string | undefined {
  const explicit = stringField(task.input, 'action');
  if (explicit !== undefined) return explicit;
  const text = taskText(task);
  return rules.find((rule) => rule.pattern.test(text))?.action;
}

function defineBusinessHandler(
  definition: BusinessAgentDefinition,
  gateway: HostRecordGateway,
): AgentHandler {
  return async (task, context) => {
    const action = resolveAction(task, definition.rules);
    const run = action === undefined ? undefined : definition.actions[action];
    if (!run) {
      context.logger.debug('Unknown action', {
        component: 'business-agent',
        agentId: context.agent.id,
        action,
      });
      return action === undefined
        ? { status: 'unknown_action' }
        : { status: 'unknown_action', action };
    }
    return run(task, gateway);
  };
}

function summarize(record: HostRecord): JsonObject {
  return { id: record.id, name: record.values['name'] ?? null };
}

/** Values to create a record with: `input.fields`, else `{ [subjectKey]: subject }`. */
function recordValues(task: AgentTaskInput, subjectKey: string): JsonObject {
  const fields = objectField(task.input, 'fields');
  if (fields) return { ...fields };
  return { [subjectKey]: taskSubject(task) ?? taskText(task) };
}

// ─── CRM ────────────────────────────────────────────────────────

const crm: BusinessAgentDefinition = {
  rules: [
    { action: 'search_leads', pattern: /\b(find|search|list|show|look\s+up)\b/i },
    { action: 'create_lead', pattern: /\b(create|add|new|register|capture|lead)/i },
  ],
  actions: {
    async create_lead(task, gateway) {
      const record = await gateway.create('lead', recordValues(task, 'name'));
      return { status: 'created', leadId: record.id, name: record.values['name'] ?? null };
    },

    async search_leads(task, gateway) {
      const leads = await gateway.search('lead', {
        text: stringField(task.input, 'query') ?? taskSubject(task),
        filters: objectField(task.input, 'filters'),
      });
      return { leads: leads.map(summarize) };
    },
  },
};

// ─── Sales ──────────────────────────────────────────────────────

const sales: BusinessAgentDefinition = {
  rules: [{ action: 'create_order', pattern: /\b(order|quot|sale|sell|create|place)/i }],
  actions: {
    async create_order(task, gateway) {
      const values = recordValues(task, 'customer');
      const leadId = fromDependencies(task, 'leadId');
      if (leadId !== undefined) values['leadId'] = leadId;
      const record = await gateway.create('order', values);
      return { status: 'created', orderId: record.id };
    },
  },
};

// ─── Inventory ──────────────────────────────────────────────────

async function findProduct(task: AgentTaskInput, gateway: HostRecordGateway): Promise<HostRecord | null> {
  const productId = numberField(task.input, 'productId');
  if (productId !== undefined) return gateway.read('product', productId);

  const subject = taskSubject(task);
  if (subject === undefined) return null;
  const [exact] = await gateway.search('product', { text: subject, limit: 1 });
  if (exact || !/s$/i.test(subject)) return exact ?? null;
  const [singular] = await gateway.search('product', { text: subject.slice(0, -1), limit: 1 });
  return singular ?? null;
}

const inventory: BusinessAgentDefinition = {
  rules: [
    { action: 'check_stock', pattern: /\b(check|stock|available|availability|inventory|how\s+many)/i },
  ],
  actions: {
    async check_stock(task, gateway): Promise<JsonValue> {
      const product = await findProduct(task, gateway);
      if (!product) {
        return { status: 'not_found', product: taskSubject(task) ?? null };
      }
      return {
        productId: product.id,
        name: product.values['name'] ?? null,
        availableQty: numberField(product.values, 'qtyAvailable') ?? 0,
        virtualQty: numberField(product.values, 'virtualQty') ?? 0,
      };
    },
  },
};

// ─── Accounting ─────────────────────────────────────────────────

const accounting: BusinessAgentDefinition = {
  rules: [{ action: 'create_invoice', pattern: /\b(invoice|bill|charge|create)/i }],
  actions: {
    async create_invoice(task, gateway) {
      const values = recordValues(task, 'customer');
      const orderId = fromDependencies(task, 'orderId');
      if (orderId !== undefined) values['orderId'] = orderId;
      const record = await gateway.create('invoice', values);
      return { status: 'created', invoiceId: record.id };
    },
  },
};

// ─── HR ─────────────────────────────────────────────────────────

const hr: BusinessAgentDefinition = {
  rules: [
    { action: 'search_employees', pattern: /\b(find|search|list|show|who|employee|staff)/i },
  ],
  actions: {
    async search_employees(task, gateway) {
      const employees = await gateway.search('employee', {
        text: stringField(task.input, 'query') ?? taskSubject(task),
        filters: objectField(task.input, 'filters'),
      });
      return { employees: employees.map(summarize) };
    },
  },
};

// ─── Factories ──────────────────────────────────────────────────

export const BUSINESS_AGENTS = { crm, sales, inventory, accounting, hr } as const;

export type BusinessAgentType = keyof typeof BUSINESS_AGENTS;

export function createBusinessHandler(
  type: BusinessAgentType,
  gateway: HostRecordGateway,
): AgentHandler {
  return defineBusinessHandler(BUSINESS_AGENTS[type], gateway);
}

/** Echoes the task input back. */
export const customHandler: AgentHandler = (task) =>
  Promise.resolve({ status: 'custom_task_executed', data: task.input });
