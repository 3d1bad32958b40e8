/**
 * Protocol gateway: exposes the orchestrator over MCP.
 *
 * Tools map onto orchestrator operations; resources are read-only projections
 * of the registry and the status snapshot. Tool failures come back as
 * `isError` results, so a client never sees a protocol error for a bad call.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z, ZodError } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ConductorError } from '@/core/errors.js';
import { jsonObjectSchema } from '@/core/json.js';
import type { CallerIdentity } from '@/core/types.js';
import type { AgentRegistry } from '@/agents/types.js';
import type { Logger } from '@/observability/logger.js';
import { describeAgent } from '@/orchestrator/agent-detail.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import { constraintsSchema, goalSchema } from '@/orchestrator/schemas.js';

// ─── Tool Inputs ────────────────────────────────────────────────

export const processRequestToolSchema = z.object({
  goal: goalSchema,
  context: jsonObjectSchema.optional(),
  constraints: constraintsSchema.optional(),
});

export const executeAgentToolSchema = z.object({
  agent_type: z.string().min(1),
  task_data: jsonObjectSchema.default({}),
  capability: z.string().min(1).optional(),
});

export const getAgentStatusToolSchema = z.object({});

interface ToolDefinition {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
}

const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'process_request',
    description:
      'Plan a goal into tasks, run each on a capable agent, and return the aggregated outcome.',
    schema: processRequestToolSchema,
  },
  {
    name: 'execute_agent',
    description:
      'Run one task on a named agent (by id or type), bypassing the planner and router.',
    schema: executeAgentToolSchema,
  },
  {
    name: 'get_agent_status',
    description: 'Snapshot of the orchestrator, its agents, the queue and recent requests.',
    schema: getAgentStatusToolSchema,
  },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON Schema for a tool's arguments, in the shape MCP expects. */
function toInputSchema(schema: z.ZodTypeAny): {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
} {
  const json: unknown = zodToJsonSchema(schema, { target: 'jsonSchema7' });
  const properties = isRecord(json) && isRecord(json['properties']) ? json['properties'] : {};
  const rawRequired = isRecord(json) ? json['required'] : undefined;
  const required = Array.isArray(rawRequired)
    ? rawRequired.filter((key): key is string => typeof key === 'string')
    : [];
  return required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

// ─── Resources ──────────────────────────────────────────────────

export const AGENTS_RESOURCE_URI = 'conductor://agents';
export const STATUS_RESOURCE_URI = 'conductor://orchestrator/status';
const AGENT_RESOURCE_PREFIX = 'conductor://agent/';

// ─── Results ────────────────────────────────────────────────────

// A type alias, not an interface, so it stays assignable to the SDK's open result type
type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function toolResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function toolError(payload: Record<string, unknown>): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }], isError: true };
}

// ─── Factory Function ───────────────────────────────────────────

export interface GatewayServerDeps {
  orchestrator: Orchestrator;
  registry: AgentRegistry;
  logger: Logger;
  name?: string;
  version?: string;
}

/** Build an MCP server bound to one orchestrator. Connect it to any transport. */
export function createGatewayServer(deps: GatewayServerDeps): Server {
  const { orchestrator, registry, logger } = deps;

  // eslint-disable-next-line @typescript-eslint/no-deprecated
  const server = new Server(
    { name: deps.name ?? 'conductor', version: deps.version ?? '0.1.0' },
    { capabilities: { tools: {}, resources: {} } },
  );

  /** The connected client is the caller; the transport already authenticated it. */
  function caller(): CallerIdentity {
    const client = server.getClientVersion();
    return { id: client?.name ?? 'mcp-client', channel: 'mcp' };
  }

  async function callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    switch (name) {
      case 'process_request': {
        const input = processRequestToolSchema.parse(args);
        return orchestrator.processRequest({
          goal: input.goal,
          context: input.context,
          constraints: input.constraints,
          caller: caller(),
        });
      }
      case 'execute_agent': {
        const input = executeAgentToolSchema.parse(args);
        return orchestrator.executeAgent({
          agentRef: input.agent_type,
          taskData: input.task_data,
          capability: input.capability,
          caller: caller(),
        });
      }
      case 'get_agent_status':
        getAgentStatusToolSchema.parse(args);
        return orchestrator.getStatus();
      default:
        return undefined;
    }
  }

  // ─── Tools ──────────────────────────────────────────────────────

  server.setRequestHandler(ListToolsRequestSchema, () =>
    Promise.resolve({
      tools: TOOL_DEFINITIONS.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: toInputSchema(tool.schema),
      })),
    }),
  );

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<ToolResult> => {
    const { name } = request.params;
    const args = request.params.arguments ?? {};

    if (!TOOL_DEFINITIONS.some((tool) => tool.name === name)) {
      return toolError({ kind: 'Validation', code: 'UNKNOWN_TOOL', message: `Unknown tool: ${name}` });
    }

    try {
      return toolResult(await callTool(name, args));
    } catch (error) {
      if (error instanceof ZodError) {
        return toolError({
          kind: 'Validation',
          code: 'VALIDATION_ERROR',
          message: 'Invalid tool arguments',
          issues: error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        });
      }
      if (error instanceof ConductorError) {
        logger.warn('Gateway tool call failed', {
          component: 'mcp-gateway',
          tool: name,
          code: error.code,
          error: error.message,
        });
        return toolError({
          kind: error.kind,
          code: error.code,
          message: error.message,
          ...(error.context && { details: error.context }),
        });
      }
      logger.error('Gateway tool call crashed', {
        component: 'mcp-gateway',
        tool: name,
        error: error instanceof Error ? error.message : String(error),
      });
      return toolError({
        kind: 'Internal',
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      });
    }
  });

  // ─── Resources ──────────────────────────────────────────────────

  server.setRequestHandler(ListResourcesRequestSchema, () =>
    Promise.resolve({
      resources: [
        {
          uri: AGENTS_RESOURCE_URI,
          name: 'agents',
          description: 'Registered agents with their state and capabilities',
          mimeType: 'application/json',
        },
        {
          uri: STATUS_RESOURCE_URI,
          name: 'orchestrator-status',
          description: 'Orchestrator status snapshot',
          mimeType: 'application/json',
        },
        ...registry.list().map(({ record }) => ({
          uri: `${AGENT_RESOURCE_PREFIX}${record.id}`,
          name: `agent-${record.id}`,
          description: record.description ?? record.name,
          mimeType: 'application/json',
        })),
      ],
    }),
  );

  server.setRequestHandler(ListResourceTemplatesRequestSchema, () =>
    Promise.resolve({
      resourceTemplates: [
        {
          uriTemplate: `${AGENT_RESOURCE_PREFIX}{agentId}`,
          name: 'agent',
          description: 'One agent with its statistics and configuration',
          mimeType: 'application/json',
        },
      ],
    }),
  );

  server.setRequestHandler(ReadResourceRequestSchema, (request) => {
    const { uri } = request.params;
    let value: unknown;

    if (uri === AGENTS_RESOURCE_URI) {
      value = orchestrator.getStatus().agents;
    } else if (uri === STATUS_RESOURCE_URI) {
      value = orchestrator.getStatus();
    } else if (uri.startsWith(AGENT_RESOURCE_PREFIX)) {
      const agentId = decodeURIComponent(uri.slice(AGENT_RESOURCE_PREFIX.length));
      value = describeAgent(orchestrator, registry, agentId);
      if (value === undefined) {
        throw new McpError(ErrorCode.InvalidParams, `Agent "${agentId}" not found`);
      }
    } else {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }

    return Promise.resolve({
      contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(value, null, 2) }],
    });
  });

  return server;
}
