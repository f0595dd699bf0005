// tests/toolHarness.ts - Records registered tools and calls them the way FastMCP does
import { FastMCP, type Context, type Tool, type ToolParameters } from 'fastmcp';
import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ExecutionEngine, NoopLock, type AttemptResult } from '../src/automation/index.js';
import { createLogger } from '../src/logger.js';
import type { FastMCPServer, FastMCPSessionAuth } from '../src/types.js';

export type ToolResult = ReturnType<Tool<FastMCPSessionAuth>['execute']>;

export interface RecordedTool {
  name: string;
  description?: string;
  readOnlyHint?: boolean;
  /** Validates raw arguments against the tool's parameters, then runs execute. */
  invoke: (args: Record<string, unknown>) => ToolResult;
}

export function createTestContext(): Context<FastMCPSessionAuth> {
  return {
    client: { version: undefined },
    log: {
      debug: () => {},
      error: () => {},
      info: () => {},
      warn: () => {},
    },
    reportProgress: async () => {},
    session: undefined,
    streamContent: async () => {},
  };
}

function isToolArgs<Params extends ToolParameters>(
  parameters: Params,
  value: unknown
): value is StandardSchemaV1.InferOutput<Params> {
  const result = parameters['~standard'].validate(value);
  return !(result instanceof Promise) && !result.issues;
}

function parseToolArgs<Params extends ToolParameters>(
  parameters: Params | undefined,
  raw: Record<string, unknown>
): StandardSchemaV1.InferOutput<Params> {
  if (!parameters) {
    throw new Error('Tool has no parameters schema');
  }
  const result = parameters['~standard'].validate(raw);
  if (result instanceof Promise) {
    throw new Error('Async parameter schemas are not supported here');
  }
  if (result.issues) {
    throw new Error(`Invalid arguments: ${result.issues.map((issue) => issue.message).join('; ')}`);
  }
  const parsed = result.value;
  if (!isToolArgs(parameters, parsed)) {
    throw new Error('Parsed arguments no longer match the schema');
  }
  return parsed;
}

/** A real FastMCP instance whose addTool only records what reaches it. */
export function recordingServer(): { server: FastMCPServer; tools: Map<string, RecordedTool> } {
  const tools = new Map<string, RecordedTool>();
  const server: FastMCPServer = new FastMCP({ name: 'test', version: '0.0.0' });
  server.addTool = <Params extends ToolParameters>(tool: Tool<FastMCPSessionAuth, Params>): void => {
    tools.set(tool.name, {
      name: tool.name,
      description: tool.description,
      readOnlyHint: tool.annotations?.readOnlyHint,
      invoke: (args) => tool.execute(parseToolArgs(tool.parameters, args), createTestContext()),
    });
  };
  return { server, tools };
}

export function getTool(tools: Map<string, RecordedTool>, name: string): RecordedTool {
  const tool = tools.get(name);
  if (!tool) {
    throw new Error(`Tool ${name} was not registered`);
  }
  return tool;
}

/** An engine whose interpreter replies with the given results in order, then with empty output. */
export function scriptedEngine(results: AttemptResult[]): { engine: ExecutionEngine; scripts: string[] } {
  const scripts: string[] = [];
  const engine = new ExecutionEngine({
    lock: new NoopLock(),
    runner: async (script) => {
      scripts.push(script);
      return results.shift() ?? { status: 'completed', stdout: '' };
    },
    logger: createLogger('error', () => {}),
    sleep: async () => {},
  });
  return { engine, scripts };
}
