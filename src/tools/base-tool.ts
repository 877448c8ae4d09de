import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type * as z from "zod";
import type { Result } from "../utils/result.js";

/**
 * Context provided to tool execution
 */
export interface ToolExecutionContext {
  sessionId?: string;
}

/**
 * Base interface for all tools served by the weather server.
 *
 * Tools are self-contained units that can be registered with the tool registry.
 * Each tool defines its own name, description, schema, and execution logic.
 */
export interface ITool<TArgs = unknown> {
  /**
   * The unique name of the tool (e.g., "get_alerts")
   */
  readonly name: string;

  /**
   * A human-readable description of what the tool does
   */
  readonly description: string;

  /**
   * Decodes raw wire arguments into the typed arguments `execute` receives.
   * Also the source of the JSON Schema advertised in `tools/list`, unless
   * `advertisedSchema` is set.
   */
  readonly schema: z.ZodType<TArgs>;

  /**
   * Stricter schema to advertise when `schema` accepts more than callers
   * should be told about.
   */
  readonly advertisedSchema?: z.ZodType;

  /**
   * Execute the tool with already-decoded arguments
   */
  execute(args: TArgs, context: ToolExecutionContext): Promise<CallToolResult>;
}

export function textResult(text: string, isError = false): CallToolResult {
  const result: CallToolResult = { content: [{ type: "text", text }] };
  if (isError) {
    result.isError = true;
  }
  return result;
}

/**
 * Collapses a domain outcome into the single text block the client prints.
 */
export function toToolResult(
  outcome: Result<string, { message: string }>,
): CallToolResult {
  return outcome.ok
    ? textResult(outcome.value)
    : textResult(outcome.error.message, true);
}
