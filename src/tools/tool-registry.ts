import {
  ErrorCode,
  McpError,
  ToolSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod";
import type { ILogger } from "../types/interfaces.js";
import { textResult, type ITool, type ToolExecutionContext } from "./base-tool.js";

/**
 * Interface for the tool registry that serves every tool call.
 */
export interface IToolRegistry {
  /**
   * Get a tool by its name
   * @returns The tool if found, undefined otherwise
   */
  get(name: string): ITool | undefined;

  /**
   * Get all registered tools, in registration order
   */
  getAll(): ITool[];

  /**
   * Tool descriptors for a `tools/list` response
   */
  describe(): Tool[];

  /**
   * Decode the arguments and run the named tool.
   *
   * @throws McpError (InvalidParams) when no tool has that name
   */
  dispatch(
    name: string,
    args: Record<string, unknown> | undefined,
    context: ToolExecutionContext,
  ): Promise<CallToolResult>;
}

/**
 * Registry of the tools the server exposes.
 *
 * Built once at startup from every tool bound in the DI container and
 * read-only afterwards.
 */
export class ToolRegistry implements IToolRegistry {
  private readonly tools: ReadonlyMap<string, ITool>;

  constructor(
    tools: readonly ITool[],
    private logger: ILogger,
  ) {
    const byName = new Map<string, ITool>();
    for (const tool of tools) {
      if (byName.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      byName.set(tool.name, tool);
    }
    this.tools = byName;
  }

  get(name: string): ITool | undefined {
    return this.tools.get(name);
  }

  getAll(): ITool[] {
    return Array.from(this.tools.values());
  }

  describe(): Tool[] {
    return this.getAll().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: ToolSchema.shape.inputSchema.parse(
        z.toJSONSchema(tool.advertisedSchema ?? tool.schema, { io: "input" }),
      ),
    }));
  }

  async dispatch(
    name: string,
    args: Record<string, unknown> | undefined,
    context: ToolExecutionContext,
  ): Promise<CallToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      this.logger.warn(`Call to unknown tool: ${name}`);
      throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
    }

    const decoded = tool.schema.safeParse(args ?? {});
    if (!decoded.success) {
      this.logger.debug(`Rejected arguments for tool ${name}`);
      return textResult(
        `Invalid arguments for tool '${name}':\n${z.prettifyError(decoded.error)}`,
        true,
      );
    }

    try {
      return await tool.execute(decoded.data, context);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Tool ${name} failed`, cause);
      return textResult(`Tool '${name}' failed: ${cause.message}`, true);
    }
  }
}
