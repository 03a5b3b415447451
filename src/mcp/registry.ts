// This module holds the named tool table that dispatch and tools/list read from.

import type { ZodTypeAny } from 'zod';
import type { ToolArguments } from '../types/domain.js';
import type { McpTool, ToolCallResult } from '../types/mcp.js';
import { AppError, DuplicateToolError, UnknownToolError } from '../utils/errors.js';

export type ToolHandler = (args: ToolArguments) => Promise<ToolCallResult>;

export interface RegisteredTool {
  descriptor: Readonly<McpTool>;
  handler: ToolHandler;
  validator?: ZodTypeAny;
}

// Tools are registered during startup; freeze() makes the table read-only for the rest of the process.
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private frozen = false;

  public register(tool: RegisteredTool): void {
    if (this.frozen) {
      throw new AppError(500, 'registry_frozen', `Cannot register ${tool.descriptor.name} after startup.`);
    }

    const name = tool.descriptor.name;
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }

    this.tools.set(name, {
      descriptor: Object.freeze({ ...tool.descriptor }),
      handler: tool.handler,
      validator: tool.validator
    });
  }

  public freeze(): void {
    this.frozen = true;
  }

  public get isFrozen(): boolean {
    return this.frozen;
  }

  public get size(): number {
    return this.tools.size;
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  // Insertion order.
  public list(): McpTool[] {
    return [...this.tools.values()].map((tool) => ({ ...tool.descriptor }));
  }

  public resolve(name: string): RegisteredTool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }

    return tool;
  }
}
