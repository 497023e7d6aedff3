import { ToolRegistry } from './registry.js';
import { errorMessage, fail } from '../shared/result.js';
import type { Tool, ToolContext, ToolResult } from '../shared/types.js';

export type ToolFactory = () => Tool;

export class ToolSystem {
  readonly registry: ToolRegistry;

  constructor(registry?: ToolRegistry) {
    this.registry = registry ?? new ToolRegistry();
  }

  /**
   * Instantiates and registers each factory. A factory that throws is
   * skipped. Returns the number of tools registered.
   */
  registerAll(factories: ToolFactory[]): number {
    let count = 0;
    for (const factory of factories) {
      try {
        this.registry.register(factory());
        count++;
      } catch (err) {
        // eslint-disable-next-line no-console
        console.warn(`Tool init failed (${factory.name || 'anonymous'}):`, errorMessage(err));
      }
    }
    return count;
  }

  /** Never throws: unknown tools and tool faults become failed results. */
  async execute(
    toolName: string,
    params: Record<string, unknown>,
    context: ToolContext,
  ): Promise<ToolResult> {
    const tool = this.registry.get(toolName);
    if (!tool) return fail(`Unknown tool: ${toolName}`);

    try {
      // eslint-disable-next-line no-console
      console.log(`Tool execute: ${toolName} (${tool.riskLevel})`);
      return await tool.execute(params, context);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(`Tool error: ${toolName}:`, errorMessage(err));
      return fail(`Tool execution error: ${errorMessage(err)}`);
    }
  }
}
