import type { OpenAiTool, Tool } from '../shared/types.js';

export function toOpenAiTool(tool: Tool): OpenAiTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  /** Later registrations replace earlier ones with the same name. */
  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      // eslint-disable-next-line no-console
      console.warn(`Duplicate tool registration: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    // eslint-disable-next-line no-console
    console.log(`Tool registered: ${tool.name} (${tool.riskLevel})`);
  }

  get(name: string): Tool | null {
    return this.tools.get(name) ?? null;
  }

  getAll(): Tool[] {
    return [...this.tools.values()];
  }

  getNames(): string[] {
    return [...this.tools.keys()];
  }

  getOpenAiTools(): OpenAiTool[] {
    return this.getAll().map(toOpenAiTool);
  }
}
