import type { Tool, ToolKind } from './types';

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /** Registered tools in registration order, optionally excluding some kinds. */
  list(options: { exclude?: ToolKind[] } = {}): Tool[] {
    const excluded = new Set(options.exclude ?? []);
    return [...this.tools.values()].filter((tool) => !excluded.has(tool.kind));
  }

  get size(): number {
    return this.tools.size;
  }
}
