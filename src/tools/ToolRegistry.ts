/**
 * Tool registry.
 * Name → tool mapping, populated once at startup.
 */

import { ConfigurationError, NotFoundError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITool, ToolDescriptor, ToolResponse } from '../types/tools.js';

export class ToolRegistry {
  private readonly tools = new Map<string, ITool>();

  constructor(private readonly logProvider: ILogProvider) {}

  register(tool: ITool): void {
    const { name, version } = tool.info();
    if (this.tools.has(name)) {
      throw new ConfigurationError(`Tool "${name}" is already registered`, { name });
    }
    this.tools.set(name, tool);
    this.logProvider.info('Registered tool', { name, version });
  }

  get(name: string): ITool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.info());
  }

  async execute(name: string, params: Record<string, unknown>): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      const err = new NotFoundError(`Tool '${name}' not found`, { available: [...this.tools.keys()] });
      this.logProvider.warn('Unknown tool requested', { name });
      return {
        toolName: name,
        status: 'error',
        error: { code: err.code, message: err.message, details: err.details },
      };
    }
    return tool.execute(params);
  }
}
