import { ToolNotFoundError, ValidationError, createLogger } from '@graphrun/shared';
import type { Tool } from '../types';

const logger = createLogger({ name: 'tool-registry' });

export interface ToolDescriptor {
  name: string;
  description?: string;
  tool: Tool;
}

export class ToolRegistry {
  private tools: Map<string, ToolDescriptor> = new Map();

  /**
   * Register a capability under a name. Registering an existing name
   * replaces the earlier capability.
   */
  register(name: string, tool: Tool, options: { description?: string } = {}): this {
    if (name.trim() === '') {
      throw new ValidationError('Tool name must not be empty');
    }
    if (this.tools.has(name)) {
      logger.warn({ tool: name }, 'Replacing registered tool');
    }
    this.tools.set(name, { name, tool, description: options.description });
    logger.debug({ tool: name }, 'Registered tool');
    return this;
  }

  get(name: string): Tool {
    const descriptor = this.tools.get(name);
    if (!descriptor) {
      throw new ToolNotFoundError(name);
    }
    return descriptor.tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): string[] {
    return [...this.tools.keys()];
  }

  describe(): Array<{ name: string; description?: string }> {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }
}
