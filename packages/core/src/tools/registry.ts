import { logger, type ToolDefinition } from '@loomwork/shared';
import type { RegisteredTool } from './types.js';

const log = logger.child({ module: 'tool-registry' });

export class ToolRegistrationError extends Error {
  constructor(tool: string, reason: string) {
    super(`Cannot register tool '${tool}': ${reason}`);
    this.name = 'ToolRegistrationError';
  }
}

/**
 * Name-keyed table of tools. Definitions are checked against their
 * argument schemas when registered, so a mismatch fails at startup rather
 * than on the first call.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: RegisteredTool[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: RegisteredTool): void {
    const { name, input_schema } = tool.definition;
    if (!/^[a-z][a-z0-9_]*$/.test(name)) {
      throw new ToolRegistrationError(name, 'name must be snake_case');
    }
    if (this.tools.has(name)) {
      throw new ToolRegistrationError(name, 'duplicate name');
    }

    const declared = Object.keys(input_schema.properties).sort();
    const accepted = Object.keys(tool.schema.shape).sort();
    if (declared.join(',') !== accepted.join(',')) {
      throw new ToolRegistrationError(
        name,
        `declared properties [${declared.join(', ')}] do not match schema keys [${accepted.join(', ')}]`,
      );
    }
    const undeclared = input_schema.required.filter((arg) => !declared.includes(arg));
    if (undeclared.length > 0) {
      throw new ToolRegistrationError(name, `required names undeclared properties: ${undeclared.join(', ')}`);
    }

    this.tools.set(name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  /** New registry holding only the named tools (unknown names are ignored). */
  subset(names: Iterable<string>): ToolRegistry {
    const wanted = new Set(names);
    const picked = [...this.tools.values()].filter((tool) => wanted.has(tool.definition.name));
    log.info({ toolCount: picked.length }, 'built tool subset');
    return new ToolRegistry(picked);
  }
}
