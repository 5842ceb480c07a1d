import { createAgentTools } from './agent-tools.js';
import { createFileTools } from './file-tools.js';
import { createMemoryTools } from './memory-tools.js';
import { createSearchTools } from './search-tools.js';
import { createTodoTools } from './todo-tools.js';
import type { RegisteredTool } from './types.js';

export function createAllTools(): RegisteredTool[] {
  return [
    ...createFileTools(),
    ...createSearchTools(),
    ...createMemoryTools(),
    ...createTodoTools(),
    ...createAgentTools(),
  ];
}

export { createAgentTools, NO_ANSWER } from './agent-tools.js';
export { createFileTools, PROTECTED_PATHS } from './file-tools.js';
export { createMemoryTools } from './memory-tools.js';
export { createSearchTools, MAX_SEARCH_RESULTS } from './search-tools.js';
export { createTodoTools } from './todo-tools.js';
export { ToolRegistry, ToolRegistrationError } from './registry.js';
export type { RegisteredTool, ToolContext, ToolHandler, ToolInteractionCallback, ToolSpec } from './types.js';
