import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { logger, type Features } from '@loomwork/shared';
import { renderMemoryContext, type MemoryStorage } from '../memory/memory-storage.js';
import type { ProjectRepository } from '../repository/project-repository.js';
import { renderTree } from '../tools/tree-format.js';

const log = logger.child({ module: 'system-prompt' });

export const DEFAULT_PROMPT_PATH = fileURLToPath(new URL('../../prompts/system.md', import.meta.url));

const FALLBACK_PROMPT = 'You are a coding agent working inside a single project. Use the available tools to read and change its files.';

const SECTION_BREAK = '\n\n---\n\n';

const cachedPrompts = new Map<string, string>();

/** Forget cached prompt files so the next turn reads them again. */
export function clearSystemPromptCache(): void {
  cachedPrompts.clear();
}

async function loadStaticPrompt(path: string): Promise<string> {
  const cached = cachedPrompts.get(path);
  if (cached !== undefined) return cached;
  try {
    const prompt = (await readFile(path, 'utf-8')).trim();
    cachedPrompts.set(path, prompt);
    return prompt;
  } catch (err) {
    // Not cached, so a file that appears later is picked up.
    log.warn({ err, path }, 'could not load system prompt file, using built-in prompt');
    return FALLBACK_PROMPT;
  }
}

export interface SystemPromptInput {
  projectId: string;
  repository: ProjectRepository;
  memory: MemoryStorage;
  features: Features;
  promptPath?: string;
}

/**
 * Static prompt, then the project tree, then saved memories (when the
 * memoryContext flag is on). A section that cannot be built is left out.
 */
export async function buildSystemPrompt(input: SystemPromptInput): Promise<string> {
  const parts = [await loadStaticPrompt(input.promptPath ?? DEFAULT_PROMPT_PATH)];

  const tree = await input.repository.getFileTree(input.projectId);
  if (tree.ok) {
    const listing = tree.value.length > 0 ? renderTree(tree.value).join('\n') : '(empty project)';
    parts.push(`## Project Structure\n\n${listing}`);
  } else {
    log.warn({ projectId: input.projectId, error: tree.error.message }, 'failed to load project tree, continuing without');
  }

  if (input.features.isEnabled('memoryContext')) {
    const memories = await input.memory.list(input.projectId);
    if (memories.ok) {
      const section = renderMemoryContext(memories.value);
      if (section) parts.push(section);
    } else {
      log.warn({ projectId: input.projectId, error: memories.error.message }, 'memory retrieval failed, continuing without');
    }
  }

  return parts.join(SECTION_BREAK);
}
