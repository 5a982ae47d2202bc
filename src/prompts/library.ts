/**
 * Prompt library — instruction templates for each agent role.
 *
 * `codeloom config --init` writes the default system templates to
 * `.codeloom/prompts/<role>.md`. Agents read those files when present, so
 * users can edit them to customize behavior.
 *
 * Templates use `{task}`, `{code}` and `{feedback}` placeholders.
 *
 * Dependency direction: library.ts → utils/fs, config/defaults, agents/types
 * Used by: agent factory, config command
 */

import { join } from 'node:path';
import { CONFIG_DIR_NAME } from '../core/config/defaults.js';
import { ensureDir, fileExists, readTextFile, writeTextFile } from '../utils/fs.js';
import type { AgentRole } from '../agents/types.js';
import { ALL_AGENT_ROLES } from '../agents/types.js';
import { logger } from '../utils/logger.js';

const PROMPTS_DIR = 'prompts';

export interface PromptTemplate {
  /** System instruction. */
  readonly system: string;
  /** User message. */
  readonly user: string;
}

export type PromptSet = Readonly<Record<AgentRole, PromptTemplate>>;

export type PromptVars = Readonly<Partial<Record<'task' | 'code' | 'feedback', string>>>;

// ── Default Prompts ──

export const DEFAULT_PROMPTS: PromptSet = {
  orchestrator: {
    system: `You are an orchestrator. Decide which agent to call based on the task:
- If the task is "write code" or "generate", respond with GENERATE.
- If the task is "review" or "debug", respond with REVIEW.
- If the task is "add docs" or "explain", respond with DOCUMENT.
Respond ONLY with GENERATE, REVIEW, or DOCUMENT.`,
    user: '{task}',
  },

  generator: {
    system: `Write clean, efficient code for: {task}.
Return ONLY the code, no explanations.`,
    user: '{task}',
  },

  reviewer: {
    system: `Review this code for errors, inefficiencies, or security flaws:
{code}
Suggest concise fixes and improvements.`,
    user: 'Review the code above',
  },

  documenter: {
    system: `Add detailed comments and a docstring to this code:
{code}
Return the code with inline comments.`,
    user: 'Document the code',
  },

  fallback: {
    system: 'You are a helpful coding assistant.',
    user: 'Task: {task}',
  },
};

/** Generator user text once a review has asked for changes. */
export const REVISION_TEMPLATE = `{task}

A reviewer flagged problems with the previous attempt:
{feedback}
Address them in the new version.`;

// ── Public API ──

/**
 * Get the prompts directory path.
 */
export function getPromptsDir(projectRoot: string): string {
  return join(projectRoot, CONFIG_DIR_NAME, PROMPTS_DIR);
}

/**
 * Substitute `{name}` placeholders. Unknown placeholders are left as they are;
 * missing values become empty strings.
 */
export function renderPrompt(template: string, vars: PromptVars): string {
  return template.replace(/\{(task|code|feedback)\}/g, (_match, name: 'task' | 'code' | 'feedback') => vars[name] ?? '');
}

/**
 * Write the default system templates into `.codeloom/prompts/`.
 * Only creates files that don't already exist (preserves user edits).
 * Returns the paths written.
 */
export function generateDefaultPrompts(projectRoot: string): string[] {
  const promptsDir = getPromptsDir(projectRoot);
  ensureDir(promptsDir);

  const written: string[] = [];
  for (const role of ALL_AGENT_ROLES) {
    const filePath = join(promptsDir, `${role}.md`);
    if (!fileExists(filePath)) {
      writeTextFile(filePath, `${DEFAULT_PROMPTS[role].system}\n`);
      logger.debug(`Created prompt: ${filePath}`);
      written.push(filePath);
    }
  }
  return written;
}

/**
 * Load the prompt set for a project. System templates found in
 * `.codeloom/prompts/<role>.md` replace the built-in ones.
 */
export function loadPrompts(projectRoot: string): PromptSet {
  const promptsDir = getPromptsDir(projectRoot);
  const load = (role: AgentRole): PromptTemplate => {
    const filePath = join(promptsDir, `${role}.md`);
    if (!fileExists(filePath)) return DEFAULT_PROMPTS[role];

    const system = readTextFile(filePath).trim();
    if (!system) {
      logger.warn(`Prompt file ${filePath} is empty, using the built-in prompt`);
      return DEFAULT_PROMPTS[role];
    }
    logger.debug(`Using custom prompt: ${filePath}`);
    return { ...DEFAULT_PROMPTS[role], system };
  };

  return {
    orchestrator: load('orchestrator'),
    generator: load('generator'),
    reviewer: load('reviewer'),
    documenter: load('documenter'),
    fallback: load('fallback'),
  };
}
