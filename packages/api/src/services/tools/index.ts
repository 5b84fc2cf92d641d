import type { LLMClient } from '../../utils/llm';
import { documentTools } from './document';
import { createGenerativeTools } from './generative';
import { ToolRegistry } from './registry';

export { ToolRegistry } from './registry';
export { ToolRouter, type ToolRouterMode, type ToolRouterOptions } from './router';
export type { Tool, ToolInput, ToolInvocation, ToolKind, ToolOutput } from './types';

/**
 * Built-in tools: generative ones first so an explicit request such as
 * "draft an email listing the definitions" wins over a structural scan.
 */
export function createDefaultToolRegistry(llm: LLMClient): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of [...createGenerativeTools(llm), ...documentTools]) {
    registry.register(tool);
  }
  return registry;
}
