import { goHooks } from './go.js';
import { createRegistry, registerLanguageHooks } from './hooks.js';
import type { GeneratorRegistry } from './hooks.js';
import { rustHooks } from './rust.js';
import { typescriptHooks } from './typescript.js';

export { GeneratorContext } from './context.js';
export { HookRegistry } from './dispatcher.js';
export type { Hook, HookResult } from './dispatcher.js';
export { createRegistry, hookName, registerLanguageHooks } from './hooks.js';
export type { GeneratorHook, GeneratorRegistry, LanguageHooks } from './hooks.js';
export { LANGUAGE_PROFILES } from './profiles.js';
export type { LanguageProfile } from './profiles.js';
export { goHooks, rustHooks, typescriptHooks };

/**
 * A registry with the bundled Go, TypeScript and Rust renderers. C and Java have
 * no bundled renderers; register hooks such as `JavaComplexType` to add them.
 */
export function createDefaultRegistry(): GeneratorRegistry {
  const registry = createRegistry();
  registerLanguageHooks(registry, 'Go', goHooks);
  registerLanguageHooks(registry, 'TypeScript', typescriptHooks);
  registerLanguageHooks(registry, 'Rust', rustHooks);
  return registry;
}
