import { NotFoundError } from '../lib/errors.js';
import type { AnyToolModule } from './types.js';

/** Modules available to this process, fixed at start-up. */
export class ModuleRegistry {
  private readonly modules = new Map<string, AnyToolModule>();

  constructor(modules: readonly AnyToolModule[]) {
    for (const module of modules) {
      if (this.modules.has(module.key)) {
        throw new Error(`Module '${module.key}' registered twice`);
      }
      const rounds = module.rounds.map(r => r.round);
      if (rounds.length === 0 || rounds.some((round, i) => round !== i + 1)) {
        throw new Error(`Module '${module.key}' must number its rounds 1..n`);
      }
      this.modules.set(module.key, module);
    }
  }

  get(key: string): AnyToolModule | undefined {
    return this.modules.get(key);
  }

  require(key: string): AnyToolModule {
    const module = this.modules.get(key);
    if (!module) throw new NotFoundError('Module', key);
    return module;
  }

  list(): AnyToolModule[] {
    return [...this.modules.values()];
  }

  keys(): string[] {
    return [...this.modules.keys()];
  }
}
