import { logger } from '../utils/logger.js';
import type { ModuleFn } from './runtime.js';

export interface ModuleDefinition {
  id: string;
  run: ModuleFn;
  description?: string;
  capabilities?: readonly string[];
  timeoutMs?: number;
  retryable?: boolean;
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface ModuleSummary {
  moduleId: string;
  description: string;
  capabilities: string[];
  timeoutMs?: number;
  retryable: boolean;
  maxRetries?: number;
}

export class ModuleRegistry {
  private modules: Map<string, ModuleDefinition> = new Map();

  register(definition: ModuleDefinition): this {
    if (this.modules.has(definition.id)) {
      logger.warn({ moduleId: definition.id }, 'Replacing registered module');
    }
    this.modules.set(definition.id, definition);
    return this;
  }

  unregister(moduleId: string): boolean {
    return this.modules.delete(moduleId);
  }

  get(moduleId: string): ModuleDefinition | undefined {
    return this.modules.get(moduleId);
  }

  has(moduleId: string): boolean {
    return this.modules.has(moduleId);
  }

  get size(): number {
    return this.modules.size;
  }

  list(): ModuleSummary[] {
    return [...this.modules.values()]
      .map((def) => ({
        moduleId: def.id,
        description: def.description ?? '',
        capabilities: [...(def.capabilities ?? [])],
        ...(def.timeoutMs !== undefined && { timeoutMs: def.timeoutMs }),
        retryable: def.retryable ?? false,
        ...(def.maxRetries !== undefined && { maxRetries: def.maxRetries }),
      }))
      .sort((a, b) => a.moduleId.localeCompare(b.moduleId));
  }
}
