/**
 * backend-registry.ts
 * Static registry of downstream inference backends, loaded from YAML
 */

import { BackendNotConfiguredError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ConfigValidationError, readStructuredFile, toValidationErrors } from './config.js';
import { backendRegistrySchema, type BackendEntry } from './schema.js';

export class BackendRegistry {
  private readonly backends: Map<string, BackendEntry>;

  constructor(entries: Record<string, BackendEntry> = {}) {
    this.backends = new Map(Object.entries(entries));
  }

  /**
   * Look up a backend by name
   * @throws BackendNotConfiguredError for unknown names
   */
  get(name: string): BackendEntry {
    const entry = this.backends.get(name);
    if (!entry) {
      throw new BackendNotConfiguredError(name);
    }
    return entry;
  }

  url(name: string): string {
    return this.get(name).url;
  }

  has(name: string): boolean {
    return this.backends.has(name);
  }

  names(): string[] {
    return [...this.backends.keys()];
  }

  entries(): Array<[string, BackendEntry]> {
    return [...this.backends.entries()];
  }
}

/**
 * Parse the `backends:` document into a registry
 */
export function parseBackendRegistry(raw: unknown): BackendRegistry {
  const result = backendRegistrySchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigValidationError(toValidationErrors(result.error));
  }
  return new BackendRegistry(result.data.backends);
}

export async function loadBackendRegistry(filePath: string): Promise<BackendRegistry> {
  const registry = parseBackendRegistry(await readStructuredFile(filePath));
  logger.info(`Loaded ${registry.names().length} backend(s) from ${filePath}`, {
    backends: registry.names(),
  });
  return registry;
}
