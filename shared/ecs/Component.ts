// ============================================
// Component Store
// ============================================

import type { EntityId, ComponentType } from './types';

/**
 * ComponentStore - typed storage for one component type: Map<EntityId, T>.
 *
 * Generic parameter T is the component data shape (e.g., HealthComponent).
 * The store knows its own type name so the world can report which
 * component an entity is missing.
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  constructor(readonly type: ComponentType) {}

  /**
   * Set component data for an entity, replacing any existing value.
   */
  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  has(entity: EntityId): boolean {
    return this.data.has(entity);
  }

  delete(entity: EntityId): void {
    this.data.delete(entity);
  }

  clear(): void {
    this.data.clear();
  }
}
