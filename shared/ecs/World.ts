// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import type { EntityId, ComponentType } from './types';

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle (create, destroy with cascading children)
 * - Ownership edges (parent id stored on the child)
 * - Component storage (add, get)
 * - Queries (find entities with specific components)
 * - Tags (lightweight entity classification)
 * - Transactions (all-or-nothing entity creation)
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private stores = new Map<ComponentType, ComponentStore<unknown>>();
  private entityTags = new Map<EntityId, Set<string>>();

  // Ownership: child -> parent, parent -> children
  private parents = new Map<EntityId, EntityId>();
  private children = new Map<EntityId, Set<EntityId>>();

  // Entities created inside the open transaction (null when none is open)
  private pendingCreated: EntityId[] | null = null;

  // Resources - singleton data that isn't tied to entities
  private resources = new Map<string, unknown>();

  // ============================================
  // Entity Lifecycle
  // ============================================

  /**
   * Create a new entity.
   * Returns the entity ID (just a number).
   */
  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.add(id);
    this.pendingCreated?.push(id);
    return id;
  }

  /**
   * Destroy an entity, its components, tags, and every entity it owns.
   * Children are destroyed depth-first before the parent.
   */
  destroyEntity(id: EntityId): void {
    if (!this.entities.has(id)) return;

    const owned = this.children.get(id);
    if (owned) {
      for (const child of Array.from(owned)) {
        this.destroyEntity(child);
      }
    }

    this.detach(id);
    this.children.delete(id);
    this.entities.delete(id);

    for (const store of this.stores.values()) {
      store.delete(id);
    }

    this.entityTags.delete(id);
  }

  hasEntity(id: EntityId): boolean {
    return this.entities.has(id);
  }

  getAllEntities(): EntityId[] {
    return Array.from(this.entities);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  // ============================================
  // Ownership
  // ============================================

  /**
   * Make parent own child. Destroying parent destroys child.
   * Re-parenting moves the edge; an entity cannot own itself or an ancestor.
   */
  setParent(child: EntityId, parent: EntityId): void {
    if (!this.entities.has(child) || !this.entities.has(parent)) {
      throw new Error(`Cannot parent ${child} to ${parent}: entity does not exist`);
    }
    for (let cursor: EntityId | undefined = parent; cursor !== undefined; cursor = this.parents.get(cursor)) {
      if (cursor === child) {
        throw new Error(`Cannot parent ${child} to ${parent}: ownership cycle`);
      }
    }

    this.detach(child);
    this.parents.set(child, parent);
    let owned = this.children.get(parent);
    if (!owned) {
      owned = new Set();
      this.children.set(parent, owned);
    }
    owned.add(child);
  }

  getParent(child: EntityId): EntityId | undefined {
    return this.parents.get(child);
  }

  /**
   * Direct children, in the order they were parented.
   */
  getChildren(parent: EntityId): EntityId[] {
    const owned = this.children.get(parent);
    return owned ? Array.from(owned) : [];
  }

  private detach(child: EntityId): void {
    const parent = this.parents.get(child);
    if (parent === undefined) return;
    this.parents.delete(child);
    this.children.get(parent)?.delete(child);
  }

  // ============================================
  // Transactions
  // ============================================

  /**
   * Run fn as one unit of work against the entity store.
   * If fn throws, every entity it created is destroyed before the error is
   * rethrown. Older entities it parented to them are detached, not destroyed.
   * Nested calls join the outer transaction.
   */
  transaction<R>(fn: () => R): R {
    if (this.pendingCreated) {
      return fn();
    }

    const created: EntityId[] = [];
    this.pendingCreated = created;
    try {
      return fn();
    } catch (error) {
      // Entities that existed before the transaction survive the rollback,
      // even if fn parented them to something it created
      const pending = new Set(created);
      for (const id of created) {
        for (const child of this.getChildren(id)) {
          if (!pending.has(child)) this.detach(child);
        }
      }
      for (let i = created.length - 1; i >= 0; i--) {
        this.destroyEntity(created[i]);
      }
      throw error;
    } finally {
      this.pendingCreated = null;
    }
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Register a component store.
   * Must be called before using a component type.
   */
  registerStore<T>(store: ComponentStore<T>): void {
    this.stores.set(store.type, store as ComponentStore<unknown>);
  }

  /**
   * Add a component to an entity.
   * Throws if component type not registered or the entity does not exist.
   */
  addComponent<T>(entity: EntityId, type: ComponentType, data: T): void {
    const store = this.stores.get(type);
    if (!store) {
      throw new Error(`Component type not registered: ${type}. Call world.registerStore() first.`);
    }
    if (!this.entities.has(entity)) {
      throw new Error(`Cannot add ${type} to entity ${entity}: entity does not exist`);
    }
    store.set(entity, data);
  }

  /**
   * Get a component from an entity.
   * Returns undefined if entity doesn't have the component.
   */
  getComponent<T>(entity: EntityId, type: ComponentType): T | undefined {
    const store = this.stores.get(type) as ComponentStore<T> | undefined;
    return store?.get(entity);
  }

  hasComponent(entity: EntityId, type: ComponentType): boolean {
    const store = this.stores.get(type);
    return store?.has(entity) ?? false;
  }

  /**
   * Component types an entity currently carries.
   */
  getComponentTypes(entity: EntityId): ComponentType[] {
    const result: ComponentType[] = [];
    for (const [type, store] of this.stores) {
      if (store.has(entity)) {
        result.push(type);
      }
    }
    return result;
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Query: get all entities with ALL specified components.
   *
   * Example: world.query('Movement', 'Velocity')
   */
  query(...types: ComponentType[]): EntityId[] {
    const result: EntityId[] = [];

    for (const entity of this.entities) {
      if (types.every((type) => this.hasComponent(entity, type))) {
        result.push(entity);
      }
    }

    return result;
  }

  // ============================================
  // Tags (lightweight entity classification)
  // ============================================

  addTag(entity: EntityId, tag: string): void {
    let tags = this.entityTags.get(entity);
    if (!tags) {
      tags = new Set();
      this.entityTags.set(entity, tags);
    }
    tags.add(tag);
  }

  hasTag(entity: EntityId, tag: string): boolean {
    return this.entityTags.get(entity)?.has(tag) ?? false;
  }

  getEntitiesWithTag(tag: string): EntityId[] {
    const result: EntityId[] = [];
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        result.push(entity);
      }
    }
    return result;
  }

  // ============================================
  // Resources (singleton data)
  // ============================================

  setResource<T>(key: string, value: T): void {
    this.resources.set(key, value);
  }

  getResource<T>(key: string): T | undefined {
    return this.resources.get(key) as T | undefined;
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Clear all entities, components, ownership edges and resources.
   * Keeps component stores registered.
   */
  clear(): void {
    this.entities.clear();
    this.entityTags.clear();
    this.parents.clear();
    this.children.clear();
    for (const store of this.stores.values()) {
      store.clear();
    }
    this.resources.clear();
    this.nextEntityId = 1;
  }
}
