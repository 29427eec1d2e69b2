/**
 * What the registry knows about a component, apart from the instance itself.
 * Read-only copies are handed out, so callers cannot mutate stored entries.
 */
export interface ComponentDescriptor {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly vendor?: string;
  readonly dependencies: readonly string[];
  readonly tags: readonly string[];
  /** Unix ms */
  readonly registeredAt: number;
}

interface RegistryEntry<TInstance> {
  instance: TInstance;
  descriptor: ComponentDescriptor;
}

function freezeDescriptor(descriptor: ComponentDescriptor): ComponentDescriptor {
  return Object.freeze({
    ...descriptor,
    dependencies: Object.freeze([...descriptor.dependencies]),
    tags: Object.freeze([...descriptor.tags]),
  });
}

/**
 * Id-keyed store of live component instances.
 *
 * Registration is check-and-set in one synchronous step; with a single
 * JavaScript thread no other caller can observe the id as free between the
 * check and the insert, so two registrations of the same id can never both
 * succeed.
 *
 * @example
 * ```typescript
 * const registry = new ComponentRegistry<Component>();
 *
 * if (!registry.register('billing', billing, descriptor)) {
 *   // already registered, nothing was changed
 * }
 *
 * registry.get('billing'); // billing
 * ```
 */
export class ComponentRegistry<TInstance> {
  private readonly entries = new Map<string, RegistryEntry<TInstance>>();

  /**
   * Adds the component if the id is free. Returns false, leaving the existing
   * entry untouched, when it is not.
   */
  public register(
    id: string,
    instance: TInstance,
    descriptor: ComponentDescriptor,
  ): boolean {
    if (this.entries.has(id)) {
      return false;
    }

    this.entries.set(id, {
      instance,
      descriptor: freezeDescriptor(descriptor),
    });

    return true;
  }

  public get(id: string): TInstance | undefined {
    return this.entries.get(id)?.instance;
  }

  public getDescriptor(id: string): ComponentDescriptor | undefined {
    return this.entries.get(id)?.descriptor;
  }

  public isRegistered(id: string): boolean {
    return this.entries.has(id);
  }

  /**
   * Snapshot in registration order; later registry changes do not show up in
   * an array already returned
   */
  public allDescriptors(): ComponentDescriptor[] {
    return [...this.entries.values()].map((entry) => entry.descriptor);
  }

  /**
   * Descriptors of components carrying the tag, in registration order
   */
  public getByTag(tag: string): ComponentDescriptor[] {
    return this.allDescriptors().filter((descriptor) =>
      descriptor.tags.includes(tag),
    );
  }

  /**
   * Replaces the descriptor of a registered component (the id cannot change)
   */
  public updateDescriptor(
    id: string,
    update: Partial<Omit<ComponentDescriptor, 'id'>>,
  ): boolean {
    const entry = this.entries.get(id);

    if (!entry) {
      return false;
    }

    entry.descriptor = freezeDescriptor({ ...entry.descriptor, ...update, id });
    return true;
  }

  public unregister(id: string): boolean {
    return this.entries.delete(id);
  }

  public get size(): number {
    return this.entries.size;
  }

  public ids(): string[] {
    return [...this.entries.keys()];
  }

  public clear(): void {
    this.entries.clear();
  }
}
