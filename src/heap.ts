import { AssertionError } from 'assert';

/**
 * Heap object type label.
 */
export type HeapObjectType = 'string';

/**
 * Base heap object interface.
 */
export interface HeapObject {
  type: HeapObjectType;
  inspectObject: () => string;
}

/**
 * Immutable string payload.
 */
export class LoxString implements HeapObject {
  type: HeapObjectType = 'string';

  constructor(public readonly chars: string) {}

  inspectObject(): string {
    return this.chars;
  }
}

/**
 * Stable reference to a heap slot. The generation guards against using a
 * handle after its slot has been released and reused.
 */
export interface Handle {
  readonly index: number;
  readonly generation: number;
}

interface Slot {
  generation: number;
  object?: HeapObject;
}

/**
 * Arena of heap objects addressed by {@link Handle}s.
 *
 * Nothing releases objects yet; `release` and the free list exist so a
 * mark-and-sweep collector can be added without changing how values
 * reference the heap.
 */
export class Heap {
  private slots: Slot[] = [];
  private freeList: number[] = [];
  private live = 0;

  /**
   * Number of live objects.
   */
  get size(): number {
    return this.live;
  }

  /**
   * Stores an object, reusing a released slot when one is available.
   *
   * @param object - Heap payload
   * @returns Handle to the stored object
   */
  allocate(object: HeapObject): Handle {
    this.live++;

    const reused = this.freeList.pop();
    if (reused !== undefined) {
      const slot = this.slots[reused];
      slot.object = object;
      return { index: reused, generation: slot.generation };
    }

    this.slots.push({ generation: 0, object });
    return { index: this.slots.length - 1, generation: 0 };
  }

  /**
   * Resolves a handle.
   *
   * @param handle - Handle returned by {@link Heap.allocate}
   * @returns Heap payload
   */
  get(handle: Handle): HeapObject {
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation || !slot.object) {
      throw new AssertionError({
        message: `Dangling heap handle ${handle.index}@${handle.generation}`,
      });
    }
    return slot.object;
  }

  /**
   * Frees the slot behind a handle. Any copy of the handle becomes
   * invalid.
   *
   * @param handle - Live handle
   */
  release(handle: Handle): void {
    this.get(handle);
    const slot = this.slots[handle.index];
    slot.object = undefined;
    slot.generation++;
    this.freeList.push(handle.index);
    this.live--;
  }
}
