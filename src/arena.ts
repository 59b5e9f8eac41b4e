/**
 * Every record tree owns one arena. Items refer to their parent by id only
 * and resolve it through the arena of the tree they currently live in.
 */

import type { Item } from './item';

export type ItemId = number;

let nextItemId: ItemId = 1;

export function allocateItemId(): ItemId {
  const id = nextItemId;
  nextItemId += 1;
  return id;
}

export class ItemArena {
  private readonly items = new Map<ItemId, Item>();

  add(item: Item): void {
    this.items.set(item.id, item);
  }

  remove(id: ItemId): void {
    this.items.delete(id);
  }

  lookup(id: ItemId | undefined): Item | undefined {
    return id === undefined ? undefined : this.items.get(id);
  }

  has(id: ItemId): boolean {
    return this.items.has(id);
  }

  get size(): number {
    return this.items.size;
  }

  members(): Item[] {
    return [...this.items.values()];
  }
}
