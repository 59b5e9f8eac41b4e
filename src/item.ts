/**
 * Base record and role collections.
 *
 * An item has a name, a set of string attributes and any number of named
 * collections of roles. Items never hold their parent directly: they keep
 * the parent's id and look it up in the arena of their tree.
 */

import { ItemArena, ItemId, allocateItemId } from './arena';
import { DiagnosticSink } from './diagnostics';
import { ArchiveError } from './errors';
import { ArchiveRecord } from './types';

export type FieldInput = Iterable<readonly [string, string]>;

export interface ItemJSON {
  type: string;
  name: string;
  attributes: Record<string, string>;
  collections: ItemJSON[];
  roles?: ItemJSON[];
}

const COMMON_ATTRIBUTES: readonly string[] = ['description'];

// Record type -> name of the collection its instances are added to
const COLLECTION_FOR_TYPE = new Map<string, string>([
  ['email', 'emails'],
  ['location', 'locations'],
  ['network', 'systems'],
  ['user', 'users'],
]);

export class Item implements ArchiveRecord {
  readonly id: ItemId = allocateItemId();
  private arena = new ItemArena();
  private parentId: ItemId | undefined;
  private itemName: string;
  protected readonly attributes = new Map<string, string>();
  private readonly collectionMap = new Map<string, Collection>();

  constructor(name: string, fields: FieldInput = [], sink?: DiagnosticSink, known: readonly string[] = []) {
    if (!name) {
      throw new ArchiveError(`Each item requires a name (${new.target.name})`);
    }
    this.itemName = name;
    this.arena.add(this);

    const accepted = new Set([...COMMON_ATTRIBUTES, ...known]);
    const unknown: string[] = [];
    for (const [key, value] of fields) {
      if (accepted.has(key)) {
        this.attributes.set(key, value);
      } else if (!unknown.includes(key)) {
        unknown.push(key);
      }
    }
    if (unknown.length > 0 && sink) {
      const noun = unknown.length === 1 ? 'option' : 'options';
      sink.report(`Unknown ${noun} "${unknown.join('", "')}" for a ${new.target.name}`);
    }
  }

  get name(): string {
    return this.itemName;
  }

  set name(name: string) {
    if (!name) {
      throw new ArchiveError('Each item requires a name');
    }
    this.itemName = name;
  }

  get type(): string {
    return 'item';
  }

  description(): string | undefined {
    return this.attribute('description');
  }

  attribute(key: string): string | undefined {
    return this.attributes.get(key);
  }

  // Parent links

  parent(): Item | undefined {
    return this.arena.lookup(this.parentId);
  }

  /** Nearest enclosing user, if any. */
  user(): Item | undefined {
    return this.parent()?.user();
  }

  /** Number of items in the tree this item currently belongs to. */
  treeSize(): number {
    return this.arena.size;
  }

  *subtree(): Generator<Item> {
    yield this;
    for (const child of this.childItems()) {
      yield* child.subtree();
    }
  }

  protected childItems(): Item[] {
    return [...this.collectionMap.values()];
  }

  /** @internal Moves `child` and its subtree into this item's tree. */
  adopt(child: Item): void {
    child.detach();
    child.parentId = this.id;
    const target = this.arena;
    for (const member of child.arena.members()) {
      target.add(member);
      member.arena = target;
    }
  }

  /** @internal Gives this item and its subtree a tree of their own. */
  detach(): void {
    if (this.parentId === undefined) {
      return;
    }
    const previous = this.arena;
    const fresh = new ItemArena();
    for (const member of this.subtree()) {
      previous.remove(member.id);
      fresh.add(member);
      member.arena = fresh;
    }
    this.parentId = undefined;
  }

  // Collections

  collection(name: string): Collection | undefined {
    return this.collectionMap.get(name) ?? this.collectionMap.get(`${name}s`);
  }

  collectionNames(): string[] {
    return [...this.collectionMap.keys()];
  }

  addCollection(collection: Collection | string): Collection {
    const object = typeof collection === 'string' ? createCollection(collection) : collection;
    if (!object) {
      throw new ArchiveError(`Don't know how to create a collection of ${collection}`);
    }
    const replaced = this.collectionMap.get(object.name);
    if (replaced && replaced !== object) {
      replaced.detach();
    }
    this.adopt(object);
    this.collectionMap.set(object.name, object);
    return object;
  }

  removeCollection(which: Collection | string): Collection | undefined {
    const name = typeof which === 'string' ? which : which.name;
    const key = this.collectionMap.has(name) ? name : `${name}s`;
    const collection = this.collectionMap.get(key);
    if (!collection) {
      return undefined;
    }
    this.collectionMap.delete(key);
    collection.detach();
    return collection;
  }

  /**
   * Adds `role` to the collection which holds items of `kind`, creating
   * that collection when needed. A collection is added as a whole.
   */
  add(kind: string, role: Item): Item {
    if (role instanceof Collection) {
      return this.addCollection(role);
    }
    const collectionName = COLLECTION_FOR_TYPE.get(kind) ?? kind;
    const collection = this.collection(kind) ?? this.collection(collectionName) ?? createCollection(kind);
    if (!collection) {
      throw new ArchiveError(`No collection for ${kind} in ${this.type} ${this.name}`);
    }
    if (collection.parent() !== this) {
      this.addCollection(collection);
    }
    return collection.addRole(role);
  }

  insertChild(kind: string, child: ArchiveRecord): void {
    if (!(child instanceof Item)) {
      throw new ArchiveError(`Cannot add a ${child.type} to ${this.type} ${this.name}`);
    }
    this.add(kind, child);
  }

  find(collectionName: string, role: string): Item | undefined {
    return this.collection(collectionName)?.find(role);
  }

  toJSON(): ItemJSON {
    return {
      type: this.type,
      name: this.name,
      attributes: Object.fromEntries(this.attributes),
      collections: [...this.collectionMap.values()].map(collection => collection.toJSON()),
    };
  }
}

export type RoleSelector = (role: Item, collection: Collection) => boolean;

export class Collection extends Item {
  readonly itemType: string;
  private readonly collectionType: string;
  private readonly roleMap = new Map<string, Item>();

  constructor(name: string, itemType: string, collectionType: string, fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name, fields, sink);
    this.itemType = itemType;
    this.collectionType = collectionType;
  }

  get type(): string {
    return this.collectionType;
  }

  roles(): Item[] {
    return [...this.roleMap.values()];
  }

  get size(): number {
    return this.roleMap.size;
  }

  addRole(role: Item): Item {
    if (role.type !== this.itemType) {
      throw new ArchiveError(
        `Wrong type of role for ${this.name}: requires a ${this.itemType} but got a ${role.type}`,
      );
    }
    const previous = role.parent();
    if (previous instanceof Collection && previous !== this) {
      previous.removeRole(role);
    }
    const replaced = this.roleMap.get(role.name);
    if (replaced && replaced !== role) {
      replaced.detach();
    }
    this.adopt(role);
    this.roleMap.set(role.name, role);
    return role;
  }

  removeRole(which: Item | string): Item | undefined {
    const name = typeof which === 'string' ? which : which.name;
    const role = this.roleMap.get(name);
    if (!role) {
      return undefined;
    }
    this.roleMap.delete(name);
    role.detach();
    return role;
  }

  /** Returns `undefined` when `newName` is taken or `which` is unknown. */
  renameRole(which: Item | string, newName: string): Item | undefined {
    const name = typeof which === 'string' ? which : which.name;
    if (this.roleMap.has(newName)) {
      return undefined;
    }
    const role = this.roleMap.get(name);
    if (!role) {
      return undefined;
    }
    this.roleMap.delete(name);
    role.name = newName;
    this.roleMap.set(newName, role);
    return role;
  }

  sorted(): Item[] {
    return this.roles().sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Without a selector the first role; with a name the role of that name;
   * with a predicate the first matching role.
   */
  find(select?: string | RoleSelector): Item | undefined;
  find(collectionName: string, role: string): Item | undefined;
  find(select?: string | RoleSelector, role?: string): Item | undefined {
    if (role !== undefined && typeof select === 'string') {
      return super.find(select, role);
    }
    if (select === undefined) {
      return this.roles()[0];
    }
    if (typeof select === 'string') {
      return this.roleMap.get(select);
    }
    return this.roles().find(candidate => select(candidate, this));
  }

  filter(select: RoleSelector): Item[] {
    return this.roles().filter(candidate => select(candidate, this));
  }

  add(kind: string, role: Item): Item {
    if (role.type === this.itemType && !(role instanceof Collection)) {
      return this.addRole(role);
    }
    return super.add(kind, role);
  }

  toString(): string {
    return `${this.name}: ${this.sorted().map(role => role.name).join(', ')}`;
  }

  protected childItems(): Item[] {
    return [...super.childItems(), ...this.roleMap.values()];
  }

  toJSON(): ItemJSON {
    return { ...super.toJSON(), roles: this.roles().map(role => role.toJSON()) };
  }
}

export class Emails extends Collection {
  constructor(name = 'emails', fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name || 'emails', 'email', 'mailgroup', fields, sink);
  }
}

export class Locations extends Collection {
  constructor(name = 'locations', fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name || 'locations', 'location', 'whereabouts', fields, sink);
  }
}

export class Systems extends Collection {
  constructor(name = 'systems', fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name || 'systems', 'network', 'network', fields, sink);
  }
}

export class Users extends Collection {
  constructor(name = 'users', fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name || 'users', 'user', 'people', fields, sink);
  }
}

const COLLECTORS = new Map<string, () => Collection>([
  ['emails', () => new Emails()],
  ['locations', () => new Locations()],
  ['systems', () => new Systems()],
  ['users', () => new Users()],
]);

function createCollection(kind: string): Collection | undefined {
  const factory =
    COLLECTORS.get(kind) ?? COLLECTORS.get(`${kind}s`) ?? COLLECTORS.get(COLLECTION_FOR_TYPE.get(kind) ?? '');
  return factory ? factory() : undefined;
}
