import { DiagnosticSink, Email, Emails, Item, Location, Locations, User, Users } from '../src/index';

describe('Item', () => {
  describe('Fields', () => {
    test('should require a name', () => {
      expect(() => new User('')).toThrow('Each item requires a name (User)');
      expect(() => new Location('home').name = '').toThrow('Each item requires a name');
    });

    test('should keep the last value of a repeated field', () => {
      const user = new User('bob', [
        ['nickname', 'a'],
        ['nickname', 'b'],
      ]);

      expect(user.nickname()).toBe('b');
    });

    test('should report unknown fields once each', () => {
      const sink = new DiagnosticSink();
      const user = new User(
        'bob',
        [
          ['a', '1'],
          ['b', '2'],
          ['a', '3'],
          ['description', 'Bob'],
        ],
        sink,
      );

      expect(sink.diagnostics).toEqual([{ message: 'Unknown options "a", "b" for a User' }]);
      expect(user.attribute('a')).toBeUndefined();
      expect(user.description()).toBe('Bob');
    });
  });

  describe('Tree', () => {
    test('should find the parent through the tree', () => {
      const user = new User('bob');
      const home = new Location('home');
      user.add('location', home);

      expect(home.parent()).toBeInstanceOf(Locations);
      expect(home.parent()?.parent()).toBe(user);
      expect(home.user()).toBe(user);
      expect(user.parent()).toBeUndefined();
      expect(user.treeSize()).toBe(3);
      expect(home.treeSize()).toBe(3);
      expect([...user.subtree()].map(item => item.name)).toEqual(['bob', 'locations', 'home']);
    });

    test('should give a removed collection a tree of its own', () => {
      const user = new User('bob');
      const home = new Location('home');
      user.add('location', home);
      const removed = user.removeCollection('location');

      expect(removed?.name).toBe('locations');
      expect(user.collectionNames()).toEqual([]);
      expect(user.treeSize()).toBe(1);
      expect(home.treeSize()).toBe(2);
      expect(home.parent()).toBe(removed);
      expect(home.user()).toBeUndefined();
    });

    test('should move a role between collections', () => {
      const first = new Emails('first');
      const second = new Emails('second');
      const email = new Email('work', [['address', 'work@example.com']]);
      first.addRole(email);
      second.addRole(email);

      expect(first.size).toBe(0);
      expect(second.size).toBe(1);
      expect(email.parent()).toBe(second);
      expect(first.treeSize()).toBe(1);
    });

    test('should fail without a collection for the kind', () => {
      expect(() => new User('bob').add('pet', new Location('x'))).toThrow('No collection for pet in user bob');
      expect(() => new User('bob').addCollection('gadgets')).toThrow("Don't know how to create a collection of gadgets");
    });

    test('should create collections by name', () => {
      const item = new Item('thing');

      expect(item.addCollection('users')).toBeInstanceOf(Users);
      expect(item.addCollection('email')).toBeInstanceOf(Emails);
      expect(item.collectionNames()).toEqual(['users', 'emails']);
    });
  });
});

describe('Collection', () => {
  function places(...names: string[]): Locations {
    const collection = new Locations();
    for (const name of names) {
      collection.addRole(new Location(name));
    }
    return collection;
  }

  test('should only take roles of its type', () => {
    expect(() => new Locations().addRole(new User('bob'))).toThrow(
      'Wrong type of role for locations: requires a location but got a user',
    );
  });

  test('should replace a role with the same name', () => {
    const collection = new Locations();
    const old = new Location('home', [['city', 'Arnhem']]);
    collection.addRole(old);
    collection.addRole(new Location('home', [['city', 'Utrecht']]));

    expect(collection.size).toBe(1);
    expect(collection.find('home')?.attribute('city')).toBe('Utrecht');
    expect(old.parent()).toBeUndefined();
  });

  test('should remove roles', () => {
    const collection = places('home', 'work');
    const removed = collection.removeRole('home');

    expect(removed?.name).toBe('home');
    expect(removed?.parent()).toBeUndefined();
    expect(collection.removeRole('home')).toBeUndefined();
    expect(collection.roles().map(role => role.name)).toEqual(['work']);
  });

  test('should rename roles unless the new name is taken', () => {
    const collection = places('home', 'work');

    expect(collection.renameRole('home', 'work')).toBeUndefined();
    expect(collection.renameRole('cottage', 'villa')).toBeUndefined();
    expect(collection.renameRole('home', 'cottage')?.name).toBe('cottage');
    expect(collection.find('home')).toBeUndefined();
    expect(collection.find('cottage')?.name).toBe('cottage');
  });

  test('should list roles sorted by name', () => {
    const collection = places('work', 'home', 'cottage');

    expect(collection.sorted().map(role => role.name)).toEqual(['cottage', 'home', 'work']);
    expect(collection.toString()).toBe('locations: cottage, home, work');
  });

  test('should find roles by name, predicate or position', () => {
    const collection = places('home', 'work', 'weekend');

    expect(collection.find()?.name).toBe('home');
    expect(collection.find('work')?.name).toBe('work');
    expect(collection.find(role => role.name.startsWith('w'))?.name).toBe('work');
    expect(collection.filter(role => role.name.startsWith('w')).map(role => role.name)).toEqual(['work', 'weekend']);
    expect(collection.find(role => role.name === 'office')).toBeUndefined();
  });

  test('should describe itself with its roles', () => {
    const collection = places('home');

    expect(collection.toJSON()).toEqual({
      type: 'whereabouts',
      name: 'locations',
      attributes: {},
      collections: [],
      roles: [{ type: 'location', name: 'home', attributes: {}, collections: [] }],
    });
  });
});
