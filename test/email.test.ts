import { Email, Location, User } from '../src/index';

function owner(): User {
  const user = new User('markov', [
    ['firstname', 'Mark'],
    ['surname', 'Overmeer'],
    ['language', 'nl'],
    ['charset', 'iso-8859-1'],
  ]);
  user.add('location', new Location('home', [['city', 'Arnhem']]));
  user.add('location', new Location('work', [['organization', 'Example Software']]));
  return user;
}

describe('Email', () => {
  describe('Names', () => {
    test('should take its name from the phrase or the address', () => {
      expect(new Email('', [['address', 'tux@example.net']]).name).toBe('tux@example.net');
      expect(
        new Email('', [
          ['address', 'tux@example.net'],
          ['phrase', 'Tux'],
        ]).name,
      ).toBe('Tux');
      expect(() => new Email('')).toThrow('Each item requires a name (Email)');
    });
  });

  describe('Conversion', () => {
    test('should return an existing identity unchanged', () => {
      const email = new Email('work', [['address', 'solutions@example.com']]);

      expect(Email.from(email)).toBe(email);
    });

    test('should take the first identity of a user', () => {
      const user = owner();

      expect(Email.from(user)).toBeUndefined();
      const home = new Email('home', [['address', 'mark@example.com']]);
      user.add('email', home);
      user.add('email', new Email('work', [['address', 'solutions@example.com']]));
      expect(Email.from(user)).toBe(home);
    });

    test('should create an identity from a header address', () => {
      const email = Email.from({ address: 'tux@example.net', phrase: 'Tux' });

      expect(email?.name).toBe('Tux');
      expect(email?.address()).toBe('tux@example.net');
      expect(email?.phrase()).toBe('Tux');
      expect(email?.comment()).toBeUndefined();
      expect(Email.from({ address: 'tux@example.net', comment: 'penguin' })?.comment()).toBe('penguin');
    });
  });

  describe('Address parts', () => {
    test('should split the address', () => {
      const email = new Email('work', [['address', 'solutions@example.com']]);

      expect(email.address()).toBe('solutions@example.com');
      expect(email.username()).toBe('solutions');
      expect(email.domain()).toBe('example.com');
    });

    test('should build the address from its parts', () => {
      const email = new Email('home', [
        ['username', 'mark'],
        ['domain', 'example.org'],
      ]);

      expect(email.address()).toBe('mark@example.org');
    });

    test('should use the name as address when it looks like one', () => {
      expect(new Email('mark@example.com').address()).toBe('mark@example.com');
    });

    test('should default to the local host', () => {
      const email = new Email('local');

      expect(email.address()).toBe('local');
      expect(email.domain()).toBe('localhost');
      expect(email.username()).toBeUndefined();
      expect(email.phrase()).toBeUndefined();
      expect(email.location()).toBeUndefined();
    });

    test('should return no domain for an address without one', () => {
      expect(new Email('x', [['address', 'postmaster']]).domain()).toBeUndefined();
    });
  });

  describe('Derived from the user', () => {
    test('should use the user for the missing parts', () => {
      const user = owner();
      const email = new Email('private');
      user.add('email', email);

      expect(email.address()).toBe('markov');
      expect(email.username()).toBe('markov');
      expect(email.phrase()).toBe('Mark Overmeer');
      expect(email.comment()).toBeUndefined();
      expect(email.language()).toBe('nl');
      expect(email.charset()).toBe('iso-8859-1');
    });

    test('should comment with the full name when the phrase differs', () => {
      const user = owner();
      const email = new Email('private', [['phrase', 'Mark']]);
      user.add('email', email);

      expect(email.comment()).toBe('Mark Overmeer');
      expect(new Email('x', [['comment', 'hi']]).comment()).toBe('hi');
    });

    test('should find its location at the user', () => {
      const user = owner();
      const first = new Email('first');
      const office = new Email('office', [['location', 'work']]);
      const lost = new Email('lost', [['location', 'moon']]);
      user.add('email', first);
      user.add('email', office);
      user.add('email', lost);

      expect(first.location()?.name).toBe('home');
      expect(office.location()?.name).toBe('work');
      expect(office.organization()).toBe('Example Software');
      expect(lost.location()).toBeUndefined();
      expect(lost.organization()).toBeUndefined();
    });

    test('should prefer its own fields', () => {
      const user = owner();
      const email = new Email('own', [
        ['language', 'en'],
        ['organization', 'Self'],
        ['pgp_key', 'test-key'],
        ['signature', '-- Mark'],
      ]);
      user.add('email', email);

      expect(email.language()).toBe('en');
      expect(email.organization()).toBe('Self');
      expect(email.pgpKey()).toBe('test-key');
      expect(email.signature()).toBe('-- Mark');
    });
  });
});
