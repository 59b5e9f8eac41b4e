/**
 * One e-mail identity of a user. Fields which are not set are derived from
 * the owning user where that makes sense: the phrase is the user's full
 * name, the location is one of the user's locations.
 */

import { DiagnosticSink } from './diagnostics';
import { FieldInput, Item } from './item';
import { Location } from './location';
import { User } from './user';

const EMAIL_ATTRIBUTES = [
  'address',
  'charset',
  'comment',
  'domain',
  'language',
  'location',
  'organization',
  'pgp_key',
  'phrase',
  'signature',
  'username',
] as const;

function lastValue(fields: ReadonlyArray<readonly [string, string]>, key: string): string | undefined {
  let value: string | undefined;
  for (const [field, content] of fields) {
    if (field === key) {
      value = content;
    }
  }
  return value;
}

/** A mail address as it appears in a header. */
export interface MailAddress {
  address: string;
  phrase?: string | undefined;
  comment?: string | undefined;
}

export class Email extends Item {
  /** Without a name, the phrase or address is used instead. */
  constructor(name: string, fields: FieldInput = [], sink?: DiagnosticSink) {
    const entries = Array.from(fields);
    super(name || lastValue(entries, 'phrase') || lastValue(entries, 'address') || '', entries, sink, EMAIL_ATTRIBUTES);
  }

  get type(): string {
    return 'email';
  }

  /**
   * An existing identity is returned unchanged, a user gives its first
   * e-mail identity and a header address becomes a new identity.
   */
  static from(other: Email | User | MailAddress): Email | undefined {
    if (other instanceof Email) {
      return other;
    }
    if (other instanceof User) {
      const first = other.collection('emails')?.find();
      return first instanceof Email ? first : undefined;
    }
    const fields: Array<[string, string]> = [['address', other.address]];
    if (other.phrase !== undefined) {
      fields.push(['phrase', other.phrase]);
    }
    if (other.comment !== undefined) {
      fields.push(['comment', other.comment]);
    }
    return new Email('', fields);
  }

  private owner(): User | undefined {
    const user = this.user();
    return user instanceof User ? user : undefined;
  }

  address(): string {
    const address = this.attribute('address');
    if (address !== undefined) {
      return address;
    }
    if (this.attribute('username') || this.attribute('domain')) {
      return `${this.username() ?? ''}@${this.domain() ?? ''}`;
    }
    if (this.name.includes('@')) {
      return this.name;
    }
    return this.owner()?.nickname() ?? this.name;
  }

  domain(): string | undefined {
    const domain = this.attribute('domain');
    if (domain !== undefined) {
      return domain;
    }
    const address = this.attribute('address');
    if (!address) {
      return 'localhost';
    }
    const at = address.indexOf('@');
    return at >= 0 ? address.slice(at + 1) : undefined;
  }

  username(): string | undefined {
    const username = this.attribute('username');
    if (username !== undefined) {
      return username;
    }
    const address = this.attribute('address');
    if (address) {
      return address.replace(/@.*$/, '');
    }
    return this.owner()?.nickname();
  }

  phrase(): string | undefined {
    return this.attribute('phrase') ?? this.owner()?.fullName();
  }

  /** The user's full name, unless that is already used as phrase. */
  comment(): string | undefined {
    const comment = this.attribute('comment');
    if (comment !== undefined) {
      return comment;
    }
    const full = this.owner()?.fullName();
    if (!full) {
      return undefined;
    }
    return this.phrase() === full ? undefined : full;
  }

  charset(): string | undefined {
    return this.attribute('charset') ?? this.owner()?.charset();
  }

  language(): string | undefined {
    return this.attribute('language') ?? this.owner()?.language();
  }

  /** Named location of the user, or the user's first location. */
  location(): Location | undefined {
    const user = this.owner();
    if (!user) {
      return undefined;
    }
    const name = this.attribute('location');
    const found = name === undefined ? user.collection('locations')?.find() : user.find('locations', name);
    return found instanceof Location ? found : undefined;
  }

  organization(): string | undefined {
    return this.attribute('organization') ?? this.location()?.organization();
  }

  pgpKey(): string | undefined {
    return this.attribute('pgp_key');
  }

  signature(): string | undefined {
    return this.attribute('signature');
  }
}
