/**
 * A login on some computer system.
 */

import { DiagnosticSink } from './diagnostics';
import { FieldInput, Item } from './item';
import { Location } from './location';

const SYSTEM_ATTRIBUTES = ['hostname', 'location', 'os', 'password', 'username'] as const;

export class System extends Item {
  constructor(name: string, fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name, fields, sink, SYSTEM_ATTRIBUTES);
  }

  get type(): string {
    return 'network';
  }

  hostname(): string {
    return this.attribute('hostname') || 'localhost';
  }

  username(): string | undefined {
    return this.attribute('username');
  }

  os(): string | undefined {
    return this.attribute('os');
  }

  password(): string | undefined {
    return this.attribute('password');
  }

  /** The owning user's location named by the `location` field. */
  location(): Location | undefined {
    const name = this.attribute('location');
    if (!name) {
      return undefined;
    }
    const found = this.user()?.find('locations', name);
    return found instanceof Location ? found : undefined;
  }
}
