/**
 * A physical location: home, office, holiday address.
 */

import { DiagnosticSink } from './diagnostics';
import { FieldInput, Item } from './item';

const LOCATION_ATTRIBUTES = [
  'city',
  'country',
  'country_code',
  'fax',
  'organization',
  'pobox',
  'pobox_pc',
  'postal_code',
  'state',
  'street',
  'telephone',
] as const;

function regionName(code: string): string | undefined {
  try {
    return new Intl.DisplayNames(['en'], { type: 'region' }).of(code.toUpperCase());
  } catch (error) {
    if (error instanceof RangeError) {
      return undefined;
    }
    throw error;
  }
}

export class Location extends Item {
  constructor(name: string, fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name, fields, sink, LOCATION_ATTRIBUTES);
  }

  get type(): string {
    return 'location';
  }

  street(): string | undefined {
    return this.attribute('street');
  }

  postalCode(): string | undefined {
    return this.attribute('postal_code');
  }

  pobox(): string | undefined {
    return this.attribute('pobox');
  }

  poboxPostalCode(): string | undefined {
    return this.attribute('pobox_pc');
  }

  city(): string | undefined {
    return this.attribute('city');
  }

  state(): string | undefined {
    return this.attribute('state');
  }

  /** Explicit country, else the English name for `country_code`. */
  country(): string | undefined {
    const country = this.attribute('country');
    if (country !== undefined) {
      return country;
    }
    const code = this.countryCode();
    return code ? regionName(code) : undefined;
  }

  countryCode(): string | undefined {
    return this.attribute('country_code');
  }

  organization(): string | undefined {
    return this.attribute('organization');
  }

  telephone(): string | undefined {
    return this.attribute('telephone');
  }

  fax(): string | undefined {
    return this.attribute('fax');
  }

  /**
   * Postal address as printed on an envelope, or `undefined` without a
   * street (or pobox) and a city. Dutch addresses put the postal code before
   * the city.
   */
  fullAddress(): string | undefined {
    const pobox = this.pobox();
    const address = pobox ?? this.street();
    const postalCode = (pobox ? this.poboxPostalCode() : this.postalCode()) ?? '';
    const city = this.city();
    if (address === undefined || city === undefined) {
      return undefined;
    }

    const code = this.countryCode()?.toLowerCase();
    const country = this.country() ?? code?.toUpperCase();
    const countryLine = country ? `\n${country}` : '';
    const organization = this.organization();
    const organizationLine = organization !== undefined ? `${organization}\n` : '';

    if (code === 'nl') {
      const dutch = postalCode.match(/(\d{4})\s*([a-zA-Z]{2})/);
      const formatted = dutch ? `${dutch[1]} ${(dutch[2] ?? '').toUpperCase()}  ` : postalCode;
      return `${organizationLine}${address}\n${formatted}${city}${countryLine}\n`;
    }

    const state = this.state();
    const stateText = state ? ` ${state}` : '';
    return `${organizationLine}${address}\n${city}${stateText}${countryLine}\n${postalCode}`;
  }
}
