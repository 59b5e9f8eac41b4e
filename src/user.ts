/**
 * A person. Most name related accessors fall back on one another, so a
 * user with only a name still answers `firstname()` and `fullName()`.
 */

import { DiagnosticSink } from './diagnostics';
import { FieldInput, Item } from './item';

const USER_ATTRIBUTES = [
  'charset',
  'courtesy',
  'birth',
  'full_name',
  'formal_name',
  'firstname',
  'gender',
  'initials',
  'language',
  'nickname',
  'prefix',
  'surname',
  'titles',
] as const;

// Forms of address -> language they belong to
const MALE_COURTESY = new Map<string, string>([
  ['mister', 'en'],
  ['mr', 'en'],
  ['sir', 'en'],
  ['de heer', 'nl'],
  ['mijnheer', 'nl'],
  ['dhr', 'nl'],
  ['herr', 'de'],
]);

const MALE_COURTESY_DEFAULT = new Map<string, string>([
  ['en', 'Mr.'],
  ['nl', 'De heer'],
  ['de', 'Herr'],
]);

const FEMALE_COURTESY = new Map<string, string>([
  ['miss', 'en'],
  ['ms', 'en'],
  ['mrs', 'en'],
  ['madam', 'en'],
  ['mevr', 'nl'],
  ['mevrouw', 'nl'],
  ['frau', 'de'],
]);

const FEMALE_COURTESY_DEFAULT = new Map<string, string>([
  ['en', 'Madam'],
  ['nl', 'Mevrouw'],
  ['de', 'Frau'],
]);

function ucfirst(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function normalizeCourtesy(courtesy: string): string {
  return courtesy.toLowerCase().replace(/[^\s\w]/g, '');
}

export class User extends Item {
  constructor(name: string, fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name, fields, sink, USER_ATTRIBUTES);
  }

  get type(): string {
    return 'user';
  }

  user(): User {
    return this;
  }

  charset(): string | undefined {
    return this.attribute('charset') || process.env.LC_CTYPE;
  }

  nickname(): string {
    return this.attribute('nickname') || this.name;
  }

  firstname(): string {
    return this.attribute('firstname') || ucfirst(this.nickname());
  }

  /** `Mark` gives `M.`, `Jan-Peter` gives `J-P.`, `Christopher` gives `Chr.` */
  initials(): string {
    const explicit = this.attribute('initials');
    if (explicit !== undefined) {
      return explicit;
    }
    let initials = '';
    for (const match of this.firstname().matchAll(/(\w+)(-)?/g)) {
      const part = match[1] ?? '';
      const start = part.match(/^(chr|th|\w)/i)?.[1] ?? '';
      initials += ucfirst(start.toLowerCase()) + (match[2] ?? '.');
    }
    return initials;
  }

  prefix(): string | undefined {
    return this.attribute('prefix');
  }

  surname(): string | undefined {
    return this.attribute('surname');
  }

  titles(): string | undefined {
    return this.attribute('titles');
  }

  fullName(): string {
    const explicit = this.attribute('full_name');
    if (explicit !== undefined) {
      return explicit;
    }
    let first = this.attribute('firstname');
    let surname = this.attribute('surname');
    if (first !== undefined && surname === undefined) {
      surname = ucfirst(this.nickname());
    }
    if (first === undefined && surname !== undefined) {
      first = this.firstname();
    }
    const full = [first, this.prefix(), surname].filter(part => part !== undefined).join(' ');
    return full || this.firstname();
  }

  formalName(): string {
    const explicit = this.attribute('formal_name');
    if (explicit !== undefined) {
      return explicit;
    }
    return [this.courtesy(), this.initials(), this.prefix(), this.surname(), this.titles()]
      .filter(part => part !== undefined && part !== '')
      .join(' ');
  }

  courtesy(): string | undefined {
    const explicit = this.attribute('courtesy');
    if (explicit !== undefined) {
      return explicit;
    }
    const table = this.isMale() ? MALE_COURTESY_DEFAULT : this.isFemale() ? FEMALE_COURTESY_DEFAULT : undefined;
    if (!table) {
      return undefined;
    }
    // "en_GB.utf8", then "en_GB", then "en"
    let language = this.language().toLowerCase();
    if (table.has(language)) {
      return table.get(language);
    }
    language = language.replace(/\..*/, '');
    if (table.has(language)) {
      return table.get(language);
    }
    return table.get(language.replace(/[-_].*/, ''));
  }

  language(): string {
    return this.attribute('language') || 'en';
  }

  gender(): string | undefined {
    return this.attribute('gender');
  }

  isMale(): boolean {
    const gender = this.gender();
    if (gender) {
      return /^[mh]/i.test(gender);
    }
    const courtesy = this.attribute('courtesy');
    return courtesy ? MALE_COURTESY.has(normalizeCourtesy(courtesy)) : false;
  }

  isFemale(): boolean {
    const gender = this.gender();
    if (gender) {
      return /^[vf]/i.test(gender);
    }
    const courtesy = this.attribute('courtesy');
    return courtesy ? FEMALE_COURTESY.has(normalizeCourtesy(courtesy)) : false;
  }

  dateOfBirth(): string | undefined {
    return this.attribute('birth');
  }

  /** Date of birth as `YYYYMMDD`, when it can be understood. */
  birth(): string | undefined {
    const birth = this.dateOfBirth();
    if (!birth) {
      return undefined;
    }
    const preformatted = birth.match(/^\s*(\d{4})[-\s]*(\d{2})[-\s]*(\d{2})\s*$/);
    if (preformatted) {
      return `${preformatted[1]}${preformatted[2]}${preformatted[3]}`;
    }
    const parsed = new Date(birth);
    if (Number.isNaN(parsed.getTime())) {
      return undefined;
    }
    const month = String(parsed.getMonth() + 1).padStart(2, '0');
    const day = String(parsed.getDate()).padStart(2, '0');
    return `${String(parsed.getFullYear()).padStart(4, '0')}${month}${day}`;
  }

  age(today: Date = new Date()): number | undefined {
    const birth = this.birth();
    if (!birth) {
      return undefined;
    }
    const year = Number(birth.slice(0, 4));
    const month = Number(birth.slice(4, 6));
    const day = Number(birth.slice(6, 8));
    const currentMonth = today.getMonth() + 1;
    let age = today.getFullYear() - year;
    if (month > currentMonth || (month === currentMonth && day > today.getDate())) {
      age -= 1;
    }
    return age;
  }
}
