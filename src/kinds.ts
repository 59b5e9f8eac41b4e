/**
 * Construction capabilities for the built-in record kinds
 */

import { Email } from './email';
import { Emails } from './item';
import { Location } from './location';
import { System } from './system';
import { RecordKind } from './types';
import { User } from './user';

export const userKind: RecordKind<User> = {
  tag: 'user',
  construct: (name, fields, sink) => new User(name, fields, sink),
};

export const emailKind: RecordKind<Email> = {
  tag: 'email',
  construct: (name, fields, sink) => new Email(name, fields, sink),
};

export const locationKind: RecordKind<Location> = {
  tag: 'location',
  construct: (name, fields, sink) => new Location(name, fields, sink),
};

export const systemKind: RecordKind<System> = {
  tag: 'network',
  construct: (name, fields, sink) => new System(name, fields, sink),
};

export const emailListKind: RecordKind<Emails> = {
  tag: 'mailgroup',
  construct: (name, fields, sink) => new Emails(name, fields, sink),
};

export const DEFAULT_ABBREVIATIONS: ReadonlyArray<readonly [string, RecordKind]> = [
  ['user', userKind],
  ['email', emailKind],
  ['location', locationKind],
  ['system', systemKind],
  ['list', emailListKind],
];
