import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Family, Individual } from '../src/types/genealogy.js';

export const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

export const fixturePath = (...segments: string[]): string => path.join(fixturesDir, ...segments);

export const readFixture = (...segments: string[]): string => readFileSync(fixturePath(...segments), 'utf-8');

export const person = (id: string, givenName: string, surname: string, extra: Partial<Individual> = {}): Individual => ({
  id,
  fullName: `${givenName} ${surname}`.trim(),
  givenName,
  surname,
  sex: 'U',
  spouseFamilyRefs: [],
  rawTags: [],
  ...extra
});

export const family = (id: string, spouseRefs: string[], childRefs: string[] = []): Family => ({
  id,
  husbandRef: spouseRefs[0],
  wifeRef: spouseRefs[1],
  spouseRefs,
  childRefs,
  rawTags: []
});
