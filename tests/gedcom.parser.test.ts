import { describe, expect, it } from 'vitest';
import { isGedcomContent, parseGedcom, parseGedcomLine, splitGedcomName } from '../src/services/gedcom.parser.js';
import { FamilyTreeEngine } from '../src/services/family-tree.engine.js';
import { FormatError } from '../src/utils/errors.js';
import { readFixture } from './helpers.js';

const gedcom = (...lines: string[]): string => lines.join('\n');

describe('parseGedcomLine', () => {
  it('reads level, xref, tag and value', () => {
    expect(parseGedcomLine('0 @I1@ INDI')).toEqual({ level: 0, xref: 'I1', tag: 'INDI', value: '' });
    expect(parseGedcomLine('1 NAME John /Doe/')).toEqual({ level: 1, tag: 'NAME', value: 'John /Doe/' });
  });

  it('returns null for lines without a level', () => {
    expect(parseGedcomLine('NAME John')).toBeNull();
  });
});

describe('splitGedcomName', () => {
  it('separates the slashed surname', () => {
    expect(splitGedcomName('Robert /Smith/')).toEqual({
      fullName: 'Robert Smith',
      givenName: 'Robert',
      surname: 'Smith'
    });
  });

  it('treats a name without slashes as a given name', () => {
    expect(splitGedcomName('Madonna')).toEqual({ fullName: 'Madonna', givenName: 'Madonna', surname: '' });
  });
});

describe('parseGedcom', () => {
  it('builds individuals and families from nested records', () => {
    const result = parseGedcom(readFixture('smith-family.ged'), 'smith-family.ged');

    expect(result.warnings).toEqual([]);
    expect(result.individuals.map(individual => individual.id)).toEqual(['I1', 'I2', 'I3', 'I4', 'I5']);
    expect(result.individuals[0]).toEqual({
      id: 'I1',
      fullName: 'Robert Smith',
      givenName: 'Robert',
      surname: 'Smith',
      sex: 'M',
      birthDate: '12 MAR 1920',
      birthPlace: 'Leeds, England',
      spouseFamilyRefs: ['F1'],
      rawTags: []
    });
    expect(result.individuals[2].parentFamilyRef).toBe('F1');
    expect(result.individuals[3].rawTags).toEqual([{ tag: 'OCCU', value: 'Teacher' }]);

    expect(result.families[0]).toEqual({
      id: 'F1',
      husbandRef: 'I1',
      wifeRef: 'I2',
      spouseRefs: ['I1', 'I2'],
      childRefs: ['I3'],
      marriageDate: '1945',
      marriagePlace: 'Leeds, England',
      rawTags: []
    });
  });

  it('rejects content that does not start with a HEAD record', () => {
    expect(() => parseGedcom(gedcom('0 @I1@ INDI', '1 NAME A /B/'), 'bad.ged')).toThrow(FormatError);
    expect(isGedcomContent('\n\n0 HEAD\n')).toBe(true);
    expect(isGedcomContent('rs1\t1\t100\tAA')).toBe(false);
  });

  it('imports a dangling FAMC pointer with a warning and leaves the individual rootless', () => {
    const result = parseGedcom(gedcom('0 HEAD', '0 @I1@ INDI', '1 NAME Orphan /Doe/', '1 FAMC @F9@', '0 TRLR'));

    expect(result.warnings).toEqual([{ line: 4, message: 'Individual I1 references missing family F9 (FAMC)' }]);
    expect(result.individuals[0].parentFamilyRef).toBeUndefined();

    const engine = new FamilyTreeEngine(result);
    expect(engine.ancestors('I1')).toEqual([]);
    expect(engine.inferRoot().id).toBe('I1');
  });

  it('reports every individual that is its own ancestor without rejecting the file', () => {
    const result = parseGedcom(
      gedcom(
        '0 HEAD',
        '0 @A@ INDI',
        '1 NAME Ann /Loop/',
        '1 FAMC @F1@',
        '1 FAMS @F2@',
        '0 @B@ INDI',
        '1 NAME Ben /Loop/',
        '1 FAMC @F2@',
        '1 FAMS @F1@',
        '0 @F1@ FAM',
        '1 HUSB @B@',
        '1 CHIL @A@',
        '0 @F2@ FAM',
        '1 WIFE @A@',
        '1 CHIL @B@',
        '0 TRLR'
      )
    );

    expect(result.warnings).toEqual([
      { message: 'Individual A appears among their own ancestors' },
      { message: 'Individual B appears among their own ancestors' }
    ]);
    expect(result.individuals).toHaveLength(2);
  });

  it('warns about level jumps, duplicate ids and a missing trailer', () => {
    const result = parseGedcom(
      gedcom('0 HEAD', '0 @I1@ INDI', '2 DATE 1900', '1 NAME First /One/', '0 @I1@ INDI', '1 NAME Second /One/')
    );

    expect(result.warnings).toEqual([
      { line: 3, message: 'Level 2 DATE has no parent at level 1' },
      { line: 5, message: 'Duplicate record id I1; later record ignored' },
      { message: 'File ended without a TRLR record' }
    ]);
    expect(result.individuals.map(individual => individual.fullName)).toEqual(['First One']);
  });

  it('prefers GIVN and SURN sub-tags and keeps the first event date', () => {
    const result = parseGedcom(
      gedcom(
        '0 HEAD',
        '0 @I1@ INDI',
        '1 NAME Bob /Smyth/',
        '2 GIVN Robert',
        '2 SURN Smith',
        '1 BIRT',
        '2 DATE 1901',
        '2 DATE 1902',
        '1 NAME Bobby /Smith/',
        '0 TRLR'
      )
    );

    const [individual] = result.individuals;
    expect(individual.givenName).toBe('Robert');
    expect(individual.surname).toBe('Smith');
    expect(individual.birthDate).toBe('1901');
    expect(individual.rawTags).toEqual([{ tag: 'NAME', value: 'Bobby /Smith/' }]);
  });

  it('drops unresolved family members and repeated children with warnings', () => {
    const result = parseGedcom(
      gedcom(
        '0 HEAD',
        '0 @I1@ INDI',
        '0 @I2@ INDI',
        '0 @F1@ FAM',
        '1 HUSB @I1@',
        '1 WIFE @I7@',
        '1 CHIL @I2@',
        '1 CHIL @I2@',
        '0 TRLR'
      )
    );

    expect(result.warnings).toEqual([
      { line: 6, message: 'Family F1 references missing individual I7 (WIFE)' },
      { line: 8, message: 'Family F1 lists child I2 more than once' }
    ]);
    expect(result.families[0].spouseRefs).toEqual(['I1']);
    expect(result.families[0].childRefs).toEqual(['I2']);
  });

  it('keeps one parent family when an individual is listed as a child of two', () => {
    const result = parseGedcom(
      gedcom(
        '0 HEAD',
        '0 @A1@ INDI',
        '1 NAME Al /One/',
        '1 FAMS @F1@',
        '0 @B1@ INDI',
        '1 NAME Bea /One/',
        '1 FAMS @F1@',
        '0 @A2@ INDI',
        '1 NAME Art /Two/',
        '1 FAMS @F2@',
        '0 @C@ INDI',
        '1 NAME Cy /One/',
        '1 FAMC @F1@',
        '1 FAMC @F2@',
        '0 @F1@ FAM',
        '1 HUSB @A1@',
        '1 WIFE @B1@',
        '1 CHIL @C@',
        '0 @F2@ FAM',
        '1 HUSB @A2@',
        '1 CHIL @C@',
        '0 TRLR'
      )
    );

    expect(result.warnings).toEqual([
      { line: 14, message: 'Individual C has more than one parent family; F2 ignored' },
      { line: 21, message: 'Family F2 lists child C whose parent family is F1; link ignored' }
    ]);
    expect(result.individuals[3].parentFamilyRef).toBe('F1');
    expect(result.families.map(record => [record.id, record.childRefs])).toEqual([
      ['F1', ['C']],
      ['F2', []]
    ]);

    const engine = new FamilyTreeEngine(result);
    expect(engine.ancestors('C').map(generation => generation.individuals.map(individual => individual.id))).toEqual([
      ['A1', 'B1']
    ]);
  });

  it('takes the first family listing a child when no FAMC names one', () => {
    const result = parseGedcom(
      gedcom(
        '0 HEAD',
        '0 @P1@ INDI',
        '0 @P2@ INDI',
        '0 @C@ INDI',
        '0 @F1@ FAM',
        '1 HUSB @P1@',
        '1 CHIL @C@',
        '0 @F2@ FAM',
        '1 HUSB @P2@',
        '1 CHIL @C@',
        '0 TRLR'
      )
    );

    expect(result.warnings).toEqual([
      { line: 10, message: 'Family F2 lists child C whose parent family is F1; link ignored' }
    ]);
    expect(result.individuals[2].parentFamilyRef).toBe('F1');
    expect(new FamilyTreeEngine(result).parentsOf('C').map(individual => individual.id)).toEqual(['P1']);
  });

  it('stops reading at the trailer', () => {
    const result = parseGedcom(gedcom('0 HEAD', '0 TRLR', '0 @I1@ INDI'));

    expect(result.individuals).toEqual([]);
    expect(result.warnings).toEqual([]);
  });
});
