import { beforeEach, describe, expect, it } from 'vitest';
import { AnnotationMatcher, match, normalizeGenotype, zygosityOf } from '../src/services/annotation.matcher.js';
import { AnnotationTable, loadAnnotationTable } from '../src/services/annotation.table.js';
import { parseGenotypeFile } from '../src/services/genotype.parser.js';
import { MemoryDataStore } from '../src/services/store/memory.store.js';
import { LookupError } from '../src/utils/errors.js';
import { fixturePath, readFixture } from './helpers.js';
import type { CuratedAnnotation } from '../src/types/annotation.js';
import type { GenotypeCall } from '../src/types/genotype.js';

const factorV: CuratedAnnotation = {
  rsid: 'rs6025',
  gene: 'F5',
  category: 'health',
  condition: 'Factor V Leiden Thrombophilia',
  riskAllele: 'A',
  normalAllele: 'G',
  interpretationRules: {
    GG: 'No Factor V Leiden allele.',
    AG: 'One Factor V Leiden allele.',
    AA: 'Two Factor V Leiden alleles.'
  },
  recommendation: 'Discuss with doctor before surgery or long flights. Avoid hormonal birth control.',
  citations: ['dbSNP rs6025']
};

const prothrombin: CuratedAnnotation = {
  rsid: 'rs1799963',
  gene: 'F2',
  category: 'health',
  condition: 'Prothrombin Thrombophilia',
  riskAllele: 'A',
  normalAllele: 'G',
  interpretationRules: {},
  citations: []
};

const call = (rsid: string, genotype: string): GenotypeCall => ({
  rsid,
  chromosome: '1',
  position: 1000,
  genotype,
  sourceFile: 'test.txt'
});

describe('normalizeGenotype', () => {
  it('sorts alleles and upper-cases them', () => {
    expect(normalizeGenotype('GA')).toBe('AG');
    expect(normalizeGenotype('ct')).toBe('CT');
    expect(normalizeGenotype('ID')).toBe('DI');
    expect(normalizeGenotype('--')).toBe('--');
  });
});

describe('zygosityOf', () => {
  it('classifies diploid, haploid and missing calls', () => {
    expect(zygosityOf('AA')).toBe('homozygous');
    expect(zygosityOf('GA')).toBe('heterozygous');
    expect(zygosityOf('T')).toBe('hemizygous');
    expect(zygosityOf('--')).toBe('no-call');
  });
});

describe('match', () => {
  it('gives AG and GA the same zygosity and interpretation', () => {
    const forward = match(call('rs6025', 'AG'), factorV, 'rs6025');
    const reverse = match(call('rs6025', 'GA'), factorV, 'rs6025');

    expect(forward).not.toBeInstanceOf(LookupError);
    expect(reverse).not.toBeInstanceOf(LookupError);
    if (forward instanceof LookupError || reverse instanceof LookupError) return;

    expect(reverse.zygosity).toBe(forward.zygosity);
    expect(reverse.interpretation).toBe(forward.interpretation);
    expect(reverse.interpretation).toBe('One Factor V Leiden allele.');
    expect(reverse.matchedRule).toBe('AG');
    expect(reverse.riskLevel).toBe('carrier');
  });

  it('distinguishes an untested SNP from an unannotated one', () => {
    const untested = match(undefined, factorV, 'rs6025');
    const unannotated = match(call('rs123', 'AA'), undefined, 'rs123');

    expect(untested).toBeInstanceOf(LookupError);
    expect(unannotated).toBeInstanceOf(LookupError);
    if (!(untested instanceof LookupError) || !(unannotated instanceof LookupError)) return;

    expect(untested.kind).toBe('NotTested');
    expect(unannotated.kind).toBe('NotAnnotated');
    expect(unannotated.message).toBe('SNP rs123 has no curated annotation');
  });

  it('falls back to counting risk alleles when no rule matches', () => {
    const carrier = match(call('rs1799963', 'GA'), prothrombin, 'rs1799963');
    const high = match(call('rs1799963', 'AA'), prothrombin, 'rs1799963');
    const normal = match(call('rs1799963', 'GG'), prothrombin, 'rs1799963');
    const missing = match(call('rs1799963', '--'), prothrombin, 'rs1799963');

    expect(carrier).toMatchObject({
      riskLevel: 'carrier',
      interpretation: 'Heterozygous carrier (AG) for Prothrombin Thrombophilia'
    });
    expect(high).toMatchObject({
      riskLevel: 'high',
      interpretation: 'Homozygous for risk allele (AA) for Prothrombin Thrombophilia'
    });
    expect(normal).toMatchObject({
      riskLevel: 'normal',
      interpretation: 'Normal genotype (GG) for Prothrombin Thrombophilia'
    });
    expect(missing).toMatchObject({
      zygosity: 'no-call',
      riskLevel: 'unknown',
      interpretation: 'No call at this position for Prothrombin Thrombophilia'
    });
  });

  it('counts a single risk allele on a haploid call as a carrier', () => {
    const risk = match(call('rs1799963', 'a'), prothrombin, 'rs1799963');
    const normal = match(call('rs1799963', 'G'), prothrombin, 'rs1799963');

    expect(risk).toMatchObject({
      zygosity: 'hemizygous',
      riskLevel: 'carrier',
      interpretation: 'Hemizygous for risk allele (A) for Prothrombin Thrombophilia'
    });
    expect(normal).toMatchObject({
      zygosity: 'hemizygous',
      riskLevel: 'normal',
      interpretation: 'Normal genotype (G) for Prothrombin Thrombophilia'
    });
  });

  it('attaches the recommendation only when the risk level is not normal', () => {
    const carrier = match(call('rs6025', 'AG'), factorV, 'rs6025');
    const normal = match(call('rs6025', 'GG'), factorV, 'rs6025');
    const missing = match(call('rs6025', '--'), factorV, 'rs6025');
    const withoutText = match(call('rs1799963', 'AA'), prothrombin, 'rs1799963');

    expect(carrier instanceof LookupError ? carrier.kind : carrier.recommendation).toBe(
      'Discuss with doctor before surgery or long flights. Avoid hormonal birth control.'
    );
    expect(normal instanceof LookupError ? normal.kind : normal.recommendation).toBeUndefined();
    expect(missing instanceof LookupError ? missing.kind : missing.recommendation).toBe(
      'Discuss with doctor before surgery or long flights. Avoid hormonal birth control.'
    );
    expect(withoutText instanceof LookupError ? withoutText.kind : withoutText.recommendation).toBeUndefined();
  });
});

describe('AnnotationMatcher', () => {
  let store: MemoryDataStore;
  let matcher: AnnotationMatcher;

  beforeEach(async () => {
    store = new MemoryDataStore();
    const genome = parseGenotypeFile(readFixture('genome-sample.txt'), 'genome-sample.txt');
    await store.replaceGenome(genome.calls, 'genome-sample.txt');
    matcher = new AnnotationMatcher(store, loadAnnotationTable(fixturePath('..', '..', 'data', 'curated-annotations.json')));
  });

  it('looks up a called and annotated SNP', async () => {
    const result = await matcher.lookup('rs4244285');

    expect(result).toMatchObject({
      normalizedGenotype: 'AG',
      zygosity: 'heterozygous',
      interpretation: 'Intermediate CYP2C19 metabolizer.'
    });
  });

  it('reports a called SNP missing from the annotation table as NotAnnotated', async () => {
    const result = await matcher.lookup('i3000001');

    expect(result instanceof LookupError && result.kind).toBe('NotAnnotated');
  });

  it('reports an SNP absent from the genome as NotTested', async () => {
    const result = await matcher.lookup('rs1800562');

    expect(result instanceof LookupError && result.kind).toBe('NotTested');
  });

  it('analyzes every called SNP in a category', async () => {
    const health = await matcher.analyzeCategory('health');

    expect(health.map(result => [result.annotation.rsid, result.riskLevel])).toEqual([
      ['rs429358', 'normal'],
      ['rs7412', 'normal'],
      ['rs6025', 'carrier'],
      ['rs1799963', 'carrier']
    ]);
  });

  it('carries the curated recommendation for an elevated result', async () => {
    const result = await matcher.lookup('rs6025');

    expect(result).toMatchObject({
      riskLevel: 'carrier',
      recommendation: 'Discuss with doctor before surgery or long flights. Avoid hormonal birth control.'
    });
  });

  it('leaves no-calls out of a category report', async () => {
    expect(await matcher.analyzeCategory('trait')).toEqual([]);
  });

  it('works with a hand-built table', async () => {
    const small = new AnnotationMatcher(store, new AnnotationTable([factorV]));

    expect(await small.analyzeCategory('health')).toHaveLength(1);
    const missing = await small.lookup('rs1799963');
    expect(missing instanceof LookupError && missing.kind).toBe('NotAnnotated');
  });
});
