import { describe, expect, it } from 'vitest';
import { MemoryDataStore } from '../src/services/store/memory.store.js';
import { WriterLock } from '../src/services/store/writer.lock.js';
import { ImportConflictError, StoreBusyError } from '../src/utils/errors.js';
import { family, person } from './helpers.js';
import type { GenotypeCall } from '../src/types/genotype.js';

const call = (rsid: string, genotype: string): GenotypeCall => ({
  rsid,
  chromosome: '1',
  position: 100,
  genotype,
  sourceFile: 'genome.txt'
});

const fixedClock = () => new Date('2024-05-01T10:00:00.000Z');

describe('MemoryDataStore', () => {
  it('replaces the whole genome on each import', async () => {
    const store = new MemoryDataStore(fixedClock);
    await store.replaceGenome([call('rs1', 'AA'), call('rs2', 'AG')], 'first.txt');
    await store.replaceGenome([call('rs3', 'CC')], 'second.txt');

    expect(await store.getGenotypeCall('rs1')).toBeNull();
    expect((await store.listGenotypeCalls()).map(entry => entry.rsid)).toEqual(['rs3']);
    expect(await store.getMetadata('genome_source')).toBe('second.txt');
    expect(await store.getMetadata('genome_call_count')).toBe('1');
    expect(await store.getMetadata('genome_imported_at')).toBe('2024-05-01T10:00:00.000Z');
    expect(await store.getMetadata('genome_generation')).toBe('2');
  });

  it('leaves the previous tree untouched when a replacement is invalid', async () => {
    const store = new MemoryDataStore();
    await store.replaceTree([person('I1', 'Ada', 'Stone')], [], 'good.ged');

    await expect(
      store.replaceTree([person('I2', 'Bo', 'Stone', { parentFamilyRef: 'F404' })], [], 'bad.ged')
    ).rejects.toThrow('Individual I2 references unknown family F404');

    expect(await store.counts()).toEqual({ genotypeCalls: 0, individuals: 1, families: 0 });
    expect(await store.getMetadata('gedcom_source')).toBe('good.ged');
    expect(await store.getTreeGeneration()).toBe(1);
  });

  it('rejects duplicate rsids in one genome', async () => {
    const store = new MemoryDataStore();

    await expect(store.replaceGenome([call('rs1', 'AA'), call('rs1', 'GG')], 'dup.txt')).rejects.toThrow(
      'Duplicate rsid rs1 in genome import'
    );
  });

  it('rejects a family with more than two spouses', async () => {
    const store = new MemoryDataStore();
    const members = [person('A', 'A', 'X'), person('B', 'B', 'X'), person('C', 'C', 'X')];

    await expect(store.replaceTree(members, [family('F1', ['A', 'B', 'C'])], 'three.ged')).rejects.toThrow(
      'Family F1 has more than two spouses'
    );
  });

  it('fails fast when a second writer arrives during an import', async () => {
    const store = new MemoryDataStore();

    const first = store.replaceGenome([call('rs1', 'AA')], 'first.txt');
    const second = store.replaceGenome([call('rs2', 'GG')], 'second.txt');

    await expect(second).rejects.toBeInstanceOf(StoreBusyError);
    await first;
    expect((await store.listGenotypeCalls()).map(entry => entry.rsid)).toEqual(['rs1']);
  });

  it('refuses to replace existing data when asked to write only into an empty store', async () => {
    const store = new MemoryDataStore();
    await store.replaceGenome([call('rs1', 'AA')], 'first.txt', { ifEmpty: true });
    await store.replaceTree([person('I1', 'Ada', 'Stone')], [], 'a.ged', { ifEmpty: true });

    await expect(store.replaceGenome([call('rs2', 'GG')], 'second.txt', { ifEmpty: true })).rejects.toBeInstanceOf(
      ImportConflictError
    );
    await expect(store.replaceTree([person('I2', 'Bo', 'Stone')], [], 'b.ged', { ifEmpty: true })).rejects.toThrow(
      'A tree has already been imported. Use force to replace it.'
    );
    expect((await store.listGenotypeCalls()).map(entry => entry.rsid)).toEqual(['rs1']);
    expect(await store.getMetadata('gedcom_source')).toBe('a.ged');

    // 冲突检查失败后写锁已释放
    await store.replaceGenome([call('rs3', 'CC')], 'third.txt');
    expect(await store.getMetadata('genome_source')).toBe('third.txt');
  });

  it('bumps the tree generation on each tree import', async () => {
    const store = new MemoryDataStore();
    expect(await store.getTreeGeneration()).toBe(0);

    await store.replaceTree([person('I1', 'Ada', 'Stone')], [], 'a.ged');
    await store.replaceTree([person('I1', 'Ada', 'Stone')], [], 'b.ged');

    expect(await store.getTreeGeneration()).toBe(2);
  });

  it('hands out copies that cannot change stored records', async () => {
    const store = new MemoryDataStore();
    await store.replaceTree([person('I1', 'Ada', 'Stone')], [], 'a.ged');

    const copy = await store.getIndividual('I1');
    copy?.rawTags.push({ tag: 'NOTE', value: 'edited' });

    expect((await store.getIndividual('I1'))?.rawTags).toEqual([]);
  });

  it('searches names and birth places', async () => {
    const store = new MemoryDataStore();
    await store.replaceTree(
      [
        person('I1', 'Ada', 'Stone', { birthPlace: 'Bristol' }),
        person('I2', 'Cy', 'Brook'),
        person('I3', 'Abe', 'Stone')
      ],
      [],
      'a.ged'
    );

    expect((await store.searchIndividuals('stone')).map(individual => individual.id)).toEqual(['I3', 'I1']);
    expect((await store.searchIndividuals('bristol')).map(individual => individual.id)).toEqual(['I1']);
    expect(await store.searchIndividuals('')).toEqual([]);
  });
});

describe('WriterLock', () => {
  it('releases on every exit path', async () => {
    const lock = new WriterLock();

    await expect(
      lock.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(lock.isHeld).toBe(false);
  });

  it('ignores a repeated release', () => {
    const lock = new WriterLock();
    const release = lock.acquire();
    release();
    const again = lock.acquire();
    release();

    expect(lock.isHeld).toBe(true);
    again();
    expect(lock.isHeld).toBe(false);
  });
});
