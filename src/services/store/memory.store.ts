import { WriterLock } from './writer.lock.js';
import { assertTreeIntegrity, assertUniqueRsids, cloneFamily, cloneIndividual } from './record.utils.js';
import { compareIndividuals, matchesIndividual } from './data.store.js';
import { ImportConflictError } from '../../utils/errors.js';
import type { DataStore, MetadataKey, ReplaceOptions, StoreCounts } from './data.store.js';
import type { GenotypeCall } from '../../types/genotype.js';
import type { Family, FamilyTreeData, Individual } from '../../types/genealogy.js';

interface StoreState {
  genome: ReadonlyMap<string, GenotypeCall>;
  individuals: ReadonlyMap<string, Individual>;
  families: ReadonlyMap<string, Family>;
  metadata: ReadonlyMap<MetadataKey, string>;
}

const emptyState = (): StoreState => ({
  genome: new Map(),
  individuals: new Map(),
  families: new Map(),
  metadata: new Map()
});

/**
 * 进程内存储。新版本在旁边构建完成后一次性替换 state 引用，
 * 读取方只会看到完整的旧版本或新版本。
 */
export class MemoryDataStore implements DataStore {
  private state: StoreState = emptyState();
  private readonly lock = new WriterLock();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async replaceGenome(calls: readonly GenotypeCall[], sourceFile: string, options: ReplaceOptions = {}): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (options.ifEmpty && this.state.genome.size > 0) {
        throw new ImportConflictError('genome');
      }
      assertUniqueRsids(calls);
      const genome = new Map(calls.map(call => [call.rsid, { ...call }] as const));
      const metadata = new Map(this.state.metadata);
      const generation = Number(metadata.get('genome_generation') ?? '0') + 1;
      metadata.set('genome_source', sourceFile);
      metadata.set('genome_imported_at', this.now().toISOString());
      metadata.set('genome_call_count', String(genome.size));
      metadata.set('genome_generation', String(generation));

      this.state = { ...this.state, genome, metadata };
    });
  }

  async replaceTree(
    individuals: readonly Individual[],
    families: readonly Family[],
    sourceFile: string,
    options: ReplaceOptions = {}
  ): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (options.ifEmpty && this.state.individuals.size + this.state.families.size > 0) {
        throw new ImportConflictError('tree');
      }
      assertTreeIntegrity(individuals, families);
      const nextIndividuals = new Map(individuals.map(individual => [individual.id, cloneIndividual(individual)] as const));
      const nextFamilies = new Map(families.map(family => [family.id, cloneFamily(family)] as const));
      const metadata = new Map(this.state.metadata);
      const generation = Number(metadata.get('tree_generation') ?? '0') + 1;
      metadata.set('gedcom_source', sourceFile);
      metadata.set('gedcom_imported_at', this.now().toISOString());
      metadata.set('tree_generation', String(generation));

      this.state = { ...this.state, individuals: nextIndividuals, families: nextFamilies, metadata };
    });
  }

  async getGenotypeCall(rsid: string): Promise<GenotypeCall | null> {
    const call = this.state.genome.get(rsid);
    return call ? { ...call } : null;
  }

  async getGenotypeCalls(rsids: readonly string[]): Promise<Map<string, GenotypeCall>> {
    const { genome } = this.state;
    const result = new Map<string, GenotypeCall>();
    for (const rsid of rsids) {
      const call = genome.get(rsid);
      if (call) result.set(rsid, { ...call });
    }
    return result;
  }

  async listGenotypeCalls(): Promise<GenotypeCall[]> {
    return [...this.state.genome.values()].map(call => ({ ...call }));
  }

  async getIndividual(id: string): Promise<Individual | null> {
    const individual = this.state.individuals.get(id);
    return individual ? cloneIndividual(individual) : null;
  }

  async searchIndividuals(query: string): Promise<Individual[]> {
    return [...this.state.individuals.values()]
      .filter(individual => matchesIndividual(individual, query))
      .sort(compareIndividuals)
      .map(cloneIndividual);
  }

  async loadTree(): Promise<FamilyTreeData> {
    const { individuals, families } = this.state;
    return {
      individuals: [...individuals.values()].map(cloneIndividual),
      families: [...families.values()].map(cloneFamily)
    };
  }

  async counts(): Promise<StoreCounts> {
    const { genome, individuals, families } = this.state;
    return { genotypeCalls: genome.size, individuals: individuals.size, families: families.size };
  }

  async getMetadata(key: MetadataKey): Promise<string | null> {
    return this.state.metadata.get(key) ?? null;
  }

  async getTreeGeneration(): Promise<number> {
    return Number(this.state.metadata.get('tree_generation') ?? '0');
  }

  async close(): Promise<void> {
    this.state = emptyState();
  }
}
