import type { GenotypeCall } from '../../types/genotype.js';
import type { Family, FamilyTreeData, Individual } from '../../types/genealogy.js';

export type MetadataKey =
  | 'genome_source'
  | 'genome_imported_at'
  | 'genome_call_count'
  | 'genome_generation'
  | 'gedcom_source'
  | 'gedcom_imported_at'
  | 'tree_generation';

export interface StoreCounts {
  genotypeCalls: number;
  individuals: number;
  families: number;
}

export interface ReplaceOptions {
  /** 已有同类数据时抛出 ImportConflictError 而不是替换；检查在写锁内进行 */
  ifEmpty?: boolean;
}

/**
 * 规范化数据存储。
 * 每次导入整体替换同一来源类型的旧数据：要么全部成功，要么失败且旧数据不变。
 * 同一时间只允许一个写入者，读取方只能看到完整的旧版本或新版本。
 */
export interface DataStore {
  replaceGenome(calls: readonly GenotypeCall[], sourceFile: string, options?: ReplaceOptions): Promise<void>;
  replaceTree(
    individuals: readonly Individual[],
    families: readonly Family[],
    sourceFile: string,
    options?: ReplaceOptions
  ): Promise<void>;

  getGenotypeCall(rsid: string): Promise<GenotypeCall | null>;
  getGenotypeCalls(rsids: readonly string[]): Promise<Map<string, GenotypeCall>>;
  listGenotypeCalls(): Promise<GenotypeCall[]>;

  getIndividual(id: string): Promise<Individual | null>;
  searchIndividuals(query: string): Promise<Individual[]>;
  /** 全量读取，仅供家族树引擎在会话开始时使用 */
  loadTree(): Promise<FamilyTreeData>;

  counts(): Promise<StoreCounts>;
  getMetadata(key: MetadataKey): Promise<string | null>;
  /** 每次树导入后递增，用于判断缓存的树引擎是否过期 */
  getTreeGeneration(): Promise<number>;

  close(): Promise<void>;
}

/**
 * 搜索排序: 姓、名、id (不区分大小写，按码位比较以保证结果稳定)
 */
export const compareIndividuals = (a: Individual, b: Individual): number => {
  const keys: Array<[string, string]> = [
    [a.surname.toLowerCase(), b.surname.toLowerCase()],
    [a.givenName.toLowerCase(), b.givenName.toLowerCase()],
    [a.id, b.id]
  ];
  for (const [left, right] of keys) {
    if (left < right) return -1;
    if (left > right) return 1;
  }
  return 0;
};

export const matchesIndividual = (individual: Individual, query: string): boolean => {
  const needle = query.trim().toLowerCase();
  if (!needle) return false;
  return [individual.givenName, individual.surname, individual.fullName, individual.birthPlace ?? '']
    .some(field => field.toLowerCase().includes(needle));
};
