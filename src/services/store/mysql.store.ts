import type { Pool, PoolConnection, RowDataPacket } from 'mysql2/promise';
import { z } from 'zod';
import { WriterLock } from './writer.lock.js';
import { assertTreeIntegrity, assertUniqueRsids } from './record.utils.js';
import { compareIndividuals, matchesIndividual } from './data.store.js';
import type { DataStore, MetadataKey, ReplaceOptions, StoreCounts } from './data.store.js';
import { ImportConflictError, StoreBusyError } from '../../utils/errors.js';
import { serverLogger } from '../../utils/logger.js';
import type { GenotypeCall } from '../../types/genotype.js';
import type { Family, FamilyTreeData, Individual, RawTag, Sex } from '../../types/genealogy.js';

const IMPORT_LOCK_NAME = 'genotree_import';
const INSERT_BATCH_SIZE = 5000;

interface GenotypeRow extends RowDataPacket {
  rsid: string;
  chromosome: string;
  position: number;
  genotype: string;
  source_file: string;
}

interface IndividualRow extends RowDataPacket {
  id: string;
  full_name: string;
  given_name: string;
  surname: string;
  sex: string;
  birth_date: string | null;
  birth_place: string | null;
  death_date: string | null;
  death_place: string | null;
  parent_family_id: string | null;
  raw_tags: unknown;
}

interface FamilyRow extends RowDataPacket {
  id: string;
  husband_id: string | null;
  wife_id: string | null;
  marriage_date: string | null;
  marriage_place: string | null;
  raw_tags: unknown;
}

interface LinkRow extends RowDataPacket {
  owner_id: string;
  linked_id: string;
}

interface CountRow extends RowDataPacket {
  count: number;
}

interface MetadataRow extends RowDataPacket {
  meta_value: string;
}

interface LockRow extends RowDataPacket {
  acquired: number | null;
}

const rawTagsSchema = z.array(z.object({ tag: z.string(), value: z.string() }));

// JSON 列可能已被驱动解析，也可能是字符串
const parseRawTags = (value: unknown): RawTag[] => {
  if (value === null || value === undefined) return [];
  const candidate = typeof value === 'string' ? JSON.parse(value) : value;
  const parsed = rawTagsSchema.safeParse(candidate);
  return parsed.success ? parsed.data : [];
};

const toSex = (value: string): Sex => (value === 'M' || value === 'F' ? value : 'U');

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, match => `\\${match}`);

const groupLinks = (rows: LinkRow[]): Map<string, string[]> => {
  const grouped = new Map<string, string[]>();
  for (const row of rows) {
    const list = grouped.get(row.owner_id);
    if (list) list.push(row.linked_id);
    else grouped.set(row.owner_id, [row.linked_id]);
  }
  return grouped;
};

const toGenotypeCall = (row: GenotypeRow): GenotypeCall => ({
  rsid: row.rsid,
  chromosome: row.chromosome,
  position: Number(row.position),
  genotype: row.genotype,
  sourceFile: row.source_file
});

const toIndividual = (row: IndividualRow, spouseFamilies: Map<string, string[]>): Individual => ({
  id: row.id,
  fullName: row.full_name,
  givenName: row.given_name,
  surname: row.surname,
  sex: toSex(row.sex),
  birthDate: row.birth_date ?? undefined,
  birthPlace: row.birth_place ?? undefined,
  deathDate: row.death_date ?? undefined,
  deathPlace: row.death_place ?? undefined,
  parentFamilyRef: row.parent_family_id ?? undefined,
  spouseFamilyRefs: spouseFamilies.get(row.id) ?? [],
  rawTags: parseRawTags(row.raw_tags)
});

/**
 * MySQL 存储。导入在单个事务中先删除旧数据再批量写入新数据，
 * 并在整个导入期间持有 GET_LOCK 命名锁 (跨进程) 与进程内写锁。
 */
export class MysqlDataStore implements DataStore {
  private readonly lock = new WriterLock();

  constructor(private readonly pool: Pool) {}

  async replaceGenome(calls: readonly GenotypeCall[], sourceFile: string, options: ReplaceOptions = {}): Promise<void> {
    assertUniqueRsids(calls);
    await this.withImportTransaction(async connection => {
      if (options.ifEmpty) {
        await this.assertEmpty(connection, 'genome', ['genotype_calls']);
      }
      await connection.query('DELETE FROM genotype_calls');
      for (const batch of chunk(calls, INSERT_BATCH_SIZE)) {
        await connection.query(
          'INSERT INTO genotype_calls (rsid, chromosome, position, genotype, source_file) VALUES ?',
          [batch.map(call => [call.rsid, call.chromosome, call.position, call.genotype, call.sourceFile])]
        );
      }

      const generation = (await this.readNumber(connection, 'genome_generation')) + 1;
      await this.writeMetadata(connection, [
        ['genome_source', sourceFile],
        ['genome_imported_at', new Date().toISOString()],
        ['genome_call_count', String(calls.length)],
        ['genome_generation', String(generation)]
      ]);
    });
  }

  async replaceTree(
    individuals: readonly Individual[],
    families: readonly Family[],
    sourceFile: string,
    options: ReplaceOptions = {}
  ): Promise<void> {
    assertTreeIntegrity(individuals, families);
    await this.withImportTransaction(async connection => {
      if (options.ifEmpty) {
        await this.assertEmpty(connection, 'tree', ['individuals', 'families']);
      }
      for (const table of ['individual_spouse_families', 'family_children', 'family_spouses', 'families', 'individuals']) {
        await connection.query(`DELETE FROM ${table}`);
      }

      for (const batch of chunk(individuals, INSERT_BATCH_SIZE)) {
        await connection.query(
          `INSERT INTO individuals
             (id, full_name, given_name, surname, sex, birth_date, birth_place, death_date, death_place, parent_family_id, raw_tags)
           VALUES ?`,
          [batch.map(individual => [
            individual.id, individual.fullName, individual.givenName, individual.surname, individual.sex,
            individual.birthDate ?? null, individual.birthPlace ?? null,
            individual.deathDate ?? null, individual.deathPlace ?? null,
            individual.parentFamilyRef ?? null, JSON.stringify(individual.rawTags)
          ])]
        );
      }

      for (const batch of chunk(families, INSERT_BATCH_SIZE)) {
        await connection.query(
          'INSERT INTO families (id, husband_id, wife_id, marriage_date, marriage_place, raw_tags) VALUES ?',
          [batch.map(family => [
            family.id, family.husbandRef ?? null, family.wifeRef ?? null,
            family.marriageDate ?? null, family.marriagePlace ?? null, JSON.stringify(family.rawTags)
          ])]
        );
      }

      const spouseLinks = families.flatMap(family => family.spouseRefs.map((id, order) => [family.id, id, order]));
      const childLinks = families.flatMap(family => family.childRefs.map((id, order) => [family.id, id, order]));
      const spouseFamilyLinks = individuals.flatMap(individual =>
        individual.spouseFamilyRefs.map((id, order) => [individual.id, id, order])
      );
      const linkTables: Array<[string, (string | number)[][]]> = [
        ['INSERT INTO family_spouses (family_id, individual_id, sort_order) VALUES ?', spouseLinks],
        ['INSERT INTO family_children (family_id, child_id, sort_order) VALUES ?', childLinks],
        ['INSERT INTO individual_spouse_families (individual_id, family_id, sort_order) VALUES ?', spouseFamilyLinks]
      ];
      for (const [sql, rows] of linkTables) {
        for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
          await connection.query(sql, [batch]);
        }
      }

      const generation = (await this.readNumber(connection, 'tree_generation')) + 1;
      await this.writeMetadata(connection, [
        ['gedcom_source', sourceFile],
        ['gedcom_imported_at', new Date().toISOString()],
        ['tree_generation', String(generation)]
      ]);
    });
  }

  async getGenotypeCall(rsid: string): Promise<GenotypeCall | null> {
    const [rows] = await this.pool.execute<GenotypeRow[]>(
      'SELECT rsid, chromosome, position, genotype, source_file FROM genotype_calls WHERE rsid = ? LIMIT 1',
      [rsid]
    );
    return rows.length > 0 ? toGenotypeCall(rows[0]) : null;
  }

  async getGenotypeCalls(rsids: readonly string[]): Promise<Map<string, GenotypeCall>> {
    const result = new Map<string, GenotypeCall>();
    if (rsids.length === 0) return result;
    const [rows] = await this.pool.query<GenotypeRow[]>(
      'SELECT rsid, chromosome, position, genotype, source_file FROM genotype_calls WHERE rsid IN (?)',
      [[...rsids]]
    );
    for (const row of rows) {
      result.set(row.rsid, toGenotypeCall(row));
    }
    return result;
  }

  async listGenotypeCalls(): Promise<GenotypeCall[]> {
    const [rows] = await this.pool.query<GenotypeRow[]>(
      'SELECT rsid, chromosome, position, genotype, source_file FROM genotype_calls ORDER BY chromosome, position, rsid'
    );
    return rows.map(toGenotypeCall);
  }

  async getIndividual(id: string): Promise<Individual | null> {
    const connection = await this.pool.getConnection();
    try {
      const [rows] = await connection.execute<IndividualRow[]>('SELECT * FROM individuals WHERE id = ? LIMIT 1', [id]);
      const individuals = await this.hydrateIndividuals(connection, rows);
      return individuals[0] ?? null;
    } finally {
      connection.release();
    }
  }

  async searchIndividuals(query: string): Promise<Individual[]> {
    const needle = query.trim();
    if (!needle) return [];
    const pattern = `%${escapeLike(needle)}%`;

    const connection = await this.pool.getConnection();
    try {
      const [rows] = await connection.execute<IndividualRow[]>(
        `SELECT * FROM individuals
         WHERE given_name LIKE ? OR surname LIKE ? OR full_name LIKE ? OR birth_place LIKE ?`,
        [pattern, pattern, pattern, pattern]
      );
      const individuals = await this.hydrateIndividuals(connection, rows);
      // 数据库排序规则可能忽略重音，这里按统一规则再过滤和排序
      return individuals.filter(individual => matchesIndividual(individual, needle)).sort(compareIndividuals);
    } finally {
      connection.release();
    }
  }

  async loadTree(): Promise<FamilyTreeData> {
    const connection = await this.pool.getConnection();
    try {
      // 一致性快照，避免读到导入过程中的中间状态
      await connection.query('START TRANSACTION WITH CONSISTENT SNAPSHOT');
      try {
        const [individualRows] = await connection.query<IndividualRow[]>('SELECT * FROM individuals ORDER BY id');
        const [familyRows] = await connection.query<FamilyRow[]>('SELECT * FROM families ORDER BY id');
        const [spouseRows] = await connection.query<LinkRow[]>(
          'SELECT family_id AS owner_id, individual_id AS linked_id FROM family_spouses ORDER BY family_id, sort_order'
        );
        const [childRows] = await connection.query<LinkRow[]>(
          'SELECT family_id AS owner_id, child_id AS linked_id FROM family_children ORDER BY family_id, sort_order'
        );
        const individuals = await this.hydrateIndividuals(connection, individualRows);
        await connection.commit();

        const spouses = groupLinks(spouseRows);
        const children = groupLinks(childRows);
        const families: Family[] = familyRows.map(row => ({
          id: row.id,
          husbandRef: row.husband_id ?? undefined,
          wifeRef: row.wife_id ?? undefined,
          spouseRefs: spouses.get(row.id) ?? [],
          childRefs: children.get(row.id) ?? [],
          marriageDate: row.marriage_date ?? undefined,
          marriagePlace: row.marriage_place ?? undefined,
          rawTags: parseRawTags(row.raw_tags)
        }));
        return { individuals, families };
      } catch (error) {
        await connection.rollback();
        throw error;
      }
    } finally {
      connection.release();
    }
  }

  async counts(): Promise<StoreCounts> {
    const [[genotypes], [individuals], [families]] = await Promise.all([
      this.pool.query<CountRow[]>('SELECT COUNT(*) AS count FROM genotype_calls'),
      this.pool.query<CountRow[]>('SELECT COUNT(*) AS count FROM individuals'),
      this.pool.query<CountRow[]>('SELECT COUNT(*) AS count FROM families')
    ]);
    return {
      genotypeCalls: Number(genotypes[0]?.count ?? 0),
      individuals: Number(individuals[0]?.count ?? 0),
      families: Number(families[0]?.count ?? 0)
    };
  }

  async getMetadata(key: MetadataKey): Promise<string | null> {
    const [rows] = await this.pool.execute<MetadataRow[]>(
      'SELECT meta_value FROM import_metadata WHERE meta_key = ? LIMIT 1',
      [key]
    );
    return rows.length > 0 ? rows[0].meta_value : null;
  }

  async getTreeGeneration(): Promise<number> {
    return Number((await this.getMetadata('tree_generation')) ?? '0');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async hydrateIndividuals(connection: PoolConnection, rows: IndividualRow[]): Promise<Individual[]> {
    if (rows.length === 0) return [];
    const [links] = await connection.query<LinkRow[]>(
      `SELECT individual_id AS owner_id, family_id AS linked_id FROM individual_spouse_families
       WHERE individual_id IN (?) ORDER BY individual_id, sort_order`,
      [rows.map(row => row.id)]
    );
    const spouseFamilies = groupLinks(links);
    return rows.map(row => toIndividual(row, spouseFamilies));
  }

  private async readNumber(connection: PoolConnection, key: MetadataKey): Promise<number> {
    const [rows] = await connection.execute<MetadataRow[]>(
      'SELECT meta_value FROM import_metadata WHERE meta_key = ? FOR UPDATE',
      [key]
    );
    return rows.length > 0 ? Number(rows[0].meta_value) || 0 : 0;
  }

  private async writeMetadata(connection: PoolConnection, entries: Array<[MetadataKey, string]>): Promise<void> {
    await connection.query(
      'INSERT INTO import_metadata (meta_key, meta_value) VALUES ? ON DUPLICATE KEY UPDATE meta_value = VALUES(meta_value)',
      [entries]
    );
  }

  private async assertEmpty(connection: PoolConnection, kind: 'genome' | 'tree', tables: readonly string[]): Promise<void> {
    for (const table of tables) {
      const [rows] = await connection.query<CountRow[]>(`SELECT COUNT(*) AS count FROM ${table}`);
      if (Number(rows[0]?.count ?? 0) > 0) {
        throw new ImportConflictError(kind);
      }
    }
  }

  /**
   * 获取写锁并开启事务；任何异常都会回滚，锁与连接在所有退出路径上释放
   */
  private async withImportTransaction(work: (connection: PoolConnection) => Promise<void>): Promise<void> {
    await this.lock.runExclusive(async () => {
      const connection = await this.pool.getConnection();
      try {
        const [lockRows] = await connection.query<LockRow[]>('SELECT GET_LOCK(?, 0) AS acquired', [IMPORT_LOCK_NAME]);
        if (lockRows[0]?.acquired !== 1) {
          throw new StoreBusyError();
        }
        try {
          await connection.beginTransaction();
          try {
            await work(connection);
            await connection.commit();
          } catch (error) {
            await connection.rollback();
            throw error;
          }
        } finally {
          await connection.query('SELECT RELEASE_LOCK(?)', [IMPORT_LOCK_NAME]).catch((error: unknown) => {
            serverLogger.error('Failed to release import lock', { error });
          });
        }
      } finally {
        connection.release();
      }
    });
  }
}
