import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { parserDefaults, ParserSettings } from '../config/settings.js';
import { assertGenotypeFile, parseGenotypeFile, splitLines } from './genotype.parser.js';
import { isGedcomContent, parseGedcom } from './gedcom.parser.js';
import { FormatError, ImportConflictError, NotFoundError } from '../utils/errors.js';
import { importLogger } from '../utils/logger.js';
import type { DataStore } from './store/data.store.js';
import type { GenotypeParseResult, ParseWarning } from '../types/genotype.js';
import type { GedcomParseResult } from '../types/genealogy.js';

export type FileClassification =
  | { kind: 'gedcom' }
  | { kind: 'genotype' }
  | { kind: 'unrecognized'; reason: string };

export interface ImportOptions {
  force?: boolean;
}

export interface ImportedFile {
  kind: 'genome' | 'tree';
  sourceFile: string;
  /** 基因型记录数，或个人记录数 */
  records: number;
  families?: number;
}

export interface SkippedFile {
  sourceFile: string;
  reason: string;
}

export interface ImportWarning extends ParseWarning {
  sourceFile: string;
}

export interface ImportReport {
  imported: ImportedFile[];
  skipped: SkippedFile[];
  warnings: ImportWarning[];
}

/**
 * 按内容判断文件类型，不看扩展名
 */
export const classifyFile = (
  sourceFile: string,
  content: string,
  options: ParserSettings = parserDefaults
): FileClassification => {
  if (isGedcomContent(content)) {
    return { kind: 'gedcom' };
  }
  try {
    assertGenotypeFile(splitLines(content), sourceFile, options);
    return { kind: 'genotype' };
  } catch (error) {
    if (error instanceof FormatError) {
      return { kind: 'unrecognized', reason: error.message };
    }
    throw error;
  }
};

const listFiles = async (dir: string): Promise<string[]> => {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files.sort();
};

const isMissingPath = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

const tagWarnings = (sourceFile: string, warnings: readonly ParseWarning[]): ImportWarning[] =>
  warnings.map(warning => ({ sourceFile, ...warning }));

/**
 * 导入编排：识别文件、解析、检查是否已有数据，再交给存储做原子替换。
 * 解析全部在写入之前完成，任何一步失败都不会改动已有数据。
 */
export class ImportService {
  constructor(
    private readonly store: DataStore,
    private readonly parser: ParserSettings = parserDefaults
  ) {}

  async importGenome(content: string, sourceFile: string, options: ImportOptions = {}): Promise<ImportReport> {
    const parsed = parseGenotypeFile(content, sourceFile, this.parser);
    await this.assertReplaceable('genome', options);
    return this.writeGenome(parsed, sourceFile, options);
  }

  async importGedcom(content: string, sourceFile: string, options: ImportOptions = {}): Promise<ImportReport> {
    const parsed = parseGedcom(content, sourceFile);
    await this.assertReplaceable('tree', options);
    return this.writeTree(parsed, sourceFile, options);
  }

  /**
   * 递归扫描目录 (按路径排序)，导入第一个基因型文件和第一个 GEDCOM 文件，其余文件记为跳过
   */
  async importDirectory(dir: string, options: ImportOptions = {}): Promise<ImportReport> {
    let files: string[];
    try {
      files = await listFiles(dir);
    } catch (error) {
      if (isMissingPath(error)) {
        throw new NotFoundError(`Directory ${dir} not found`);
      }
      throw error;
    }
    const skipped: SkippedFile[] = [];
    let genome: { sourceFile: string; parsed: GenotypeParseResult } | null = null;
    let tree: { sourceFile: string; parsed: GedcomParseResult } | null = null;

    for (const file of files) {
      const content = await readFile(file, 'utf-8');
      const classification = classifyFile(file, content, this.parser);
      switch (classification.kind) {
        case 'genotype':
          if (genome) {
            skipped.push({ sourceFile: file, reason: `Another genome file (${genome.sourceFile}) is already selected` });
          } else {
            genome = { sourceFile: file, parsed: parseGenotypeFile(content, file, this.parser) };
          }
          break;
        case 'gedcom':
          if (tree) {
            skipped.push({ sourceFile: file, reason: `Another GEDCOM file (${tree.sourceFile}) is already selected` });
          } else {
            tree = { sourceFile: file, parsed: parseGedcom(content, file) };
          }
          break;
        default:
          skipped.push({ sourceFile: file, reason: classification.reason });
      }
    }

    if (!genome && !tree) {
      throw new FormatError(`No genotype or GEDCOM file recognized under ${dir}`);
    }

    // 写入前先检查冲突，避免只导入一半；存储在写锁内还会再检查一次
    if (genome) await this.assertReplaceable('genome', options);
    if (tree) await this.assertReplaceable('tree', options);

    const parts: ImportReport[] = [];
    if (genome) parts.push(await this.writeGenome(genome.parsed, genome.sourceFile, options));
    if (tree) parts.push(await this.writeTree(tree.parsed, tree.sourceFile, options));

    const report: ImportReport = { imported: [], skipped, warnings: [] };
    for (const part of parts) {
      report.imported.push(...part.imported);
      report.warnings.push(...part.warnings);
    }

    for (const skip of skipped) {
      importLogger.warn({ action: 'skip_file', sourceFile: skip.sourceFile, reason: skip.reason });
    }
    return report;
  }

  private async assertReplaceable(kind: 'genome' | 'tree', options: ImportOptions): Promise<void> {
    if (options.force) return;
    const counts = await this.store.counts();
    const existing = kind === 'genome' ? counts.genotypeCalls : counts.individuals + counts.families;
    if (existing > 0) {
      throw new ImportConflictError(kind);
    }
  }

  private async writeGenome(parsed: GenotypeParseResult, sourceFile: string, options: ImportOptions): Promise<ImportReport> {
    await this.store.replaceGenome(parsed.calls, sourceFile, { ifEmpty: !options.force });
    importLogger.info({
      action: 'import_genome',
      sourceFile,
      calls: parsed.calls.length,
      lines: parsed.lineCount,
      warnings: parsed.warnings.length
    });
    return {
      imported: [{ kind: 'genome', sourceFile, records: parsed.calls.length }],
      skipped: [],
      warnings: tagWarnings(sourceFile, parsed.warnings)
    };
  }

  private async writeTree(parsed: GedcomParseResult, sourceFile: string, options: ImportOptions): Promise<ImportReport> {
    await this.store.replaceTree(parsed.individuals, parsed.families, sourceFile, { ifEmpty: !options.force });
    importLogger.info({
      action: 'import_gedcom',
      sourceFile,
      individuals: parsed.individuals.length,
      families: parsed.families.length,
      warnings: parsed.warnings.length
    });
    return {
      imported: [{ kind: 'tree', sourceFile, records: parsed.individuals.length, families: parsed.families.length }],
      skipped: [],
      warnings: tagWarnings(sourceFile, parsed.warnings)
    };
  }
}
