import { parserDefaults, ParserSettings } from '../config/settings.js';
import { FormatError } from '../utils/errors.js';
import type { GenotypeCall, GenotypeParseResult, ParseWarning } from '../types/genotype.js';

// 厂商导出文件的表头注释
const HEADER_COMMENT_PATTERNS: RegExp[] = [
  /^#\s*rsid\s+chromosome\s+position\s+genotype/i,
  /^#.*this data file generated by/i,
  /^#.*23andme/i,
  /^#.*genotype export/i
];

const CHROMOSOME_PATTERN = /^(?:[1-9]|1\d|2[0-2]|X|Y|XY|MT)$/;
const GENOTYPE_PATTERN = /^(?:[ACGTDI]{1,2}|--)$/;
const POSITION_PATTERN = /^\d+$/;
// 与存储中 INT UNSIGNED 列的上限一致
const MAX_POSITION = 4294967295;

export type GenotypeLine =
  | { kind: 'skip' }
  | { kind: 'call'; rsid: string; chromosome: string; position: number; genotype: string }
  | { kind: 'malformed'; reason: string };

export const splitLines = (content: string): string[] => content.replace(/^\uFEFF/, '').split(/\r?\n/);

/**
 * 解析单行，列顺序固定为 rsid, chromosome, position, genotype
 */
export const classifyGenotypeLine = (line: string): GenotypeLine => {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return { kind: 'skip' };
  }

  const columns = trimmed.split(/\s+/);
  // 未注释的列名行
  if (columns[0].toLowerCase() === 'rsid') {
    return { kind: 'skip' };
  }
  if (columns.length !== 4) {
    return { kind: 'malformed', reason: `expected 4 columns, found ${columns.length}` };
  }

  const [rsid, rawChromosome, rawPosition, rawGenotype] = columns;
  const chromosome = rawChromosome.toUpperCase() === 'M' ? 'MT' : rawChromosome.toUpperCase();
  if (!CHROMOSOME_PATTERN.test(chromosome)) {
    return { kind: 'malformed', reason: `unknown chromosome "${rawChromosome}"` };
  }
  if (!POSITION_PATTERN.test(rawPosition)) {
    return { kind: 'malformed', reason: `unparseable position "${rawPosition}"` };
  }
  const position = Number(rawPosition);
  if (!Number.isSafeInteger(position) || position > MAX_POSITION) {
    return { kind: 'malformed', reason: `position out of range "${rawPosition}"` };
  }
  const genotype = rawGenotype.toUpperCase();
  if (!GENOTYPE_PATTERN.test(genotype)) {
    return { kind: 'malformed', reason: `invalid genotype "${rawGenotype}"` };
  }

  return { kind: 'call', rsid, chromosome, position, genotype };
};

/**
 * 校验内容是否为基因型导出文件，不是则抛出 FormatError。
 * 前 N 行中既没有可识别的表头注释也没有合法数据行，或抽样数据行的跳过率超过阈值，均视为无法识别。
 */
export const assertGenotypeFile = (
  lines: string[],
  sourceFile: string,
  options: ParserSettings = parserDefaults
): void => {
  const head = lines.slice(0, options.genotypeSniffLines);
  const hasHeader = head.some(line => HEADER_COMMENT_PATTERNS.some(pattern => pattern.test(line.trim())));
  const hasDataLine = head.some(line => classifyGenotypeLine(line).kind === 'call');
  if (!hasHeader && !hasDataLine) {
    throw new FormatError(`${sourceFile} does not look like a genotype export file`, sourceFile);
  }

  let sampled = 0;
  let malformed = 0;
  for (const line of lines) {
    if (sampled >= options.genotypeSampleLines) break;
    const parsed = classifyGenotypeLine(line);
    if (parsed.kind === 'skip') continue;
    sampled++;
    if (parsed.kind === 'malformed') malformed++;
  }

  if (sampled === 0) {
    throw new FormatError(`${sourceFile} contains no genotype data lines`, sourceFile);
  }
  const skipRate = malformed / sampled;
  if (skipRate > options.genotypeMaxSkipRate) {
    throw new FormatError(
      `${sourceFile} is not a recognized genotype file: ${malformed} of ${sampled} sampled lines are malformed`,
      sourceFile
    );
  }
};

/**
 * 惰性读取基因型记录，格式错误的行跳过并记录警告
 */
export function* readGenotypeCalls(
  lines: Iterable<string>,
  sourceFile: string,
  warnings: ParseWarning[]
): Generator<GenotypeCall> {
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;
    const parsed = classifyGenotypeLine(line);
    if (parsed.kind === 'skip') continue;
    if (parsed.kind === 'malformed') {
      warnings.push({ line: lineNumber, message: `Skipped line: ${parsed.reason}` });
      continue;
    }
    yield {
      rsid: parsed.rsid,
      chromosome: parsed.chromosome,
      position: parsed.position,
      genotype: parsed.genotype,
      sourceFile
    };
  }
}

/**
 * 解析完整的基因型文件。同一 rsid 出现多次时保留最后一次。
 */
export const parseGenotypeFile = (
  content: string,
  sourceFile: string,
  options: ParserSettings = parserDefaults
): GenotypeParseResult => {
  const lines = splitLines(content);
  assertGenotypeFile(lines, sourceFile, options);

  const warnings: ParseWarning[] = [];
  const calls = new Map<string, GenotypeCall>();
  for (const call of readGenotypeCalls(lines, sourceFile, warnings)) {
    if (calls.has(call.rsid)) {
      warnings.push({ message: `Duplicate rsid ${call.rsid}; keeping the later call` });
    }
    calls.set(call.rsid, call);
  }

  return { calls: [...calls.values()], warnings, lineCount: lines.length };
};
