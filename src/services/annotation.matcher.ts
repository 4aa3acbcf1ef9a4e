import { LookupError } from '../utils/errors.js';
import type { AnnotationTable } from './annotation.table.js';
import type { DataStore } from './store/data.store.js';
import type { AnnotationCategory, CuratedAnnotation, InterpretedResult, RiskLevel } from '../types/annotation.js';
import type { GenotypeCall, Zygosity } from '../types/genotype.js';

export const NO_CALL = '--';

/**
 * 等位基因按字母排序，AG 与 GA 视为同一基因型
 */
export const normalizeGenotype = (genotype: string): string => {
  const upper = genotype.trim().toUpperCase();
  if (upper === NO_CALL) return upper;
  return [...upper].sort().join('');
};

export const zygosityOf = (genotype: string): Zygosity => {
  const normalized = normalizeGenotype(genotype);
  if (normalized === NO_CALL || normalized === '') return 'no-call';
  if (normalized.length === 1) return 'hemizygous';
  return normalized[0] === normalized[1] ? 'homozygous' : 'heterozygous';
};

const riskLevelOf = (normalized: string, zygosity: Zygosity, annotation: CuratedAnnotation): RiskLevel => {
  if (zygosity === 'no-call' || !annotation.riskAllele) return 'unknown';
  const riskCount = [...normalized].filter(allele => allele === annotation.riskAllele).length;
  if (riskCount === 0) return 'normal';
  // 单倍体位点只有一个拷贝，按携带者计
  if (zygosity === 'heterozygous' || zygosity === 'hemizygous') return 'carrier';
  return 'high';
};

const fallbackInterpretation = (
  normalized: string,
  zygosity: Zygosity,
  riskLevel: RiskLevel,
  annotation: CuratedAnnotation
): string => {
  let text: string;
  if (normalized === NO_CALL) {
    text = 'No call at this position';
  } else if (zygosity === 'hemizygous' && riskLevel === 'carrier') {
    text = `Hemizygous for risk allele (${normalized})`;
  } else if (riskLevel === 'high') {
    text = `Homozygous for risk allele (${normalized})`;
  } else if (riskLevel === 'carrier') {
    text = `Heterozygous carrier (${normalized})`;
  } else if (riskLevel === 'normal') {
    text = `Normal genotype (${normalized})`;
  } else {
    text = `Genotype: ${normalized}`;
  }
  return annotation.condition ? `${text} for ${annotation.condition}` : text;
};

/**
 * 根据一个基因型记录和对应的策展注释推导合子性与解读文本。
 * 没有基因型记录返回 NotTested，有记录但没有注释返回 NotAnnotated。
 */
export const match = (
  call: GenotypeCall | null | undefined,
  annotation: CuratedAnnotation | undefined,
  rsid: string
): InterpretedResult | LookupError => {
  if (!call) return new LookupError('NotTested', rsid);
  if (!annotation) return new LookupError('NotAnnotated', rsid);

  const normalizedGenotype = normalizeGenotype(call.genotype);
  const zygosity = zygosityOf(call.genotype);
  const riskLevel = riskLevelOf(normalizedGenotype, zygosity, annotation);
  const matchedRule = Object.keys(annotation.interpretationRules).find(
    pattern => normalizeGenotype(pattern) === normalizedGenotype
  );

  return {
    call,
    annotation,
    normalizedGenotype,
    zygosity,
    riskLevel,
    interpretation:
      matchedRule !== undefined
        ? annotation.interpretationRules[matchedRule]
        : fallbackInterpretation(normalizedGenotype, zygosity, riskLevel, annotation),
    matchedRule,
    recommendation: riskLevel === 'normal' ? undefined : annotation.recommendation
  };
};

export class AnnotationMatcher {
  constructor(
    private readonly store: DataStore,
    private readonly annotations: AnnotationTable
  ) {}

  async lookup(rsid: string): Promise<InterpretedResult | LookupError> {
    const call = await this.store.getGenotypeCall(rsid);
    return match(call, this.annotations.get(rsid), rsid);
  }

  /**
   * 某一类别下所有已检出 (非 no-call) 位点的解读结果
   */
  async analyzeCategory(category: AnnotationCategory): Promise<InterpretedResult[]> {
    const annotations = this.annotations.byCategory(category);
    const calls = await this.store.getGenotypeCalls(annotations.map(annotation => annotation.rsid));

    const results: InterpretedResult[] = [];
    for (const annotation of annotations) {
      const result = match(calls.get(annotation.rsid), annotation, annotation.rsid);
      if (!(result instanceof LookupError) && result.zygosity !== 'no-call') {
        results.push(result);
      }
    }
    return results;
  }
}
