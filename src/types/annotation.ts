import type { GenotypeCall, Zygosity } from './genotype.js';

export type AnnotationCategory = 'health' | 'carrier' | 'pharma' | 'trait';

export type RiskLevel = 'normal' | 'carrier' | 'elevated' | 'high' | 'unknown';

export interface CuratedAnnotation {
  rsid: string;
  gene: string;
  category: AnnotationCategory;
  description?: string;
  condition?: string;
  riskAllele?: string;
  normalAllele?: string;
  clinicalSignificance?: string;
  drugs?: string;
  /** 风险等级非 normal 时附带的建议 */
  recommendation?: string;
  /** 基因型模式 -> 解读文本，模式的等位基因顺序不限 */
  interpretationRules: Record<string, string>;
  citations: string[];
}

export interface InterpretedResult {
  call: GenotypeCall;
  annotation: CuratedAnnotation;
  normalizedGenotype: string;
  zygosity: Zygosity;
  riskLevel: RiskLevel;
  interpretation: string;
  /** 命中的规则模式，未命中时为 undefined */
  matchedRule?: string;
  recommendation?: string;
}

export interface ApoeStatus {
  genotype: string;
  rs429358: string;
  rs7412: string;
  riskLevel: RiskLevel;
  interpretation: string;
}
