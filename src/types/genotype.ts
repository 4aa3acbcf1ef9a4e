// 基因型数据模型
export interface GenotypeCall {
  rsid: string;
  chromosome: string;
  position: number;
  /** 两位等位基因 (如 AG)、单倍体位点的单个字符，或未检出时的 "--" */
  genotype: string;
  sourceFile: string;
}

export type Zygosity = 'homozygous' | 'heterozygous' | 'hemizygous' | 'no-call';

export interface ParseWarning {
  /** 从 1 开始的行号，逐行解析之后产生的警告没有行号 */
  line?: number;
  message: string;
}

export interface GenotypeParseResult {
  calls: GenotypeCall[];
  warnings: ParseWarning[];
  lineCount: number;
}
