import { NO_CALL, normalizeGenotype } from './annotation.matcher.js';
import type { DataStore } from './store/data.store.js';
import type { ApoeStatus, RiskLevel } from '../types/annotation.js';

export const APOE_RSIDS = ['rs429358', 'rs7412'] as const;

interface ApoeClass {
  rs429358: string;
  rs7412: string;
  genotype: string;
  riskLevel: RiskLevel;
  interpretation: string;
}

// ε2: rs429358=T, rs7412=T; ε3: T, C; ε4: C, C
const APOE_CLASSES: ApoeClass[] = [
  { rs429358: 'TT', rs7412: 'CC', genotype: 'ε3/ε3', riskLevel: 'normal', interpretation: "Most common genotype. Average Alzheimer's risk." },
  { rs429358: 'TT', rs7412: 'CT', genotype: 'ε2/ε3', riskLevel: 'normal', interpretation: "Lower than average Alzheimer's risk." },
  { rs429358: 'TT', rs7412: 'TT', genotype: 'ε2/ε2', riskLevel: 'normal', interpretation: "Rare genotype. Lowest Alzheimer's risk." },
  { rs429358: 'CT', rs7412: 'CC', genotype: 'ε3/ε4', riskLevel: 'elevated', interpretation: "One ε4 copy. Increased Alzheimer's risk." },
  { rs429358: 'CC', rs7412: 'CC', genotype: 'ε4/ε4', riskLevel: 'high', interpretation: "Two ε4 copies. Substantially increased Alzheimer's risk." },
  { rs429358: 'CT', rs7412: 'CT', genotype: 'ε2/ε4', riskLevel: 'elevated', interpretation: 'One ε2 and one ε4 allele.' }
];

/**
 * 由 rs429358 / rs7412 两个位点推导 APOE 基因型 (等位基因顺序不敏感)
 */
export const classifyApoe = (rs429358Genotype?: string, rs7412Genotype?: string): ApoeStatus => {
  const rs429358 = normalizeGenotype(rs429358Genotype ?? NO_CALL);
  const rs7412 = normalizeGenotype(rs7412Genotype ?? NO_CALL);

  if (rs429358 === NO_CALL || rs7412 === NO_CALL) {
    if (rs429358 === 'TT') {
      return {
        genotype: 'ε2/ε3 or ε3/ε3 (no ε4)',
        rs429358,
        rs7412,
        riskLevel: 'normal',
        interpretation: "No ε4 allele detected. Average or lower Alzheimer's risk."
      };
    }
    return {
      genotype: 'Unknown',
      rs429358,
      rs7412,
      riskLevel: 'unknown',
      interpretation: 'Unable to determine APOE status: SNP data is missing.'
    };
  }

  const known = APOE_CLASSES.find(entry => entry.rs429358 === rs429358 && entry.rs7412 === rs7412);
  if (known) {
    return { genotype: known.genotype, rs429358, rs7412, riskLevel: known.riskLevel, interpretation: known.interpretation };
  }
  return {
    genotype: `Atypical (${rs429358}/${rs7412})`,
    rs429358,
    rs7412,
    riskLevel: 'unknown',
    interpretation: 'Unusual combination that may need verification.'
  };
};

export const determineApoeStatus = async (store: DataStore): Promise<ApoeStatus> => {
  const calls = await store.getGenotypeCalls(APOE_RSIDS);
  return classifyApoe(calls.get('rs429358')?.genotype, calls.get('rs7412')?.genotype);
};
