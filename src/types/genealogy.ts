import type { ParseWarning } from './genotype.js';

export type Sex = 'M' | 'F' | 'U';

export interface RawTag {
  tag: string;
  value: string;
}

// 个人记录 (INDI)
export interface Individual {
  id: string;
  fullName: string;
  givenName: string;
  surname: string;
  sex: Sex;
  birthDate?: string;
  birthPlace?: string;
  deathDate?: string;
  deathPlace?: string;
  /** 作为子女所属的家庭 */
  parentFamilyRef?: string;
  /** 作为配偶所属的家庭 */
  spouseFamilyRefs: string[];
  rawTags: RawTag[];
}

// 家庭记录 (FAM)
export interface Family {
  id: string;
  husbandRef?: string;
  wifeRef?: string;
  spouseRefs: string[];
  childRefs: string[];
  marriageDate?: string;
  marriagePlace?: string;
  rawTags: RawTag[];
}

export interface GedcomParseResult {
  individuals: Individual[];
  families: Family[];
  warnings: ParseWarning[];
}

export interface FamilyTreeData {
  individuals: Individual[];
  families: Family[];
}

export interface AncestorGeneration {
  generation: number;
  individuals: Individual[];
}
