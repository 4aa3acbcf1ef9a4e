import type { GenotypeCall } from '../../types/genotype.js';
import type { Family, Individual } from '../../types/genealogy.js';

export const cloneIndividual = (individual: Individual): Individual => ({
  ...individual,
  spouseFamilyRefs: [...individual.spouseFamilyRefs],
  rawTags: individual.rawTags.map(tag => ({ ...tag }))
});

export const cloneFamily = (family: Family): Family => ({
  ...family,
  spouseRefs: [...family.spouseRefs],
  childRefs: [...family.childRefs],
  rawTags: family.rawTags.map(tag => ({ ...tag }))
});

/**
 * 校验同一基因组内 rsid 唯一
 */
export const assertUniqueRsids = (calls: readonly GenotypeCall[]): void => {
  const seen = new Set<string>();
  for (const call of calls) {
    if (seen.has(call.rsid)) {
      throw new Error(`Duplicate rsid ${call.rsid} in genome import`);
    }
    seen.add(call.rsid);
  }
};

/**
 * 校验树的身份与引用约束: id 唯一，所有引用都能解析到已知记录
 */
export const assertTreeIntegrity = (individuals: readonly Individual[], families: readonly Family[]): void => {
  const individualIds = new Set<string>();
  for (const individual of individuals) {
    if (individualIds.has(individual.id)) {
      throw new Error(`Duplicate individual id ${individual.id}`);
    }
    individualIds.add(individual.id);
  }

  const familyIds = new Set<string>();
  for (const family of families) {
    if (familyIds.has(family.id)) {
      throw new Error(`Duplicate family id ${family.id}`);
    }
    familyIds.add(family.id);
  }

  for (const individual of individuals) {
    const refs = [individual.parentFamilyRef, ...individual.spouseFamilyRefs];
    for (const ref of refs) {
      if (ref !== undefined && !familyIds.has(ref)) {
        throw new Error(`Individual ${individual.id} references unknown family ${ref}`);
      }
    }
  }

  for (const family of families) {
    if (family.spouseRefs.length > 2) {
      throw new Error(`Family ${family.id} has more than two spouses`);
    }
    for (const ref of [...family.spouseRefs, ...family.childRefs]) {
      if (!individualIds.has(ref)) {
        throw new Error(`Family ${family.id} references unknown individual ${ref}`);
      }
    }
  }
};
