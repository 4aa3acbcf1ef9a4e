import type { Family, Individual } from '../types/genealogy.js';

const pushUnique = (map: Map<string, string[]>, key: string, value: string): void => {
  const list = map.get(key);
  if (!list) {
    map.set(key, [value]);
  } else if (!list.includes(value)) {
    list.push(value);
  }
};

/**
 * 由家庭记录推导出的关系索引 (父母、子女、配偶)。
 * 只保存 id，不持有记录本身；每次完整导入后重新构建，不做增量维护。
 */
export class RelationshipIndex {
  private readonly parents = new Map<string, string[]>();
  private readonly children = new Map<string, string[]>();
  private readonly spouses = new Map<string, string[]>();

  constructor(individuals: readonly Individual[], families: readonly Family[]) {
    const known = new Set(individuals.map(individual => individual.id));

    // 子女既可能写在 FAM 的 CHIL 中，也可能只在 INDI 的 FAMC 中；
    // 每人只归属一个父母家庭，parentFamilyRef 优先，否则取第一个列出他的家庭
    const familyIds = new Set(families.map(family => family.id));
    const parentFamilyOf = new Map<string, string>();
    for (const individual of individuals) {
      if (individual.parentFamilyRef && familyIds.has(individual.parentFamilyRef)) {
        parentFamilyOf.set(individual.id, individual.parentFamilyRef);
      }
    }
    for (const family of families) {
      for (const childId of family.childRefs) {
        if (known.has(childId) && !parentFamilyOf.has(childId)) {
          parentFamilyOf.set(childId, family.id);
        }
      }
    }

    const childrenByFamily = new Map<string, string[]>();
    for (const family of families) {
      childrenByFamily.set(family.id, family.childRefs.filter(id => parentFamilyOf.get(id) === family.id));
    }
    for (const [childId, familyId] of parentFamilyOf) {
      pushUnique(childrenByFamily, familyId, childId);
    }

    for (const family of families) {
      const spouseIds = family.spouseRefs.filter(id => known.has(id));
      const childIds = childrenByFamily.get(family.id) ?? [];

      for (const childId of childIds) {
        for (const parentId of spouseIds) {
          pushUnique(this.parents, childId, parentId);
          pushUnique(this.children, parentId, childId);
        }
      }

      if (spouseIds.length === 2) {
        const [first, second] = spouseIds;
        pushUnique(this.spouses, first, second);
        pushUnique(this.spouses, second, first);
      }
    }
  }

  parentsOf(id: string): readonly string[] {
    return this.parents.get(id) ?? [];
  }

  childrenOf(id: string): readonly string[] {
    return this.children.get(id) ?? [];
  }

  spousesOf(id: string): readonly string[] {
    return this.spouses.get(id) ?? [];
  }

  /** 通过父母边能否从 id 回到自身 */
  isOwnAncestor(id: string): boolean {
    const visited = new Set<string>();
    const queue = [...this.parentsOf(id)];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) continue;
      if (current === id) return true;
      visited.add(current);
      queue.push(...this.parentsOf(current));
    }
    return false;
  }
}

/**
 * 找出所有在祖先链上出现自身的个人 (结构性环)，按 id 排序
 */
export const findCycleMembers = (index: RelationshipIndex, individuals: readonly Individual[]): string[] =>
  individuals
    .map(individual => individual.id)
    .filter(id => index.isOwnAncestor(id))
    .sort();
