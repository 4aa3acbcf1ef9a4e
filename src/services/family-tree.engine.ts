import { RelationshipIndex } from './relationship.index.js';
import { compareIndividuals, matchesIndividual } from './store/data.store.js';
import { AmbiguousRootError, NotFoundError } from '../utils/errors.js';
import type { AncestorGeneration, Family, FamilyTreeData, Individual } from '../types/genealogy.js';

export interface PersonSelector {
  id?: string;
  name?: string;
}

export interface TreeSummary {
  individuals: number;
  families: number;
  components: number;
  largestComponent: number;
  rootId: string | null;
  ambiguousRoot: boolean;
}

export interface Relatives {
  individual: Individual;
  parents: Individual[];
  spouses: Individual[];
  children: Individual[];
}

const isComplete = (individual: Individual): boolean => Boolean(individual.birthDate && individual.birthPlace);

/**
 * 内存中的家族关系图，每个查询会话由存储中的全部个人与家庭构建一次。
 * 所有遍历都带访问集合，输入中存在环时也会终止。
 */
export class FamilyTreeEngine {
  private readonly individuals = new Map<string, Individual>();
  private readonly families = new Map<string, Family>();
  private readonly index: RelationshipIndex;

  constructor(data: FamilyTreeData) {
    for (const individual of data.individuals) {
      this.individuals.set(individual.id, individual);
    }
    for (const family of data.families) {
      this.families.set(family.id, family);
    }
    this.index = new RelationshipIndex(data.individuals, data.families);
  }

  get size(): number {
    return this.individuals.size;
  }

  getIndividual(id: string): Individual | undefined {
    return this.individuals.get(id);
  }

  parentsOf(id: string): Individual[] {
    return this.resolve(this.index.parentsOf(id));
  }

  childrenOf(id: string): Individual[] {
    return this.resolve(this.index.childrenOf(id));
  }

  spousesOf(id: string): Individual[] {
    return this.resolve(this.index.spousesOf(id));
  }

  relatives(id: string): Relatives {
    const individual = this.require(id);
    return {
      individual,
      parents: this.parentsOf(id),
      spouses: this.spousesOf(id),
      children: this.childrenOf(id)
    };
  }

  /** 通过子女边可达的后代数量 (不含自身) */
  descendantCount(id: string): number {
    const visited = new Set<string>([id]);
    const queue = [...this.index.childrenOf(id)];
    let count = 0;
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      count++;
      queue.push(...this.index.childrenOf(current));
    }
    return count;
  }

  /**
   * 按代广度优先列出祖先。第 k 代为恰好经过 k 条父母边首次到达的个人，
   * 每个人最多出现一次；maxGenerations 缺省时不限代数。
   */
  ancestors(personId: string, maxGenerations?: number): AncestorGeneration[] {
    this.require(personId);

    const generations: AncestorGeneration[] = [];
    const visited = new Set<string>([personId]);
    let frontier = [personId];
    let generation = 0;

    while (frontier.length > 0 && (maxGenerations === undefined || generation < maxGenerations)) {
      generation++;
      const next: string[] = [];
      for (const id of frontier) {
        for (const parentId of this.index.parentsOf(id)) {
          if (!visited.has(parentId)) {
            visited.add(parentId);
            next.push(parentId);
          }
        }
      }
      if (next.length === 0) break;
      generations.push({ generation, individuals: this.resolve(next) });
      frontier = next;
    }

    return generations;
  }

  /**
   * 名、姓、出生地的不区分大小写子串匹配，按姓、名、id 排序
   */
  search(query: string): Individual[] {
    return [...this.individuals.values()]
      .filter(individual => matchesIndividual(individual, query))
      .sort(compareIndividuals);
  }

  /**
   * 按父母、子女、配偶边划分的连通分量，每个分量内按 id 排序
   */
  components(): string[][] {
    const seen = new Set<string>();
    const result: string[][] = [];
    const ids = [...this.individuals.keys()].sort();

    for (const start of ids) {
      if (seen.has(start)) continue;
      const component: string[] = [];
      const stack = [start];
      seen.add(start);
      while (stack.length > 0) {
        const current = stack.pop();
        if (current === undefined) continue;
        component.push(current);
        const neighbours = [
          ...this.index.parentsOf(current),
          ...this.index.childrenOf(current),
          ...this.index.spousesOf(current)
        ];
        for (const neighbour of neighbours) {
          if (!seen.has(neighbour)) {
            seen.add(neighbour);
            stack.push(neighbour);
          }
        }
      }
      result.push(component.sort());
    }

    return result;
  }

  /**
   * 未指定人员时推断一个默认的根人物。这只是启发式规则，并不保证"正确"：
   * 后代最多者优先，其次是出生日期与出生地都齐全的记录，最后按 id 字典序。
   * 只考虑至少两人的分量 (全是孤立个人时才考虑单人分量)；候选分量多于一个时抛出 AmbiguousRootError。
   */
  inferRoot(): Individual {
    if (this.individuals.size === 0) {
      throw new NotFoundError('Family tree is empty');
    }

    const components = this.components();
    const linked = components.filter(component => component.length > 1);
    const candidates = linked.length > 0 ? linked : components;
    const best = candidates.map(component => this.bestAnchor(component));

    if (best.length > 1) {
      throw new AmbiguousRootError(best.map(individual => individual.id).sort());
    }
    return best[0];
  }

  resolvePerson(selector: PersonSelector = {}): Individual {
    if (selector.id) {
      return this.require(selector.id);
    }
    if (selector.name) {
      const [first] = this.search(selector.name);
      if (!first) {
        throw new NotFoundError(`No individual matches "${selector.name}"`);
      }
      return first;
    }
    return this.inferRoot();
  }

  summary(): TreeSummary {
    const components = this.components();
    let rootId: string | null = null;
    let ambiguousRoot = false;
    try {
      rootId = this.individuals.size > 0 ? this.inferRoot().id : null;
    } catch (error) {
      if (!(error instanceof AmbiguousRootError)) throw error;
      ambiguousRoot = true;
    }
    return {
      individuals: this.individuals.size,
      families: this.families.size,
      components: components.length,
      largestComponent: components.reduce((max, component) => Math.max(max, component.length), 0),
      rootId,
      ambiguousRoot
    };
  }

  private bestAnchor(component: string[]): Individual {
    const scored = this.resolve(component).map(individual => ({
      individual,
      descendants: this.descendantCount(individual.id),
      complete: isComplete(individual)
    }));
    scored.sort((a, b) => {
      if (a.descendants !== b.descendants) return b.descendants - a.descendants;
      if (a.complete !== b.complete) return a.complete ? -1 : 1;
      if (a.individual.id < b.individual.id) return -1;
      if (a.individual.id > b.individual.id) return 1;
      return 0;
    });
    return scored[0].individual;
  }

  private require(id: string): Individual {
    const individual = this.individuals.get(id);
    if (!individual) {
      throw new NotFoundError(`Individual ${id} not found`);
    }
    return individual;
  }

  private resolve(ids: readonly string[]): Individual[] {
    const result: Individual[] = [];
    for (const id of ids) {
      const individual = this.individuals.get(id);
      if (individual) result.push(individual);
    }
    return result;
  }
}
