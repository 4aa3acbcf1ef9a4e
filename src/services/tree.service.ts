import { FamilyTreeEngine } from './family-tree.engine.js';
import type { DataStore } from './store/data.store.js';

/**
 * 按存储中的树版本号缓存家族树引擎，导入新树后下一次查询自动重建
 */
export class TreeService {
  private cached: { generation: number; engine: FamilyTreeEngine } | null = null;

  constructor(private readonly store: DataStore) {}

  async getEngine(): Promise<FamilyTreeEngine> {
    const generation = await this.store.getTreeGeneration();
    if (this.cached && this.cached.generation === generation) {
      return this.cached.engine;
    }
    const engine = new FamilyTreeEngine(await this.store.loadTree());
    this.cached = { generation, engine };
    return engine;
  }
}
