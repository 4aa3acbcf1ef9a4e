import { settings as defaultSettings, AppSettings } from './config/settings.js';
import { AnnotationMatcher } from './services/annotation.matcher.js';
import { ImportService } from './services/import.service.js';
import { TreeService } from './services/tree.service.js';
import type { AnnotationTable } from './services/annotation.table.js';
import type { DataStore } from './services/store/data.store.js';

/**
 * 请求处理所需的全部依赖，启动时构建一次，显式传给路由和控制器
 */
export interface AppContext {
  settings: AppSettings;
  store: DataStore;
  annotations: AnnotationTable;
  matcher: AnnotationMatcher;
  trees: TreeService;
  importer: ImportService;
}

export const createContext = (
  store: DataStore,
  annotations: AnnotationTable,
  settings: AppSettings = defaultSettings
): AppContext => ({
  settings,
  store,
  annotations,
  matcher: new AnnotationMatcher(store, annotations),
  trees: new TreeService(store),
  importer: new ImportService(store, settings.parser)
});
