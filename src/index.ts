import { settings } from './config/settings.js';
import { createDatabasePool, ensureSchema, testConnection } from './config/database.js';
import { createApp } from './app.js';
import { createContext } from './context.js';
import { loadAnnotationTable } from './services/annotation.table.js';
import { MemoryDataStore } from './services/store/memory.store.js';
import { MysqlDataStore } from './services/store/mysql.store.js';
import { serverLogger } from './utils/logger.js';
import type { DataStore } from './services/store/data.store.js';

const createStore = async (): Promise<DataStore> => {
  if (settings.storeDriver === 'memory') {
    serverLogger.warn('Using the in-memory store; imported data is lost on restart');
    return new MemoryDataStore();
  }
  const pool = createDatabasePool();
  await testConnection(pool);
  await ensureSchema(pool, settings.schemaPath);
  return new MysqlDataStore(pool);
};

const start = async (): Promise<void> => {
  const annotations = loadAnnotationTable(settings.annotationsPath);
  serverLogger.info('Annotation table loaded', { version: annotations.version, entries: annotations.size });

  const store = await createStore();
  const app = createApp(createContext(store, annotations));

  // 启动服务器 (默认只监听本机回环地址)
  const server = app.listen(settings.port, settings.host, () => {
    serverLogger.info(`Server running at http://${settings.host}:${settings.port}`);
  });

  const shutdown = (signal: string): void => {
    serverLogger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch(error => {
          serverLogger.error('Failed to close data store:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

start().catch(error => {
  serverLogger.error('Failed to start server:', error);
  process.exit(1);
});
