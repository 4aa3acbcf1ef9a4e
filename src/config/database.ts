import mysql, { Pool } from 'mysql2/promise';
import { readFile } from 'fs/promises';
import { serverLogger } from '../utils/logger.js';

// 数据库配置接口
export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  waitForConnections: boolean;
  connectionLimit: number;
  queueLimit: number;
}

// 数据库配置
export const databaseConfig: DatabaseConfig = {
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '3306', 10),
  user: process.env.DB_USER || 'root',
  password: process.env.DB_PASSWORD || '',
  database: process.env.DB_NAME || 'genotree',
  waitForConnections: true,
  connectionLimit: 10,
  queueLimit: 0
};

// 创建数据库连接池
export const createDatabasePool = (config: DatabaseConfig = databaseConfig): Pool => mysql.createPool(config);

// 测试数据库连接
export const testConnection = async (pool: Pool): Promise<void> => {
  const connection = await pool.getConnection();
  try {
    await connection.ping();
    serverLogger.info('Database connection established', { host: databaseConfig.host, database: databaseConfig.database });
  } finally {
    connection.release();
  }
};

/**
 * 按分号拆分 schema.sql 并逐条执行，全部为 CREATE ... IF NOT EXISTS
 */
export const ensureSchema = async (pool: Pool, schemaPath: string): Promise<void> => {
  const script = await readFile(schemaPath, 'utf-8');
  const statements = script
    .split(/;\s*(?:\r?\n|$)/)
    .map(statement => statement.replace(/^\s*--.*$/gm, '').trim())
    .filter(statement => statement.length > 0);

  for (const statement of statements) {
    await pool.query(statement);
  }
  serverLogger.info('Database schema ready', { statements: statements.length });
};
