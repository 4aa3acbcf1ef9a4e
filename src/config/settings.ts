import dotenv from 'dotenv';
import path from 'path';

// 加载环境变量
dotenv.config();

export type StoreDriver = 'mysql' | 'memory';

export interface ParserSettings {
  /** 探测文件头时检查的行数 */
  genotypeSniffLines: number;
  /** 计算跳过率时抽样的数据行数 */
  genotypeSampleLines: number;
  /** 跳过率超过该值则整个文件视为无法识别 */
  genotypeMaxSkipRate: number;
}

export interface AppSettings {
  port: number;
  host: string;
  storeDriver: StoreDriver;
  annotationsPath: string;
  schemaPath: string;
  uploadMaxMb: number;
  corsOrigin: string;
  logLevel: string;
  logDir: string;
  logSilent: boolean;
  parser: ParserSettings;
}

const readNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const readStoreDriver = (value: string | undefined): StoreDriver =>
  value === 'memory' ? 'memory' : 'mysql';

export const parserDefaults: ParserSettings = {
  genotypeSniffLines: 50,
  genotypeSampleLines: 1000,
  genotypeMaxSkipRate: 0.5
};

export const settings: AppSettings = {
  port: readNumber(process.env.PORT, 3000),
  host: process.env.HOST || '127.0.0.1',
  storeDriver: readStoreDriver(process.env.STORE_DRIVER),
  annotationsPath: path.resolve(process.cwd(), process.env.ANNOTATIONS_PATH || 'data/curated-annotations.json'),
  schemaPath: path.resolve(process.cwd(), process.env.SCHEMA_PATH || 'sql/schema.sql'),
  uploadMaxMb: readNumber(process.env.UPLOAD_MAX_MB, 64),
  corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:5173',
  logLevel: process.env.LOG_LEVEL || 'info',
  logDir: path.resolve(process.cwd(), process.env.LOG_DIR || 'logs'),
  logSilent: process.env.NODE_ENV === 'test',
  parser: {
    genotypeSniffLines: readNumber(process.env.GENOTYPE_SNIFF_LINES, parserDefaults.genotypeSniffLines),
    genotypeSampleLines: readNumber(process.env.GENOTYPE_SAMPLE_LINES, parserDefaults.genotypeSampleLines),
    genotypeMaxSkipRate: readNumber(process.env.GENOTYPE_MAX_SKIP_RATE, parserDefaults.genotypeMaxSkipRate)
  }
};
