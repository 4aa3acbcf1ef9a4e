import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { settings } from '../config/settings.js';

// 确保日志目录存在 (测试环境下不写文件)
const logDir = settings.logDir;
if (!settings.logSilent && !existsSync(logDir)) {
  mkdirSync(logDir, { recursive: true });
}

// 通用日志格式
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.json()
);

const consoleTransport = () =>
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  });

const fileTransports = (prefix: string, keepDays: string): DailyRotateFile[] =>
  settings.logSilent
    ? []
    : [
        new DailyRotateFile({
          filename: join(logDir, `${prefix}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: keepDays,
          level: 'info'
        })
      ];

// 服务器日志 - 记录运行状态和错误
const serverLogger = winston.createLogger({
  level: settings.logLevel,
  format: logFormat,
  defaultMeta: { type: 'server' },
  silent: settings.logSilent,
  transports: [
    consoleTransport(),
    ...fileTransports('server', '14d'),
    // 错误日志单独输出
    ...(settings.logSilent
      ? []
      : [
          new DailyRotateFile({
            filename: join(logDir, 'server-error-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles: '30d',
            level: 'error'
          })
        ])
  ]
});

// 导入日志 - 每次导入一条结构化记录 (来源文件、记录数、警告数)
const importLogger = winston.createLogger({
  level: 'info',
  format: logFormat,
  defaultMeta: { type: 'import' },
  silent: settings.logSilent,
  transports: [consoleTransport(), ...fileTransports('import', '30d')]
});

export {
  serverLogger,
  importLogger
};
