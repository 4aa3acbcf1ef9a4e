// src/middleware/upload.middleware.ts
import { Request } from 'express';
import multer from 'multer';
import path from 'path';

// 文件只在内存中解析，不落盘
const storage = multer.memoryStorage();

// 导出文件通常是纯文本，GEDCOM 常被浏览器标成 octet-stream；真正的格式由内容嗅探决定
const ACCEPTED_EXTENSIONS = new Set(['.txt', '.tsv', '.csv', '.ged', '.gedcom']);

const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
  const extension = path.extname(file.originalname).toLowerCase();
  if (file.mimetype.startsWith('text/') || ACCEPTED_EXTENSIONS.has(extension)) {
    cb(null, true);
  } else {
    cb(new Error('Unsupported file type. Please upload a genotype export or a GEDCOM file.'));
  }
};

export const createUpload = (maxMb: number): multer.Multer =>
  multer({
    storage,
    fileFilter,
    limits: {
      fileSize: 1024 * 1024 * maxMb
    }
  });
