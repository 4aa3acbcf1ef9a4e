import { readFileSync } from 'fs';
import { z } from 'zod';
import type { AnnotationCategory, CuratedAnnotation } from '../types/annotation.js';

const annotationSchema = z.object({
  rsid: z.string().min(1),
  gene: z.string().min(1),
  category: z.enum(['health', 'carrier', 'pharma', 'trait']),
  description: z.string().optional(),
  condition: z.string().optional(),
  riskAllele: z.string().length(1).optional(),
  normalAllele: z.string().length(1).optional(),
  clinicalSignificance: z.string().optional(),
  drugs: z.string().optional(),
  recommendation: z.string().optional(),
  interpretationRules: z.record(z.string()).default({}),
  citations: z.array(z.string()).default([])
});

const annotationFileSchema = z.object({
  version: z.string(),
  annotations: z.array(annotationSchema)
});

/**
 * 只读的策展注释表，进程启动时加载一次
 */
export class AnnotationTable {
  private readonly byRsid: ReadonlyMap<string, CuratedAnnotation>;

  constructor(annotations: readonly CuratedAnnotation[], public readonly version = 'unversioned') {
    const map = new Map<string, CuratedAnnotation>();
    for (const annotation of annotations) {
      if (map.has(annotation.rsid)) {
        throw new Error(`Annotation table lists ${annotation.rsid} more than once`);
      }
      map.set(annotation.rsid, Object.freeze({ ...annotation }));
    }
    this.byRsid = map;
  }

  get size(): number {
    return this.byRsid.size;
  }

  get(rsid: string): CuratedAnnotation | undefined {
    return this.byRsid.get(rsid);
  }

  byCategory(category: AnnotationCategory): CuratedAnnotation[] {
    return [...this.byRsid.values()].filter(annotation => annotation.category === category);
  }

  all(): CuratedAnnotation[] {
    return [...this.byRsid.values()];
  }
}

export const parseAnnotationTable = (json: unknown): AnnotationTable => {
  const parsed = annotationFileSchema.parse(json);
  return new AnnotationTable(parsed.annotations, parsed.version);
};

export const loadAnnotationTable = (filePath: string): AnnotationTable => {
  const content = readFileSync(filePath, 'utf-8');
  return parseAnnotationTable(JSON.parse(content));
};
