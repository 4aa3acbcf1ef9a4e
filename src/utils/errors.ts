// 统一错误类型，控制器根据类型映射 HTTP 状态码

/** 文件不像任何已知格式，导入中止，已有数据不变 */
export class FormatError extends Error {
  constructor(message: string, public readonly sourceFile?: string) {
    super(message);
    this.name = 'FormatError';
  }
}

export type LookupErrorKind = 'NotTested' | 'NotAnnotated';

export class LookupError extends Error {
  constructor(public readonly kind: LookupErrorKind, public readonly rsid: string) {
    super(
      kind === 'NotTested'
        ? `SNP ${rsid} was not found in the imported genome`
        : `SNP ${rsid} has no curated annotation`
    );
    this.name = 'LookupError';
  }
}

/** 树中存在多个互不相连的家族分支且未指定人员 */
export class AmbiguousRootError extends Error {
  constructor(public readonly candidateIds: string[]) {
    super(
      `Family tree has ${candidateIds.length} disconnected components; name a person to anchor the query`
    );
    this.name = 'AmbiguousRootError';
  }
}

export class ImportConflictError extends Error {
  constructor(public readonly kind: 'genome' | 'tree') {
    super(`A ${kind} has already been imported. Use force to replace it.`);
    this.name = 'ImportConflictError';
  }
}

export class StoreBusyError extends Error {
  constructor() {
    super('Another import is in progress');
    this.name = 'StoreBusyError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}
