/**
 * GEDCOM 解析：把带层级号的行解析为个人与家庭记录。
 * 层级隐含嵌套关系，解析时维护一个作用域栈；交叉引用指针先按原始 id 收集，第二遍再统一解析。
 */

import { FormatError } from '../utils/errors.js';
import { findCycleMembers, RelationshipIndex } from './relationship.index.js';
import type { Family, GedcomParseResult, Individual, Sex } from '../types/genealogy.js';
import type { ParseWarning } from '../types/genotype.js';

export interface GedcomLine {
  level: number;
  tag: string;
  xref?: string;
  value: string;
}

interface PointerRef {
  ref: string;
  line: number;
}

interface PendingIndividual {
  record: Individual;
  famc: PointerRef[];
  fams: PointerRef[];
}

interface PendingFamily {
  record: Family;
  husb: PointerRef[];
  wife: PointerRef[];
  chil: PointerRef[];
}

type EventField = 'date' | 'place';

type Scope =
  | { kind: 'header' }
  | { kind: 'individual'; pending: PendingIndividual }
  | { kind: 'family'; pending: PendingFamily }
  | { kind: 'name'; record: Individual }
  | { kind: 'event'; assign: (field: EventField, value: string) => void }
  | { kind: 'ignored' };

interface Frame {
  level: number;
  scope: Scope;
}

const IGNORED: Scope = { kind: 'ignored' };

/**
 * 解析一行: LEVEL [@XREF@] TAG [VALUE]
 *   0 HEAD
 *   0 @I1@ INDI
 *   1 NAME John /Doe/
 *   2 DATE 14 OCT 1995
 */
export const parseGedcomLine = (raw: string): GedcomLine | null => {
  const line = raw.replace(/^\uFEFF/, '').trim();
  if (!line) return null;

  const xrefMatch = line.match(/^(\d+)\s+(@[^@]+@)\s+(\w+)(?:\s+(.*))?$/);
  if (xrefMatch) {
    const [, levelStr, xref, tag, value] = xrefMatch;
    return {
      level: parseInt(levelStr, 10),
      xref: xref.replace(/@/g, ''),
      tag: tag.toUpperCase(),
      value: value?.trim() ?? ''
    };
  }

  const normalMatch = line.match(/^(\d+)\s+(\w+)(?:\s+(.*))?$/);
  if (normalMatch) {
    const [, levelStr, tag, value] = normalMatch;
    return {
      level: parseInt(levelStr, 10),
      tag: tag.toUpperCase(),
      value: value?.trim() ?? ''
    };
  }

  return null;
};

const POINTER_PATTERN = /^@([^@]+)@$/;

const toPointer = (value: string): string | null => {
  const match = value.trim().match(POINTER_PATTERN);
  return match ? match[1] : null;
};

/**
 * 拆分 "given /surname/ suffix" 形式的姓名
 */
export const splitGedcomName = (value: string): { fullName: string; givenName: string; surname: string } => {
  const fullName = value.replace(/\//g, ' ').replace(/\s+/g, ' ').trim();
  const slash = value.indexOf('/');
  if (slash === -1) {
    return { fullName, givenName: fullName, surname: '' };
  }
  const closing = value.indexOf('/', slash + 1);
  const givenName = value.slice(0, slash).trim();
  const surname = (closing === -1 ? value.slice(slash + 1) : value.slice(slash + 1, closing)).trim();
  return { fullName, givenName, surname };
};

const toSex = (value: string): Sex => {
  const normalized = value.trim().toUpperCase();
  return normalized === 'M' || normalized === 'F' ? normalized : 'U';
};

const newIndividual = (id: string): Individual => ({
  id,
  fullName: '',
  givenName: '',
  surname: '',
  sex: 'U',
  spouseFamilyRefs: [],
  rawTags: []
});

const newFamily = (id: string): Family => ({
  id,
  spouseRefs: [],
  childRefs: [],
  rawTags: []
});

export const isGedcomContent = (content: string): boolean => {
  for (const raw of content.split(/\r?\n/)) {
    if (raw.replace(/^\uFEFF/, '').trim() === '') continue;
    const first = parseGedcomLine(raw);
    return first !== null && first.level === 0 && first.tag === 'HEAD' && first.xref === undefined;
  }
  return false;
};

/**
 * 解析 GEDCOM 内容。第一行非空内容必须是 "0 HEAD"，否则抛出 FormatError。
 * 未能解析的指针、重复记录、层级跳跃等问题只记录警告。
 */
export const parseGedcom = (content: string, sourceFile = 'gedcom'): GedcomParseResult => {
  if (!isGedcomContent(content)) {
    throw new FormatError(`${sourceFile} does not start with a "0 HEAD" header line`, sourceFile);
  }

  const warnings: ParseWarning[] = [];
  const individuals = new Map<string, PendingIndividual>();
  const families = new Map<string, PendingFamily>();
  const stack: Frame[] = [];
  let terminated = false;

  const openRecord = (line: GedcomLine, lineNumber: number): Scope => {
    switch (line.tag) {
      case 'HEAD':
        return { kind: 'header' };
      case 'INDI':
      case 'FAM': {
        if (!line.xref) {
          warnings.push({ line: lineNumber, message: `${line.tag} record without an id was ignored` });
          return IGNORED;
        }
        if (individuals.has(line.xref) || families.has(line.xref)) {
          warnings.push({ line: lineNumber, message: `Duplicate record id ${line.xref}; later record ignored` });
          return IGNORED;
        }
        if (line.tag === 'INDI') {
          const pending: PendingIndividual = { record: newIndividual(line.xref), famc: [], fams: [] };
          individuals.set(line.xref, pending);
          return { kind: 'individual', pending };
        }
        const pending: PendingFamily = { record: newFamily(line.xref), husb: [], wife: [], chil: [] };
        families.set(line.xref, pending);
        return { kind: 'family', pending };
      }
      default:
        // SOUR, NOTE, REPO, SUBM 等记录不影响核心数据
        return IGNORED;
    }
  };

  const pointer = (line: GedcomLine, lineNumber: number, into: PointerRef[]): void => {
    const ref = toPointer(line.value);
    if (ref === null) {
      warnings.push({ line: lineNumber, message: `${line.tag} value "${line.value}" is not a pointer` });
      return;
    }
    into.push({ ref, line: lineNumber });
  };

  const individualChild = (pending: PendingIndividual, line: GedcomLine, lineNumber: number): Scope => {
    const record = pending.record;
    switch (line.tag) {
      case 'NAME': {
        if (record.fullName || record.givenName || record.surname) {
          record.rawTags.push({ tag: line.tag, value: line.value });
          return IGNORED;
        }
        Object.assign(record, splitGedcomName(line.value));
        return { kind: 'name', record };
      }
      case 'SEX':
        record.sex = toSex(line.value);
        return IGNORED;
      case 'BIRT':
        return {
          kind: 'event',
          assign: (field, value) => {
            if (field === 'date' && record.birthDate === undefined) record.birthDate = value;
            if (field === 'place' && record.birthPlace === undefined) record.birthPlace = value;
          }
        };
      case 'DEAT':
        return {
          kind: 'event',
          assign: (field, value) => {
            if (field === 'date' && record.deathDate === undefined) record.deathDate = value;
            if (field === 'place' && record.deathPlace === undefined) record.deathPlace = value;
          }
        };
      case 'FAMC':
        pointer(line, lineNumber, pending.famc);
        return IGNORED;
      case 'FAMS':
        pointer(line, lineNumber, pending.fams);
        return IGNORED;
      default:
        record.rawTags.push({ tag: line.tag, value: line.value });
        return IGNORED;
    }
  };

  const familyChild = (pending: PendingFamily, line: GedcomLine, lineNumber: number): Scope => {
    const record = pending.record;
    switch (line.tag) {
      case 'HUSB':
        pointer(line, lineNumber, pending.husb);
        return IGNORED;
      case 'WIFE':
        pointer(line, lineNumber, pending.wife);
        return IGNORED;
      case 'CHIL':
        pointer(line, lineNumber, pending.chil);
        return IGNORED;
      case 'MARR':
        return {
          kind: 'event',
          assign: (field, value) => {
            if (field === 'date' && record.marriageDate === undefined) record.marriageDate = value;
            if (field === 'place' && record.marriagePlace === undefined) record.marriagePlace = value;
          }
        };
      default:
        record.rawTags.push({ tag: line.tag, value: line.value });
        return IGNORED;
    }
  };

  const childScope = (parent: Scope, line: GedcomLine, lineNumber: number): Scope => {
    switch (parent.kind) {
      case 'individual':
        return individualChild(parent.pending, line, lineNumber);
      case 'family':
        return familyChild(parent.pending, line, lineNumber);
      case 'name':
        if (line.tag === 'GIVN' && line.value) parent.record.givenName = line.value;
        if (line.tag === 'SURN' && line.value) parent.record.surname = line.value;
        return IGNORED;
      case 'event':
        if (line.value && line.tag === 'DATE') parent.assign('date', line.value);
        if (line.value && line.tag === 'PLAC') parent.assign('place', line.value);
        return IGNORED;
      default:
        return IGNORED;
    }
  };

  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    if (lines[i].replace(/^\uFEFF/, '').trim() === '') continue;

    const line = parseGedcomLine(lines[i]);
    if (!line) {
      warnings.push({ line: lineNumber, message: 'Unparseable line skipped' });
      continue;
    }

    // 弹出栈直到栈顶层级小于当前行
    while (stack.length > 0 && stack[stack.length - 1].level >= line.level) {
      stack.pop();
    }

    if (line.level === 0) {
      if (line.tag === 'TRLR') {
        terminated = true;
        break;
      }
      stack.push({ level: 0, scope: openRecord(line, lineNumber) });
      continue;
    }

    const parent = stack[stack.length - 1];
    if (!parent || parent.level !== line.level - 1) {
      warnings.push({ line: lineNumber, message: `Level ${line.level} ${line.tag} has no parent at level ${line.level - 1}` });
      continue;
    }
    stack.push({ level: line.level, scope: childScope(parent.scope, line, lineNumber) });
  }

  if (!terminated) {
    warnings.push({ message: 'File ended without a TRLR record' });
  }

  // 第二遍: 解析所有指针，无法解析的边丢弃并记录警告
  for (const pending of individuals.values()) {
    const record = pending.record;
    for (const famc of pending.famc) {
      if (!families.has(famc.ref)) {
        warnings.push({ line: famc.line, message: `Individual ${record.id} references missing family ${famc.ref} (FAMC)` });
      } else if (record.parentFamilyRef === undefined) {
        record.parentFamilyRef = famc.ref;
      } else if (record.parentFamilyRef !== famc.ref) {
        warnings.push({ line: famc.line, message: `Individual ${record.id} has more than one parent family; ${famc.ref} ignored` });
      }
    }
    for (const fams of pending.fams) {
      if (!families.has(fams.ref)) {
        warnings.push({ line: fams.line, message: `Individual ${record.id} references missing family ${fams.ref} (FAMS)` });
      } else if (!record.spouseFamilyRefs.includes(fams.ref)) {
        record.spouseFamilyRefs.push(fams.ref);
      }
    }
  }

  for (const pending of families.values()) {
    const record = pending.record;
    const resolveSpouse = (refs: PointerRef[], tag: 'HUSB' | 'WIFE'): string | undefined => {
      let resolved: string | undefined;
      for (const ref of refs) {
        if (!individuals.has(ref.ref)) {
          warnings.push({ line: ref.line, message: `Family ${record.id} references missing individual ${ref.ref} (${tag})` });
        } else if (resolved === undefined) {
          resolved = ref.ref;
        } else {
          warnings.push({ line: ref.line, message: `Family ${record.id} has more than one ${tag}; ${ref.ref} ignored` });
        }
      }
      return resolved;
    };

    record.husbandRef = resolveSpouse(pending.husb, 'HUSB');
    record.wifeRef = resolveSpouse(pending.wife, 'WIFE');
    for (const spouse of [record.husbandRef, record.wifeRef]) {
      if (spouse !== undefined && !record.spouseRefs.includes(spouse)) {
        record.spouseRefs.push(spouse);
      }
    }

    // 每个人只有一个父母家庭: FAMC 优先，否则取第一个列出其 CHIL 的家庭
    for (const child of pending.chil) {
      const childRecord = individuals.get(child.ref)?.record;
      if (!childRecord) {
        warnings.push({ line: child.line, message: `Family ${record.id} references missing individual ${child.ref} (CHIL)` });
      } else if (record.childRefs.includes(child.ref)) {
        warnings.push({ line: child.line, message: `Family ${record.id} lists child ${child.ref} more than once` });
      } else if (childRecord.parentFamilyRef !== undefined && childRecord.parentFamilyRef !== record.id) {
        warnings.push({
          line: child.line,
          message: `Family ${record.id} lists child ${child.ref} whose parent family is ${childRecord.parentFamilyRef}; link ignored`
        });
      } else {
        childRecord.parentFamilyRef = record.id;
        record.childRefs.push(child.ref);
      }
    }
  }

  const individualRecords = [...individuals.values()].map(pending => pending.record);
  const familyRecords = [...families.values()].map(pending => pending.record);

  // 环检测: 自己是自己祖先的个人只报告警告，不拒绝导入
  const index = new RelationshipIndex(individualRecords, familyRecords);
  for (const id of findCycleMembers(index, individualRecords)) {
    warnings.push({ message: `Individual ${id} appears among their own ancestors` });
  }

  return { individuals: individualRecords, families: familyRecords, warnings };
};
