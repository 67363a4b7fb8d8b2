/**
 * ENDF-6 materials: split a tape into (MF, MT) sections and decode the
 * descriptive header (MF=1/MT=451) and cross sections (MF=3).
 */

import { malformedRecord, notFound } from '../shared/index.js';
import { parseControlColumns, type ControlColumns } from './fields.js';
import {
  EndfLineReader,
  readContRecord,
  readHeadRecord,
  readTab1Record,
  readTextRecord,
} from './records.js';
import type { Tabulated1D } from './tabulated.js';

const LIBRARY_NAMES: Record<number, string> = {
  0: 'ENDF/B',
  1: 'ENDF/A',
  2: 'JEFF',
  3: 'EFF',
  4: 'ENDF/B High Energy',
  5: 'CENDL',
  6: 'JENDL',
  17: 'TENDL',
  18: 'ROSFOND',
  21: 'SG-23',
  31: 'INDL/V',
  32: 'INDL/A',
  33: 'FENDL',
  34: 'IRDF',
  35: 'BROND',
  36: 'INGDB-90',
  37: 'FENDL/A',
  38: 'IAEA/PD',
  41: 'BROND',
};

const SUBLIBRARY_NAMES: Record<number, string> = {
  0: 'Photo-nuclear data',
  1: 'Photo-induced fission product yields',
  3: 'Photo-atomic data',
  4: 'Radioactive decay data',
  5: 'Spontaneous fission product yields',
  6: 'Atomic relaxation data',
  10: 'Incident-neutron data',
  11: 'Neutron-induced fission product yields',
  12: 'Thermal neutron scattering data',
  19: 'Neutron standards',
  113: 'Electro-atomic data',
  10010: 'Incident-proton data',
  10011: 'Proton-induced fission product yields',
  10020: 'Incident-deuteron data',
  10030: 'Incident-triton data',
  20030: 'Incident-helion (3He) data',
  20040: 'Incident-alpha data',
};

export interface DirectoryEntry {
  MF: number;
  MT: number;
  NC: number;
  MOD: number;
}

export interface Mf1Mt451 {
  ZA: number;
  AWR: number;
  LRP: number;
  LFI: number;
  NLIB: number;
  NMOD: number;
  ELIS: number;
  STA: number;
  LIS: number;
  LISO: number;
  NFOR: number;
  AWI: number;
  EMAX: number;
  LREL: number;
  NSUB: number;
  NVER: number;
  TEMP: number;
  LDRV: number;
  NWD: number;
  NXC: number;
  library: string | null;
  sublibrary: string | null;
  ZSYMAM: string | null;
  ALAB: string | null;
  EDATE: string | null;
  AUTH: string | null;
  REF: string | null;
  DDATE: string | null;
  RDATE: string | null;
  ENDATE: string | null;
  HSUB: string[];
  description: string[];
  sectionList: DirectoryEntry[];
}

export interface Mf3CrossSection {
  ZA: number;
  AWR: number;
  QM: number;
  QI: number;
  LR: number;
  sigma: Tabulated1D;
}

export function parseMf1Mt451(lines: readonly string[]): Mf1Mt451 {
  const reader = new EndfLineReader(lines);
  const head = readHeadRecord(reader);
  const cont1 = readContRecord(reader);
  const cont2 = readContRecord(reader);
  const cont3 = readContRecord(reader);
  const nwd = cont3.N1;
  const nxc = cont3.N2;

  const text: string[] = [];
  for (let i = 0; i < nwd; i += 1) text.push(readTextRecord(reader));

  const first = text[0] ?? '';
  const second = text[1] ?? '';
  const labelled = text.length >= 5;
  const pick = (line: string, start: number, end: number): string | null =>
    labelled ? line.slice(start, end).trim() : null;

  const sectionList: DirectoryEntry[] = [];
  for (let i = 0; i < nxc; i += 1) {
    const { L1, L2, N1, N2 } = readContRecord(reader, { skipC: true });
    sectionList.push({ MF: L1, MT: L2, NC: N1, MOD: N2 });
  }

  return {
    ZA: head.ZA,
    AWR: head.AWR,
    LRP: head.L1,
    LFI: head.L2,
    NLIB: head.N1,
    NMOD: head.N2,
    ELIS: cont1.C1,
    STA: cont1.C2,
    LIS: cont1.L1,
    LISO: cont1.L2,
    NFOR: cont1.N2,
    AWI: cont2.C1,
    EMAX: cont2.C2,
    LREL: cont2.L1,
    NSUB: cont2.N1,
    NVER: cont2.N2,
    TEMP: cont3.C1,
    LDRV: cont3.L1,
    NWD: nwd,
    NXC: nxc,
    library: LIBRARY_NAMES[head.N1] ?? null,
    sublibrary: SUBLIBRARY_NAMES[cont2.N1] ?? null,
    ZSYMAM: pick(first, 0, 11),
    ALAB: pick(first, 11, 22),
    EDATE: pick(first, 22, 32),
    AUTH: pick(first, 32, 66),
    REF: pick(second, 1, 22),
    DDATE: pick(second, 22, 32),
    RDATE: pick(second, 33, 43),
    ENDATE: pick(second, 55, 63),
    HSUB: labelled ? text.slice(2, 5).map(line => line.trimEnd()) : [],
    description: labelled ? text.slice(5).map(line => line.trimEnd()) : [],
    sectionList,
  };
}

export function parseMf3(lines: readonly string[]): Mf3CrossSection {
  const reader = new EndfLineReader(lines);
  const { ZA, AWR } = readHeadRecord(reader);
  const { params, table } = readTab1Record(reader);
  return { ZA, AWR, QM: params.C1, QI: params.C2, LR: params.L2, sigma: table };
}

function sectionKey(mf: number, mt: number): string {
  return `${mf}/${mt}`;
}

/** One material (MAT) of an ENDF-6 tape, held as raw section lines. */
export class EndfMaterial {
  private readonly sectionLines = new Map<string, string[]>();
  private readonly order: Array<[number, number]> = [];

  constructor(readonly MAT: number) {}

  /** (MF, MT) pairs in tape order. */
  get sections(): Array<[number, number]> {
    return this.order.map(([mf, mt]) => [mf, mt]);
  }

  has(mf: number, mt: number): boolean {
    return this.sectionLines.has(sectionKey(mf, mt));
  }

  section(mf: number, mt: number): string[] {
    const lines = this.sectionLines.get(sectionKey(mf, mt));
    if (!lines) throw notFound(`MAT=${this.MAT} has no MF=${mf} MT=${mt} section`, { MAT: this.MAT, MF: mf, MT: mt });
    return lines;
  }

  appendLine(mf: number, mt: number, line: string): void {
    const key = sectionKey(mf, mt);
    let lines = this.sectionLines.get(key);
    if (!lines) {
      lines = [];
      this.sectionLines.set(key, lines);
      this.order.push([mf, mt]);
    }
    lines.push(line);
  }

  header(): Mf1Mt451 {
    return parseMf1Mt451(this.section(1, 451));
  }

  crossSection(mt: number): Mf3CrossSection {
    return parseMf3(this.section(3, mt));
  }

  /** Short label, e.g. "Incident-neutron data for Pb208 ENDF/B". */
  describe(): string {
    if (!this.has(1, 451)) return `MAT=${this.MAT}`;
    const h = this.header();
    const name = h.ZSYMAM?.replace(/ /g, '') ?? `ZA=${h.ZA}`;
    return `${h.sublibrary ?? `NSUB=${h.NSUB}`} for ${name} ${h.library ?? `NLIB=${h.NLIB}`}`;
  }
}

/** Columns 1-70: data plus MAT. */
const MIN_CONTROL_LINE_LENGTH = 70;

function controlOf(line: string, lineNo: number): ControlColumns {
  if (line.length < MIN_CONTROL_LINE_LENGTH) {
    throw malformedRecord(`Line ${lineNo + 1} is too short to carry MAT/MF/MT columns`, {
      line: lineNo + 1,
      length: line.length,
    });
  }
  try {
    return parseControlColumns(line);
  } catch (err) {
    throw malformedRecord(`Unreadable MAT/MF/MT columns on line ${lineNo + 1}`, {
      line: lineNo + 1,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Read every material on an ENDF-6 tape.
 *
 * The first line is the tape identification (TPID) when it is not a data
 * line (MF=0 or unreadable control columns); it is skipped. Reading stops at
 * TEND (MAT=-1) or end of text.
 */
export function readMaterials(text: string): EndfMaterial[] {
  const lines = text.split(/\r?\n/);
  let start = 0;
  const tpid = lines[0];
  if (tpid !== undefined) {
    try {
      if (parseControlColumns(tpid).MF === 0) start = 1;
    } catch {
      start = 1;
    }
  }

  const materials: EndfMaterial[] = [];
  let current: EndfMaterial | null = null;

  for (let i = start; i < lines.length; i += 1) {
    const line = lines[i] ?? '';
    if (line.trim().length === 0) continue;
    const { MAT, MF, MT } = controlOf(line, i);

    if (MAT === -1) break;
    if (MAT === 0) {
      current = null;
      continue;
    }
    if (MF === 0 || MT === 0) continue;

    if (current === null || current.MAT !== MAT) {
      current = new EndfMaterial(MAT);
      materials.push(current);
    }
    current.appendLine(MF, MT, line);
  }

  return materials;
}

/** The first material on a tape. */
export function readMaterial(text: string): EndfMaterial {
  const [first] = readMaterials(text);
  if (!first) throw notFound('No ENDF-6 material found in input');
  return first;
}
