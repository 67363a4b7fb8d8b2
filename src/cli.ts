import * as path from 'path';
import { readEndfFile } from './config.js';
import { normalizeEndfNumeral, parseEndfFloat, readMaterials } from './endf/index.js';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIo: CliIo = {
  out: (line) => { process.stdout.write(`${line}\n`); },
  err: (line) => { console.error(line); },
};

function usage(): string {
  return [
    'Usage:',
    '  endf-mcp                          start the MCP stdio server',
    '  endf-mcp parse [--verbose] <field>...   print each ENDF float field as a number',
    '  endf-mcp sections <file>          print the (MF, MT) sections of an ENDF-6 file as JSON',
  ].join('\n');
}

function runParse(argv: string[], io: CliIo): void {
  const verbose = argv[0] === '--verbose' || argv[0] === '-v';
  const fields = verbose ? argv.slice(1) : argv;
  if (fields.length === 0) throw new Error(`parse needs at least one field\n${usage()}`);
  for (const field of fields) {
    const value = parseEndfFloat(field);
    io.out(verbose ? `${JSON.stringify(field)}\t${normalizeEndfNumeral(field)}\t${value}` : String(value));
  }
}

async function runSections(argv: string[], io: CliIo): Promise<void> {
  const file = argv[0];
  if (!file || argv.length > 1) throw new Error(`sections takes exactly one file\n${usage()}`);
  const text = await readEndfFile(path.resolve(file));
  const summary = readMaterials(text).map(material => ({
    MAT: material.MAT,
    sections: material.sections,
  }));
  io.out(JSON.stringify(summary));
}

/** Returns true when `argv` named a CLI command (and it ran). */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<boolean> {
  const [command, ...rest] = argv;
  if (command === 'parse') {
    runParse(rest, io);
    return true;
  }
  if (command === 'sections') {
    await runSections(rest, io);
    return true;
  }
  if (command === '--help' || command === '-h' || command === 'help') {
    io.err(usage());
    return true;
  }
  if (command !== undefined) {
    throw new Error(`Unknown command: ${command}\n${usage()}`);
  }
  return false;
}
