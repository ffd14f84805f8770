// Command-line front end: obtain an objdump listing (by running objdump or by
// reading a saved one), normalize it and write the canonical text out.
import fs from 'node:fs';
import { Disassembly } from './disasm/disassembly';
import type { RenderOptions } from './disasm/instruction';
import { DisasmError } from './disasm/errors';
import { loadConfig } from './config';
import type { Env } from './config';
import { createLogger } from './utils/log';
import type { Logger } from './utils/log';
import { fingerprint } from './utils/hash';
import { decodeUtf8 } from './utils/text';
import { runObjdump } from './tools/objdump';

export class UsageError extends Error {}

export interface CliOptions {
  objFile?: string;
  input?: string;
  executable?: string;
  out?: string;
  includeOperands?: boolean;
  includeComments?: boolean;
  hash: boolean;
  help: boolean;
}

export const USAGE = `Usage: disasm-normalize <OBJ-FILE> [options]

Disassemble <OBJ-FILE> with objdump and print an address-free listing,
grouped by section and symbol and sorted by name.

Options:
  -e, --executable <FILE>  Use the objdump executable <FILE> (default: $DISASM_OBJDUMP or objdump)
  -o, --out <FILE>         Place the output into <FILE> instead of stdout
  -i, --input <FILE>       Normalize a saved objdump listing instead of running objdump
      --operands           Keep instruction operands
      --comments           Keep trailing '#' comments
      --hash               Print an FNV-1a fingerprint of the listing instead of the listing
  -h, --help               Show this help`;

const VALUE_FLAGS: Record<string, 'executable' | 'out' | 'input'> = {
  '-e': 'executable', '--executable': 'executable',
  '-o': 'out', '--out': 'out',
  '-i': 'input', '--input': 'input',
};

export function parseArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = { hash: false, help: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('-') || a === '-') { positional.push(a); continue; }

    const eq = a.indexOf('=');
    const name = a.startsWith('--') && eq > 0 ? a.slice(0, eq) : a;
    const inline = a.startsWith('--') && eq > 0 ? a.slice(eq + 1) : undefined;

    const key = VALUE_FLAGS[name];
    if (key) {
      const value = inline ?? argv[i + 1];
      // A following flag is never taken as the value.
      if (value === undefined || value.length === 0 || (inline === undefined && value.startsWith('-'))) {
        throw new UsageError(`${name} requires a value`);
      }
      if (inline === undefined) i++;
      opts[key] = value;
      continue;
    }
    if (inline !== undefined) throw new UsageError(`${name} does not take a value`);

    switch (name) {
      case '--operands': opts.includeOperands = true; break;
      case '--comments': opts.includeComments = true; break;
      case '--hash': opts.hash = true; break;
      case '-h':
      case '--help': opts.help = true; break;
      default: throw new UsageError(`unknown flag: ${name}`);
    }
  }

  if (positional.length > 1) throw new UsageError(`unexpected argument: ${positional[1]}`);
  opts.objFile = positional[0];
  if (!opts.help && opts.objFile === undefined && opts.input === undefined) {
    throw new UsageError('missing <OBJ-FILE>');
  }
  if (opts.objFile !== undefined && opts.input !== undefined) {
    throw new UsageError('<OBJ-FILE> and --input are mutually exclusive');
  }
  return opts;
}

// Everything the CLI touches outside the process, swappable in tests.
export interface CliIo {
  isFile(p: string): boolean;
  readFile(p: string): Uint8Array;
  writeFile(p: string, data: string): void;
  stdout(data: string): void;
  stderr(data: string): void;
  objdump(objFile: string, executable: string, log: Logger): Promise<string>;
}

export const nodeIo: CliIo = {
  isFile: (p) => {
    try {
      return fs.statSync(p).isFile();
    } catch {
      return false;
    }
  },
  readFile: (p) => fs.readFileSync(p),
  writeFile: (p, data) => fs.writeFileSync(p, data, 'utf8'),
  stdout: (data) => { process.stdout.write(data); },
  stderr: (data) => { process.stderr.write(data); },
  objdump: (objFile, executable, log) => runObjdump(objFile, { executable, log }),
};

function requireFile(io: CliIo, p: string): void {
  if (!io.isFile(p)) throw new UsageError(`${p}: File does not exist!`);
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

async function obtainListing(opts: CliOptions, io: CliIo, executable: string, log: Logger): Promise<string> {
  if (opts.input !== undefined) {
    requireFile(io, opts.input);
    let bytes: Uint8Array;
    try {
      bytes = io.readFile(opts.input);
    } catch (e) {
      throw DisasmError.ioFailure(errorMessage(e));
    }
    const text = decodeUtf8(bytes);
    if (text === null) throw DisasmError.ioFailure(`${opts.input}: not valid UTF-8`);
    return text;
  }
  if (opts.objFile === undefined) throw new UsageError('missing <OBJ-FILE>');
  requireFile(io, opts.objFile);
  // A bare command name is looked up on PATH by spawn; only explicit paths are checked.
  if (opts.executable !== undefined) requireFile(io, opts.executable);
  return io.objdump(opts.objFile, executable, log);
}

// Exit codes: 0 success, 1 parse or I/O failure, 2 bad arguments.
export async function runCli(argv: readonly string[], io: CliIo = nodeIo, env: Env = process.env): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv);
  } catch (e) {
    io.stderr(`error: ${errorMessage(e)}\n\n${USAGE}\n`);
    return 2;
  }
  if (opts.help) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  const config = loadConfig(env);
  const log = createLogger(config, (line) => io.stderr(`${line}\n`));
  const render: RenderOptions = {
    includeOperands: opts.includeOperands ?? config.render.includeOperands,
    includeComments: opts.includeComments ?? config.render.includeComments,
  };
  const executable = opts.executable ?? config.objdump;

  try {
    const listing = await obtainListing(opts, io, executable, log);
    const disasm = Disassembly.parse(listing, { log });
    const text = disasm.render(render);
    const result = opts.hash ? `${fingerprint(text)}  ${opts.objFile ?? opts.input ?? ''}\n` : text;

    if (opts.out !== undefined) {
      try {
        io.writeFile(opts.out, result);
      } catch (e) {
        throw DisasmError.ioFailure(errorMessage(e));
      }
      log.info('CLI', `wrote ${result.length} chars to ${opts.out}`);
    } else {
      io.stdout(result);
    }
    return 0;
  } catch (e) {
    if (e instanceof UsageError) {
      io.stderr(`error: ${e.message}\n`);
      return 2;
    }
    io.stderr(`error: ${errorMessage(e)}\n`);
    return 1;
  }
}
