// Runs objdump and captures its listing. The flags strip addresses and raw
// instruction bytes so the parser only ever sees mnemonics and operands.
import { spawn } from 'node:child_process';
import type { SpawnOptionsWithoutStdio } from 'node:child_process';
import { DisasmError } from '../disasm/errors';
import { silentLogger } from '../utils/log';
import { decodeUtf8 } from '../utils/text';
import type { Logger } from '../utils/log';

export const OBJDUMP_FLAGS = ['-d', '--no-addresses', '--no-show-raw-insn'] as const;

export function objdumpArgs(objFile: string): string[] {
  return [...OBJDUMP_FLAGS, objFile];
}

// Subset of ChildProcess the runner relies on, so tests can hand in a fake.
export interface ChildLike {
  stdout: NodeJS.ReadableStream | null;
  stderr: NodeJS.ReadableStream | null;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null) => void): unknown;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptionsWithoutStdio) => ChildLike;

export interface RunObjdumpOptions {
  executable?: string;
  spawnFn?: SpawnFn;
  log?: Logger;
}

function hasCode(err: Error): err is Error & { code: string } {
  return 'code' in err && typeof err.code === 'string';
}

export function runObjdump(objFile: string, opts: RunObjdumpOptions = {}): Promise<string> {
  const executable = opts.executable ?? 'objdump';
  const spawnFn: SpawnFn = opts.spawnFn ?? spawn;
  const log = opts.log ?? silentLogger;
  const args = objdumpArgs(objFile);
  log.info('OBJDUMP', `${executable} ${args.join(' ')}`);

  return new Promise<string>((resolve, reject) => {
    const out: Buffer[] = [];
    const err: Buffer[] = [];
    const proc = spawnFn(executable, args, { stdio: 'pipe' });

    proc.stdout?.on('data', (chunk: Buffer) => { out.push(chunk); });
    proc.stderr?.on('data', (chunk: Buffer) => { err.push(chunk); });

    proc.on('error', (e) => {
      if (hasCode(e) && e.code === 'ENOENT') {
        reject(DisasmError.ioFailure(`'${executable}' was not found! Check your PATH or explicitly provide an executable`));
        return;
      }
      reject(DisasmError.ioFailure(e.message));
    });

    proc.on('close', (code) => {
      const stderr = decodeUtf8(Buffer.concat(err));
      if (stderr === null) {
        reject(DisasmError.ioFailure(`'${executable}' wrote invalid UTF-8 to stderr`));
        return;
      }
      // objdump reports unreadable or unsupported files on stderr, sometimes
      // with exit code 0.
      if (stderr.length > 0) {
        reject(DisasmError.ioFailure(stderr));
        return;
      }
      if (code !== 0) {
        reject(DisasmError.ioFailure(`'${executable}' exited with code ${code ?? 'null'}`));
        return;
      }
      const stdout = decodeUtf8(Buffer.concat(out));
      if (stdout === null) {
        reject(DisasmError.ioFailure(`'${executable}' wrote invalid UTF-8 to stdout`));
        return;
      }
      log.info('OBJDUMP', `captured ${stdout.length} chars`);
      resolve(stdout);
    });
  });
}
